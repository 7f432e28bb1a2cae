/**
 * BaseAgent: the class every discoverable adapter extends.
 *
 * Subclasses provide the four metadata fields and run(). invoke() wraps
 * run() with model validation and error normalisation, so callers only
 * ever see strings or AdapterError.
 */

import { AdapterError, toAdapterError } from "./errors.ts";
import { agentKey, type AgentAdapter, type AgentDescriptor, type InvokeOptions } from "./types.ts";

/**
 * Brand carried by BaseAgent and inherited by every subclass.
 * Registered globally so an adapter loaded against a second copy of this
 * module is still recognised.
 */
export const ADAPTER_BRAND = Symbol.for("agent-arena.adapter");

export abstract class BaseAgent implements AgentAdapter {
  static readonly [ADAPTER_BRAND] = true;

  abstract readonly framework: string;
  abstract readonly name: string;
  abstract readonly displayName: string;
  abstract readonly description: string;

  private frozen?: AgentDescriptor;

  get descriptor(): AgentDescriptor {
    if (!this.frozen) {
      this.frozen = Object.freeze({
        framework: this.framework,
        name: this.name,
        displayName: this.displayName,
        description: this.description,
      });
    }
    return this.frozen;
  }

  /**
   * Models this agent accepts. Undefined (the default) accepts any model.
   */
  supportedModels(): readonly string[] | undefined {
    return undefined;
  }

  async invoke(
    message: string,
    model: string,
    conversationId: string,
    options: InvokeOptions = {},
  ): Promise<string> {
    const key = agentKey(this);
    const supported = this.supportedModels();
    if (supported && !supported.includes(model)) {
      throw new AdapterError(
        "invalid-model",
        `Model '${model}' is not supported by ${key}. Supported: ${supported.join(", ")}`,
        { agent: key },
      );
    }

    try {
      return await this.run(message, model, conversationId, options);
    } catch (error) {
      throw toAdapterError(error, key);
    }
  }

  /** Framework-specific work. May throw anything. */
  protected abstract run(
    message: string,
    model: string,
    conversationId: string,
    options: InvokeOptions,
  ): Promise<string>;
}

/** A class that can be instantiated with no arguments into an adapter */
export type AgentClass = new () => AgentAdapter;

/**
 * True for concrete adapter classes: constructors that inherit the
 * brand, excluding BaseAgent itself.
 */
export function isAgentClass(value: unknown): value is AgentClass {
  return typeof value === "function" && value !== BaseAgent && Reflect.get(value, ADAPTER_BRAND) === true;
}

/** Structural check for adapter objects that do not extend BaseAgent */
export function isAgentAdapter(value: unknown): value is AgentAdapter {
  if (typeof value !== "object" || value === null) return false;
  const fields = ["framework", "name", "displayName", "description"] as const;
  return (
    fields.every((f) => typeof Reflect.get(value, f) === "string") &&
    typeof Reflect.get(value, "invoke") === "function" &&
    typeof Reflect.get(value, "descriptor") === "object"
  );
}
