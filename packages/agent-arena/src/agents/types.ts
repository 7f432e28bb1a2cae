/**
 * Agent adapter contract
 *
 * An adapter wraps one third-party agent framework behind a fixed
 * invoke() signature. The core only ever sees this interface.
 */

import type { Logger } from "../logger.ts";

/** Identity and display metadata of one adapter */
export interface AgentDescriptor {
  /** Framework the agent belongs to, e.g. "AISDK" */
  readonly framework: string;
  /** Technical name used by the API, unique within its framework */
  readonly name: string;
  /** Friendly name shown in the UI */
  readonly displayName: string;
  /** Short help text */
  readonly description: string;
}

export type ChatRole = "user" | "assistant" | "system";

/** One earlier turn of a conversation */
export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface InvokeOptions {
  /** Earlier turns, oldest first (excluding the current message) */
  history?: ChatMessage[];
  /** Aborted when the dispatcher gives up on the call */
  signal?: AbortSignal;
  /** Request-scoped logger */
  logger?: Logger;
  /** MCP tool config file, for adapters that use MCP tools */
  mcpConfigPath?: string;
}

export interface AgentAdapter extends AgentDescriptor {
  /** Frozen snapshot of the metadata */
  readonly descriptor: AgentDescriptor;
  /**
   * Run the agent on one message.
   * Rejects with AdapterError (timeout | upstream-error | invalid-model).
   */
  invoke(
    message: string,
    model: string,
    conversationId: string,
    options?: InvokeOptions,
  ): Promise<string>;
}

/** Qualified identity string, "framework/name" */
export function agentKey(descriptor: Pick<AgentDescriptor, "framework" | "name">): string {
  return `${descriptor.framework}/${descriptor.name}`;
}
