/**
 * AgentRegistry: startup-built, read-only index of adapters.
 *
 * Keyed by the (framework, name) pair. A lookup string resolves when it
 * names exactly one agent, either as a bare name or as "framework/name".
 */

import { agentKey, type AgentAdapter, type AgentDescriptor } from "../agents/types.ts";
import { AgentNotFoundError, DuplicateAgentError } from "./errors.ts";

interface Entry {
  adapter: AgentAdapter;
  /** Module path or label the adapter came from */
  source?: string;
}

export interface FrameworkGroup {
  name: string;
  agents: AgentDescriptor[];
}

export class AgentRegistry {
  /** framework → name → entry */
  private entries = new Map<string, Map<string, Entry>>();
  private ordered: Entry[] = [];
  private byName = new Map<string, Entry[]>();
  private sealed = false;

  /**
   * Register an adapter. Fails fast on a duplicate (framework, name):
   * the first registration is kept and DuplicateAgentError is thrown.
   */
  register(adapter: AgentAdapter, source?: string): void {
    if (this.sealed) {
      throw new Error(`Registry is sealed; cannot register ${agentKey(adapter)}`);
    }

    const descriptor = adapter.descriptor;
    const existing = this.lookup(descriptor.framework, descriptor.name);
    if (existing) {
      throw new DuplicateAgentError(descriptor.framework, descriptor.name, {
        first: existing.source,
        second: source,
      });
    }

    const entry: Entry = { adapter, source };
    const names = this.entries.get(descriptor.framework) ?? new Map<string, Entry>();
    names.set(descriptor.name, entry);
    this.entries.set(descriptor.framework, names);
    this.ordered.push(entry);
    this.byName.set(descriptor.name, [...(this.byName.get(descriptor.name) ?? []), entry]);
  }

  /** Disallow further registration. Called once serving begins. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.ordered.length;
  }

  /**
   * Look up an agent by bare name or "framework/name".
   * @throws AgentNotFoundError when nothing (or more than one agent) matches
   */
  get(name: string): AgentAdapter {
    const matches = this.resolve(name);
    if (matches.length === 1 && matches[0]) return matches[0].adapter;
    throw new AgentNotFoundError(
      name,
      matches.map((entry) => agentKey(entry.adapter.descriptor)),
    );
  }

  getByIdentity(framework: string, name: string): AgentAdapter {
    const entry = this.lookup(framework, name);
    if (!entry) {
      throw new AgentNotFoundError(agentKey({ framework, name }));
    }
    return entry.adapter;
  }

  has(name: string): boolean {
    return this.resolve(name).length === 1;
  }

  /** Source recorded for an agent at registration */
  sourceOf(framework: string, name: string): string | undefined {
    return this.lookup(framework, name)?.source;
  }

  /** Descriptors in registration order */
  list(): AgentDescriptor[] {
    return this.ordered.map((e) => e.adapter.descriptor);
  }

  /** Descriptors grouped by framework, frameworks in first-seen order */
  frameworks(): FrameworkGroup[] {
    const groups = new Map<string, AgentDescriptor[]>();
    for (const descriptor of this.list()) {
      const agents = groups.get(descriptor.framework) ?? [];
      agents.push(descriptor);
      groups.set(descriptor.framework, agents);
    }
    return Array.from(groups, ([name, agents]) => ({ name, agents }));
  }

  private lookup(framework: string, name: string): Entry | undefined {
    return this.entries.get(framework)?.get(name);
  }

  /**
   * Every distinct entry `name` can refer to, in registration order:
   * agents with that bare name, plus each "framework/name" split of it.
   */
  private resolve(name: string): Entry[] {
    const matches = new Set<Entry>(this.byName.get(name));
    for (let slash = name.indexOf("/"); slash !== -1; slash = name.indexOf("/", slash + 1)) {
      const entry = this.lookup(name.slice(0, slash), name.slice(slash + 1));
      if (entry) matches.add(entry);
    }
    return this.ordered.filter((entry) => matches.has(entry));
  }
}
