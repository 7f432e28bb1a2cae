/**
 * Registry errors
 */

/** A module failed to import, or an adapter failed to construct. Non-fatal. */
export class DiscoveryError extends Error {
  /** File the failure came from */
  readonly modulePath: string;
  /** Export name, when the failure was a constructor */
  readonly exportName?: string;

  constructor(modulePath: string, message: string, options: { cause?: unknown; exportName?: string } = {}) {
    super(message, { cause: options.cause });
    this.name = "DiscoveryError";
    this.modulePath = modulePath;
    this.exportName = options.exportName;
  }
}

/** Two adapters reported the same (framework, name). Fatal at startup. */
export class DuplicateAgentError extends Error {
  readonly framework: string;
  readonly agentName: string;
  /** Where the first registration came from, if known */
  readonly firstSource?: string;
  /** Where the rejected registration came from, if known */
  readonly source?: string;

  constructor(framework: string, agentName: string, sources: { first?: string; second?: string } = {}) {
    const where =
      sources.first || sources.second
        ? ` (first: ${sources.first ?? "unknown"}, duplicate: ${sources.second ?? "unknown"})`
        : "";
    super(`Duplicate agent '${framework}/${agentName}'${where}`);
    this.name = "DuplicateAgentError";
    this.framework = framework;
    this.agentName = agentName;
    this.firstSource = sources.first;
    this.source = sources.second;
  }
}

/** No agent matches a lookup */
export class AgentNotFoundError extends Error {
  readonly agentName: string;
  /** Qualified names that matched an ambiguous bare name */
  readonly candidates: string[];

  constructor(agentName: string, candidates: string[] = []) {
    super(
      candidates.length > 1
        ? `Agent '${agentName}' is ambiguous. Use one of: ${candidates.join(", ")}.`
        : `Agent '${agentName}' not found.`,
    );
    this.name = "AgentNotFoundError";
    this.agentName = agentName;
    this.candidates = candidates;
  }
}
