/**
 * Adapter discovery
 *
 * Walks each configured root, imports every `agent.ts` / `agent.js`
 * module it finds and registers the adapters those modules export:
 *
 *   <root>/<Framework>/<agent>/agent.ts
 *
 * A module that fails to import, or an adapter whose constructor throws,
 * is logged and recorded as a DiscoveryError; the scan carries on.
 * A duplicate (framework, name) aborts discovery with DuplicateAgentError.
 */

import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { isAgentAdapter, isAgentClass } from "../agents/base.ts";
import { agentKey, type AgentAdapter } from "../agents/types.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import { DiscoveryError, DuplicateAgentError } from "./errors.ts";
import { AgentRegistry } from "./registry.ts";

/** File names treated as adapter modules */
export const AGENT_MODULE_NAMES = ["agent.ts", "agent.mts", "agent.js", "agent.mjs"];

const SKIPPED_DIRS = new Set(["node_modules", "dist", "coverage"]);

export type ModuleImporter = (modulePath: string) => Promise<Record<string, unknown>>;

export interface DiscoveryOptions {
  logger?: Logger;
  /** Registry to fill (default: a new one) */
  registry?: AgentRegistry;
  /** Module loader (default: dynamic import) */
  importModule?: ModuleImporter;
  /** Seal the registry once the scan is done (default: true) */
  seal?: boolean;
}

export interface DiscoveryReport {
  /** Adapter modules found, in scan order */
  modules: string[];
  /** Qualified keys registered, in registration order */
  registered: string[];
  failures: DiscoveryError[];
  /** Roots that did not exist */
  missingRoots: string[];
}

export interface DiscoveryResult {
  registry: AgentRegistry;
  report: DiscoveryReport;
}

const defaultImporter: ModuleImporter = (modulePath) => import(pathToFileURL(modulePath).href);

function isAgentModule(fileName: string): boolean {
  return AGENT_MODULE_NAMES.includes(fileName);
}

/**
 * Recursively collect adapter module paths under a directory.
 * Entries are visited in code-point order so the result is stable.
 */
export async function findAgentModules(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const found: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (SKIPPED_DIRS.has(entry.name)) continue;
      found.push(...(await findAgentModules(full)));
    } else if (entry.isFile() && isAgentModule(entry.name)) {
      found.push(full);
    }
  }
  return found;
}

/**
 * Instantiate every adapter a module exports.
 * Constructor failures, and identities with a '/' that would make
 * "framework/name" ambiguous, become DiscoveryErrors.
 */
export function collectAdapters(
  modulePath: string,
  exports: Record<string, unknown>,
): { adapters: AgentAdapter[]; failures: DiscoveryError[] } {
  const adapters: AgentAdapter[] = [];
  const failures: DiscoveryError[] = [];
  const seen = new Set<unknown>();

  const accept = (exportName: string, adapter: AgentAdapter) => {
    const { framework, name } = adapter.descriptor;
    if (framework.includes("/") || name.includes("/")) {
      failures.push(
        new DiscoveryError(
          modulePath,
          `${exportName} has a '/' in its framework or name (framework '${framework}', name '${name}')`,
          { exportName },
        ),
      );
      return;
    }
    adapters.push(adapter);
  };

  for (const [exportName, value] of Object.entries(exports)) {
    if (seen.has(value)) continue;
    seen.add(value);

    if (isAgentClass(value)) {
      let instance: AgentAdapter;
      try {
        instance = new value();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        failures.push(
          new DiscoveryError(modulePath, `Failed to construct ${exportName}: ${reason}`, {
            cause: error,
            exportName,
          }),
        );
        continue;
      }
      if (!isAgentAdapter(instance)) {
        failures.push(
          new DiscoveryError(
            modulePath,
            `${exportName} does not provide framework, name, displayName and description`,
            { exportName },
          ),
        );
        continue;
      }
      accept(exportName, instance);
    } else if (isAgentAdapter(value)) {
      accept(exportName, value);
    }
  }

  return { adapters, failures };
}

/**
 * Discover adapters under the given roots and register them.
 *
 * Roots are scanned in the order given; a root may also be a single
 * module file.
 */
export async function discoverAgents(
  roots: string[],
  options: DiscoveryOptions = {},
): Promise<DiscoveryResult> {
  const logger = options.logger ?? createSilentLogger();
  const registry = options.registry ?? new AgentRegistry();
  const importModule = options.importModule ?? defaultImporter;
  const report: DiscoveryReport = { modules: [], registered: [], failures: [], missingRoots: [] };

  const fail = (error: DiscoveryError) => {
    report.failures.push(error);
    logger.error(`Skipping ${error.modulePath}: ${error.message}`);
  };

  for (const root of roots) {
    const rootPath = resolve(root);
    let modules: string[];
    try {
      const info = await stat(rootPath);
      modules = info.isDirectory() ? await findAgentModules(rootPath) : [rootPath];
    } catch (error) {
      report.missingRoots.push(rootPath);
      logger.warn(`Agent root not readable, skipped: ${rootPath}`, error);
      continue;
    }

    logger.debug(`Scanning ${rootPath} (${modules.length} module(s))`);

    for (const modulePath of modules) {
      report.modules.push(modulePath);

      let exports: Record<string, unknown>;
      try {
        exports = await importModule(modulePath);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        fail(new DiscoveryError(modulePath, `Failed to import: ${reason}`, { cause: error }));
        continue;
      }

      const { adapters, failures } = collectAdapters(modulePath, exports);
      failures.forEach(fail);

      if (adapters.length === 0 && failures.length === 0) {
        logger.debug(`No adapters exported by ${modulePath}`);
      }

      for (const adapter of adapters) {
        try {
          registry.register(adapter, modulePath);
        } catch (error) {
          if (error instanceof DuplicateAgentError) {
            logger.error(error.message);
          }
          throw error;
        }
        const key = agentKey(adapter);
        report.registered.push(key);
        logger.info(`Registered agent '${key}' from ${modulePath}`);
      }
    }
  }

  if (options.seal ?? true) {
    registry.seal();
  }

  logger.info(
    `Registry ready: ${registry.size} agent(s), ${report.failures.length} failure(s)`,
  );
  return { registry, report };
}
