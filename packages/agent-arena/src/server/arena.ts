/**
 * Process startup: discover adapters, build the app, listen.
 *
 * The registry is complete and sealed before the first request is
 * accepted.
 */

import type { ArenaConfig } from "../config.ts";
import { createLogger, type Logger } from "../logger.ts";
import { discoverAgents, type DiscoveryReport } from "../registry/discovery.ts";
import type { AgentRegistry } from "../registry/registry.ts";
import { createArenaApp } from "./app.ts";
import { startHttpServer, type ServerHandle } from "./serve.ts";

export interface RunningArena {
  registry: AgentRegistry;
  report: DiscoveryReport;
  server: ServerHandle;
  url: string;
  stop(): Promise<void>;
}

export async function startArena(config: ArenaConfig, logger: Logger = createLogger()): Promise<RunningArena> {
  if (config.source) {
    logger.info(`Config: ${config.source}`);
  }
  logger.info(`Agent roots: ${config.agentRoots.join(", ") || "(none)"}`);

  const { registry, report } = await discoverAgents(config.agentRoots, {
    logger: logger.child("registry"),
  });

  const app = createArenaApp({
    registry,
    models: config.models,
    invokeTimeout: config.invokeTimeout,
    mcpConfigPath: config.mcpConfig,
    logger: logger.child("chat"),
  });

  const server = await startHttpServer(app, { port: config.port, hostname: config.host });
  const url = `http://${config.host}:${server.port}`;
  logger.info(`Listening: ${url}`);

  let stopping: Promise<void> | undefined;
  const stop = () => {
    stopping ??= server.close().then(() => logger.info("Server stopped"));
    return stopping;
  };

  return { registry, report, server, url, stop };
}
