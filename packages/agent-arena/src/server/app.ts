/**
 * Dispatch API (Hono)
 *
 *   GET  /health   liveness, no dependencies checked
 *   GET  /config   frameworks → agents, plus the model catalog
 *   GET  /agents   flat descriptor list
 *   POST /chat     run one agent on one message
 *
 * Errors are JSON `{ detail }` bodies. The app holds no mutable state:
 * the registry is sealed before it is handed over.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { agentKey, type AgentDescriptor } from "../agents/types.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { AgentRegistry } from "../registry/registry.ts";
import { chatRequestSchema, dispatchChat } from "./dispatch.ts";

export interface ArenaAppOptions {
  registry: AgentRegistry;
  /** Model catalog served by GET /config */
  models?: string[];
  /** Deadline per invoke in ms, 0 disables */
  invokeTimeout?: number;
  mcpConfigPath?: string;
  logger?: Logger;
}

/** Wire shape of one agent in GET /config */
export interface AgentInfo {
  /** "framework/name"; always resolves in POST /chat, unlike a shared bare name */
  id: string;
  name: string;
  display_name: string;
  description: string;
}

export interface ConfigResponse {
  frameworks: Array<{ name: string; agents: AgentInfo[] }>;
  models: string[];
}

function toAgentInfo(descriptor: AgentDescriptor): AgentInfo {
  return {
    id: agentKey(descriptor),
    name: descriptor.name,
    display_name: descriptor.displayName,
    description: descriptor.description,
  };
}

export function createArenaApp(options: ArenaAppOptions) {
  const { registry } = options;
  const logger = options.logger ?? createSilentLogger();
  const models = [...(options.models ?? [])];

  const app = new Hono();
  app.use("*", cors());

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/config", (c) => {
    const body: ConfigResponse = {
      frameworks: registry.frameworks().map((group) => ({
        name: group.name,
        agents: group.agents.map(toAgentInfo),
      })),
      models,
    };
    return c.json(body);
  });

  app.get("/agents", (c) =>
    c.json({
      agents: registry.list().map((d) => ({ framework: d.framework, ...toAgentInfo(d) })),
    }),
  );

  app.post("/chat", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json({ detail: "Request body must be valid JSON" }, 400);
    }

    const parsed = chatRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
        .join("; ");
      return c.json({ detail }, 400);
    }

    const result = await dispatchChat(registry, parsed.data, {
      invokeTimeout: options.invokeTimeout,
      mcpConfigPath: options.mcpConfigPath,
      logger,
    });
    return c.json(result.body, result.status);
  });

  app.notFound((c) => c.json({ detail: `Not found: ${c.req.method} ${c.req.path}` }, 404));

  app.onError((error, c) => {
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${error.message}`);
    return c.json({ detail: `Internal server error: ${error.message}` }, 500);
  });

  return app;
}

export type ArenaApp = ReturnType<typeof createArenaApp>;
