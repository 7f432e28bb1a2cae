/**
 * agent-arena: run many agent frameworks behind one chat API.
 */

// Adapter contract
export { BaseAgent, ADAPTER_BRAND, isAgentClass, isAgentAdapter } from "./agents/base.ts";
export type { AgentClass } from "./agents/base.ts";
export { agentKey } from "./agents/types.ts";
export type {
  AgentAdapter,
  AgentDescriptor,
  ChatMessage,
  ChatRole,
  InvokeOptions,
} from "./agents/types.ts";
export {
  AdapterError,
  ADAPTER_ERROR_KINDS,
  classifyError,
  toAdapterError,
} from "./agents/errors.ts";
export type { AdapterErrorKind, ClassifiedError } from "./agents/errors.ts";

// Registry & discovery
export { AgentRegistry } from "./registry/registry.ts";
export type { FrameworkGroup } from "./registry/registry.ts";
export {
  AGENT_MODULE_NAMES,
  collectAdapters,
  discoverAgents,
  findAgentModules,
} from "./registry/discovery.ts";
export type {
  DiscoveryOptions,
  DiscoveryReport,
  DiscoveryResult,
  ModuleImporter,
} from "./registry/discovery.ts";
export { AgentNotFoundError, DiscoveryError, DuplicateAgentError } from "./registry/errors.ts";

// Server
export { createArenaApp } from "./server/app.ts";
export type { AgentInfo, ArenaApp, ArenaAppOptions, ConfigResponse } from "./server/app.ts";
export { ADAPTER_ERROR_STATUS, chatRequestSchema, dispatchChat } from "./server/dispatch.ts";
export type { ChatRequest, DispatchOptions, DispatchResult } from "./server/dispatch.ts";
export { startHttpServer } from "./server/serve.ts";
export type { ServerHandle, ServeOptions } from "./server/serve.ts";
export { startArena } from "./server/arena.ts";
export type { RunningArena } from "./server/arena.ts";

// Config
export {
  ConfigError,
  DEFAULT_CONFIG_FILE,
  DEFAULT_HOST,
  DEFAULT_INVOKE_TIMEOUT,
  DEFAULT_PORT,
  loadConfig,
  parseConfigFile,
} from "./config.ts";
export type { ArenaConfig, LoadConfigOptions } from "./config.ts";

// Helpers for adapters
export { createModel, defaultModelCatalog, FRONTIER_MODELS } from "./models.ts";
export { createMcpToolBridge, loadMcpConfig } from "./mcp.ts";
export type { McpConfig, McpServerConfig, McpToolBridge } from "./mcp.ts";
export {
  DEFAULT_STARTUP_TIMEOUT,
  IdleTimeoutError,
  ProcessExitError,
  runWithIdleTimeout,
} from "./process.ts";
export type { RunOptions, RunResult } from "./process.ts";

// Client & logging
export { ApiError, createClient, DEFAULT_URL } from "./cli/client.ts";
export type { ArenaClient, ClientOptions } from "./cli/client.ts";
export { createLogger, createSilentLogger, formatArg, formatFields } from "./logger.ts";
export type { LogFields, LogLevel, Logger, LoggerConfig } from "./logger.ts";
