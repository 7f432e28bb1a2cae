/**
 * Arena configuration
 *
 * Read from arena.config.yaml, then overridden by ARENA_* environment
 * variables (ARENA_CONFIG, ARENA_HOST, ARENA_PORT, ARENA_AGENT_ROOTS,
 * ARENA_MODELS, ARENA_MCP_CONFIG), then by CLI flags. Relative paths in the file resolve
 * against the file's directory.
 */

import { existsSync, readFileSync } from "node:fs";
import { delimiter, dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { defaultModelCatalog } from "./models.ts";

export const DEFAULT_CONFIG_FILE = "arena.config.yaml";
export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = "127.0.0.1";
/** Same 300s the web client waits for an answer */
export const DEFAULT_INVOKE_TIMEOUT = 300_000;

const configFileSchema = z
  .object({
    agentRoots: z.array(z.string().min(1)).optional(),
    models: z.array(z.string().min(1)).optional(),
    server: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
      })
      .strict()
      .optional(),
    invokeTimeout: z.number().int().min(0).optional(),
    mcpConfig: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface ArenaConfig {
  /** Absolute discovery roots, scan order */
  agentRoots: string[];
  /** Model catalog served by GET /config */
  models: string[];
  host: string;
  port: number;
  /** Per-invoke deadline in ms, 0 disables */
  invokeTimeout: number;
  /** Absolute path of the MCP tool config, if any */
  mcpConfig?: string;
  /** Config file actually read, if any */
  source?: string;
}

export class ConfigError extends Error {
  readonly file?: string;

  constructor(message: string, options: { file?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.file = options.file;
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; missing file is an error */
  file?: string;
  /** Working directory for defaults (default: process.cwd()) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence overrides, typically CLI flags */
  overrides?: Partial<Pick<ArenaConfig, "agentRoots" | "models" | "host" | "port" | "invokeTimeout">>;
}

/**
 * Parse and validate the YAML text of a config file.
 * @throws ConfigError listing every invalid path
 */
export function parseConfigFile(content: string, file?: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
      { file, cause: error },
    );
  }

  const result = configFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config${file ? ` ${file}` : ""}:\n${messages}`, { file });
  }
  return result.data;
}

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

function splitList(value: string | undefined, separator: string): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(separator)
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function parsePort(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${name} must be a port number, got '${value}'`);
  }
  return port;
}

/**
 * Load configuration: defaults < file < environment < overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): ArenaConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.file ?? env.ARENA_CONFIG;

  let file: ConfigFile = {};
  let source: string | undefined;
  let baseDir = cwd;

  const candidate = resolveFrom(cwd, explicit ?? DEFAULT_CONFIG_FILE);
  if (existsSync(candidate)) {
    source = candidate;
    baseDir = dirname(candidate);
    file = parseConfigFile(readFileSync(candidate, "utf-8"), candidate);
  } else if (explicit) {
    throw new ConfigError(`Config file not found: ${candidate}`, { file: candidate });
  }

  const envRoots = splitList(env.ARENA_AGENT_ROOTS, delimiter)?.map((p) => resolveFrom(cwd, p));
  const envModels = splitList(env.ARENA_MODELS, ",");
  const overrides = options.overrides ?? {};

  return {
    agentRoots:
      overrides.agentRoots?.map((p) => resolveFrom(cwd, p)) ??
      envRoots ??
      (file.agentRoots ?? ["agents"]).map((p) => resolveFrom(baseDir, p)),
    models: overrides.models ?? envModels ?? file.models ?? defaultModelCatalog(),
    host: overrides.host ?? env.ARENA_HOST ?? file.server?.host ?? DEFAULT_HOST,
    port: overrides.port ?? parsePort(env.ARENA_PORT, "ARENA_PORT") ?? file.server?.port ?? DEFAULT_PORT,
    invokeTimeout: overrides.invokeTimeout ?? file.invokeTimeout ?? DEFAULT_INVOKE_TIMEOUT,
    mcpConfig: env.ARENA_MCP_CONFIG
      ? resolveFrom(cwd, env.ARENA_MCP_CONFIG)
      : file.mcpConfig
        ? resolveFrom(baseDir, file.mcpConfig)
        : undefined,
    source,
  };
}
