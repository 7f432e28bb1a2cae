/**
 * Line logger for the server and the CLI.
 *
 *   12:00:01.250 INFO  [chat:F1/echo] Answered in 812ms model=openai/gpt-4o conversation=c1
 *
 * Components take a Logger instead of writing to the console, so each
 * entry point (and each test) picks where lines go. `child()` narrows the
 * prefix, `with()` appends key=value fields scoped to one request.
 */

import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface LoggerConfig {
  /** Print debug lines */
  debug?: boolean;
  /** Sink for finished lines (default: console.log) */
  log?: (line: string) => void;
  prefix?: string;
  fields?: LogFields;
  /** Default: on for a TTY without NO_COLOR */
  color?: boolean;
}

type LogMethod = (message: string, ...args: unknown[]) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  isDebug(): boolean;
  /** Same sink, prefix extended with `name` */
  child(name: string): Logger;
  /** Same sink, `fields` appended to every line */
  with(fields: LogFields): Logger;
}

const LEVEL_COLOR = {
  debug: "gray",
  info: "cyan",
  warn: "yellow",
  error: "red",
} as const satisfies Record<LogLevel, string>;

const defaultColor = !!process.stdout.isTTY && !process.env.NO_COLOR;

function timestamp(): string {
  const now = new Date();
  return `${now.toTimeString().slice(0, 8)}.${String(now.getMilliseconds()).padStart(3, "0")}`;
}

/** `key=value` pairs; values with spaces, quotes or `=` are JSON-quoted */
export function formatFields(fields: LogFields): string {
  const pairs: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    pairs.push(`${key}=${/[\s"=]/.test(text) || text === "" ? JSON.stringify(text) : text}`);
  }
  return pairs.join(" ");
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const { debug = false, log = console.log, prefix = "", fields = {}, color = defaultColor } = config;
  const c = pc.createColors(color);
  const tail = formatFields(fields);

  const write = (level: LogLevel, message: string, args: unknown[]) => {
    if (level === "debug" && !debug) return;
    const parts = [c.dim(timestamp()), c[LEVEL_COLOR[level]](level.toUpperCase().padEnd(5))];
    if (prefix) parts.push(`[${prefix}]`);
    parts.push(message, ...args.map(formatArg));
    if (tail) parts.push(c.dim(tail));
    log(parts.join(" "));
  };

  return {
    debug: (message, ...args) => write("debug", message, args),
    info: (message, ...args) => write("info", message, args),
    warn: (message, ...args) => write("warn", message, args),
    error: (message, ...args) => write("error", message, args),
    isDebug: () => debug,
    child: (name) => createLogger({ ...config, prefix: prefix ? `${prefix}:${name}` : name }),
    with: (more) => createLogger({ ...config, fields: { ...fields, ...more } }),
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  const silent: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    isDebug: () => false,
    child: () => silent,
    with: () => silent,
  };
  return silent;
}

/** Render one extra log argument */
export function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg !== "object" || arg === null) return String(arg);
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
