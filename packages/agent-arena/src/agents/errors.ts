/**
 * Adapter invocation errors.
 *
 * Whatever an underlying framework throws is folded into one of three
 * kinds so the dispatch layer can map it to an HTTP status without
 * knowing the framework.
 */

export const ADAPTER_ERROR_KINDS = ["timeout", "upstream-error", "invalid-model"] as const;

export type AdapterErrorKind = (typeof ADAPTER_ERROR_KINDS)[number];

export class AdapterError extends Error {
  readonly kind: AdapterErrorKind;
  /** Qualified agent key ("framework/name"), filled in by BaseAgent */
  agent?: string;
  /** HTTP status reported upstream, when there was one */
  readonly status?: number;

  constructor(
    kind: AdapterErrorKind,
    message: string,
    options: { cause?: unknown; agent?: string; status?: number } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "AdapterError";
    this.kind = kind;
    this.agent = options.agent;
    this.status = options.status;
  }
}

const NETWORK_CODES = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
];

const TIMEOUT_PATTERNS = ["timeout", "timed out", "etimedout", "deadline exceeded"];

const INVALID_MODEL_PATTERNS = [
  "model not found",
  "unknown model",
  "invalid model",
  "model_not_found",
  "does not exist or you do not have access",
  "unsupported model",
];

export interface ClassifiedError {
  kind: AdapterErrorKind;
  message: string;
  status?: number;
}

function readField(error: unknown, key: string): unknown {
  return typeof error === "object" && error !== null ? Reflect.get(error, key) : undefined;
}

/**
 * Classify a thrown value into an adapter error kind.
 *
 * Inspects, in order: abort/timeout error names, execa's timedOut flag,
 * HTTP status codes, Node.js error codes and message patterns.
 * Anything unrecognised is an upstream error.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof AdapterError) {
    return { kind: error.kind, message: error.message, status: error.status };
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : undefined;

  if (name === "TimeoutError" || name === "IdleTimeoutError" || readField(error, "timedOut") === true) {
    return { kind: "timeout", message };
  }

  const rawStatus = readField(error, "status") ?? readField(error, "statusCode");
  const status = typeof rawStatus === "number" ? rawStatus : undefined;
  if (status === 408 || status === 504) {
    return { kind: "timeout", message, status };
  }
  if (status === 404 && INVALID_MODEL_PATTERNS.some((p) => message.toLowerCase().includes(p))) {
    return { kind: "invalid-model", message, status };
  }

  const code = readField(error, "code");
  if (code === "ETIMEDOUT") {
    return { kind: "timeout", message, status };
  }
  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return { kind: "upstream-error", message, status };
  }

  const lower = message.toLowerCase();
  if (INVALID_MODEL_PATTERNS.some((p) => lower.includes(p))) {
    return { kind: "invalid-model", message, status };
  }
  if (TIMEOUT_PATTERNS.some((p) => lower.includes(p))) {
    return { kind: "timeout", message, status };
  }

  return { kind: "upstream-error", message, status };
}

/**
 * Normalise any thrown value into an AdapterError, keeping the original
 * as `cause`.
 */
export function toAdapterError(error: unknown, agent?: string): AdapterError {
  if (error instanceof AdapterError) {
    if (agent && !error.agent) error.agent = agent;
    return error;
  }
  const classified = classifyError(error);
  return new AdapterError(classified.kind, classified.message, {
    cause: error,
    agent,
    status: classified.status,
  });
}
