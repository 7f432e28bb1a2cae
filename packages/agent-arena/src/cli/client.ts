/**
 * HTTP client for the dispatch API.
 *
 *   GET /health, GET /config, POST /chat
 */

import { z } from "zod";
import { ADAPTER_ERROR_KINDS, type AdapterErrorKind } from "../agents/errors.ts";
import type { ConfigResponse } from "../server/app.ts";
import type { ChatRequest } from "../server/dispatch.ts";

export const DEFAULT_URL = "http://127.0.0.1:8000";

/** Non-2xx answer from the API, carrying its `detail` */
export class ApiError extends Error {
  readonly status: number;
  readonly kind?: AdapterErrorKind;

  constructor(status: number, detail: string, kind?: AdapterErrorKind) {
    super(detail);
    this.name = "ApiError";
    this.status = status;
    this.kind = kind;
  }
}

export const configResponseSchema = z.object({
  frameworks: z.array(
    z.object({
      name: z.string(),
      agents: z.array(
        z.object({ id: z.string(), name: z.string(), display_name: z.string(), description: z.string() }),
      ),
    }),
  ),
  models: z.array(z.string()),
});

// ── Retry logic ────────────────────────────────────────────────────

const MAX_RETRIES = 2;
const BASE_DELAY_MS = 200;

function isRetryableError(error: unknown): boolean {
  if (error instanceof TypeError) return true; // fetch failed: connection refused/reset
  const code = error instanceof Error ? Reflect.get(error, "code") : undefined;
  return code === "ECONNREFUSED" || code === "ECONNRESET";
}

export interface ClientOptions {
  baseUrl?: string;
  /** Per-request timeout in ms */
  timeout?: number;
  fetch?: typeof fetch;
}

export interface ArenaClient {
  health(): Promise<{ status: string }>;
  config(): Promise<ConfigResponse>;
  chat(request: ChatRequest): Promise<string>;
}

/** Error body; fields the server did not send (or that are unknown) drop out */
const errorBodySchema = z.object({
  detail: z.string().optional().catch(undefined),
  kind: z.enum(ADAPTER_ERROR_KINDS).optional().catch(undefined),
});

function readDetail(body: unknown, fallback: string): { detail: string; kind?: AdapterErrorKind } {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return { detail: fallback };
  return { detail: parsed.data.detail || fallback, kind: parsed.data.kind };
}

export function createClient(options: ClientOptions = {}): ArenaClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_URL).replace(/\/+$/, "");
  const timeout = options.timeout ?? 300_000;
  const doFetch = options.fetch ?? fetch;

  async function request(method: string, path: string, body?: unknown): Promise<unknown> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= MAX_RETRIES; attempt++) {
      let res: Response;
      try {
        res = await doFetch(`${baseUrl}${path}`, {
          method,
          headers: body !== undefined ? { "Content-Type": "application/json" } : undefined,
          body: body !== undefined ? JSON.stringify(body) : undefined,
          signal: AbortSignal.timeout(timeout),
        });
      } catch (error) {
        lastError = error;
        if (attempt < MAX_RETRIES && isRetryableError(error)) {
          await new Promise((resolve) => setTimeout(resolve, BASE_DELAY_MS * 2 ** attempt));
          continue;
        }
        break;
      }

      const data: unknown = await res.json().catch(() => undefined);
      if (!res.ok) {
        const { detail, kind } = readDetail(data, `HTTP ${res.status}`);
        throw new ApiError(res.status, detail, kind);
      }
      return data;
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new Error(`Connection to ${baseUrl} failed: ${message}`, { cause: lastError });
  }

  return {
    async health() {
      const data = await request("GET", "/health");
      return { status: String(readField(data, "status")) };
    },
    async config() {
      const parsed = configResponseSchema.safeParse(await request("GET", "/config"));
      if (!parsed.success) {
        throw new Error(`Malformed /config answer: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      }
      return parsed.data;
    },
    async chat(body) {
      const data = await request("POST", "/chat", body);
      const response = readField(data, "response");
      if (typeof response !== "string") {
        throw new Error("Malformed /chat answer: missing response");
      }
      return response;
    },
  };
}

function readField(data: unknown, key: string): unknown {
  return typeof data === "object" && data !== null ? Reflect.get(data, key) : undefined;
}
