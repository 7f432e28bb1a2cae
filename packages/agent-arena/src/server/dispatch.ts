/**
 * Chat dispatch: registry lookup, invoke with a deadline, error mapping.
 *
 * Transport-agnostic; the Hono app turns a DispatchResult into a
 * response.
 */

import { z } from "zod";
import { AdapterError, toAdapterError, type AdapterErrorKind } from "../agents/errors.ts";
import { agentKey, type AgentAdapter } from "../agents/types.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import { AgentNotFoundError } from "../registry/errors.ts";
import type { AgentRegistry } from "../registry/registry.ts";

export const chatMessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
});

export const chatRequestSchema = z.object({
  agent_name: z.string().min(1, "agent_name is required"),
  model: z.string().min(1, "model is required"),
  user_prompt: z.string(),
  conversation_id: z.string().min(1, "conversation_id is required"),
  history: z.array(chatMessageSchema).optional(),
});

export type ChatRequest = z.infer<typeof chatRequestSchema>;

/** HTTP status per adapter failure kind */
export const ADAPTER_ERROR_STATUS: Record<AdapterErrorKind, 500 | 502 | 504> = {
  timeout: 504,
  "upstream-error": 502,
  "invalid-model": 500,
};

export type DispatchResult =
  | { ok: true; status: 200; body: { response: string } }
  | { ok: false; status: 404; body: { detail: string } }
  | { ok: false; status: 500 | 502 | 504; body: { detail: string; kind: AdapterErrorKind } };

export interface DispatchOptions {
  /** Deadline per invoke in ms, 0 disables */
  invokeTimeout?: number;
  mcpConfigPath?: string;
  logger?: Logger;
}

/**
 * Race an invocation against the deadline. On expiry the signal handed
 * to the adapter is aborted and a timeout AdapterError is thrown.
 */
async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number,
  agent: string,
): Promise<T> {
  const controller = new AbortController();
  if (ms <= 0) {
    return run(controller.signal);
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new AdapterError("timeout", `Agent ${agent} did not answer within ${ms}ms`, {
        agent,
      });
      controller.abort(error);
      reject(error);
    }, ms);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Dispatch one chat request. Never throws for lookup or adapter
 * failures; those come back as error results.
 */
export async function dispatchChat(
  registry: AgentRegistry,
  request: ChatRequest,
  options: DispatchOptions = {},
): Promise<DispatchResult> {
  const logger = options.logger ?? createSilentLogger();

  let agent: AgentAdapter;
  try {
    agent = registry.get(request.agent_name);
  } catch (error) {
    if (error instanceof AgentNotFoundError) {
      logger.warn(error.message);
      return { ok: false, status: 404, body: { detail: error.message } };
    }
    throw error;
  }

  const key = agentKey(agent);
  const log = logger.child(key).with({ model: request.model, conversation: request.conversation_id });
  const started = Date.now();
  log.info("Running");

  try {
    const response = await withDeadline(
      (signal) =>
        agent.invoke(request.user_prompt, request.model, request.conversation_id, {
          history: request.history,
          signal,
          logger: log,
          mcpConfigPath: options.mcpConfigPath,
        }),
      options.invokeTimeout ?? 0,
      key,
    );
    log.info(`Answered in ${Date.now() - started}ms`, { chars: response.length });
    return { ok: true, status: 200, body: { response } };
  } catch (error) {
    const adapterError = toAdapterError(error, key);
    log.error(`Failed [${adapterError.kind}]: ${adapterError.message}`);
    return {
      ok: false,
      status: ADAPTER_ERROR_STATUS[adapterError.kind],
      body: {
        detail: `Error executing agent: ${adapterError.message}`,
        kind: adapterError.kind,
      },
    };
  }
}
