/**
 * Subprocess runner for CLI-backed adapters.
 *
 * Unlike a hard timeout, the idle timeout only fires when the process
 * writes nothing to stdout/stderr for the configured duration, so long
 * agent runs survive as long as they keep producing output.
 */

import { execa } from "execa";

/** Kill a process that writes nothing at all within this window */
export const DEFAULT_STARTUP_TIMEOUT = 30_000;
/** Minimum idle timeout to prevent accidental instant kills */
const MIN_TIMEOUT_MS = 1000;

export interface RunOptions {
  command: string;
  args: string[];
  cwd?: string;
  /** Idle timeout in ms */
  timeout: number;
  /** Zero-output window in ms (default DEFAULT_STARTUP_TIMEOUT, 0 disables), capped at timeout */
  startupTimeout?: number;
  /** Kills the process when aborted */
  signal?: AbortSignal;
}

export interface RunResult {
  stdout: string;
  stderr: string;
}

export class IdleTimeoutError extends Error {
  readonly timeout: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, timeout: number, stdout: string, stderr: string) {
    super(`${command} timed out after ${timeout}ms of inactivity`);
    this.name = "IdleTimeoutError";
    this.timeout = timeout;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/** Non-zero exit of a CLI; message carries stderr */
export class ProcessExitError extends Error {
  readonly exitCode?: number;
  readonly stderr: string;

  constructor(command: string, exitCode: number | undefined, stderr: string, cause?: unknown) {
    const detail = stderr || (cause instanceof Error ? cause.message : "no output");
    super(`${command} failed (exit ${exitCode ?? "?"}): ${detail}`, { cause });
    this.name = "ProcessExitError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

function readExitCode(error: unknown): number | undefined {
  const code = typeof error === "object" && error !== null ? Reflect.get(error, "exitCode") : undefined;
  return typeof code === "number" ? code : undefined;
}

/**
 * Run a command, killing it after `timeout` ms of silence.
 */
export async function runWithIdleTimeout(options: RunOptions): Promise<RunResult> {
  const { command, args, cwd, signal } = options;
  const timeout = Math.max(options.timeout, MIN_TIMEOUT_MS);
  const rawStartup = options.startupTimeout ?? DEFAULT_STARTUP_TIMEOUT;
  const firstWindow = rawStartup > 0 ? Math.min(rawStartup, timeout) : timeout;

  let idleTimedOut = false;
  let hasReceivedOutput = false;
  let timer: ReturnType<typeof setTimeout> | undefined;
  let stdout = "";
  let stderr = "";

  // stdin must be ignored, CLI agents wait on it otherwise
  const subprocess = execa(command, args, {
    cwd,
    stdin: "ignore",
    buffer: false,
    cancelSignal: signal,
  });

  const armTimer = (ms: number) => {
    clearTimeout(timer);
    timer = setTimeout(() => {
      idleTimedOut = true;
      subprocess.kill();
    }, ms);
  };

  subprocess.stdout?.on("data", (chunk: Buffer) => {
    stdout += chunk.toString();
    hasReceivedOutput = true;
    armTimer(timeout);
  });

  subprocess.stderr?.on("data", (chunk: Buffer) => {
    stderr += chunk.toString();
    hasReceivedOutput = true;
    armTimer(timeout);
  });

  armTimer(firstWindow);

  try {
    await subprocess;
    return { stdout: stdout.trimEnd(), stderr: stderr.trimEnd() };
  } catch (error) {
    if (idleTimedOut) {
      throw new IdleTimeoutError(command, hasReceivedOutput ? timeout : firstWindow, stdout, stderr);
    }
    if (signal?.aborted) {
      throw error;
    }
    throw new ProcessExitError(command, readExitCode(error), stderr.trimEnd(), error);
  } finally {
    clearTimeout(timer);
  }
}
