/**
 * Logger Tests
 */

import { describe, test, expect } from "vitest";
import { createLogger, createSilentLogger, formatArg, formatFields } from "../../src/logger.ts";

const LINE = /^\d{2}:\d{2}:\d{2}\.\d{3} /;

function collect(debug = false) {
  const lines: string[] = [];
  const logger = createLogger({ debug, color: false, log: (line) => lines.push(line) });
  return { logger, lines };
}

describe("createLogger", () => {
  test("formats timestamp, level and message", () => {
    const { logger, lines } = collect();
    logger.info("server up");
    logger.warn("careful");

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(LINE);
    expect(lines[0]?.slice(13)).toBe("INFO  server up");
    expect(lines[1]?.slice(13)).toBe("WARN  careful");
  });

  test("debug lines only when enabled", () => {
    const quiet = collect();
    quiet.logger.debug("hidden");
    expect(quiet.lines).toEqual([]);
    expect(quiet.logger.isDebug()).toBe(false);

    const verbose = collect(true);
    verbose.logger.debug("shown");
    expect(verbose.lines[0]?.slice(13)).toBe("DEBUG shown");
  });

  test("child loggers nest their prefixes", () => {
    const { logger, lines } = collect();
    logger.child("registry").child("F1/echo").error("failed", new Error("boom"), { code: 7 });
    expect(lines[0]?.slice(13)).toBe('ERROR [registry:F1/echo] failed boom {"code":7}');
  });

  test("with() appends request fields after the message", () => {
    const { logger, lines } = collect();
    const request = logger.child("chat").with({ model: "openai/gpt-4o", conversation: "c 1" });
    request.info("Running");
    request.with({ status: 200 }).info("Answered in 5ms", { chars: 4 });
    logger.info("untouched");

    expect(lines.map((line) => line.slice(13))).toEqual([
      'INFO  [chat] Running model=openai/gpt-4o conversation="c 1"',
      'INFO  [chat] Answered in 5ms {"chars":4} model=openai/gpt-4o conversation="c 1" status=200',
      "INFO  untouched",
    ]);
  });

  test("colors can be forced on", () => {
    const lines: string[] = [];
    createLogger({ color: true, log: (line) => lines.push(line) }).info("hi");
    expect(lines[0]).toContain("\u001b[");
  });
});

describe("createSilentLogger", () => {
  test("drops everything", () => {
    const logger = createSilentLogger();
    expect(() => logger.child("x").with({ a: 1 }).error("nothing")).not.toThrow();
    expect(logger.isDebug()).toBe(false);
  });
});

describe("formatFields", () => {
  test("skips undefined and quotes values that would split", () => {
    expect(formatFields({ a: 1, b: undefined, c: true, d: "x=y", e: "", f: "plain" })).toBe(
      'a=1 c=true d="x=y" e="" f=plain',
    );
  });
});

describe("formatArg", () => {
  test("formats each kind of value", () => {
    expect(formatArg(undefined)).toBe("undefined");
    expect(formatArg(null)).toBe("null");
    expect(formatArg(new Error("msg"))).toBe("msg");
    expect(formatArg({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(formatArg(12)).toBe("12");
  });

  test("falls back to String() for circular objects", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(formatArg(circular)).toBe("[object Object]");
  });
});
