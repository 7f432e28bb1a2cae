/**
 * Dispatch API Tests
 *
 * Drives the Hono app through app.request(); no sockets.
 */

import { describe, test, expect } from "vitest";
import { z } from "zod";
import { AdapterError } from "../../src/agents/errors.ts";
import { AgentRegistry } from "../../src/registry/registry.ts";
import { createArenaApp } from "../../src/server/app.ts";
import { configResponseSchema } from "../../src/cli/client.ts";
import { EchoAgent, ScriptedAgent, hangUntilAborted } from "../helpers/agents.ts";

const MODELS = ["openai/gpt-4o", "anthropic/claude-sonnet-4-5"];

const agentsResponseSchema = z.object({
  agents: z.array(
    z.object({
      framework: z.string(),
      id: z.string(),
      name: z.string(),
      display_name: z.string(),
      description: z.string(),
    }),
  ),
});

function setup(options: { invokeTimeout?: number } = {}) {
  const registry = new AgentRegistry();
  registry.register(new EchoAgent("Test", "echo"));
  registry.register(new EchoAgent("Other", "mirror", "Mirror"));
  const recorder = new ScriptedAgent("recorder", async (message) => `got ${message}`);
  registry.register(recorder);
  registry.register(
    new ScriptedAgent("slowpoke", async () => {
      throw new AdapterError("timeout", "model took too long");
    }),
  );
  registry.register(
    new ScriptedAgent("flaky", async () => {
      throw new Error("provider returned 503");
    }),
  );
  registry.register(
    new ScriptedAgent("strict", async () => {
      throw new AdapterError("invalid-model", "Unknown provider: foo");
    }),
  );
  const hanging = new ScriptedAgent("hanging", hangUntilAborted);
  registry.register(hanging);
  registry.seal();

  const app = createArenaApp({ registry, models: MODELS, invokeTimeout: options.invokeTimeout });
  return { app, recorder, hanging };
}

function chat(body: unknown) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  };
}

const request = (agent_name: string, user_prompt = "hi") => ({
  agent_name,
  model: "openai/gpt-4o",
  user_prompt,
  conversation_id: "conv_test_1",
});

describe("GET /health", () => {
  test("returns ok", async () => {
    const { app } = setup();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("GET /config", () => {
  test("groups agents by framework and lists the models", async () => {
    const { app } = setup();
    const res = await app.request("/config");
    expect(res.status).toBe(200);

    const body = configResponseSchema.parse(await res.json());
    expect(body.models).toEqual(MODELS);
    expect(body.frameworks.map((f) => f.name)).toEqual(["Test", "Other"]);
    expect(body.frameworks[1]).toEqual({
      name: "Other",
      agents: [{ id: "Other/mirror", name: "mirror", display_name: "Mirror", description: "Repeats the message" }],
    });
  });

  test("every advertised agent can be chatted with by its id", async () => {
    const { app } = setup();
    const config = configResponseSchema.parse(await (await app.request("/config")).json());
    const ids = config.frameworks.flatMap((f) => f.agents.map((a) => a.id));
    expect(ids).toHaveLength(7);

    // The rest are scripted to fail or hang
    for (const id of ids.filter((candidate) => candidate === "Test/echo" || candidate === "Other/mirror")) {
      const res = await app.request("/chat", chat(request(id)));
      expect(res.status).toBe(200);
    }
  });

  test("ids keep agents apart when two frameworks share a name", async () => {
    class FrameworkEcho extends EchoAgent {
      protected async run(message: string) {
        return `${this.framework}: ${message}`;
      }
    }
    const registry = new AgentRegistry();
    registry.register(new FrameworkEcho("F1", "echo"));
    registry.register(new FrameworkEcho("F2", "echo"));
    const app = createArenaApp({ registry: registry.seal() });

    const config = configResponseSchema.parse(await (await app.request("/config")).json());
    const agents = config.frameworks.flatMap((f) => f.agents);
    expect(agents.map((a) => [a.id, a.name])).toEqual([
      ["F1/echo", "echo"],
      ["F2/echo", "echo"],
    ]);

    const answers: unknown[] = [];
    for (const agent of agents) {
      const res = await app.request("/chat", chat(request(agent.id, "ping")));
      expect(res.status).toBe(200);
      answers.push(await res.json());
    }
    expect(answers).toEqual([{ response: "F1: ping" }, { response: "F2: ping" }]);

    const bare = await app.request("/chat", chat(request("echo")));
    expect(bare.status).toBe(404);
  });
});

describe("GET /agents", () => {
  test("returns a flat descriptor list", async () => {
    const { app } = setup();
    const body = agentsResponseSchema.parse(await (await app.request("/agents")).json());
    expect(body.agents[0]).toEqual({
      framework: "Test",
      id: "Test/echo",
      name: "echo",
      display_name: "Echo",
      description: "Repeats the message",
    });
    expect(body.agents).toHaveLength(7);
  });
});

describe("POST /chat", () => {
  test("echo agent answers with its response", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("echo")));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ response: "echo: hi" });
  });

  test("qualified names resolve", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("Other/mirror", "ping")));
    expect(await res.json()).toEqual({ response: "echo: ping" });
  });

  test("passes model, conversation id and history to the adapter", async () => {
    const { app, recorder } = setup();
    const history = [
      { role: "user", content: "first" },
      { role: "assistant", content: "got first" },
    ];

    const res = await app.request("/chat", chat({ ...request("recorder", "second"), history }));
    expect(await res.json()).toEqual({ response: "got second" });
    expect(recorder.calls[0]?.model).toBe("openai/gpt-4o");
    expect(recorder.calls[0]?.conversationId).toBe("conv_test_1");
    expect(recorder.calls[0]?.options.history).toEqual(history);
  });

  test("unknown agent → 404 with a detail", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("ghost")));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: "Agent 'ghost' not found." });
  });

  test("body that is not JSON → 400", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat("{not json"));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "Request body must be valid JSON" });
  });

  test("missing field → 400 naming the field", async () => {
    const { app } = setup();
    const { agent_name: _omitted, ...rest } = request("echo");
    const res = await app.request("/chat", chat(rest));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "agent_name: Required" });
  });

  test("empty agent name → 400", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("")));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "agent_name: agent_name is required" });
  });

  test("adapter timeout → 504", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("slowpoke")));
    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({
      detail: "Error executing agent: model took too long",
      kind: "timeout",
    });
  });

  test("upstream failure → 502", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("flaky")));
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      detail: "Error executing agent: provider returned 503",
      kind: "upstream-error",
    });
  });

  test("invalid model → 500", async () => {
    const { app } = setup();
    const res = await app.request("/chat", chat(request("strict")));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      detail: "Error executing agent: Unknown provider: foo",
      kind: "invalid-model",
    });
  });

  test("invoke deadline aborts the adapter and answers 504", async () => {
    const { app, hanging } = setup({ invokeTimeout: 50 });
    const res = await app.request("/chat", chat(request("hanging")));
    expect(res.status).toBe(504);
    expect(await res.json()).toEqual({
      detail: "Error executing agent: Agent Test/hanging did not answer within 50ms",
      kind: "timeout",
    });
    expect(hanging.calls[0]?.options.signal?.aborted).toBe(true);
  });

  test("a failing agent does not affect the next request", async () => {
    const { app } = setup();
    await app.request("/chat", chat(request("flaky")));
    const res = await app.request("/chat", chat(request("echo", "still here")));
    expect(await res.json()).toEqual({ response: "echo: still here" });
  });
});

describe("other routes", () => {
  test("unknown route → 404 JSON", async () => {
    const { app } = setup();
    const res = await app.request("/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: "Not found: GET /nope" });
  });

  test("CORS headers are set", async () => {
    const { app } = setup();
    const res = await app.request("/health", { headers: { Origin: "http://localhost:8501" } });
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });
});
