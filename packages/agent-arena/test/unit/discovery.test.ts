/**
 * Adapter Discovery Tests
 *
 * Scans the fixture trees under test/fixtures:
 *
 *   basic/  F1/echo and F2/echo (same name, two frameworks), a module that
 *           throws on import, a constructor that throws, a plain-object
 *           adapter and a non-adapter helper file
 *   dupes/  two modules declaring the same (framework, name)
 */

import { describe, test, expect } from "vitest";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ADAPTER_BRAND, BaseAgent } from "../../src/agents/base.ts";
import {
  collectAdapters,
  discoverAgents,
  findAgentModules,
} from "../../src/registry/discovery.ts";
import { DiscoveryError, DuplicateAgentError } from "../../src/registry/errors.ts";
import { captureLogger } from "../helpers/capture-logger.ts";
import { EchoAgent } from "../helpers/agents.ts";

const fixtures = fileURLToPath(new URL("../fixtures", import.meta.url));
const basic = join(fixtures, "basic");
const dupes = join(fixtures, "dupes");

describe("findAgentModules", () => {
  test("finds agent modules in code-point order, ignoring other files", async () => {
    const modules = await findAgentModules(basic);
    expect(modules).toEqual([
      join(basic, "Broken/bad/agent.ts"),
      join(basic, "F1/echo/agent.ts"),
      join(basic, "F2/echo/agent.ts"),
      join(basic, "Faulty/ctor/agent.ts"),
      join(basic, "Plain/objects/agent.ts"),
    ]);
  });
});

describe("discoverAgents", () => {
  test("registers every loadable adapter and reports failures", async () => {
    const { registry, report } = await discoverAgents([basic]);

    expect(report.registered).toEqual(["F1/echo", "F2/echo", "Plain/object"]);
    expect(registry.size).toBe(3);
    expect(report.modules).toHaveLength(5);
    expect(report.failures).toHaveLength(2);
    expect(report.missingRoots).toEqual([]);
  });

  test("same agent name under two frameworks registers both", async () => {
    const { registry } = await discoverAgents([basic]);

    expect(registry.get("F1/echo").displayName).toBe("Echo (F1)");
    expect(registry.get("F2/echo").displayName).toBe("Echo (F2)");
    expect(registry.frameworks().map((g) => g.name)).toEqual(["F1", "F2", "Plain"]);
  });

  test("a module that throws on import does not stop its siblings", async () => {
    const { report } = await discoverAgents([basic]);

    const importFailure = report.failures.find((f) => f.modulePath.includes("Broken"));
    expect(importFailure).toBeInstanceOf(DiscoveryError);
    expect(importFailure?.message).toMatch(/^Failed to import: /);
    expect(importFailure?.message).toContain("boom on import");
  });

  test("a constructor that throws becomes a DiscoveryError", async () => {
    const { registry, report } = await discoverAgents([basic]);

    const ctorFailure = report.failures.find((f) => f.modulePath.includes("Faulty"));
    expect(ctorFailure?.exportName).toBe("ExplodingAgent");
    expect(ctorFailure?.message).toBe("Failed to construct ExplodingAgent: constructor exploded");
    expect(registry.has("Faulty/ctor")).toBe(false);
  });

  test("an adapter exported twice registers once", async () => {
    const { registry } = await discoverAgents([basic]);

    const adapter = registry.get("object");
    expect(await adapter.invoke("hi", "any", "c1")).toBe("plain: hi");
    expect(registry.list().filter((d) => d.framework === "Plain")).toHaveLength(1);
  });

  test("duplicate (framework, name) across modules aborts discovery", async () => {
    const { logger, matching } = captureLogger();

    let caught: unknown;
    try {
      await discoverAgents([dupes], { logger });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DuplicateAgentError);
    if (caught instanceof DuplicateAgentError) {
      expect(caught.framework).toBe("Same");
      expect(caught.agentName).toBe("one");
      expect(caught.firstSource).toBe(join(dupes, "A/one/agent.ts"));
      expect(caught.source).toBe(join(dupes, "B/one/agent.ts"));
    }
    expect(matching("Duplicate agent 'Same/one'")).toHaveLength(1);
  });

  test("the registry is sealed after discovery unless asked not to", async () => {
    const sealed = await discoverAgents([join(basic, "F1")]);
    expect(sealed.registry.isSealed).toBe(true);

    const open = await discoverAgents([join(basic, "F1")], { seal: false });
    expect(open.registry.isSealed).toBe(false);
    open.registry.register(new EchoAgent("Extra", "late"));
    expect(open.registry.size).toBe(2);
  });

  test("a missing root is recorded and skipped", async () => {
    const { logger, matching } = captureLogger();
    const missing = join(fixtures, "does-not-exist");

    const { registry, report } = await discoverAgents([missing, join(basic, "F2")], { logger });

    expect(report.missingRoots).toEqual([missing]);
    expect(report.registered).toEqual(["F2/echo"]);
    expect(registry.size).toBe(1);
    expect(matching("Agent root not readable")).toHaveLength(1);
  });

  test("logs registrations and a summary", async () => {
    const { logger, matching } = captureLogger();
    await discoverAgents([basic], { logger });

    expect(matching(`Registered agent 'F1/echo' from ${join(basic, "F1/echo/agent.ts")}`)).toHaveLength(1);
    expect(matching("Registry ready: 3 agent(s), 2 failure(s)")).toHaveLength(1);
    expect(matching("Skipping")).toHaveLength(2);
  });

  test("uses the injected module loader", async () => {
    const { logger, matching } = captureLogger(true);
    const loaded: string[] = [];

    const { registry, report } = await discoverAgents([join(basic, "F1")], {
      logger,
      importModule: async (path) => {
        loaded.push(path);
        return { Agent: class extends EchoAgent {} };
      },
    });

    expect(loaded).toEqual([join(basic, "F1/echo/agent.ts")]);
    expect(report.registered).toEqual(["Test/echo"]);
    expect(registry.get("echo").framework).toBe("Test");
    expect(matching("Scanning")).toHaveLength(1);
  });
});

describe("collectAdapters", () => {
  test("ignores BaseAgent, plain functions and non-adapter values", () => {
    const { adapters, failures } = collectAdapters("mod.ts", {
      BaseAgent,
      helper: () => "x",
      config: { name: "not an agent" },
      answer: 42,
    });
    expect(adapters).toEqual([]);
    expect(failures).toEqual([]);
  });

  test("instantiates subclasses and keeps adapter instances", () => {
    const instance = new EchoAgent("Inst", "ready");
    const { adapters } = collectAdapters("mod.ts", {
      Cls: class extends EchoAgent {},
      instance,
    });
    expect(adapters.map((a) => `${a.framework}/${a.name}`)).toEqual(["Test/echo", "Inst/ready"]);
    expect(adapters[1]).toBe(instance);
  });

  test("rejects adapters with a '/' in their framework or name", () => {
    const { adapters, failures } = collectAdapters("mod.ts", {
      Nested: class extends EchoAgent {
        constructor() {
          super("Lang/Graph", "cot");
        }
      },
      fine: new EchoAgent("LangGraph", "cot"),
    });
    expect(adapters.map((a) => `${a.framework}/${a.name}`)).toEqual(["LangGraph/cot"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(DiscoveryError);
    expect(failures[0]?.exportName).toBe("Nested");
    expect(failures[0]?.message).toBe(
      "Nested has a '/' in its framework or name (framework 'Lang/Graph', name 'cot')",
    );
  });

  test("rejects a branded class whose instances lack metadata", () => {
    class Hollow {
      static readonly [ADAPTER_BRAND] = true;
    }

    const { adapters, failures } = collectAdapters("mod.ts", { Hollow });
    expect(adapters).toEqual([]);
    expect(failures[0]?.message).toBe(
      "Hollow does not provide framework, name, displayName and description",
    );
  });
});
