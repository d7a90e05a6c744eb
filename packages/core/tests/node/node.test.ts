import { describe, it, expect } from "vitest";
import { Node, formatError } from "../../src/node/node.js";
import { PoisonPill } from "../../src/node/poison-pill.js";
import { MemoryStore } from "../../src/datasets/memory.js";
import { loadSettings } from "../../src/settings.js";
import { createDefaultDatasetRegistry } from "../../src/datasets/registry.js";
import {
  ConfigurationError,
  InvalidLogLevelError,
  ModeError,
} from "../../src/errors.js";
import type { TributaryEvent } from "../../src/events.js";
import type { NodeLogic } from "../../src/node/logic.js";
import {
  Counter,
  Doubler,
  Exploder,
  Idler,
  Passthrough,
  Sequencer,
} from "../support/nodes.js";

function testNode(logic: NodeLogic, options: { poisonPill?: PoisonPill } = {}): Node {
  return new Node({ pipelineName: "test_pipeline", logic, testMode: true, ...options });
}

describe("Node", () => {
  describe("construction", () => {
    it("is named after its logic by default", () => {
      const node = new Node({ pipelineName: "integers", logic: new Sequencer() });
      expect(node.name).toBe("Sequencer");
      expect(node.testMode).toBe(false);
    });

    it("can be switched into test mode", () => {
      const node = new Node({ pipelineName: "integers", logic: new Sequencer() });
      node.enableTestMode();
      expect(node.testMode).toBe(true);
    });
  });

  describe("runTest", () => {
    it("passes every input value through", async () => {
      const node = testNode(new Passthrough());
      node.setupTest({ inputs: { input: [1, 2, 3] }, outputs: ["output"] });

      expect(await node.runTest()).toEqual({ output: [1, 2, 3], logging: [] });
    });

    it("stops when the step returns false", async () => {
      const node = testNode(new Sequencer());
      node.setupTest({ outputs: ["integer_sequence"], params: { start_int: 3, num_ints: 2 } });

      const results = await node.runTest();
      expect(results["integer_sequence"]).toEqual([3, 4]);
    });

    it("stops after the runtime budget has elapsed", async () => {
      const node = testNode(new Counter());
      node.setupTest({ outputs: ["output"] });

      const results = await node.runTest({ runtimeMs: 0 });
      expect(results["output"]).toEqual([0]);
    });

    it("overrides the setup params", async () => {
      const node = testNode(new Sequencer());
      node.setupTest({ outputs: ["integer_sequence"], params: { num_ints: 1 } });

      const results = await node.runTest({ params: { start_int: 10, num_ints: 2 } });
      expect(results["integer_sequence"]).toEqual([10, 11]);
    });

    it("chains a sequencer into a doubler", async () => {
      const sequencer = testNode(new Sequencer());
      sequencer.setupTest({ outputs: ["integer_sequence"], params: { num_ints: 5 } });
      const sequence = (await sequencer.runTest())["integer_sequence"] ?? [];

      const doubler = testNode(new Doubler());
      doubler.setupTest({ inputs: { integer_sequence: sequence }, outputs: ["doubled"] });

      const results = await doubler.runTest();
      expect(results["doubled"]).toEqual([0, 2, 4, 6, 8]);
    });

    it("requires test mode", async () => {
      const node = new Node({ pipelineName: "integers", logic: new Sequencer() });
      await expect(node.runTest()).rejects.toThrow(ModeError);
    });

    it("requires test datasets", async () => {
      const node = testNode(new Counter());
      await expect(node.runTest()).rejects.toThrow(
        'Node "Counter" has no test datasets. Call setupTest() before running it.',
      );
    });

    it("never touches datasets set up before test mode", async () => {
      const store = new MemoryStore();
      const node = new Node({
        pipelineName: "test_pipeline",
        logic: new Counter(),
        datasetRegistry: createDefaultDatasetRegistry(store),
      });
      await node.setup({ output: { type: "memory" } }, [], ["output"]);

      node.enableTestMode();
      await expect(node.runTest({ runtimeMs: 0 })).rejects.toThrow(ModeError);
      expect(node.outputs["output"]).toBeUndefined();

      node.setupTest({ outputs: ["output"] });
      const results = await node.runTest({ runtimeMs: 0 });

      expect(results["output"]).toEqual([0]);
      expect(store.depth("output")).toBe(0);
    });
  });

  describe("iterateTest", () => {
    it("yields what each iteration consumed and produced", async () => {
      const node = testNode(new Passthrough());
      node.setupTest({ inputs: { input: ["a", "b"] }, outputs: ["output"] });

      const iterations: Array<{ consumed: unknown; produced: unknown }> = [];
      for await (const { consumed, produced } of node.iterateTest()) {
        iterations.push({ consumed, produced });
      }

      expect(iterations).toEqual([
        { consumed: { input: "a" }, produced: { output: "a" } },
        { consumed: { input: "b" }, produced: { output: "b" } },
      ]);
    });
  });

  describe("setupTest", () => {
    it("always records the logging dataset", () => {
      const node = testNode(new Passthrough());
      node.setupTest({ outputs: ["output"] });

      expect(Object.keys(node.outputs)).toEqual(["output", "logging"]);
    });

    it("is only available in test mode", () => {
      const node = new Node({ pipelineName: "integers", logic: new Passthrough() });
      expect(() => node.setupTest()).toThrow(
        'Node "Passthrough" is not in test mode. Please initialize with enableTestMode().',
      );
    });
  });

  describe("dataset access", () => {
    it("rejects unknown inputs and outputs", () => {
      const node = testNode(new Passthrough());
      node.setupTest({ outputs: ["output"] });

      expect(() => node.input("missing")).toThrow(ModeError);
      expect(() => node.output("missing")).toThrow(ModeError);
    });
  });

  describe("log", () => {
    it("writes the message and level to the logging dataset", async () => {
      const node = testNode(new Idler());
      node.setupTest();

      await node.log("disk almost full", "warning");

      expect(await node.output("logging").read()).toEqual({
        log: "disk almost full",
        level: "warning",
      });
    });

    it("keeps the newest entries of the default logging queue", async () => {
      const store = new MemoryStore();
      const node = new Node({
        pipelineName: "test_pipeline",
        logic: new Idler(),
        datasetRegistry: createDefaultDatasetRegistry(store),
        settings: loadSettings({ TRIBUTARY_LOGGING_CAPACITY: "2" }),
      });
      await node.setup({});

      await node.log("first");
      await node.log("second");
      await node.log("third");

      expect(store.depth("logging")).toBe(2);
      expect(store.shift("logging")).toEqual({ log: "second", level: "info" });
    });

    it("defaults to info", async () => {
      const node = testNode(new Idler());
      node.setupTest();

      await node.log("hello");

      expect(await node.output("logging").read()).toEqual({ log: "hello", level: "info" });
    });

    it("rejects unknown levels", async () => {
      const node = testNode(new Idler());
      node.setupTest();

      const error = await node.log("hello", "verbose").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(InvalidLogLevelError);
      expect(error).toHaveProperty(
        "message",
        "Invalid logging level verbose. Valid options are: info, debug, warning, error, critical",
      );
    });
  });

  describe("activatePoisonPill", () => {
    it("activates the shared flag and stays active", async () => {
      const poisonPill = new PoisonPill();
      const node = testNode(new Idler(), { poisonPill });

      await node.activatePoisonPill();
      await node.activatePoisonPill();

      expect(poisonPill.isActive()).toBe(true);
    });

    it("is a no-op without a flag", async () => {
      const node = testNode(new Idler());
      await expect(node.activatePoisonPill()).resolves.toBeUndefined();
    });

    it("emits an event", async () => {
      const events: TributaryEvent[] = [];
      const node = new Node({
        pipelineName: "integers",
        name: "stopper",
        logic: new Idler(),
        poisonPill: new PoisonPill(),
        onEvent: (event) => events.push(event),
      });

      await node.activatePoisonPill();

      expect(events.map((event) => event.type)).toEqual(["PoisonPillActivated"]);
    });
  });

  describe("failures", () => {
    it("logs the stack at debug and re-throws", async () => {
      const events: TributaryEvent[] = [];
      const node = new Node({
        pipelineName: "integers",
        name: "exploder",
        logic: new Exploder("execute"),
        testMode: true,
        onEvent: (event) => events.push(event),
      });
      node.setupTest();

      await expect(node.runTest()).rejects.toThrow("boom");

      expect(await node.output("logging").read()).toEqual({
        log: expect.stringContaining("Error: boom"),
        level: "debug",
      });
      expect(events.find((event) => event.type === "NodeFailed")).toEqual(
        expect.objectContaining({ node: "exploder", phase: "execute", error: "boom" }),
      );
    });

    it("reports the failing hook", async () => {
      const events: TributaryEvent[] = [];
      const node = new Node({
        pipelineName: "integers",
        logic: new Exploder("post"),
        testMode: true,
        onEvent: (event) => events.push(event),
      });
      node.setupTest();

      await expect(node.runTest()).rejects.toThrow("boom in post");
      expect(events.find((event) => event.type === "NodeFailed")).toEqual(
        expect.objectContaining({ phase: "post_loop_hook" }),
      );
    });
  });

  describe("setup", () => {
    it("builds handles from dataset records and adds the logging output", async () => {
      const node = new Node({
        pipelineName: "integers",
        logic: new Doubler(),
        datasetRegistry: createDefaultDatasetRegistry(),
      });

      await node.setup(
        { integer_sequence: { type: "memory" }, doubled: { type: "memory.async" } },
        ["integer_sequence"],
        ["doubled"],
      );

      expect(Object.keys(node.inputs)).toEqual(["integer_sequence"]);
      expect(Object.keys(node.outputs)).toEqual(["doubled", "logging"]);
      expect(node.outputs["logging"]?.kind).toBe("memory");
    });

    it("rejects undeclared datasets", async () => {
      const node = new Node({ pipelineName: "integers", logic: new Doubler() });
      await expect(node.setup({}, ["integer_sequence"], [])).rejects.toThrow(ConfigurationError);
    });

    it("is not available in test mode", async () => {
      const node = testNode(new Doubler());
      await expect(node.setup({}, [], [])).rejects.toThrow(ModeError);
    });
  });

  describe("execute", () => {
    it("runs the loop over memory datasets and logs completion", async () => {
      const store = new MemoryStore();
      const node = new Node({
        pipelineName: "integers",
        name: "doubler",
        logic: new Doubler(),
        datasetRegistry: createDefaultDatasetRegistry(store),
      });
      await node.setup(
        { integer_sequence: { type: "memory" }, doubled: { type: "memory" } },
        ["integer_sequence"],
        ["doubled"],
      );
      for (const value of [1, 2, 3]) store.push("integer_sequence", value);

      await node.execute({ stop_after: 3 });

      expect([store.shift("doubled"), store.shift("doubled"), store.shift("doubled")]).toEqual([
        2, 4, 6,
      ]);
      expect(store.shift("logging")).toEqual({
        log: "Execution loop complete for node: doubler",
        level: "info",
      });
    });

    it("stops when the signal aborts", async () => {
      const events: TributaryEvent[] = [];
      const node = new Node({
        pipelineName: "integers",
        logic: new Idler(),
        onEvent: (event) => events.push(event),
      });
      await node.setup({}, [], []);

      const controller = new AbortController();
      controller.abort();
      await node.execute({}, { signal: controller.signal });

      expect(events.find((event) => event.type === "NodeCompleted")).toEqual(
        expect.objectContaining({ iterations: 0 }),
      );
    });
  });
});

describe("formatError", () => {
  it("includes the chain of causes", () => {
    const error = new Error("outer", { cause: new Error("inner") });
    const formatted = formatError(error);

    expect(formatted.startsWith("Error: outer")).toBe(true);
    expect(formatted).toContain("Caused by: Error: inner");
  });

  it("stringifies non-errors", () => {
    expect(formatError("plain")).toBe("plain");
  });
});
