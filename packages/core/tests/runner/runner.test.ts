import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { PipelineRunner } from "../../src/runner/runner.js";
import { NodeRegistry } from "../../src/runner/node-registry.js";
import { AbstractDataset } from "../../src/datasets/dataset.js";
import { DatasetCreateStatus, PendingOperation } from "../../src/datasets/create-status.js";
import { MemoryStore } from "../../src/datasets/memory.js";
import { createDefaultDatasetRegistry } from "../../src/datasets/registry.js";
import { ConfigurationError, DatasetError } from "../../src/errors.js";
import type { TributaryEvent } from "../../src/events.js";
import type { PipelineConfigInput } from "../../src/config/pipeline-config.js";
import { Doubler, Exploder, Idler, Sequencer, Stopper } from "../support/nodes.js";

class UnprovisionableDataset extends AbstractDataset {
  readonly kind = "unprovisionable";

  protected doRead(): unknown {
    return undefined;
  }

  protected doWrite(): void {}

  protected doCreate(): DatasetCreateStatus {
    return new DatasetCreateStatus(this.name, {
      statuses: [new PendingOperation(Promise.reject(new Error("no space left")))],
    });
  }

  protected doDelete(): void {}

  protected doInitialize(): void {}

  protected doExists(): boolean {
    return false;
  }
}

function nodeRegistry(): NodeRegistry {
  const registry = new NodeRegistry();
  registry.register("sequencer", () => new Sequencer());
  registry.register("doubler", () => new Doubler());
  registry.register("idler", () => new Idler());
  registry.register("stopper", () => new Stopper());
  registry.register("exploder", () => new Exploder());
  return registry;
}

const integersPipeline: PipelineConfigInput = {
  pipeline: {
    name: "integers",
    nodes: {
      sequencer: {
        class: "sequencer",
        outputs: ["integer_sequence"],
        node_params: { start_int: 0, num_ints: 5 },
      },
      doubler: {
        class: "doubler",
        inputs: ["integer_sequence"],
        outputs: ["doubled"],
        node_params: { stop_after: 5 },
      },
    },
    datasets: {
      integer_sequence: { type: "memory" },
      doubled: { type: "memory" },
    },
  },
};

function drain(store: MemoryStore, queue: string): unknown[] {
  const values: unknown[] = [];
  while (store.depth(queue) > 0) {
    values.push(store.shift(queue));
  }
  return values;
}

describe("PipelineRunner", () => {
  it("runs every node to completion", async () => {
    const store = new MemoryStore();
    const runner = new PipelineRunner({
      nodeRegistry: nodeRegistry(),
      datasetRegistry: createDefaultDatasetRegistry(store),
      pollIntervalMs: 5,
    });

    const result = await runner.run(integersPipeline);

    expect(result.status).toBe("success");
    expect(result.nodes).toEqual({
      sequencer: { status: "success" },
      doubler: { status: "success" },
    });
    expect(drain(store, "doubled")).toEqual([0, 2, 4, 6, 8]);
    expect(drain(store, "logging")).toEqual(
      expect.arrayContaining([
        { log: "Execution loop complete for node: sequencer", level: "info" },
        { log: "Execution loop complete for node: doubler", level: "info" },
      ]),
    );
  });

  it("emits pipeline events", async () => {
    const events: TributaryEvent[] = [];
    const runner = new PipelineRunner({
      nodeRegistry: nodeRegistry(),
      pollIntervalMs: 5,
      onEvent: (event) => events.push(event),
    });

    await runner.run(integersPipeline);

    const types = events.map((event) => event.type);
    expect(types[0]).toBe("PipelineStarted");
    expect(types[types.length - 1]).toBe("PipelineCompleted");
    expect(types.filter((type) => type === "NodeCompleted")).toHaveLength(2);
  });

  it("stops every node once the poison pill is active", async () => {
    const runner = new PipelineRunner({ nodeRegistry: nodeRegistry(), pollIntervalMs: 5 });

    const result = await runner.run({
      pipeline: {
        name: "shutdown",
        nodes: {
          stopper: { class: "stopper" },
          idler: { class: "idler" },
        },
      },
    });

    expect(result.status).toBe("stopped");
    expect(result.nodes).toEqual({
      stopper: { status: "success" },
      idler: { status: "stopped" },
    });
  });

  it("stops the pipeline when a node fails", async () => {
    const events: TributaryEvent[] = [];
    const runner = new PipelineRunner({
      nodeRegistry: nodeRegistry(),
      pollIntervalMs: 5,
      onEvent: (event) => events.push(event),
    });

    const result = await runner.run({
      pipeline: {
        name: "failing",
        nodes: {
          exploder: { class: "exploder" },
          idler: { class: "idler" },
        },
      },
    });

    expect(result.status).toBe("fail");
    expect(result.nodes).toEqual({
      exploder: { status: "fail", error: "boom" },
      idler: { status: "stopped" },
    });
    expect(events[events.length - 1]).toEqual(
      expect.objectContaining({ type: "PipelineFailed", error: "exploder: boom" }),
    );
  });

  it("rejects unknown node classes", async () => {
    const runner = new PipelineRunner({ nodeRegistry: new NodeRegistry() });

    await expect(
      runner.run({ pipeline: { name: "p", nodes: { a: { class: "missing" } } } }),
    ).rejects.toThrow('Unknown node class "missing". Registered classes: none');
  });

  it("rejects invalid configs", async () => {
    const runner = new PipelineRunner({ nodeRegistry: nodeRegistry() });
    await expect(
      runner.run({ pipeline: { name: "", nodes: {} } }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("fails when a dataset cannot be created", async () => {
    const datasetRegistry = createDefaultDatasetRegistry();
    datasetRegistry.register("unprovisionable", (name) => new UnprovisionableDataset(name));
    const runner = new PipelineRunner({
      nodeRegistry: nodeRegistry(),
      datasetRegistry,
      pollIntervalMs: 5,
    });

    const error = await runner
      .run({
        pipeline: {
          name: "p",
          nodes: { sequencer: { class: "sequencer", outputs: ["broken"] } },
          datasets: { broken: { type: "unprovisionable" } },
        },
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatasetError);
    expect(error).toHaveProperty("message", "Failed to create dataset broken.");
  });

  describe("runFile", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "runner-test-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("runs a pipeline file with variables", async () => {
      const file = path.join(tmpDir, "pipeline.yml");
      fs.writeFileSync(
        file,
        `
pipeline:
  name: integers
  nodes:
    sequencer:
      class: sequencer
      outputs: [integer_sequence]
      node_params:
        num_ints: 3
    doubler:
      class: doubler
      inputs: [integer_sequence]
      outputs: [doubled]
      node_params:
        stop_after: 3
  datasets:
    integer_sequence:
      type: memory
    doubled:
      type: memory
      target: $QUEUE
`,
      );
      const store = new MemoryStore();
      const runner = new PipelineRunner({
        nodeRegistry: nodeRegistry(),
        datasetRegistry: createDefaultDatasetRegistry(store),
        pollIntervalMs: 5,
      });

      const result = await runner.runFile(file, { QUEUE: "results" });

      expect(result.status).toBe("success");
      expect(drain(store, "results")).toEqual([0, 2, 4]);
    });
  });
});

describe("NodeRegistry", () => {
  it("builds a fresh logic per call", () => {
    const registry = nodeRegistry();

    expect(registry.create("sequencer")).not.toBe(registry.create("sequencer"));
    expect(registry.has("doubler")).toBe(true);
    expect(registry.registeredClasses()).toEqual([
      "sequencer",
      "doubler",
      "idler",
      "stopper",
      "exploder",
    ]);
  });
});
