/**
 * Example: running a two-node pipeline in process.
 *
 * A sequencer writes the integers 0..4 to `integer_sequence`; a doubler reads
 * them and writes each value times two to `doubled`. Both datasets live in
 * one in-memory store, so the result can be read back once the run ends.
 *
 * Usage:
 *   npx tsx examples/run-pipeline.ts
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  MemoryStore,
  NodeRegistry,
  PipelineRunner,
  createDefaultDatasetRegistry,
} from "@tributary/core";
import type {
  NodeContext,
  NodeLogic,
  NodeParams,
  TributaryEvent,
} from "@tributary/core";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const pipelineFile = path.join(__dirname, "integers.yml");

// ---------------------------------------------------------------------------
// Node logic
// ---------------------------------------------------------------------------

function numberParam(params: NodeParams, key: string, fallback: number): number {
  const value = params[key];
  return typeof value === "number" ? value : fallback;
}

class Sequencer implements NodeLogic {
  private current = 0;
  private end = 0;

  async preLoopHook(node: NodeContext, params: NodeParams): Promise<void> {
    this.current = numberParam(params, "start_int", 0);
    this.end = this.current + numberParam(params, "num_ints", 5);
    await node.log(`Emitting integers ${this.current} to ${this.end - 1}`);
  }

  async execute(node: NodeContext): Promise<boolean> {
    if (this.current >= this.end) return false;
    await node.write("integer_sequence", this.current++);
    return true;
  }
}

class Doubler implements NodeLogic {
  private processed = 0;

  async execute(node: NodeContext, params: NodeParams): Promise<boolean> {
    const value = await node.read("integer_sequence");
    if (typeof value !== "number") return true;
    await node.write("doubled", value * 2);
    this.processed++;
    return this.processed < numberParam(params, "stop_after", Infinity);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function printEvent(event: TributaryEvent): void {
  switch (event.type) {
    case "PipelineStarted":
      console.log(`[PIPELINE] Started: ${event.name} (${event.nodeCount} nodes)`);
      break;
    case "NodeStarted":
      console.log(`  [NODE] Started: ${event.node}`);
      break;
    case "NodeCompleted":
      console.log(`  [NODE] Completed: ${event.node} after ${event.iterations} iterations`);
      break;
    case "NodeFailed":
      console.log(`  [NODE] Failed: ${event.node} in ${event.phase}: ${event.error}`);
      break;
    case "PipelineCompleted":
      console.log(`[PIPELINE] ${event.status} in ${event.duration}ms`);
      break;
    case "PipelineFailed":
      console.log(`[PIPELINE] Failed: ${event.error}`);
      break;
    default:
      break;
  }
}

async function main(): Promise<void> {
  const store = new MemoryStore();
  const nodeRegistry = new NodeRegistry();
  nodeRegistry.register("sequencer", () => new Sequencer());
  nodeRegistry.register("doubler", () => new Doubler());

  const runner = new PipelineRunner({
    nodeRegistry,
    datasetRegistry: createDefaultDatasetRegistry(store),
    onEvent: printEvent,
  });

  const result = await runner.runFile(pipelineFile, { OUTPUT_QUEUE: "doubled" });

  const doubled: unknown[] = [];
  while (store.depth("doubled") > 0) {
    doubled.push(store.shift("doubled"));
  }
  console.log(`\nStatus: ${result.status}`);
  console.log(`Doubled: ${JSON.stringify(doubled)}`);

  const logs: unknown[] = [];
  while (store.depth("logging") > 0) {
    logs.push(store.shift("logging"));
  }
  console.log(`Node logs:`);
  for (const entry of logs) {
    console.log(`  ${JSON.stringify(entry)}`);
  }
}

main().catch((err) => {
  console.error("Pipeline failed:", err);
  process.exit(1);
});
