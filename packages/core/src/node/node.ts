/**
 * Node: the execution unit of a pipeline.
 *
 * Owns input and output dataset handles, drives a NodeLogic through the
 * lifecycle `created → setup → pre-loop hook → loop → post-loop hook`, and
 * can trigger the pipeline-wide shutdown flag. In test mode every handle is a
 * test double and the loop can be replayed with `runTest` or `iterateTest`.
 *
 * Failures are not recovered: a throwing hook or step is logged to the
 * logging dataset and re-thrown. Isolation belongs to whatever supervises
 * the node.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { NodeParams } from "../config/params.js";
import { FakeDatasetInput, FakeDatasetOutput } from "../datasets/fakes.js";
import {
  DatasetRegistry,
  createDefaultDatasetRegistry,
} from "../datasets/registry.js";
import type {
  ConnectionParams,
  DatasetHandle,
  DatasetOptions,
} from "../datasets/types.js";
import { ConfigurationError, InvalidLogLevelError, ModeError } from "../errors.js";
import { TributaryEventEmitter } from "../events.js";
import type { NodePhase, TributaryEvent } from "../events.js";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { loadSettings } from "../settings.js";
import type { NodeLogLevel, Settings } from "../settings.js";
import type { NodeContext, NodeLogic, StepResult } from "./logic.js";
import type { ShutdownFlag } from "./poison-pill.js";

// ---------- Types ----------

export interface NodeOptions {
  pipelineName: string;
  /** User logic driven by the loop. */
  logic: NodeLogic;
  /** Defaults to the logic's class name. */
  name?: string;
  /** Shared shutdown flag of the pipeline run; borrowed, not owned. */
  poisonPill?: ShutdownFlag;
  testMode?: boolean;
  /** Registry used by `setup`. Default: the built-in in-memory backends. */
  datasetRegistry?: DatasetRegistry;
  /** Default: `loadSettings()`. */
  settings?: Settings;
  onEvent?: (event: TributaryEvent) => void;
}

export interface SetupOptions {
  /** Topic prefix (`<prefix>.<topic>`). */
  prefix?: string;
  /** Whether dataset names already carry the pipeline name. */
  hasPipelinePrefix?: boolean;
  /** Overrides the default consumer configuration from settings. */
  consumerConfig?: Record<string, unknown>;
  /** Overrides the default producer configuration from settings. */
  producerConfig?: Record<string, unknown>;
}

export interface TestSetup {
  /** Values each input replays, e.g. `{ input: [1, 2, 3] }`. */
  inputs?: Record<string, readonly unknown[]>;
  /** Output names to record. The logging dataset is always added. */
  outputs?: readonly string[];
  params?: NodeParams;
}

export interface ExecuteOptions {
  /** Cooperative stop, checked before every iteration. */
  signal?: AbortSignal;
}

/** Why a loop ended: the step returned `false`, or the signal aborted. */
export type LoopExit = "completed" | "aborted";

export interface RunTestOptions {
  /** Default: the params given to `setupTest`. */
  params?: NodeParams;
  /** Wall-clock budget in milliseconds. */
  runtimeMs?: number;
}

/** State after one test-mode iteration. */
export interface TestIteration {
  /** Last value each input handed out during the iteration. */
  consumed: Record<string, unknown>;
  /** Last value each output received during the iteration. */
  produced: Record<string, unknown>;
  node: Node;
}

const PINO_LEVELS = {
  info: "info",
  debug: "debug",
  warning: "warn",
  error: "error",
  critical: "fatal",
} as const satisfies Record<NodeLogLevel, string>;

function isNodeLogLevel(
  level: string,
  allowed: readonly NodeLogLevel[],
): level is NodeLogLevel {
  return allowed.some((candidate) => candidate === level);
}

/** Stack trace including the chain of causes. */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const lines = [error.stack ?? `${error.name}: ${error.message}`];
  if (error.cause !== undefined) {
    lines.push(`Caused by: ${formatError(error.cause)}`);
  }
  return lines.join("\n");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------- Node ----------

export class Node implements NodeContext {
  readonly name: string;
  readonly pipelineName: string;
  parameters: NodeParams = {};
  inputs: Record<string, DatasetHandle> = {};
  outputs: Record<string, DatasetHandle> = {};
  /** Epoch milliseconds of the last completed iteration. */
  lastHeartbeat: number;

  private readonly logic: NodeLogic;
  private readonly poisonPill: ShutdownFlag | undefined;
  private readonly registry: DatasetRegistry;
  private readonly settings: Settings;
  private readonly events: TributaryEventEmitter;
  private readonly logger: Logger;
  private test: boolean;
  private testInputs: Map<string, FakeDatasetInput> = new Map();
  private testOutputs: Map<string, FakeDatasetOutput> = new Map();
  private testDoublesReady = false;

  constructor(options: NodeOptions) {
    this.logic = options.logic;
    this.name = options.name ?? options.logic.constructor.name;
    this.pipelineName = options.pipelineName;
    this.poisonPill = options.poisonPill;
    this.test = options.testMode ?? false;
    this.registry = options.datasetRegistry ?? createDefaultDatasetRegistry();
    this.settings = options.settings ?? loadSettings();
    this.lastHeartbeat = Date.now();
    this.events = new TributaryEventEmitter();
    if (options.onEvent) {
      this.events.on(options.onEvent);
    }
    this.logger = createLogger("node").child({
      node: this.name,
      pipeline: this.pipelineName,
    });
  }

  get testMode(): boolean {
    return this.test;
  }

  /**
   * Switch to test mode. Handles from an earlier `setup()` are dropped in
   * favour of empty doubles; `setupTest()` must run before `runTest()`.
   */
  enableTestMode(): void {
    this.test = true;
    this.installTestDoubles({});
    this.testDoublesReady = false;
  }

  // ---------- Setup ----------

  /**
   * Build input and output handles from the dataset records and connect the
   * broker-backed ones: inputs as consumers, outputs as producers.
   * Handles from an earlier call are replaced per name.
   */
  async setup(
    datasets: Readonly<Record<string, unknown>>,
    inputs: readonly string[] = [],
    outputs: readonly string[] = [],
    options: SetupOptions = {},
  ): Promise<void> {
    if (this.test) {
      throw new ModeError(
        `Node "${this.name}" is in test mode; production datasets are never set up. Use setupTest() instead.`,
      );
    }

    const loggingDataset = this.settings.loggingDataset;
    const outputNames = outputs.includes(loggingDataset)
      ? [...outputs]
      : [...outputs, loggingDataset];
    const hasPipelinePrefix = options.hasPipelinePrefix ?? false;

    for (const datasetName of inputs) {
      const handle = this.buildDataset(datasets, datasetName);
      this.inputs[datasetName] = handle;
      if (handle.kind === "broker") {
        const connectionParams: ConnectionParams = {
          role: "consumer",
          datasetName,
          nodeName: this.name,
          pipelineName: this.pipelineName,
          prefix: options.prefix,
          hasPipelinePrefix,
          consumerConfig: options.consumerConfig ?? this.settings.consumerConfig,
        };
        await handle.initialize({ connectionParams });
      }
    }

    for (const datasetName of outputNames) {
      const handle = this.buildDataset(datasets, datasetName);
      this.outputs[datasetName] = handle;
      if (handle.kind === "broker") {
        const connectionParams: ConnectionParams = {
          role: "producer",
          datasetName,
          nodeName: this.name,
          pipelineName: this.pipelineName,
          prefix: options.prefix,
          hasPipelinePrefix,
          producerConfig: options.producerConfig ?? this.settings.producerConfig,
        };
        await handle.initialize({ connectionParams });
      }
    }

    this.logger.debug(
      { inputs: [...inputs], outputs: outputNames },
      "Datasets set up",
    );
  }

  private buildDataset(
    datasets: Readonly<Record<string, unknown>>,
    datasetName: string,
  ): DatasetHandle {
    const config = datasets[datasetName];
    if (config !== undefined) {
      return this.registry.create(datasetName, config);
    }
    if (datasetName === this.settings.loggingDataset) {
      return this.registry.create(datasetName, {
        type: "memory",
        target: datasetName,
        params: { maxSize: this.settings.loggingCapacity },
      });
    }
    throw new ConfigurationError(
      `Dataset "${datasetName}" used by node "${this.name}" is not defined in the dataset configuration`,
    );
  }

  /**
   * Replace every handle with test doubles.
   *
   * @throws ModeError when the node is not in test mode
   */
  setupTest(setup: TestSetup = {}): void {
    this.assertTestMode();
    this.installTestDoubles(setup);
    this.parameters = setup.params ?? {};
    this.testDoublesReady = true;
  }

  private installTestDoubles(setup: TestSetup): void {
    this.testInputs = new Map(
      Object.entries(setup.inputs ?? {}).map(
        ([datasetName, values]): [string, FakeDatasetInput] => [
          datasetName,
          new FakeDatasetInput(datasetName, this.name, values),
        ],
      ),
    );

    const outputNames = [...(setup.outputs ?? [])];
    if (!outputNames.includes(this.settings.loggingDataset)) {
      outputNames.push(this.settings.loggingDataset);
    }
    this.testOutputs = new Map(
      outputNames.map((datasetName): [string, FakeDatasetOutput] => [
        datasetName,
        new FakeDatasetOutput(datasetName, this.name),
      ]),
    );

    this.inputs = Object.fromEntries(this.testInputs);
    this.outputs = Object.fromEntries(this.testOutputs);
  }

  // ---------- NodeContext ----------

  input(name: string): DatasetHandle {
    const handle = this.inputs[name];
    if (!handle) {
      throw new ModeError(
        `Node "${this.name}" has no input dataset "${name}". Call setup() or setupTest() with it first.`,
      );
    }
    return handle;
  }

  output(name: string): DatasetHandle {
    const handle = this.outputs[name];
    if (!handle) {
      throw new ModeError(
        `Node "${this.name}" has no output dataset "${name}". Call setup() or setupTest() with it first.`,
      );
    }
    return handle;
  }

  async read(name: string, options: DatasetOptions = {}): Promise<unknown> {
    return await this.input(name).read(options);
  }

  async write(
    name: string,
    value: unknown,
    options: DatasetOptions = {},
  ): Promise<void> {
    await this.output(name).write(value, options);
  }

  /**
   * Write `{ log, level }` to the logging dataset.
   *
   * @throws InvalidLogLevelError when `level` is not one of the node log levels
   */
  async log(message: string, level: string = "info"): Promise<void> {
    const allowed = this.settings.nodeLogLevels;
    if (!isNodeLogLevel(level, allowed)) {
      throw new InvalidLogLevelError(level, allowed);
    }
    await this.output(this.settings.loggingDataset).write({
      log: message,
      level,
    });
    this.logger[PINO_LEVELS[level]](message);
  }

  /** Activate the shared shutdown flag. A no-op without one. */
  async activatePoisonPill(): Promise<void> {
    if (!this.poisonPill) return;
    await this.poisonPill.activate();
    this.logger.info("Poison pill activated");
    this.events.emitPoisonPillActivated(this.name, this.pipelineName);
  }

  // ---------- Execution ----------

  /**
   * Run the full lifecycle: pre-loop hook, steps until one returns `false`
   * (or `options.signal` aborts), post-loop hook, then a final log line.
   */
  async execute(
    params: NodeParams = this.parameters,
    options: ExecuteOptions = {},
  ): Promise<LoopExit> {
    const startTime = Date.now();
    this.events.emitNodeStarted(this.name, this.pipelineName, this.test);

    await this.runPhase("pre_loop_hook", () =>
      this.logic.preLoopHook?.(this, params),
    );

    let iterations = 0;
    let result: StepResult = true;
    while (result !== false && !options.signal?.aborted) {
      result = await this.runPhase("execute", () =>
        this.logic.execute(this, params),
      );
      iterations++;
      this.lastHeartbeat = Date.now();
      // Let other nodes and timers in this process run between steps
      await yieldToEventLoop();
    }

    await this.runPhase("post_loop_hook", () =>
      this.logic.postLoopHook?.(this, params),
    );
    await this.log(`Execution loop complete for node: ${this.name}`);

    this.events.emitNodeCompleted(
      this.name,
      this.pipelineName,
      iterations,
      Date.now() - startTime,
    );
    return result === false ? "completed" : "aborted";
  }

  /**
   * Run the lifecycle against the test doubles and return, per output, every
   * value written.
   *
   * After each iteration the loop ends when the step returned `false`, when
   * `runtimeMs` has elapsed, or when the node has inputs and all of them are
   * exhausted.
   *
   * @throws ModeError when the node is not in test mode
   */
  async runTest(options: RunTestOptions = {}): Promise<Record<string, unknown[]>> {
    const iterations = this.iterateTest(options);
    let next = await iterations.next();
    while (!next.done) {
      next = await iterations.next();
    }

    const results: Record<string, unknown[]> = {};
    for (const [datasetName, output] of this.testOutputs) {
      results[datasetName] = [...output.values];
    }
    return results;
  }

  /**
   * Like `runTest`, but yields the consumed and produced values of every
   * iteration. The post-loop hook runs once the last iteration is consumed.
   *
   * @example
   * for await (const { consumed, produced } of node.iterateTest()) {
   *   console.log(consumed, produced);
   * }
   */
  async *iterateTest(
    options: RunTestOptions = {},
  ): AsyncGenerator<TestIteration, void, undefined> {
    this.assertTestMode();
    if (!this.testDoublesReady) {
      throw new ModeError(
        `Node "${this.name}" has no test datasets. Call setupTest() before running it.`,
      );
    }
    const params = options.params ?? this.parameters;
    const startTime = Date.now();
    this.events.emitNodeStarted(this.name, this.pipelineName, true);

    await this.runPhase("pre_loop_hook", () =>
      this.logic.preLoopHook?.(this, params),
    );

    let iterations = 0;
    let result: StepResult = true;
    while (result !== false) {
      const consumedBefore = new Map(
        [...this.testInputs].map(([name, input]): [string, number] => [
          name,
          input.consumed.length,
        ]),
      );
      const producedBefore = new Map(
        [...this.testOutputs].map(([name, output]): [string, number] => [
          name,
          output.values.length,
        ]),
      );

      result = await this.runPhase("execute", () =>
        this.logic.execute(this, params),
      );
      iterations++;
      this.lastHeartbeat = Date.now();

      if (
        options.runtimeMs !== undefined &&
        Date.now() - startTime >= options.runtimeMs
      ) {
        result = false;
      }
      if (this.testInputs.size > 0 && this.inputsExhausted()) {
        result = false;
      }

      yield {
        consumed: this.collectNew(this.testInputs, consumedBefore, (input) => input.consumed),
        produced: this.collectNew(this.testOutputs, producedBefore, (output) => output.values),
        node: this,
      };
    }

    await this.runPhase("post_loop_hook", () =>
      this.logic.postLoopHook?.(this, params),
    );

    this.events.emitNodeCompleted(
      this.name,
      this.pipelineName,
      iterations,
      Date.now() - startTime,
    );
  }

  /** Close every handle. */
  async close(): Promise<void> {
    for (const handle of [...Object.values(this.inputs), ...Object.values(this.outputs)]) {
      await handle.close();
    }
  }

  // ---------- Internals ----------

  private assertTestMode(): void {
    if (!this.test) {
      throw new ModeError(
        `Node "${this.name}" is not in test mode. Please initialize with enableTestMode().`,
      );
    }
  }

  private inputsExhausted(): boolean {
    return [...this.testInputs.values()].every((input) => input.empty);
  }

  private collectNew<D>(
    datasets: Map<string, D>,
    before: Map<string, number>,
    values: (dataset: D) => readonly unknown[],
  ): Record<string, unknown> {
    const collected: Record<string, unknown> = {};
    for (const [datasetName, dataset] of datasets) {
      const current = values(dataset);
      if (current.length > (before.get(datasetName) ?? 0)) {
        collected[datasetName] = current[current.length - 1];
      }
    }
    return collected;
  }

  /** Run one lifecycle phase; on failure log the stack at debug and re-throw. */
  private async runPhase<T>(
    phase: NodePhase,
    fn: () => T | Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.events.emitNodeFailed(
        this.name,
        this.pipelineName,
        phase,
        errorMessage(error),
      );
      this.logger.error({ err: error, phase }, "Node failed");
      await this.logTraceback(error);
      throw error;
    }
  }

  private async logTraceback(error: unknown): Promise<void> {
    try {
      await this.log(formatError(error), "debug");
    } catch (logError) {
      this.logger.error(
        { err: logError },
        "Failed to write traceback to the logging dataset",
      );
    }
  }
}
