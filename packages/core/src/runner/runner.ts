/**
 * In-process supervisor for a whole pipeline.
 *
 * Orchestrates: validate config -> create datasets -> build and set up one
 * Node per definition -> run every node concurrently -> stop all loops once
 * the shared poison pill is active -> close handles.
 *
 * Each node runs as its own async task in this process. A failing node
 * activates the poison pill so that the remaining nodes stop as well.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { ConfigLoader } from "../config/loader.js";
import { PipelineConfigSchema } from "../config/pipeline-config.js";
import type {
  PipelineConfig,
  PipelineConfigInput,
} from "../config/pipeline-config.js";
import type { NodeParams } from "../config/params.js";
import type { DatasetCreateStatus } from "../datasets/create-status.js";
import {
  DatasetRegistry,
  createDefaultDatasetRegistry,
} from "../datasets/registry.js";
import type { DatasetHandle } from "../datasets/types.js";
import { ConfigurationError, DatasetError } from "../errors.js";
import { TributaryEventEmitter } from "../events.js";
import type { TributaryEvent } from "../events.js";
import { createLogger } from "../logger.js";
import { Node } from "../node/node.js";
import { PoisonPill } from "../node/poison-pill.js";
import { loadSettings } from "../settings.js";
import type { Settings } from "../settings.js";
import { NodeRegistry } from "./node-registry.js";

const log = createLogger("runner");

// ---------- Config Types ----------

export interface RunnerConfig {
  /** Resolves the `class` of every node definition. */
  nodeRegistry: NodeRegistry;
  /** Default: the built-in in-memory backends over one shared store. */
  datasetRegistry?: DatasetRegistry;
  /** Default: `loadSettings()`. */
  settings?: Settings;
  onEvent?: (event: TributaryEvent) => void;
  /** How often the poison pill and creation statuses are polled. Default 100. */
  pollIntervalMs?: number;
  /** Topic prefix handed to every node's setup. */
  prefix?: string;
  hasPipelinePrefix?: boolean;
  /** Provision every declared dataset before nodes start. Default true. */
  createDatasets?: boolean;
}

export type NodeRunStatus = "success" | "stopped" | "fail";

export interface NodeRunResult {
  status: NodeRunStatus;
  /** Failure message when `status` is `"fail"`. */
  error?: string;
}

export interface PipelineResult {
  /** `"fail"` if any node failed, `"stopped"` if the poison pill ended the run. */
  status: NodeRunStatus;
  nodes: Record<string, NodeRunResult>;
  duration: number;
}

interface PreparedNode {
  name: string;
  node: Node;
  params: NodeParams;
}

// ---------- PipelineRunner ----------

export class PipelineRunner {
  private config: RunnerConfig;
  private datasetRegistry: DatasetRegistry;
  private settings: Settings;
  private events: TributaryEventEmitter;

  constructor(config: RunnerConfig) {
    this.config = config;
    this.datasetRegistry =
      config.datasetRegistry ?? createDefaultDatasetRegistry();
    this.settings = config.settings ?? loadSettings();
    this.events = new TributaryEventEmitter();
    if (config.onEvent) {
      this.events.on(config.onEvent);
    }
  }

  private get pollIntervalMs(): number {
    return this.config.pollIntervalMs ?? 100;
  }

  /**
   * Run a pipeline file, substituting `$NAME` tokens from `variables` and
   * `{$NAME}` placeholders from the environment.
   */
  async runFile(
    pipelineConfigFile: string,
    variables?: Record<string, string>,
  ): Promise<PipelineResult> {
    const loader = new ConfigLoader({ pipelineConfigFile, variables });
    return this.run(loader.loadConfig());
  }

  /**
   * Run every node of the pipeline until all loops have ended.
   *
   * @throws ConfigurationError for an invalid config or unknown node class
   * @throws DatasetError when datasets cannot be created or set up
   */
  async run(
    input: PipelineConfig | PipelineConfigInput,
  ): Promise<PipelineResult> {
    const parsed = PipelineConfigSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid pipeline config: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
        { cause: parsed.error },
      );
    }

    const { name, nodes, datasets } = parsed.data.pipeline;
    const startTime = Date.now();
    const poisonPill = new PoisonPill();
    this.events.emitPipelineStarted(name, Object.keys(nodes).length);
    log.info({ pipeline: name, nodes: Object.keys(nodes) }, "Starting pipeline");

    const prepared: PreparedNode[] = [];
    try {
      if (this.config.createDatasets ?? true) {
        await this.createDatasets(name, datasets);
      }

      for (const [nodeName, nodeConfig] of Object.entries(nodes)) {
        const node = new Node({
          pipelineName: name,
          name: nodeName,
          logic: this.config.nodeRegistry.create(nodeConfig.class),
          poisonPill,
          datasetRegistry: this.datasetRegistry,
          settings: this.settings,
          onEvent: (event) => this.events.emit(event),
        });
        prepared.push({ name: nodeName, node, params: nodeConfig.node_params ?? {} });
        await node.setup(datasets, nodeConfig.inputs, nodeConfig.outputs, {
          prefix: this.config.prefix,
          hasPipelinePrefix: this.config.hasPipelinePrefix,
        });
      }
    } catch (error) {
      await this.closeNodes(prepared);
      this.events.emitPipelineFailed(
        name,
        error instanceof Error ? error.message : String(error),
        Date.now() - startTime,
      );
      throw error;
    }

    const results = await this.runNodes(prepared, poisonPill);
    await this.closeNodes(prepared);

    const duration = Date.now() - startTime;
    const failed = Object.entries(results).filter(
      ([, result]) => result.status === "fail",
    );
    if (failed.length > 0) {
      const summary = failed
        .map(([nodeName, result]) => `${nodeName}: ${result.error ?? "unknown error"}`)
        .join("; ");
      this.events.emitPipelineFailed(name, summary, duration);
      log.error({ pipeline: name, failed: summary }, "Pipeline failed");
      return { status: "fail", nodes: results, duration };
    }

    const status = poisonPill.isActive() ? "stopped" : "success";
    this.events.emitPipelineCompleted(name, status, duration);
    log.info({ pipeline: name, status, duration }, "Pipeline finished");
    return { status, nodes: results, duration };
  }

  // ---------- Internals ----------

  private async runNodes(
    prepared: PreparedNode[],
    poisonPill: PoisonPill,
  ): Promise<Record<string, NodeRunResult>> {
    const controller = new AbortController();
    const watcher = setInterval(() => {
      if (poisonPill.isActive() && !controller.signal.aborted) {
        log.info("Poison pill is active, stopping all nodes");
        controller.abort();
      }
    }, this.pollIntervalMs);

    try {
      const settled = await Promise.all(
        prepared.map(async ({ name, node, params }): Promise<[string, NodeRunResult]> => {
          try {
            const exit = await node.execute(params, { signal: controller.signal });
            return [name, { status: exit === "aborted" ? "stopped" : "success" }];
          } catch (error) {
            log.error({ err: error, node: name }, "Node failed, stopping pipeline");
            poisonPill.activate();
            controller.abort();
            return [
              name,
              {
                status: "fail",
                error: error instanceof Error ? error.message : String(error),
              },
            ];
          }
        }),
      );
      return Object.fromEntries(settled);
    } finally {
      clearInterval(watcher);
    }
  }

  private async createDatasets(
    pipelineName: string,
    datasets: PipelineConfig["pipeline"]["datasets"],
  ): Promise<void> {
    const handles: DatasetHandle[] = [];
    const statuses: DatasetCreateStatus[] = [];
    try {
      for (const [datasetName, datasetConfig] of Object.entries(datasets)) {
        const handle = this.datasetRegistry.create(datasetName, datasetConfig);
        handles.push(handle);
        statuses.push(
          await handle.create({
            pipelineName,
            prefix: this.config.prefix,
            hasPipelinePrefix: this.config.hasPipelinePrefix ?? false,
          }),
        );
      }

      while (!statuses.every((status) => status.done())) {
        await sleep(this.pollIntervalMs);
      }

      for (const status of statuses) {
        const [cause] = status.errors();
        if (cause !== undefined) {
          throw new DatasetError(
            `Failed to create dataset ${status.datasetName}.`,
            { datasetName: status.datasetName, cause },
          );
        }
      }
      log.debug({ datasets: Object.keys(datasets) }, "Datasets created");
    } finally {
      for (const handle of handles) {
        await handle.close();
      }
    }
  }

  private async closeNodes(prepared: PreparedNode[]): Promise<void> {
    for (const { node } of prepared) {
      await node.close();
    }
  }
}
