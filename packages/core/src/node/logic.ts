/**
 * The contract user-supplied node types implement.
 *
 * The Node loop driver holds a NodeLogic value and calls its hooks around a
 * repeated `execute` step. Logic keeps its own state as fields; it reaches
 * datasets, logging and the shutdown flag through the NodeContext it is given.
 */

import type { NodeParams } from "../config/params.js";
import type { DatasetHandle, DatasetOptions } from "../datasets/types.js";
import type { NodeLogLevel } from "../settings.js";

/**
 * Result of one step. Exactly `false` stops the loop; `true` or no value
 * continues it.
 */
export type StepResult = boolean | void;

export const StepSignal = {
  CONTINUE: true,
  STOP: false,
} as const;

/** What a step sees of the node running it. */
export interface NodeContext {
  readonly name: string;
  readonly pipelineName: string;
  readonly inputs: Readonly<Record<string, DatasetHandle>>;
  readonly outputs: Readonly<Record<string, DatasetHandle>>;

  /** Input handle by name; fails when the node was not set up with it. */
  input(name: string): DatasetHandle;
  /** Output handle by name; fails when the node was not set up with it. */
  output(name: string): DatasetHandle;

  /** Read from an input of either dataset hierarchy. */
  read(name: string, options?: DatasetOptions): Promise<unknown>;
  /** Write to an output of either dataset hierarchy. */
  write(name: string, value: unknown, options?: DatasetOptions): Promise<void>;

  log(message: string, level?: NodeLogLevel | (string & {})): Promise<void>;
  activatePoisonPill(): Promise<void>;
}

export interface NodeLogic {
  /** Called once before the loop. */
  preLoopHook?(node: NodeContext, params: NodeParams): void | Promise<void>;

  /** One loop iteration. */
  execute(node: NodeContext, params: NodeParams): StepResult | Promise<StepResult>;

  /** Called once after the loop ends. */
  postLoopHook?(node: NodeContext, params: NodeParams): void | Promise<void>;
}
