/**
 * Shared dataset types: kinds, option bags and connection parameter records.
 */

import type { AbstractDataset } from "./dataset.js";
import type { AbstractAsyncDataset } from "./async-dataset.js";

/**
 * Backend discriminator. `"broker"` handles are initialized by `Node.setup`
 * with role-specific connection parameters.
 */
export type DatasetKind = "broker" | "memory" | "fake" | (string & {});

/** Backend-specific options for a single operation. */
export type DatasetOptions = Record<string, unknown>;

/** Backend-specific construction parameters (the `params` of a record). */
export type DatasetParams = Record<string, unknown>;

/** A handle of either dataset hierarchy. */
export type DatasetHandle = AbstractDataset | AbstractAsyncDataset;

interface BaseConnectionParams {
  datasetName: string;
  nodeName: string;
  pipelineName: string;
  /** Topic prefix (`<prefix>.<topic>`). */
  prefix?: string;
  /** Whether `datasetName` already carries the pipeline name. */
  hasPipelinePrefix: boolean;
}

export interface ConsumerParams extends BaseConnectionParams {
  role: "consumer";
  consumerConfig: Record<string, unknown>;
}

export interface ProducerParams extends BaseConnectionParams {
  role: "producer";
  producerConfig: Record<string, unknown>;
}

export type ConnectionParams = ConsumerParams | ProducerParams;
