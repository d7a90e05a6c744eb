// Errors
export {
  TributaryError,
  DatasetError,
  ConfigurationError,
  InvalidParamTypeError,
  ModeError,
  MissingEnvironmentVariableError,
  InvalidLogLevelError,
  toDatasetError,
} from "./errors.js";

// Settings and logging
export {
  loadSettings,
  parseBrokers,
  NODE_LOG_LEVELS,
  LOGGING_DATASET,
} from "./settings.js";
export type { Settings, NodeLogLevel } from "./settings.js";
export { logger, createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Events
export { TributaryEventEmitter } from "./events.js";
export type {
  TributaryEvent,
  EventListener,
  NodePhase,
  NodeStartedEvent,
  NodeCompletedEvent,
  NodeFailedEvent,
  PoisonPillActivatedEvent,
  PipelineStartedEvent,
  PipelineCompletedEvent,
  PipelineFailedEvent,
} from "./events.js";

// Datasets
export { AbstractDataset } from "./datasets/dataset.js";
export { AbstractAsyncDataset, isAsyncDataset } from "./datasets/async-dataset.js";
export {
  DatasetCreateStatus,
  PendingOperation,
} from "./datasets/create-status.js";
export type { Completable } from "./datasets/create-status.js";
export { DatasetConfigSchema } from "./datasets/config.js";
export type { DatasetConfig, DatasetConfigInput } from "./datasets/config.js";
export {
  DatasetRegistry,
  createDefaultDatasetRegistry,
} from "./datasets/registry.js";
export type { DatasetFactory } from "./datasets/registry.js";
export {
  MemoryStore,
  MemoryDataset,
  AsyncMemoryDataset,
} from "./datasets/memory.js";
export { FakeDatasetInput, FakeDatasetOutput } from "./datasets/fakes.js";
export type {
  DatasetKind,
  DatasetOptions,
  DatasetParams,
  DatasetHandle,
  ConnectionParams,
  ConsumerParams,
  ProducerParams,
} from "./datasets/types.js";

// Config
export {
  ParamValueSchema,
  NodeParamsSchema,
  isParamMapping,
} from "./config/params.js";
export type { ParamScalar, ParamValue, NodeParams } from "./config/params.js";
export { injectEnvVars, updateParams } from "./config/inject.js";
export {
  NodeConfigSchema,
  PipelineConfigSchema,
} from "./config/pipeline-config.js";
export type {
  NodeConfig,
  PipelineConfig,
  PipelineConfigInput,
} from "./config/pipeline-config.js";
export { ConfigLoader } from "./config/loader.js";
export type { ConfigLoaderOptions } from "./config/loader.js";

// Node
export { Node, formatError } from "./node/node.js";
export type {
  NodeOptions,
  SetupOptions,
  TestSetup,
  ExecuteOptions,
  RunTestOptions,
  TestIteration,
  LoopExit,
} from "./node/node.js";
export { StepSignal } from "./node/logic.js";
export type { NodeContext, NodeLogic, StepResult } from "./node/logic.js";
export { PoisonPill } from "./node/poison-pill.js";
export type { ShutdownFlag } from "./node/poison-pill.js";

// Runner
export { NodeRegistry } from "./runner/node-registry.js";
export type { NodeLogicFactory } from "./runner/node-registry.js";
export { PipelineRunner } from "./runner/runner.js";
export type {
  RunnerConfig,
  NodeRunStatus,
  NodeRunResult,
  PipelineResult,
} from "./runner/runner.js";
