import { loadSettings } from "@tributary/core";
import type { DatasetRegistry, Settings } from "@tributary/core";
import { KafkaDataset } from "./kafka-dataset.js";

export {
  KafkaDataset,
  KafkaEnvelopeSchema,
  topicName,
} from "./kafka-dataset.js";
export type {
  KafkaEnvelope,
  KafkaParams,
  TopicNameOptions,
} from "./kafka-dataset.js";

/**
 * Register the `"kafka"` dataset type. Records without a `target` connect to
 * the brokers from `settings`.
 */
export function registerKafkaDatasets(
  registry: DatasetRegistry,
  settings: Settings = loadSettings(),
): DatasetRegistry {
  registry.register(
    "kafka",
    (name, target, params) =>
      new KafkaDataset(name, target, params, settings.brokers),
  );
  return registry;
}
