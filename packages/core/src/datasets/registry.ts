/**
 * Maps stable type keys to dataset factories.
 *
 * Backends are registered at startup and looked up when a dataset is built
 * from its configuration record. An unregistered key or a malformed record is
 * a configuration error; a factory's own failure propagates unchanged.
 */

import { ConfigurationError } from "../errors.js";
import { DatasetConfigSchema } from "./config.js";
import { AbstractDataset } from "./dataset.js";
import { AbstractAsyncDataset } from "./async-dataset.js";
import { MemoryStore, MemoryDataset, AsyncMemoryDataset } from "./memory.js";
import type { DatasetHandle, DatasetParams } from "./types.js";

export type DatasetFactory = (
  name: string,
  target: string,
  params: DatasetParams,
) => DatasetHandle;

export class DatasetRegistry {
  private factories: Map<string, DatasetFactory> = new Map();

  /**
   * Register a factory for a type key.
   * Registering an already-registered key replaces the previous factory.
   */
  register(type: string, factory: DatasetFactory): void {
    this.factories.set(type, factory);
  }

  /** Check if a factory is registered for a type key. */
  has(type: string): boolean {
    return this.factories.has(type);
  }

  /** Get all registered type keys. */
  registeredTypes(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Build a dataset from a configuration record.
   *
   * @throws ConfigurationError for a malformed record or an unknown type
   */
  create(name: string, config: unknown): DatasetHandle {
    const parsed = DatasetConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ");
      throw new ConfigurationError(
        `Invalid configuration for dataset "${name}": ${issues}`,
        { cause: parsed.error },
      );
    }

    const { type, target, params } = parsed.data;
    const factory = this.factories.get(type);
    if (!factory) {
      const known = this.registeredTypes().join(", ") || "none";
      throw new ConfigurationError(
        `Unknown dataset type "${type}" for dataset "${name}". Registered types: ${known}`,
      );
    }

    return factory(name, target, params);
  }

  /** Build a dataset that must belong to the synchronous hierarchy. */
  createSync(name: string, config: unknown): AbstractDataset {
    const dataset = this.create(name, config);
    if (!(dataset instanceof AbstractDataset)) {
      throw new ConfigurationError(
        `Dataset "${name}" is asynchronous; a synchronous dataset was required`,
      );
    }
    return dataset;
  }

  /** Build a dataset that must belong to the asynchronous hierarchy. */
  createAsync(name: string, config: unknown): AbstractAsyncDataset {
    const dataset = this.create(name, config);
    if (!(dataset instanceof AbstractAsyncDataset)) {
      throw new ConfigurationError(
        `Dataset "${name}" is synchronous; an asynchronous dataset was required`,
      );
    }
    return dataset;
  }
}

/**
 * Registry with the built-in in-memory backends. Datasets built from the
 * same registry share `store`, so nodes in one process can exchange values.
 */
export function createDefaultDatasetRegistry(
  store: MemoryStore = new MemoryStore(),
): DatasetRegistry {
  const registry = new DatasetRegistry();
  registry.register(
    "memory",
    (name, target, params) => new MemoryDataset(name, target, params, store),
  );
  registry.register(
    "memory.async",
    (name, target, params) =>
      new AsyncMemoryDataset(name, target, params, store),
  );
  return registry;
}
