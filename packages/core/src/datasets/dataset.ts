/**
 * The synchronous dataset contract.
 *
 * Every public operation delegates to a protected `do*` method implemented by
 * the backend and translates any failure that is not already a DatasetError
 * into one tagged with the dataset name.
 *
 * ```ts
 * class MyDataset extends AbstractDataset {
 *   readonly kind = "memory";
 *   protected doRead(options: DatasetOptions): unknown { ... }
 *   protected doWrite(value: unknown, options: DatasetOptions): void { ... }
 *   protected doCreate(options: DatasetOptions): DatasetCreateStatus { ... }
 *   protected doDelete(): void { ... }
 *   protected doInitialize(options: DatasetOptions): void { ... }
 *   protected doExists(options: DatasetOptions): boolean { ... }
 * }
 *
 * registry.register("my", (name, target, params) => new MyDataset(name, target, params));
 * const dataset = registry.createSync("events", { type: "my", target: "foo" });
 * ```
 */

import { toDatasetError } from "../errors.js";
import type { DatasetCreateStatus } from "./create-status.js";
import type { DatasetKind, DatasetOptions, DatasetParams } from "./types.js";

export abstract class AbstractDataset {
  readonly name: string;
  readonly target: string;
  readonly params: DatasetParams;
  abstract readonly kind: DatasetKind;

  constructor(name: string, target: string = "", params: DatasetParams = {}) {
    this.name = name;
    this.target = target;
    this.params = params;
  }

  /** Read a value; `undefined` when the backend has nothing to hand out. */
  read(options: DatasetOptions = {}): unknown {
    try {
      return this.doRead(options);
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to read dataset ${this.name}.`);
    }
  }

  write(value: unknown, options: DatasetOptions = {}): void {
    try {
      this.doWrite(value, options);
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to write dataset ${this.name}.`);
    }
  }

  /** Provision backing storage. */
  create(options: DatasetOptions = {}): DatasetCreateStatus {
    try {
      return this.doCreate(options);
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to create dataset ${this.name}.`);
    }
  }

  delete(): void {
    try {
      this.doDelete();
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to delete dataset ${this.name}.`);
    }
  }

  /** Establish live connections; required before read/write on some backends. */
  initialize(options: DatasetOptions = {}): void {
    try {
      this.doInitialize(options);
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to initialize dataset ${this.name}.`,
      );
    }
  }

  exists(options: DatasetOptions = {}): boolean {
    try {
      return this.doExists(options);
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to check if dataset ${this.name} exists.`,
      );
    }
  }

  describe(options: DatasetOptions = {}): string {
    try {
      return this.doDescribe(options);
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to describe dataset ${this.name}.`,
      );
    }
  }

  /** Release live connections. */
  close(): void {
    try {
      this.doClose();
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to close dataset ${this.name}.`);
    }
  }

  protected abstract doRead(options: DatasetOptions): unknown;
  protected abstract doWrite(value: unknown, options: DatasetOptions): void;
  protected abstract doCreate(options: DatasetOptions): DatasetCreateStatus;
  protected abstract doDelete(): void;
  protected abstract doInitialize(options: DatasetOptions): void;
  protected abstract doExists(options: DatasetOptions): boolean;

  protected doDescribe(_options: DatasetOptions): string {
    return `Dataset name: ${this.name}`;
  }

  protected doClose(): void {}
}
