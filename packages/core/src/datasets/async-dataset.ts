/**
 * The asynchronous dataset contract.
 *
 * Same operation names and error translation as AbstractDataset, but every
 * operation returns a promise. The two hierarchies share no operation.
 */

import { toDatasetError } from "../errors.js";
import type { DatasetCreateStatus } from "./create-status.js";
import type { AbstractDataset } from "./dataset.js";
import type { DatasetKind, DatasetOptions, DatasetParams } from "./types.js";

export abstract class AbstractAsyncDataset {
  readonly name: string;
  readonly target: string;
  readonly params: DatasetParams;
  abstract readonly kind: DatasetKind;

  constructor(name: string, target: string = "", params: DatasetParams = {}) {
    this.name = name;
    this.target = target;
    this.params = params;
  }

  async read(options: DatasetOptions = {}): Promise<unknown> {
    try {
      return await this.doRead(options);
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to read dataset ${this.name}.`);
    }
  }

  async write(value: unknown, options: DatasetOptions = {}): Promise<void> {
    try {
      await this.doWrite(value, options);
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to write dataset ${this.name}.`);
    }
  }

  async create(options: DatasetOptions = {}): Promise<DatasetCreateStatus> {
    try {
      return await this.doCreate(options);
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to create dataset ${this.name}.`);
    }
  }

  async delete(): Promise<void> {
    try {
      await this.doDelete();
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to delete dataset ${this.name}.`);
    }
  }

  async initialize(options: DatasetOptions = {}): Promise<void> {
    try {
      await this.doInitialize(options);
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to initialize dataset ${this.name}.`,
      );
    }
  }

  async exists(options: DatasetOptions = {}): Promise<boolean> {
    try {
      return await this.doExists(options);
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to check if dataset ${this.name} exists.`,
      );
    }
  }

  async describe(options: DatasetOptions = {}): Promise<string> {
    try {
      return await this.doDescribe(options);
    } catch (error) {
      throw toDatasetError(
        error,
        this.name,
        `Failed to describe dataset ${this.name}.`,
      );
    }
  }

  async close(): Promise<void> {
    try {
      await this.doClose();
    } catch (error) {
      throw toDatasetError(error, this.name, `Failed to close dataset ${this.name}.`);
    }
  }

  protected abstract doRead(options: DatasetOptions): Promise<unknown>;
  protected abstract doWrite(value: unknown, options: DatasetOptions): Promise<void>;
  protected abstract doCreate(options: DatasetOptions): Promise<DatasetCreateStatus>;
  protected abstract doDelete(): Promise<void>;
  protected abstract doInitialize(options: DatasetOptions): Promise<void>;
  protected abstract doExists(options: DatasetOptions): Promise<boolean>;

  protected async doDescribe(_options: DatasetOptions): Promise<string> {
    return `Dataset name: ${this.name}`;
  }

  protected async doClose(): Promise<void> {}
}

/** Discriminate the two dataset hierarchies. */
export function isAsyncDataset(
  handle: AbstractDataset | AbstractAsyncDataset,
): handle is AbstractAsyncDataset {
  return handle instanceof AbstractAsyncDataset;
}
