/**
 * In-memory dataset backends.
 *
 * A MemoryStore holds named FIFO queues. Datasets address the queue named by
 * their `target`, falling back to the dataset name, so several handles built
 * over one store see the same stream.
 */

import { z } from "zod";
import { AbstractDataset } from "./dataset.js";
import { AbstractAsyncDataset } from "./async-dataset.js";
import { DatasetCreateStatus } from "./create-status.js";
import { ConfigurationError } from "../errors.js";
import type { DatasetOptions, DatasetParams } from "./types.js";

const MemoryReadOptionsSchema = z.object({
  how: z.enum(["next", "last"]).default("next"),
});

const MemoryParamsSchema = z
  .object({
    /** Queue length past which the oldest values are dropped. */
    maxSize: z.number().int().positive().optional(),
  })
  .passthrough();

export class MemoryStore {
  private queues: Map<string, unknown[]> = new Map();

  /** Provision a queue; a no-op when it already exists. */
  ensure(queue: string): void {
    if (!this.queues.has(queue)) {
      this.queues.set(queue, []);
    }
  }

  has(queue: string): boolean {
    return this.queues.has(queue);
  }

  remove(queue: string): boolean {
    return this.queues.delete(queue);
  }

  /** Append a value, dropping the oldest ones beyond `maxSize`. */
  push(queue: string, value: unknown, maxSize?: number): void {
    this.ensure(queue);
    const values = this.queues.get(queue);
    if (!values) return;
    values.push(value);
    if (maxSize !== undefined && values.length > maxSize) {
      values.splice(0, values.length - maxSize);
    }
  }

  /** Remove and return the oldest value. */
  shift(queue: string): unknown {
    return this.queues.get(queue)?.shift();
  }

  /** Return the newest value and drain the queue. */
  takeLast(queue: string): unknown {
    const values = this.queues.get(queue);
    if (!values || values.length === 0) return undefined;
    const last = values[values.length - 1];
    values.length = 0;
    return last;
  }

  depth(queue: string): number {
    return this.queues.get(queue)?.length ?? 0;
  }
}

function takeFromStore(
  store: MemoryStore,
  queue: string,
  options: DatasetOptions,
): unknown {
  const { how } = MemoryReadOptionsSchema.parse(options);
  return how === "last" ? store.takeLast(queue) : store.shift(queue);
}

function parseMaxSize(name: string, params: DatasetParams): number | undefined {
  const parsed = MemoryParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid params for memory dataset "${name}": ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      { cause: parsed.error },
    );
  }
  return parsed.data.maxSize;
}

function describeQueue(
  name: string,
  queue: string,
  store: MemoryStore,
): string {
  return `Dataset name: ${name}\nQueue: ${queue}\nDepth: ${store.depth(queue)}`;
}

export class MemoryDataset extends AbstractDataset {
  readonly kind = "memory";
  private readonly store: MemoryStore;
  private readonly maxSize: number | undefined;

  constructor(
    name: string,
    target: string = "",
    params: DatasetParams = {},
    store: MemoryStore = new MemoryStore(),
  ) {
    super(name, target, params);
    this.store = store;
    this.maxSize = parseMaxSize(name, params);
  }

  get queue(): string {
    return this.target || this.name;
  }

  protected doRead(options: DatasetOptions): unknown {
    return takeFromStore(this.store, this.queue, options);
  }

  protected doWrite(value: unknown): void {
    this.store.push(this.queue, value, this.maxSize);
  }

  protected doCreate(): DatasetCreateStatus {
    this.store.ensure(this.queue);
    return new DatasetCreateStatus(this.name);
  }

  protected doDelete(): void {
    this.store.remove(this.queue);
  }

  protected doInitialize(): void {
    this.store.ensure(this.queue);
  }

  protected doExists(): boolean {
    return this.store.has(this.queue);
  }

  protected override doDescribe(): string {
    return describeQueue(this.name, this.queue, this.store);
  }
}

export class AsyncMemoryDataset extends AbstractAsyncDataset {
  readonly kind = "memory";
  private readonly store: MemoryStore;
  private readonly maxSize: number | undefined;

  constructor(
    name: string,
    target: string = "",
    params: DatasetParams = {},
    store: MemoryStore = new MemoryStore(),
  ) {
    super(name, target, params);
    this.store = store;
    this.maxSize = parseMaxSize(name, params);
  }

  get queue(): string {
    return this.target || this.name;
  }

  protected async doRead(options: DatasetOptions): Promise<unknown> {
    return takeFromStore(this.store, this.queue, options);
  }

  protected async doWrite(value: unknown): Promise<void> {
    this.store.push(this.queue, value, this.maxSize);
  }

  protected async doCreate(): Promise<DatasetCreateStatus> {
    this.store.ensure(this.queue);
    return new DatasetCreateStatus(this.name);
  }

  protected async doDelete(): Promise<void> {
    this.store.remove(this.queue);
  }

  protected async doInitialize(): Promise<void> {
    this.store.ensure(this.queue);
  }

  protected async doExists(): Promise<boolean> {
    return this.store.has(this.queue);
  }

  protected override async doDescribe(): Promise<string> {
    return describeQueue(this.name, this.queue, this.store);
  }
}
