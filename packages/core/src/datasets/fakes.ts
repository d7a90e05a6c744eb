/**
 * Test doubles used by a node in test mode.
 *
 * FakeDatasetInput replays a caller-supplied sequence and reads `undefined`
 * once exhausted; FakeDatasetOutput records every value written to it.
 */

import { AbstractDataset } from "./dataset.js";
import { DatasetCreateStatus } from "./create-status.js";

export class FakeDatasetInput extends AbstractDataset {
  readonly kind = "fake";
  readonly nodeName: string;
  private pending: unknown[];
  private history: unknown[] = [];

  constructor(name: string, nodeName: string, values: readonly unknown[] = []) {
    super(name);
    this.nodeName = nodeName;
    this.pending = [...values];
  }

  /** True once every value has been read. */
  get empty(): boolean {
    return this.pending.length === 0;
  }

  /** Values not yet read, oldest first. */
  get values(): readonly unknown[] {
    return this.pending;
  }

  /** Values handed out so far, in order. */
  get consumed(): readonly unknown[] {
    return this.history;
  }

  protected doRead(): unknown {
    if (this.pending.length === 0) return undefined;
    const value = this.pending.shift();
    this.history.push(value);
    return value;
  }

  protected doWrite(value: unknown): void {
    this.pending.push(value);
  }

  protected doCreate(): DatasetCreateStatus {
    return new DatasetCreateStatus(this.name);
  }

  protected doDelete(): void {
    this.pending = [];
  }

  protected doInitialize(): void {}

  protected doExists(): boolean {
    return true;
  }

  protected override doDescribe(): string {
    return `Fake input ${this.name} for node ${this.nodeName}: ${this.pending.length} pending, ${this.history.length} consumed`;
  }
}

export class FakeDatasetOutput extends AbstractDataset {
  readonly kind = "fake";
  readonly nodeName: string;
  private written: unknown[] = [];

  constructor(name: string, nodeName: string) {
    super(name);
    this.nodeName = nodeName;
  }

  /** Every value written, in order. */
  get values(): readonly unknown[] {
    return this.written;
  }

  /** Reads the most recent value without removing it. */
  protected doRead(): unknown {
    return this.written[this.written.length - 1];
  }

  protected doWrite(value: unknown): void {
    this.written.push(value);
  }

  protected doCreate(): DatasetCreateStatus {
    return new DatasetCreateStatus(this.name);
  }

  protected doDelete(): void {
    this.written = [];
  }

  protected doInitialize(): void {}

  protected doExists(): boolean {
    return true;
  }

  protected override doDescribe(): string {
    return `Fake output ${this.name} for node ${this.nodeName}: ${this.written.length} written`;
  }
}
