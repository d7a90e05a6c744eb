/**
 * Completion tracking for dataset provisioning.
 *
 * A DatasetCreateStatus gathers pending creation work (topic creation
 * requests, connection attempts) so that a caller can poll `done()` until a
 * batch of datasets is ready.
 */

/** Anything that can report whether it has finished. */
export interface Completable {
  done(): boolean;
  /** Failure recorded once the operation finished unsuccessfully. */
  readonly error?: unknown;
}

/**
 * Adapts a promise to a Completable. The rejection is recorded on `error`
 * instead of surfacing as an unhandled rejection.
 */
export class PendingOperation<T = unknown> implements Completable {
  private finished = false;
  private failure: unknown = undefined;
  private readonly settledPromise: Promise<void>;

  constructor(promise: Promise<T>) {
    this.settledPromise = promise.then(
      () => {
        this.finished = true;
      },
      (error: unknown) => {
        this.failure = error;
        this.finished = true;
      },
    );
  }

  done(): boolean {
    return this.finished;
  }

  get error(): unknown {
    return this.failure;
  }

  /** Resolves once the wrapped promise has settled, never rejects. */
  settled(): Promise<void> {
    return this.settledPromise;
  }
}

export class DatasetCreateStatus {
  readonly datasetName: string;
  readonly topicFutures: Readonly<Record<string, Completable>>;
  readonly statuses: readonly Completable[];

  constructor(
    datasetName: string,
    options: {
      topicFutures?: Record<string, Completable>;
      statuses?: Completable[];
    } = {},
  ) {
    this.datasetName = datasetName;
    this.topicFutures = options.topicFutures ?? {};
    this.statuses = options.statuses ?? [];
  }

  private tracked(): Completable[] {
    return [...Object.values(this.topicFutures), ...this.statuses];
  }

  /** True when nothing is tracked or every tracked operation has finished. */
  done(): boolean {
    return this.tracked().every((item) => item.done());
  }

  /** Failures of tracked operations that finished unsuccessfully. */
  errors(): unknown[] {
    return this.tracked()
      .filter((item) => item.done() && item.error !== undefined)
      .map((item) => item.error);
  }
}
