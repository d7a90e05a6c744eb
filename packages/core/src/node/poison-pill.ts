/**
 * Shutdown flag shared by every node of one pipeline run.
 *
 * The flag is created once per run and handed to each node at construction.
 * It has two states, inactive and active, and never goes back.
 */

/**
 * Capability a node needs from the shared flag. Implementations backed by a
 * remote runtime may answer asynchronously.
 */
export interface ShutdownFlag {
  activate(): void | Promise<void>;
  isActive(): boolean | Promise<boolean>;
}

export class PoisonPill implements ShutdownFlag {
  private state = false;

  activate(): void {
    this.state = true;
  }

  isActive(): boolean {
    return this.state;
  }
}
