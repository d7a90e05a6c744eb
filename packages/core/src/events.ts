/**
 * Node and pipeline lifecycle events.
 *
 * Nodes and the runner emit typed events for UIs, metrics and tests. Listeners
 * run synchronously in registration order.
 */

// ---------- Event Types ----------

export type NodePhase = "pre_loop_hook" | "execute" | "post_loop_hook";

export interface NodeStartedEvent {
  type: "NodeStarted";
  node: string;
  pipeline: string;
  testMode: boolean;
  timestamp: string;
}

export interface NodeCompletedEvent {
  type: "NodeCompleted";
  node: string;
  pipeline: string;
  iterations: number;
  duration: number;
  timestamp: string;
}

export interface NodeFailedEvent {
  type: "NodeFailed";
  node: string;
  pipeline: string;
  phase: NodePhase;
  error: string;
  timestamp: string;
}

export interface PoisonPillActivatedEvent {
  type: "PoisonPillActivated";
  node: string;
  pipeline: string;
  timestamp: string;
}

export interface PipelineStartedEvent {
  type: "PipelineStarted";
  name: string;
  nodeCount: number;
  timestamp: string;
}

export interface PipelineCompletedEvent {
  type: "PipelineCompleted";
  name: string;
  status: "success" | "stopped";
  duration: number;
  timestamp: string;
}

export interface PipelineFailedEvent {
  type: "PipelineFailed";
  name: string;
  error: string;
  duration: number;
  timestamp: string;
}

export type TributaryEvent =
  | NodeStartedEvent
  | NodeCompletedEvent
  | NodeFailedEvent
  | PoisonPillActivatedEvent
  | PipelineStartedEvent
  | PipelineCompletedEvent
  | PipelineFailedEvent;

// ---------- Event Emitter ----------

export type EventListener = (event: TributaryEvent) => void;

export class TributaryEventEmitter {
  private listeners: EventListener[] = [];

  /** Register an event listener. */
  on(listener: EventListener): void {
    this.listeners.push(listener);
  }

  /** Remove an event listener. */
  off(listener: EventListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  emit(event: TributaryEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Remove all listeners. */
  clear(): void {
    this.listeners = [];
  }

  emitNodeStarted(node: string, pipeline: string, testMode: boolean): void {
    this.emit({
      type: "NodeStarted",
      node,
      pipeline,
      testMode,
      timestamp: new Date().toISOString(),
    });
  }

  emitNodeCompleted(
    node: string,
    pipeline: string,
    iterations: number,
    duration: number,
  ): void {
    this.emit({
      type: "NodeCompleted",
      node,
      pipeline,
      iterations,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitNodeFailed(
    node: string,
    pipeline: string,
    phase: NodePhase,
    error: string,
  ): void {
    this.emit({
      type: "NodeFailed",
      node,
      pipeline,
      phase,
      error,
      timestamp: new Date().toISOString(),
    });
  }

  emitPoisonPillActivated(node: string, pipeline: string): void {
    this.emit({
      type: "PoisonPillActivated",
      node,
      pipeline,
      timestamp: new Date().toISOString(),
    });
  }

  emitPipelineStarted(name: string, nodeCount: number): void {
    this.emit({
      type: "PipelineStarted",
      name,
      nodeCount,
      timestamp: new Date().toISOString(),
    });
  }

  emitPipelineCompleted(
    name: string,
    status: "success" | "stopped",
    duration: number,
  ): void {
    this.emit({
      type: "PipelineCompleted",
      name,
      status,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitPipelineFailed(name: string, error: string, duration: number): void {
    this.emit({
      type: "PipelineFailed",
      name,
      error,
      duration,
      timestamp: new Date().toISOString(),
    });
  }
}
