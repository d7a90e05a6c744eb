/**
 * Maps the `class` identifiers of a pipeline config to
 * factories of node logic.
 */

import { ConfigurationError } from "../errors.js";
import type { NodeLogic } from "../node/logic.js";

export type NodeLogicFactory = () => NodeLogic;

export class NodeRegistry {
  private factories: Map<string, NodeLogicFactory> = new Map();

  /**
   * Register a factory for a class identifier.
   * Registering an already-registered identifier replaces the previous factory.
   */
  register(className: string, factory: NodeLogicFactory): void {
    this.factories.set(className, factory);
  }

  /**
   * Build a fresh logic instance; every node gets its own.
   *
   * @throws ConfigurationError for an unregistered identifier
   */
  create(className: string): NodeLogic {
    const factory = this.factories.get(className);
    if (!factory) {
      const known = this.registeredClasses().join(", ") || "none";
      throw new ConfigurationError(
        `Unknown node class "${className}". Registered classes: ${known}`,
      );
    }
    return factory();
  }

  has(className: string): boolean {
    return this.factories.has(className);
  }

  registeredClasses(): string[] {
    return Array.from(this.factories.keys());
  }
}
