/**
 * runtime.ts
 *
 * Serialized execution context shared by all components.
 *
 * Every public operation runs inside atomic(): the outermost call takes a
 * checkpoint of every registered store and restores it if anything throws,
 * collaborator failures included. Nested calls join the enclosing
 * operation, so a failure anywhere rolls back the whole transaction.
 */

import type { Clock } from "@refract/types";
import { ProtocolError, describeError } from "./errors";
import { createLogger, type Logger } from "./logger";

/** State owner that can be checkpointed and rolled back. */
export interface Snapshotable<S> {
  snapshot(): S;
  restore(state: S): void;
}

interface Checkpoint {
  restore(): void;
}

function checkpoint<S>(store: Snapshotable<S>): Checkpoint {
  const state = store.snapshot();
  return { restore: () => store.restore(state) };
}

export class Runtime {
  private readonly stores: Snapshotable<unknown>[] = [];
  private readonly guards = new Set<string>();
  private depth = 0;
  private readonly logger: Logger;

  constructor(private readonly clock: Clock, logger?: Logger) {
    this.logger = logger ?? createLogger("runtime");
  }

  /** Block time of the operation in progress. */
  now(): number {
    return this.clock.now();
  }

  register<S>(store: Snapshotable<S>): void {
    this.stores.push(store);
  }

  /** True while an operation is executing. */
  get inTransaction(): boolean {
    return this.depth > 0;
  }

  atomic<T>(operation: string, fn: () => T): T {
    if (this.depth > 0) return fn();

    const checkpoints = this.stores.map((store) => checkpoint(store));
    this.depth++;
    try {
      return fn();
    } catch (err) {
      for (const saved of checkpoints) saved.restore();
      this.logger.warn(`${operation} reverted`, { reason: describeError(err) });
      throw err;
    } finally {
      this.depth--;
    }
  }

  /**
   * Run `fn` holding the `key` guard. A transitive call back into any
   * section guarded by the same key fails with ReentrantCall.
   */
  nonReentrant<T>(key: string, fn: () => T): T {
    if (this.guards.has(key)) {
      throw new ProtocolError("ReentrantCall", `${key} is already executing`);
    }
    this.guards.add(key);
    try {
      return fn();
    } finally {
      this.guards.delete(key);
    }
  }
}
