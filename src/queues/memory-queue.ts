/**
 * MemoryQueue is the in-process FIFO behind every queue handle.
 * Purpose: point-to-point delivery with timed, abortable waits.
 * Assumptions: one consumer per queue; waiters are served in arrival order.
 * Usage: queue.push(msg); await queue.pop(500); queue.close().
 */

import { QueueClosedError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type QueueHandle<T> = {
  readonly name: string;
  push(message: T): void;
  /** Resolves `null` (Empty) on timeout, close or abort. `0` never waits. */
  pop(timeoutMs?: number, signal?: AbortSignal): Promise<T | null>;
  size(): number;
  drain(): T[];
  close(): void;
  readonly closed: boolean;
};

type Waiter<T> = {
  resolve: (value: T | null) => void;
  cleanup: () => void;
};

// =============================================================================
// QUEUE
// =============================================================================

export class MemoryQueue<T> implements QueueHandle<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private isClosed = false;

  constructor(public readonly name: string) {}

  get closed(): boolean {
    return this.isClosed;
  }

  push(message: T): void {
    if (this.isClosed) {
      throw new QueueClosedError(this.name);
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(message);
      return;
    }

    this.items.push(message);
  }

  pop(timeoutMs?: number, signal?: AbortSignal): Promise<T | null> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null);
    }
    if (this.isClosed || timeoutMs === 0 || signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => {
          if (timer) clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };

      const settleEmpty = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        waiter.cleanup();
        resolve(null);
      };
      const onAbort = (): void => settleEmpty();

      if (timeoutMs !== undefined) {
        timer = setTimeout(settleEmpty, timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  size(): number {
    return this.items.length;
  }

  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter.cleanup();
      waiter.resolve(null);
    }
  }
}
