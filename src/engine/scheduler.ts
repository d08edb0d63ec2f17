/**
 * Run-time concurrency primitives for the decision engine.
 * - BoundedScheduler: fans a subject list out over a fixed number of lanes
 * - SerialWriter: one sink write at a time, in arrival order
 */

import { ConfigError } from '../core/errors.js';
import type { DecisionRecord } from './types.js';
import type { ActionSink } from '../sink/action-sink.js';

/**
 * Runs a worker over a list with at most `capacity` items in flight.
 * Each lane pulls the next item from a shared cursor, so items start in
 * list order and a lane picks up new work as soon as its item settles.
 */
export class BoundedScheduler {
  private running = 0;
  private queued = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(`Scheduler needs at least 1 lane, got ${capacity}`);
    }
  }

  /**
   * Resolves once every item has settled. A rejected item does not stop
   * the others; the first rejection is rethrown at the end.
   */
  async each<T>(items: readonly T[], worker: (item: T) => Promise<void>): Promise<void> {
    const errors: unknown[] = [];
    let cursor = 0;
    this.queued += items.length;

    const lane = async (): Promise<void> => {
      while (cursor < items.length) {
        const item = items[cursor++];
        this.queued--;
        this.running++;
        try {
          await worker(item);
        } catch (err) {
          errors.push(err);
        } finally {
          this.running--;
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(this.capacity, items.length) }, lane));
    if (errors.length > 0) throw errors[0];
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queued;
  }
}

/**
 * SerialWriter: exclusive access to an ActionSink. Writers queue in FIFO
 * order; a writer that gets the lock after the run was halted skips its
 * write so no record lands once cancellation is observed.
 */
export class SerialWriter {
  private locked = false;
  private queue: Array<() => void> = [];
  private written = 0;

  constructor(private readonly sink: ActionSink) {}

  /**
   * Write one record. Resolves true when the sink accepted it, false when
   * `signal` aborted before the lock was obtained.
   */
  async write(record: DecisionRecord, signal?: AbortSignal): Promise<boolean> {
    await this.lock();
    try {
      if (signal?.aborted) return false;
      await this.sink.write(record);
      this.written++;
      return true;
    } finally {
      this.unlock();
    }
  }

  get count(): number {
    return this.written;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  private async lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  private unlock(): void {
    const next = this.queue.shift();
    if (next) {
      queueMicrotask(next);
    } else {
      this.locked = false;
    }
  }
}
