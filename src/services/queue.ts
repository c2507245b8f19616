/**
 * @fileoverview Admission control for outbound page fetches.
 *
 * Two limits apply to every fetch a crawl level launches:
 *
 * 1. **Concurrency** -- a {@link FetchPool} wraps a `p-queue` instance so at
 *    most `maxConcurrent` fetches are in flight at once.
 * 2. **Memory pressure** -- before a queued fetch starts, its slot waits on a
 *    {@link MemoryGate} until host memory usage drops below the threshold.
 *
 * ```
 *   pool.run(fn)
 *     |
 *     +--> PQueue slot (concurrency = maxConcurrent)
 *            |
 *            +--> gate.waitForCapacity()   (sample every intervalMs)
 *            |
 *            +--> fn()
 * ```
 *
 * Unlike a per-domain rate limiter, the pool is global: a crawl of a single
 * site still reaches full concurrency.
 *
 * @module services/queue
 */

import os from "node:os";
import { setTimeout as sleep } from "node:timers/promises";
import PQueue from "p-queue";

// ---------------------------------------------------------------------------
// Memory Gate
// ---------------------------------------------------------------------------

/** Returns current host memory usage as a percentage in [0, 100]. */
export type MemorySampler = () => number;

/** Memory usage of the whole host, from the OS counters. */
export function hostMemoryUsagePercent(): number {
  const total = os.totalmem();
  if (total === 0) {
    return 0;
  }
  return (1 - os.freemem() / total) * 100;
}

export interface MemoryGateOptions {
  /** Usage at or above which new work waits. */
  thresholdPercent: number;

  /** Delay between samples while waiting, in milliseconds. */
  intervalMs: number;

  /** Defaults to {@link hostMemoryUsagePercent}. */
  sample?: MemorySampler;
}

/**
 * Blocks callers while host memory usage is at or above a threshold.
 *
 * @example
 * ```ts
 * const gate = new MemoryGate({ thresholdPercent: 70, intervalMs: 1000 });
 * await gate.waitForCapacity(); // resolves once usage < 70%
 * ```
 */
export class MemoryGate {
  private readonly thresholdPercent: number;
  private readonly intervalMs: number;
  private readonly sample: MemorySampler;

  constructor(options: MemoryGateOptions) {
    this.thresholdPercent = options.thresholdPercent;
    this.intervalMs = options.intervalMs;
    this.sample = options.sample ?? hostMemoryUsagePercent;
  }

  /** Whether a new task may start right now. */
  hasCapacity(): boolean {
    return this.sample() < this.thresholdPercent;
  }

  /**
   * Resolve once memory usage is below the threshold. Logs once per wait.
   *
   * @returns Number of samples that were over the threshold.
   */
  async waitForCapacity(): Promise<number> {
    let waits = 0;
    while (!this.hasCapacity()) {
      if (waits === 0) {
        console.error(
          `[queue] Memory usage at or above ${this.thresholdPercent}%, holding new fetches`
        );
      }
      waits++;
      await sleep(this.intervalMs);
    }
    return waits;
  }
}

// ---------------------------------------------------------------------------
// Fetch Pool
// ---------------------------------------------------------------------------

export interface FetchPoolOptions {
  /** Maximum tasks running at once. */
  maxConcurrent: number;

  /** Optional admission gate checked before each task starts. */
  gate?: MemoryGate;
}

/**
 * Bounded, memory-gated task pool.
 */
export class FetchPool {
  private readonly queue: PQueue;
  private readonly gate: MemoryGate | undefined;

  constructor(options: FetchPoolOptions) {
    if (options.maxConcurrent < 1) {
      throw new RangeError(
        `maxConcurrent must be at least 1, got ${options.maxConcurrent}`
      );
    }
    this.queue = new PQueue({ concurrency: options.maxConcurrent });
    this.gate = options.gate;
  }

  /**
   * Run a task once a slot is free and the gate admits it. The returned
   * promise settles with the task's own result or rejection.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.add(
      async () => {
        if (this.gate) {
          await this.gate.waitForCapacity();
        }
        return task();
      },
      { throwOnTimeout: true }
    );
  }
}
