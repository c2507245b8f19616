/**
 * @fileoverview Tests for fetch admission control.
 *
 * Covers: MemoryGate with an injected memory sampler, and FetchPool
 * concurrency, gating and error propagation.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  FetchPool,
  MemoryGate,
  hostMemoryUsagePercent,
} from "../../src/services/queue.js";

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

/** Sampler that returns each value in turn, then repeats the last one. */
function sequence(...values: number[]): () => number {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)];
}

// ---------------------------------------------------------------------------
// MemoryGate
// ---------------------------------------------------------------------------

describe("MemoryGate", () => {
  it("has capacity strictly below the threshold", () => {
    expect(new MemoryGate({ thresholdPercent: 70, intervalMs: 1, sample: () => 69.9 }).hasCapacity()).toBe(true);
    expect(new MemoryGate({ thresholdPercent: 70, intervalMs: 1, sample: () => 70 }).hasCapacity()).toBe(false);
  });

  it("resolves immediately when memory is available", async () => {
    const gate = new MemoryGate({ thresholdPercent: 70, intervalMs: 1, sample: () => 10 });

    await expect(gate.waitForCapacity()).resolves.toBe(0);
    expect(console.error).not.toHaveBeenCalled();
  });

  it("waits until usage drops and logs once", async () => {
    const gate = new MemoryGate({
      thresholdPercent: 70,
      intervalMs: 1,
      sample: sequence(95, 90, 80, 40),
    });

    await expect(gate.waitForCapacity()).resolves.toBe(3);
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      "[queue] Memory usage at or above 70%, holding new fetches",
    );
  });
});

describe("hostMemoryUsagePercent", () => {
  it("returns a percentage", () => {
    const usage = hostMemoryUsagePercent();
    expect(usage).toBeGreaterThanOrEqual(0);
    expect(usage).toBeLessThanOrEqual(100);
  });
});

// ---------------------------------------------------------------------------
// FetchPool
// ---------------------------------------------------------------------------

describe("FetchPool", () => {
  it("rejects a concurrency below one", () => {
    expect(() => new FetchPool({ maxConcurrent: 0 })).toThrow(RangeError);
  });

  it("never runs more than maxConcurrent tasks at once", async () => {
    const pool = new FetchPool({ maxConcurrent: 3 });
    let running = 0;
    let peak = 0;

    const results = await Promise.all(
      Array.from({ length: 10 }, (_unused, i) =>
        pool.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await sleep(5);
          running--;
          return i * 2;
        }),
      ),
    );

    expect(peak).toBe(3);
    expect(results).toEqual([0, 2, 4, 6, 8, 10, 12, 14, 16, 18]);
  });

  it("propagates a task rejection to its caller only", async () => {
    const pool = new FetchPool({ maxConcurrent: 2 });

    const failing = pool.run(async () => {
      throw new Error("boom");
    });
    const passing = pool.run(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(passing).resolves.toBe("ok");
  });

  it("holds tasks until the gate admits them", async () => {
    const sample = vi.fn(sequence(99, 99, 10));
    const gate = new MemoryGate({ thresholdPercent: 50, intervalMs: 1, sample });
    const pool = new FetchPool({ maxConcurrent: 1, gate });

    await expect(pool.run(async () => "done")).resolves.toBe("done");
    expect(sample).toHaveBeenCalledTimes(3);
  });
});
