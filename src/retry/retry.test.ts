/**
 * Tests for the polling retrier.
 *
 * A fake clock advances by exactly the requested interval on every
 * sleep, so attempt counts are deterministic.
 */

import { describe, it, expect, vi } from "vitest";
import { MAX_INTERVAL_MS, retry, type RetryOptions } from "./retry.js";
import { createLogger } from "../logging/logger.js";
import { MemoryTransport, flushLogs } from "../logging/memory-transport.js";

function fakeClock(): Required<Pick<RetryOptions, "sleepFn" | "nowFn">> & { sleeps: number[] } {
  let current = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    nowFn: () => current,
    sleepFn: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}

describe("retry", () => {
  it("returns true without sleeping when the first probe succeeds", async () => {
    const clock = fakeClock();
    const probe = vi.fn(() => true);

    const result = await retry(1000, 100, probe, clock);

    expect(result).toBe(true);
    expect(probe).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("returns true after N failures with N+1 probes", async () => {
    const clock = fakeClock();
    let calls = 0;
    const probe = vi.fn(() => {
      calls += 1;
      return calls > 3;
    });

    const result = await retry(1000, 100, probe, clock);

    expect(result).toBe(true);
    expect(probe).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([100, 100, 100]);
  });

  it("gives up after ceil(timeout / interval) + 1 probes", async () => {
    const clock = fakeClock();
    const probe = vi.fn(() => false);

    const result = await retry(1000, 300, probe, clock);

    expect(result).toBe(false);
    // Probes at 0, 300, 600, 900, 1200: the loop stops once 1200 >= 1000.
    expect(probe).toHaveBeenCalledTimes(5);
  });

  it("stops exactly at the deadline when the interval divides the timeout", async () => {
    const clock = fakeClock();
    const probe = vi.fn(() => false);

    const result = await retry(1000, 250, probe, clock);

    expect(result).toBe(false);
    expect(probe).toHaveBeenCalledTimes(5);
  });

  it("accepts async probes", async () => {
    const clock = fakeClock();
    const answers = [false, true];
    const probe = vi.fn(async () => answers.shift() ?? false);

    await expect(retry(500, 100, probe, clock)).resolves.toBe(true);
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it("propagates a probe error immediately without retrying", async () => {
    const clock = fakeClock();
    const probe = vi.fn(() => {
      throw new Error("connection refused");
    });

    await expect(retry(1000, 100, probe, clock)).rejects.toThrow("connection refused");
    expect(probe).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("propagates a rejection from a later attempt", async () => {
    const clock = fakeClock();
    let calls = 0;
    const probe = vi.fn(async () => {
      calls += 1;
      if (calls === 2) {
        throw new Error("socket hang up");
      }
      return false;
    });

    await expect(retry(1000, 100, probe, clock)).rejects.toThrow("socket hang up");
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it("stops probing once the signal is aborted", async () => {
    const clock = fakeClock();
    const controller = new AbortController();
    const probe = vi.fn(() => {
      controller.abort();
      return false;
    });

    const result = await retry(1000, 100, probe, { ...clock, signal: controller.signal });

    expect(result).toBe(false);
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it("does not probe when the signal is already aborted", async () => {
    const clock = fakeClock();
    const controller = new AbortController();
    controller.abort();
    const probe = vi.fn(() => true);

    const result = await retry(1000, 100, probe, { ...clock, signal: controller.signal });

    expect(result).toBe(false);
    expect(probe).not.toHaveBeenCalled();
  });

  it("ends the wait early when the signal is aborted while sleeping", async () => {
    const controller = new AbortController();
    const probe = vi.fn(() => false);
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    const result = await retry(60_000, 30_000, probe, { signal: controller.signal });

    expect(result).toBe(false);
    expect(probe).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("rethrows a sleep failure that is not an abort", async () => {
    const probe = vi.fn(() => false);
    const sleepFn = async () => {
      throw new Error("timer unavailable");
    };

    await expect(retry(1000, 100, probe, { sleepFn, nowFn: () => 0 })).rejects.toThrow(
      "timer unavailable",
    );
  });

  it("rejects an interval longer than a Node timer can wait", async () => {
    const probe = vi.fn(() => true);

    await expect(retry(5_000_000_000, MAX_INTERVAL_MS + 1, probe)).rejects.toThrow(
      "intervalMs must be at most 2147483647, got 2147483648",
    );
    expect(probe).not.toHaveBeenCalled();
  });

  it("accepts the longest interval a Node timer can wait", async () => {
    await expect(retry(5_000_000_000, MAX_INTERVAL_MS, () => true)).resolves.toBe(true);
  });

  it.each([
    [0, 100],
    [-1, 100],
    [100, 0],
    [1.5, 100],
    [100, Number.NaN],
  ])("rejects timeout %s / interval %s", async (timeoutMs, intervalMs) => {
    await expect(retry(timeoutMs, intervalMs, () => true)).rejects.toThrow(RangeError);
  });

  it("suspends on a real timer between attempts", async () => {
    const answers = [false, true];
    const started = Date.now();

    const result = await retry(1000, 20, () => answers.shift() ?? false);

    expect(result).toBe(true);
    expect(Date.now() - started).toBeGreaterThanOrEqual(15);
  });

  it("logs each retry and the outcome at debug level", async () => {
    const clock = fakeClock();
    const transport = new MemoryTransport();
    const logger = createLogger({ level: "debug", transport });

    await retry(200, 100, () => false, { ...clock, logger });
    await flushLogs();

    expect(transport.messages("debug")).toEqual([
      "Operation did not succeed, retrying in 100 ms",
      "Operation did not succeed, retrying in 100 ms",
      "Operation timed out after 200 ms",
    ]);
  });
});
