/**
 * Bounded polling.
 *
 * Some build-server data (coverage reports in particular) appears a
 * little after the build step that produced it. `retry` polls a probe
 * until it reports success or the time budget runs out. Running out of
 * time is a normal outcome and resolves to `false`; a probe that throws
 * ends the loop with that error.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "winston";

export type Probe = () => boolean | Promise<boolean>;

export interface RetryOptions {
  readonly logger?: Logger;
  /** Suspends between attempts. Defaults to a real timer that ends early on abort. */
  readonly sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Monotonic clock in milliseconds. */
  readonly nowFn?: () => number;
  /** Checked before every attempt; once aborted, no further probes run. */
  readonly signal?: AbortSignal;
}

/** Node timers clamp anything longer to 1 ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, signal === undefined ? undefined : { signal });
}

function defaultNow(): number {
  return performance.now();
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Invoke `probe` until it returns true or `timeoutMs` has elapsed since
 * the first attempt, waiting `intervalMs` between attempts.
 *
 * With a probe that never succeeds the probe runs at most
 * `ceil(timeoutMs / intervalMs) + 1` times.
 */
export async function retry(
  timeoutMs: number,
  intervalMs: number,
  probe: Probe,
  options: RetryOptions = {},
): Promise<boolean> {
  assertPositiveInteger("timeoutMs", timeoutMs);
  assertPositiveInteger("intervalMs", intervalMs);
  if (intervalMs > MAX_INTERVAL_MS) {
    throw new RangeError(`intervalMs must be at most ${MAX_INTERVAL_MS}, got ${intervalMs}`);
  }

  const sleep = options.sleepFn ?? defaultSleep;
  const now = options.nowFn ?? defaultNow;
  const logger = options.logger;
  const signal = options.signal;

  if (options.signal?.aborted === true) {
    logger?.debug("Retry cancelled", { attempts: 0 });
    return false;
  }

  const start = now();
  let attempts = 1;
  let succeeded = await probe();

  while (!succeeded && now() - start < timeoutMs) {
    logger?.debug(`Operation did not succeed, retrying in ${intervalMs} ms`, {
      attempts,
      elapsedMs: Math.round(now() - start),
      timeoutMs,
    });
    try {
      await sleep(intervalMs, signal);
    } catch (cause: unknown) {
      if (signal?.aborted !== true) {
        throw cause;
      }
    }
    if (signal?.aborted === true) {
      logger?.debug("Retry cancelled", { attempts });
      return false;
    }
    attempts += 1;
    succeeded = await probe();
  }

  const elapsedMs = Math.round(now() - start);
  if (succeeded) {
    logger?.debug(`Operation succeeded after ${elapsedMs} ms`, { attempts });
  } else {
    logger?.debug(`Operation timed out after ${elapsedMs} ms`, { attempts });
  }
  return succeeded;
}
