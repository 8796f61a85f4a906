/**
 * @module utils/clock
 * @fileoverview Time source and cancellable waits.
 *
 * The rate limiter and the retry backoff are the only places the crawler
 * suspends. Both wait through a {@link Clock} so a crawl can be cancelled
 * mid-wait and tests can substitute a clock that never really sleeps.
 */

import { clearTimeout, setTimeout } from "node:timers";
import { setTimeout as delay } from "node:timers/promises";
import { CrawlAbortedError } from "./errors.js";

export interface Clock {
  /** Milliseconds on a monotonic scale. */
  now(): number;
  /**
   * Resolve after `ms` milliseconds. Rejects with an `AbortError` as soon as
   * `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now() {
    return performance.now();
  },
  async sleep(ms, signal) {
    if (ms <= 0) {
      signal?.throwIfAborted();
      return;
    }
    await delay(ms, undefined, { signal });
  },
};

/**
 * An abort controller that follows a parent signal and, optionally, fires on
 * its own after `timeoutMs`. `reason()` tells the two causes apart, and the
 * signal's own `reason` is a {@link CrawlAbortedError} carrying the same cause.
 *
 * Call `dispose()` once the guarded work is over to drop the timer and the
 * listener on the parent.
 */
export interface CrawlSignal {
  readonly signal: AbortSignal;
  reason(): "aborted" | "timeout" | null;
  dispose(): void;
}

export function createCrawlSignal(parent?: AbortSignal, timeoutMs?: number): CrawlSignal {
  const controller = new AbortController();
  let cause: "aborted" | "timeout" | null = null;

  const fire = (why: "aborted" | "timeout"): void => {
    if (cause === null) {
      cause = why;
      controller.abort(new CrawlAbortedError(why));
    }
  };
  const onParentAbort = (): void => fire("aborted");

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMs !== undefined && !controller.signal.aborted) {
    timer = setTimeout(() => fire("timeout"), timeoutMs);
    timer.unref();
  }

  return {
    signal: controller.signal,
    reason: () => cause,
    dispose() {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
