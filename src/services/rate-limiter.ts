/**
 * @fileoverview Per-host request pacing for the crawler.
 *
 * Every request to a host passes through that host's queue:
 *
 * ```
 *   fetch attempt (host "a.test")
 *         |
 *         v
 *   [ Host Queue "a.test" ]  <-- concurrency 1
 *         |
 *         +--> wait until lastRequestAt + minInterval
 *         +--> stamp lastRequestAt = now
 *         +--> run the request
 * ```
 *
 * The read-then-write of `lastRequestAt` happens inside the queue task, so it
 * is atomic with respect to any other request for the same host. Different
 * hosts never wait on each other.
 *
 * The wait goes through the injected {@link Clock} and honours the caller's
 * `AbortSignal`, so an aborted crawl leaves the queue immediately.
 *
 * @module services/rate-limiter
 */

import PQueue from "p-queue";
import { systemClock, type Clock } from "../utils/clock.js";

// ---------------------------------------------------------------------------
// HostRateLimiter Class
// ---------------------------------------------------------------------------

/**
 * Serializes and spaces out requests per host.
 *
 * ## Usage
 *
 * ```typescript
 * const limiter = new HostRateLimiter(1000);
 *
 * // robots.txt asked for Crawl-delay: 5
 * limiter.setMinInterval("a.test", 5000);
 *
 * const res = await limiter.schedule("a.test", () => fetch("http://a.test/x"));
 * ```
 *
 * One instance belongs to one crawl run; call {@link close} when the run ends.
 */
export class HostRateLimiter {
  /**
   * Lazily created queue per host, concurrency 1.
   */
  private readonly queues = new Map<string, PQueue>();

  /** Clock reading taken when the last request to each host started. */
  private readonly lastRequestAt = new Map<string, number>();

  /** Host-specific intervals raised above the default (robots crawl-delay). */
  private readonly minIntervals = new Map<string, number>();

  /**
   * @param defaultIntervalMs - Minimum spacing between two requests to one host.
   */
  constructor(
    private readonly defaultIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  // -------------------------------------------------------------------------
  // Interval Management
  // -------------------------------------------------------------------------

  /**
   * Raise the interval for `host`. Never lowers it below the default.
   *
   * @example
   * ```typescript
   * const limiter = new HostRateLimiter(1000);
   * limiter.setMinInterval("a.test", 250);
   * limiter.intervalFor("a.test"); // => 1000
   * limiter.setMinInterval("a.test", 5000);
   * limiter.intervalFor("a.test"); // => 5000
   * ```
   */
  setMinInterval(host: string, intervalMs: number): void {
    this.minIntervals.set(host, Math.max(this.defaultIntervalMs, intervalMs));
  }

  intervalFor(host: string): number {
    return this.minIntervals.get(host) ?? this.defaultIntervalMs;
  }

  /** When the last request to `host` started, or `undefined` if none has. */
  lastRequestFor(host: string): number | undefined {
    return this.lastRequestAt.get(host);
  }

  // -------------------------------------------------------------------------
  // Scheduling
  // -------------------------------------------------------------------------

  private queueFor(host: string): PQueue {
    let queue = this.queues.get(host);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(host, queue);
    }
    return queue;
  }

  /**
   * Run `fn` once `host` is free and its interval has elapsed.
   *
   * The first request to a host never waits. The timestamp is taken right
   * before `fn` starts, whatever the outcome of `fn`.
   *
   * @throws Whatever `fn` throws, or an abort error when `signal` fires
   *   while queued or waiting.
   */
  async schedule<T>(
    host: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const queue = this.queueFor(host);

    return queue.add(
      async () => {
        const last = this.lastRequestAt.get(host);
        if (last !== undefined) {
          const wait = last + this.intervalFor(host) - this.clock.now();
          if (wait > 0) {
            await this.clock.sleep(wait, signal);
          }
        }
        signal?.throwIfAborted();

        this.lastRequestAt.set(host, this.clock.now());
        return fn();
      },
      { throwOnTimeout: true, signal },
    );
  }

  /**
   * Number of hosts seen so far.
   */
  get hostCount(): number {
    return this.queues.size;
  }

  /**
   * Drop pending tasks and forget all per-host state.
   */
  close(): void {
    for (const queue of this.queues.values()) {
      queue.clear();
    }
    this.queues.clear();
    this.lastRequestAt.clear();
    this.minIntervals.clear();
  }
}
