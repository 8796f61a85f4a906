import type { Clock } from "../../src/utils/clock.js";

/**
 * Virtual time: `sleep` records the duration and advances `now` at once.
 */
export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];
  /** Runs inside every sleep, before the abort check. */
  onSleep?: (ms: number) => void;

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    this.onSleep?.(ms);
    signal?.throwIfAborted();
    this.time += ms;
  }
}
