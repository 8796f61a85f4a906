/**
 * @module crawler/frontier
 * @fileoverview BFS frontier and visited set for one crawl run.
 *
 * The frontier is a FIFO of {@link CrawlTask}s. It remembers which URLs are
 * currently queued so one URL is never pending twice; the {@link VisitedSet}
 * remembers which URLs have been taken off the queue for processing. Together
 * they guarantee each URL is processed at most once per run.
 *
 * Dequeue is O(1): a head index walks the backing array, which is compacted
 * once the consumed prefix dominates it.
 */

/** A unit of work: a normalized URL and its link distance from the seed. */
export interface CrawlTask {
  readonly url: string;
  readonly depth: number;
}

/**
 * Normalized URLs already taken for processing. Grows monotonically.
 */
export class VisitedSet {
  private readonly urls = new Set<string>();

  /**
   * Check-and-insert in one step.
   *
   * @returns `true` if the caller now owns `url`, `false` if it was already claimed.
   */
  claim(url: string): boolean {
    if (this.urls.has(url)) {
      return false;
    }
    this.urls.add(url);
    return true;
  }

  has(url: string): boolean {
    return this.urls.has(url);
  }

  get size(): number {
    return this.urls.size;
  }
}

export class Frontier {
  private items: CrawlTask[] = [];
  private head = 0;
  private readonly queued = new Set<string>();

  constructor(initial: readonly CrawlTask[] = []) {
    for (const task of initial) {
      this.push(task);
    }
  }

  /**
   * Append `task` to the back unless its URL is already pending.
   *
   * @returns Whether the task was added.
   */
  push(task: CrawlTask): boolean {
    if (this.queued.has(task.url)) {
      return false;
    }
    this.queued.add(task.url);
    this.items.push(task);
    return true;
  }

  /** Remove and return the front task, or `undefined` when empty. */
  shift(): CrawlTask | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }
    const task = this.items[this.head];
    this.head += 1;
    this.queued.delete(task.url);

    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return task;
  }

  isQueued(url: string): boolean {
    return this.queued.has(url);
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }
}
