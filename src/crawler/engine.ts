/**
 * @module crawler/engine
 * @fileoverview Breadth-first crawl engine.
 *
 * ## Algorithm Overview
 *
 * ```
 *   seed (depth 0)
 *      |
 *      v
 *   [Frontier] --shift--> visited? --yes--> discard
 *      ^                     | no
 *      |                   claim
 *      |                     |
 *      |               robots allow? --no--> record "skipped" (robots)
 *      |                     | yes
 *      |                   fetch --FetchError--> record "failed" (kind)
 *      |                     |  \--redirect refused--> record "skipped" (robots | filtered)
 *      |                     |
 *      |                  extract
 *      |                     |
 *      +--- push (link, depth + 1) <-- filter + bounds
 *                            |
 *                     record "success"
 * ```
 *
 * The loop runs while the frontier is non-empty and fewer than `maxPages`
 * records have been emitted. Every record counts toward the budget,
 * failed and skipped ones included, which bounds the number of requests a
 * run can make. Discarded duplicates produce no record and cost nothing.
 *
 * ## Task states
 *
 * `pending → fetching → (extracting → enqueuing) | failed | skipped`, ending
 * in `recorded` or `skipped`. Each transition is logged at debug level and
 * reported to `onProgress`.
 *
 * ## Redirects
 *
 * Every redirect hop passes the same robots.txt check as a queued URL, and
 * the same scope filter as a discovered link, before it is requested. The
 * seed is exempt from the scope filter; when it redirects to another host,
 * that host becomes the crawl's host. The final URL is claimed as visited.
 *
 * ## Failure isolation
 *
 * A {@link FetchError} becomes a failed record. Any other exception while
 * processing a task is logged and recorded as `error: "internal"`. Only a
 * {@link CrawlAbortedError} (caller's signal or `crawlTimeoutSeconds`) ends
 * the loop early; the task it interrupted produces no record.
 *
 * ## Ownership
 *
 * Each {@link CrawlEngine.run} call creates and disposes its own frontier,
 * visited set, robots cache and rate limiter. Nothing is shared between runs.
 *
 * @example
 * ```ts
 * import { CrawlEngine } from "./engine.js";
 * import { parseCrawlConfig } from "../config.js";
 *
 * const engine = new CrawlEngine({
 *   config: parseCrawlConfig({ seedUrl: "https://example.com/", maxDepth: 1 }),
 *   onRecord: (record) => console.error(record.url, record.status),
 * });
 * const result = await engine.run();
 * console.error(result.summary);
 * // { pages_processed: 12, succeeded: 11, failed: 1, skipped: 0,
 * //   max_depth_reached: 1, stopped_reason: "frontier_exhausted" }
 * ```
 */

import type { CrawlConfig } from "../config.js";
import { ContentExtractor } from "../extractor/content-extractor.js";
import type { HtmlParser } from "../extractor/html-parser.js";
import { Fetcher, type FetchLike, type FetchOutcome } from "../services/fetch.js";
import { createCrawlSignal, systemClock, type Clock } from "../utils/clock.js";
import {
  CrawlAbortedError,
  FetchError,
  RedirectBlockedError,
  formatError,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { extractHost, normalizeUrl } from "../utils/url.js";
import { Frontier, VisitedSet, type CrawlTask } from "./frontier.js";
import { createRecord, type PageRecord, type RecordInit } from "./records.js";
import { RobotsChecker } from "./robots.js";
import { filterCandidates, shouldVisit } from "./url-filter.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

export type TaskState =
  | "pending"
  | "fetching"
  | "extracting"
  | "enqueuing"
  | "recorded"
  | "failed"
  | "skipped";

/**
 * Why a task ended without a success record.
 *
 * - `visited`: the URL was already processed (no record)
 * - `depth`: the task lies beyond `maxDepth` (no record)
 * - `robots`: robots.txt denies it or a redirect hop (skipped record)
 * - `filtered`: a redirect leads out of the crawl's scope (skipped record)
 */
export type SkipReason = "visited" | "depth" | "robots" | "filtered";

/**
 * One state transition of one task, as reported to `onProgress`.
 */
export interface CrawlProgress {
  url: string;
  depth: number;
  state: TaskState;
  /** Records emitted so far, this task's included once it is recorded. */
  pages_processed: number;
  max_pages: number;
  /** Skip reason or failure kind for `skipped` and `failed`. */
  reason?: string;
  status_code?: number | null;
  title?: string;
}

export type StopReason = "frontier_exhausted" | "page_budget" | "aborted" | "timeout";

export interface CrawlSummary {
  pages_processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Deepest depth among emitted records; 0 when nothing was recorded. */
  max_depth_reached: number;
  stopped_reason: StopReason;
}

export interface CrawlResult {
  seedUrl: string;
  /** Records in the order they were emitted (BFS order). */
  records: PageRecord[];
  summary: CrawlSummary;
}

/** Receives each record as soon as it is emitted. */
export type RecordSink = (record: PageRecord) => void | Promise<void>;

export interface CrawlEngineOptions {
  config: CrawlConfig;
  logger?: Logger;
  /** Replaces the global `fetch` for pages and robots.txt. */
  fetchImpl?: FetchLike;
  parser?: HtmlParser;
  clock?: Clock;
  /** Wall-clock source for `fetched_at`. @default () => new Date() */
  now?: () => Date;
  onRecord?: RecordSink;
  onProgress?: (progress: CrawlProgress) => void;
  /** Cancels the run; the current task is abandoned without a record. */
  signal?: AbortSignal;
}

/**
 * Collaborators and state of one run.
 *
 * @internal
 */
interface RunContext {
  fetcher: Fetcher;
  robots: RobotsChecker;
  extractor: ContentExtractor;
  frontier: Frontier;
  visited: VisitedSet;
  seedHost: string;
  signal: AbortSignal;
  records: PageRecord[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * CrawlEngine
 * ──────────────────────────────────────────────────────────────────────────── */

export class CrawlEngine {
  private readonly config: CrawlConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly now: () => Date;

  constructor(private readonly options: CrawlEngineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? systemClock;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Crawl from the configured seed until the frontier empties, the page
   * budget is spent or the run is cancelled.
   *
   * Never rejects because of a single page. Rejects only when the seed URL
   * itself cannot be normalized.
   */
  async run(): Promise<CrawlResult> {
    const { config } = this;
    const seed = normalizeUrl(config.seedUrl);
    const crawlSignal = createCrawlSignal(
      this.options.signal,
      config.crawlTimeoutSeconds !== undefined
        ? config.crawlTimeoutSeconds * 1000
        : undefined,
    );

    const ctx: RunContext = {
      fetcher: new Fetcher({
        config,
        fetchImpl: this.options.fetchImpl,
        clock: this.clock,
        logger: this.logger.child("fetch"),
      }),
      robots: new RobotsChecker({
        userAgent: config.userAgent,
        respectRobots: config.respectRobots,
        timeoutSeconds: config.robotsTimeoutSeconds,
        fetchImpl: this.options.fetchImpl,
        logger: this.logger.child("robots"),
      }),
      extractor: new ContentExtractor({
        snippetLength: config.snippetLength,
        parser: this.options.parser,
        logger: this.logger.child("extract"),
      }),
      frontier: new Frontier([{ url: seed, depth: 0 }]),
      visited: new VisitedSet(),
      seedHost: extractHost(seed),
      signal: crawlSignal.signal,
      records: [],
    };

    this.logger.info(
      `Crawling ${seed} (max depth ${config.maxDepth}, max pages ${config.maxPages})`,
    );

    let stoppedReason: StopReason = "frontier_exhausted";

    try {
      while (!ctx.frontier.isEmpty()) {
        if (crawlSignal.signal.aborted) {
          stoppedReason = crawlSignal.reason() ?? "aborted";
          break;
        }
        if (ctx.records.length >= config.maxPages) {
          stoppedReason = "page_budget";
          break;
        }

        const task = ctx.frontier.shift();
        if (!task) {
          break;
        }

        let record: PageRecord | null;
        try {
          record = await this.processTask(task, ctx);
        } catch (error: unknown) {
          if (error instanceof CrawlAbortedError) {
            stoppedReason = error.reason;
            break;
          }
          this.logger.error(`Unexpected failure on ${task.url}: ${formatError(error)}`);
          record = this.buildRecord(task, { status: "failed", error: "internal" });
          this.report(task, "failed", ctx, { reason: "internal" });
        }

        if (record) {
          ctx.records.push(record);
          if (record.status !== "skipped") {
            this.report(task, "recorded", ctx, {
              status_code: record.status_code,
              title: record.title,
            });
          }
          await this.emit(record);
        }
      }
    } finally {
      crawlSignal.dispose();
      ctx.fetcher.close();
      ctx.robots.close();
    }

    const summary = summarize(ctx.records, stoppedReason);
    this.logger.info(
      `Done: ${summary.pages_processed} pages (${summary.succeeded} ok, ${summary.failed} failed, ` +
        `${summary.skipped} skipped), stopped: ${summary.stopped_reason}`,
    );

    return { seedUrl: seed, records: ctx.records, summary };
  }

  /* ──────────────────────────────────────────────────────────────────────────
   * Per-task pipeline
   * ────────────────────────────────────────────────────────────────────────── */

  /**
   * @returns The task's record, or `null` when it is discarded without one.
   * @throws {CrawlAbortedError} When the run is cancelled mid-task.
   */
  private async processTask(task: CrawlTask, ctx: RunContext): Promise<PageRecord | null> {
    const { config } = this;
    this.report(task, "pending", ctx);

    if (!ctx.visited.claim(task.url)) {
      this.report(task, "skipped", ctx, { reason: "visited" });
      return null;
    }

    if (task.depth > config.maxDepth) {
      this.report(task, "skipped", ctx, { reason: "depth" });
      return null;
    }

    // ── Robots ──
    if (!(await this.robotsAllow(task.url, ctx))) {
      this.logger.info(`Blocked by robots.txt: ${task.url}`);
      this.report(task, "skipped", ctx, { reason: "robots" });
      return this.buildRecord(task, { status: "skipped", error: "robots" });
    }

    // ── Fetch ──
    this.report(task, "fetching", ctx);
    let outcome: FetchOutcome;
    try {
      outcome = await ctx.fetcher.fetch(task.url, ctx.signal, (target) =>
        this.checkRedirect(task, target, ctx),
      );
    } catch (error: unknown) {
      if (error instanceof RedirectBlockedError) {
        this.logger.info(`Redirect refused: ${task.url} -> ${error.target} (${error.reason})`);
        this.report(task, "skipped", ctx, { reason: error.reason });
        return this.buildRecord(task, { status: "skipped", error: error.reason });
      }
      if (!(error instanceof FetchError)) {
        throw error;
      }
      this.logger.warn(`Failed: ${task.url} (${error.kind}): ${error.message}`);
      this.report(task, "failed", ctx, {
        reason: error.kind,
        status_code: error.statusCode ?? null,
      });
      return this.buildRecord(task, {
        status: "failed",
        status_code: error.statusCode ?? null,
        error: error.kind,
      });
    }

    // A redirect target is the same page; never fetch it again.
    const { finalUrl } = outcome;
    if (finalUrl !== task.url) {
      ctx.visited.claim(finalUrl);
      if (task.depth === 0) {
        ctx.seedHost = extractHost(finalUrl);
      }
    }

    // ── Extract ──
    this.report(task, "extracting", ctx);
    const extraction = ctx.extractor.extract(outcome.body, finalUrl);

    // ── Enqueue ──
    this.report(task, "enqueuing", ctx);
    const survivors = filterCandidates(extraction.links, config, ctx.seedHost);
    const childDepth = task.depth + 1;
    let enqueued = 0;
    if (childDepth <= config.maxDepth) {
      for (const link of survivors) {
        if (!ctx.visited.has(link) && ctx.frontier.push({ url: link, depth: childDepth })) {
          enqueued += 1;
        }
      }
    }

    this.logger.info(
      `[${ctx.records.length + 1}/${config.maxPages}] depth=${task.depth} ${task.url} - ` +
        `${extraction.title || "(no title)"}`,
    );
    this.logger.debug(
      `${task.url}: ${extraction.links.length} links, ${survivors.length} kept, ${enqueued} enqueued`,
    );

    return this.buildRecord(task, {
      status: "success",
      status_code: outcome.statusCode,
      title: extraction.title,
      meta_description: extraction.metaDescription,
      content_snippet: extraction.snippet,
      discovered_links: survivors,
      error: extraction.warning ?? null,
    });
  }

  /* ──────────────────────────────────────────────────────────────────────────
   * Helpers
   * ────────────────────────────────────────────────────────────────────────── */

  /** Consult robots.txt for `url`, applying its host's Crawl-delay. */
  private async robotsAllow(url: string, ctx: RunContext): Promise<boolean> {
    const policy = await ctx.robots.policyFor(url, ctx.signal);
    if (policy.crawlDelaySeconds !== undefined) {
      ctx.fetcher.setHostDelay(extractHost(url), policy.crawlDelaySeconds);
    }
    return policy.isAllowed(url);
  }

  private async checkRedirect(
    task: CrawlTask,
    target: string,
    ctx: RunContext,
  ): Promise<SkipReason | null> {
    if (task.depth > 0 && !shouldVisit(target, this.config, ctx.seedHost)) {
      return "filtered";
    }
    if (!(await this.robotsAllow(target, ctx))) {
      return "robots";
    }
    return null;
  }

  private buildRecord(
    task: CrawlTask,
    fields: Omit<RecordInit, "url" | "depth" | "fetched_at">,
  ): PageRecord {
    return createRecord({ ...fields, url: task.url, depth: task.depth, fetched_at: this.now() });
  }

  private report(
    task: CrawlTask,
    state: TaskState,
    ctx: RunContext,
    extra: Pick<CrawlProgress, "reason" | "status_code" | "title"> = {},
  ): void {
    this.logger.debug(
      `${task.url} -> ${state}${extra.reason !== undefined ? ` (${extra.reason})` : ""}`,
    );

    const { onProgress } = this.options;
    if (!onProgress) {
      return;
    }
    try {
      onProgress({
        url: task.url,
        depth: task.depth,
        state,
        pages_processed: ctx.records.length,
        max_pages: this.config.maxPages,
        ...extra,
      });
    } catch (error: unknown) {
      this.logger.warn(`Progress callback failed: ${formatError(error)}`);
    }
  }

  private async emit(record: PageRecord): Promise<void> {
    const { onRecord } = this.options;
    if (!onRecord) {
      return;
    }
    try {
      await onRecord(record);
    } catch (error: unknown) {
      this.logger.warn(`Record sink failed for ${record.url}: ${formatError(error)}`);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Summary
 * ──────────────────────────────────────────────────────────────────────────── */

export function summarize(
  records: readonly PageRecord[],
  stoppedReason: StopReason,
): CrawlSummary {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;
  let maxDepth = 0;

  for (const record of records) {
    if (record.status === "success") {
      succeeded += 1;
    } else if (record.status === "failed") {
      failed += 1;
    } else {
      skipped += 1;
    }
    maxDepth = Math.max(maxDepth, record.depth);
  }

  return {
    pages_processed: records.length,
    succeeded,
    failed,
    skipped,
    max_depth_reached: maxDepth,
    stopped_reason: stoppedReason,
  };
}
