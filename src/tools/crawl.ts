/**
 * @module tools/crawl
 * @fileoverview MCP tool handler for `crawl`.
 *
 * Runs one breadth-first crawl and returns:
 *
 * 1. a Markdown summary (counts, stop reason, one line per record)
 * 2. the full records as a fenced JSON block, in the same shape the JSON
 *    writer puts on disk
 *
 * Invalid parameters and unexpected failures come back as an `isError`
 * result whose text is `[CODE] message`; per-page failures are part of a
 * normal result.
 *
 * @example
 * ```ts
 * const handleCrawl = createCrawlHandler({ defaults: loadConfig() });
 * const response = await handleCrawl({ url: "https://example.com/", max_depth: 1 });
 * // response.content[0].text starts with "# Crawl Results"
 * ```
 */

import { z } from "zod";
import { loadConfig, parseCrawlConfig, type AppConfig } from "../config.js";
import { CrawlEngine, type CrawlResult } from "../crawler/engine.js";
import { serializeRecords } from "../crawler/records.js";
import type { FetchLike } from "../services/fetch.js";
import type { Clock } from "../utils/clock.js";
import { formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parameter shape registered with the MCP server. Omitted values fall back
 * to the `CRAWLER_*` environment defaults.
 */
export const CrawlSchema = {
  url: z.string().url().describe("Seed URL for the crawl (http or https)"),

  max_depth: z
    .number()
    .int()
    .min(0)
    .max(10)
    .optional()
    .describe("Maximum link depth from the seed (default: 2)"),

  max_pages: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .optional()
    .describe("Maximum number of records to produce (default: 100)"),

  delay_seconds: z
    .number()
    .min(0)
    .optional()
    .describe("Minimum seconds between two requests to the same host (default: 1)"),

  respect_robots: z
    .boolean()
    .optional()
    .describe("Honour robots.txt rules and Crawl-delay (default: true)"),

  allow_external: z
    .boolean()
    .optional()
    .describe("Follow links to other hosts (default: false)"),

  url_patterns: z
    .array(z.string())
    .optional()
    .describe("Regular expressions; a URL must match at least one to be followed"),

  exclude_patterns: z
    .array(z.string())
    .optional()
    .describe("Regular expressions; URLs matching any of them are not followed"),
};

export interface CrawlParams {
  url: string;
  max_depth?: number;
  max_pages?: number;
  delay_seconds?: number;
  respect_robots?: boolean;
  allow_external?: boolean;
  url_patterns?: string[];
  exclude_patterns?: string[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Markdown report of a finished crawl, records included as JSON.
 */
export function formatCrawlReport(result: CrawlResult): string {
  const { summary } = result;
  const header = [
    "# Crawl Results",
    `> Seed URL: ${result.seedUrl}`,
    `> Pages processed: ${summary.pages_processed} ` +
      `(${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped)`,
    `> Max depth reached: ${summary.max_depth_reached}`,
    `> Stop reason: ${summary.stopped_reason}`,
  ].join("\n");

  const lines = result.records.map((record, index) => {
    const detail =
      record.status === "success"
        ? record.title || "(no title)"
        : (record.error ?? record.status);
    return `${index + 1}. [${record.status}] depth ${record.depth} ${record.url} - ${detail}`;
  });

  return [
    header,
    "",
    "## Pages",
    lines.length > 0 ? lines.join("\n") : "(none)",
    "",
    "## Records",
    "```json",
    serializeRecords(result.records),
    "```",
  ].join("\n");
}

/* ────────────────────────────────────────────────────────────────────────────
 * Handler
 * ──────────────────────────────────────────────────────────────────────────── */

export interface CrawlToolDeps {
  /** @default loadConfig() */
  defaults?: AppConfig;
  logger?: Logger;
  fetchImpl?: FetchLike;
  clock?: Clock;
  now?: () => Date;
}

/**
 * Build the `crawl` handler. The optional second argument carries the MCP
 * request's cancellation signal.
 */
export function createCrawlHandler(deps: CrawlToolDeps = {}) {
  return async (params: CrawlParams, extra?: { signal?: AbortSignal }) => {
    try {
      const config = parseCrawlConfig(
        {
          seedUrl: params.url,
          maxDepth: params.max_depth,
          maxPages: params.max_pages,
          delaySeconds: params.delay_seconds,
          respectRobots: params.respect_robots,
          allowExternal: params.allow_external,
          urlPatterns: params.url_patterns,
          excludePatterns: params.exclude_patterns,
        },
        deps.defaults ?? loadConfig(),
      );

      const result = await new CrawlEngine({
        config,
        logger: deps.logger ?? silentLogger,
        fetchImpl: deps.fetchImpl,
        clock: deps.clock,
        now: deps.now,
        signal: extra?.signal,
      }).run();

      return {
        content: [{ type: "text" as const, text: formatCrawlReport(result) }],
      };
    } catch (error) {
      return {
        content: [{ type: "text" as const, text: formatError(error) }],
        isError: true,
      };
    }
  };
}
