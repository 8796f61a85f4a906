/**
 * @module crawler/robots
 * @fileoverview robots.txt retrieval and allow/deny decisions.
 *
 * One {@link RobotsChecker} belongs to one crawl run. The first question about
 * an origin triggers a single `GET /robots.txt` (short timeout, no retry, not
 * rate limited, size capped); the resulting {@link RobotsPolicy} is cached in
 * a node-cache instance for the rest of the run. A missing, unreachable or
 * oversized file yields an allow-all policy.
 *
 * Parsing and matching are done by `robots-parser`:
 *
 * - The group whose `User-agent` equals the crawler's product token
 *   (case-insensitive) applies; failing that the `*` group.
 * - `*` and a trailing `$` work in rule paths. An empty `Disallow:` is ignored.
 * - The longest matching rule wins; a tie goes to allow.
 * - Paths are compared percent-encoded, so `Disallow: /café/` blocks
 *   `/caf%C3%A9/menu`.
 *
 * @example
 * ```ts
 * const policy = parseRobotsTxt(
 *   "User-agent: *\nDisallow: /private/\nAllow: /private/open\n",
 *   "breadth-crawler/1.0",
 *   "http://a.test",
 * );
 * policy.isAllowed("http://a.test/private/page"); // false
 * policy.isAllowed("http://a.test/private/open"); // true
 * policy.isAllowed("http://a.test/public");       // true
 * ```
 */

import { createRequire } from "node:module";
import NodeCache from "node-cache";
import { readBodyWithLimit, type FetchLike } from "../services/fetch.js";
import {
  CrawlAbortedError,
  FetchError,
  RobotsFetchError,
  formatError,
} from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { originOf } from "../utils/url.js";

interface RobotsInstance {
  isAllowed(url: string, ua?: string): boolean | undefined;
  getCrawlDelay(ua?: string): number | undefined;
}

const require = createRequire(import.meta.url);
const robotsParser: (url: string, content: string) => RobotsInstance = require("robots-parser");

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * What robots.txt says about this crawler on one origin.
 */
export interface RobotsPolicy {
  readonly origin: string;
  /** `Crawl-delay` of the selected group, in seconds. */
  readonly crawlDelaySeconds?: number;
  /** Decide an absolute URL on {@link origin}. */
  isAllowed(url: string): boolean;
}

/** Largest robots.txt read; anything bigger is treated as unavailable. */
export const DEFAULT_ROBOTS_MAX_BYTES = 512_000;

/* ────────────────────────────────────────────────────────────────────────────
 * Parsing
 * ──────────────────────────────────────────────────────────────────────────── */

export function allowAllPolicy(origin: string): RobotsPolicy {
  return { origin, isAllowed: () => true };
}

/**
 * Parse robots.txt `text` into the policy that applies to `userAgent`.
 * URLs outside `origin` are allowed.
 */
export function parseRobotsTxt(
  text: string,
  userAgent: string,
  origin: string,
): RobotsPolicy {
  const robots = robotsParser(`${origin}/robots.txt`, text);
  return {
    origin,
    crawlDelaySeconds: robots.getCrawlDelay(userAgent),
    isAllowed: (url) => robots.isAllowed(url, userAgent) !== false,
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * RobotsChecker
 * ──────────────────────────────────────────────────────────────────────────── */

export interface RobotsCheckerOptions {
  userAgent: string;
  /** When false, every URL is allowed and nothing is fetched. */
  respectRobots: boolean;
  timeoutSeconds: number;
  /** @default DEFAULT_ROBOTS_MAX_BYTES */
  maxBytes?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Per-run robots.txt cache and decision point.
 */
export class RobotsChecker {
  private readonly cache = new NodeCache({
    stdTTL: 0,
    checkperiod: 0,
    useClones: false,
  });

  /** Lookups in flight, so concurrent callers share one request per origin. */
  private readonly pending = new Map<string, Promise<RobotsPolicy>>();

  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly options: RobotsCheckerOptions) {
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Policy for the origin of `url`, fetched on first use.
   *
   * @throws {CrawlAbortedError} When `signal` fires during the request.
   */
  async policyFor(url: string, signal?: AbortSignal): Promise<RobotsPolicy> {
    const origin = originOf(url);
    if (!this.options.respectRobots) {
      return allowAllPolicy(origin);
    }

    const cached = this.cache.get<RobotsPolicy>(origin);
    if (cached) {
      return cached;
    }

    let lookup = this.pending.get(origin);
    if (!lookup) {
      lookup = this.load(origin, signal);
      this.pending.set(origin, lookup);
    }

    try {
      const policy = await lookup;
      this.cache.set(origin, policy);
      return policy;
    } finally {
      this.pending.delete(origin);
    }
  }

  /**
   * Whether this crawler may fetch `url`.
   */
  async isAllowed(url: string, signal?: AbortSignal): Promise<boolean> {
    if (!this.options.respectRobots) {
      return true;
    }
    const policy = await this.policyFor(url, signal);
    return policy.isAllowed(url);
  }

  /** Number of origins with a cached policy. */
  get size(): number {
    return this.cache.keys().length;
  }

  close(): void {
    this.cache.flushAll();
    this.cache.close();
    this.pending.clear();
  }

  private async load(origin: string, signal?: AbortSignal): Promise<RobotsPolicy> {
    const robotsUrl = `${origin}/robots.txt`;

    try {
      const text = await this.download(robotsUrl, signal);
      if (text === null) {
        return allowAllPolicy(origin);
      }
      const policy = parseRobotsTxt(text, this.options.userAgent, origin);
      this.logger.debug(
        `Loaded ${robotsUrl} (${text.length} chars)` +
          (policy.crawlDelaySeconds !== undefined
            ? `, crawl-delay ${policy.crawlDelaySeconds}s`
            : ""),
      );
      return policy;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason instanceof CrawlAbortedError
          ? signal.reason
          : new CrawlAbortedError("aborted");
      }
      if (!(error instanceof RobotsFetchError)) {
        throw error;
      }
      this.logger.warn(`${formatError(error)}, allowing all`);
      return allowAllPolicy(origin);
    }
  }

  /**
   * @returns The file's text, or `null` when the server says it has none.
   * @throws {RobotsFetchError} On network failure, timeout, a 5xx answer or
   *   a file over the size cap.
   */
  private async download(robotsUrl: string, signal?: AbortSignal): Promise<string | null> {
    signal?.throwIfAborted();
    const timeoutMs = this.options.timeoutSeconds * 1000;
    const timeout = AbortSignal.timeout(timeoutMs);
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    timeout.addEventListener("abort", abort, { once: true });
    signal?.addEventListener("abort", abort, { once: true });

    try {
      const response = await this.fetchImpl(robotsUrl, {
        signal: controller.signal,
        headers: { "User-Agent": this.options.userAgent },
        redirect: "follow",
      });

      if (response.status >= 400) {
        await response.body?.cancel();
        if (response.status >= 500) {
          throw new RobotsFetchError(`HTTP ${response.status} for ${robotsUrl}`);
        }
        this.logger.debug(`No robots.txt at ${robotsUrl} (HTTP ${response.status}), allowing all`);
        return null;
      }
      return await readBodyWithLimit(
        response,
        this.options.maxBytes ?? DEFAULT_ROBOTS_MAX_BYTES,
      );
    } catch (error) {
      if (error instanceof RobotsFetchError) {
        throw error;
      }
      if (error instanceof FetchError) {
        throw new RobotsFetchError(`${robotsUrl}: ${error.message}`);
      }
      const detail = timeout.aborted
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new RobotsFetchError(`Could not fetch ${robotsUrl}: ${detail}`);
    } finally {
      timeout.removeEventListener("abort", abort);
      signal?.removeEventListener("abort", abort);
    }
  }
}
