/**
 * @fileoverview Polite HTTP fetcher for the crawl engine.
 *
 * Wraps a `fetch()` implementation (Node's global one by default) with the
 * reliability and politeness controls a crawler needs:
 *
 * 1. **Rate limiting** - every attempt goes through the per-host
 *    {@link HostRateLimiter}, including retries
 * 2. **Timeout** - one `AbortSignal.timeout()` per attempt, covering the body read
 * 3. **Retry** - network errors, timeouts, HTTP 5xx and 429 are retried with a
 *    fixed or exponential backoff; everything else fails at once
 * 4. **Content-Type filtering** - only HTML-like responses are accepted
 * 5. **Response size limiting** - the body is streamed with a byte counter
 * 6. **Redirects** - followed one hop at a time, up to `maxRedirects`; an
 *    optional {@link RedirectGuard} can refuse a hop before it is requested
 *
 * ## Retry state machine
 *
 * ```
 *   attempting ──ok──────────────────────────> succeeded
 *       │
 *       └──error──> retryable and attempts left? ──yes──> retrying ──backoff──> attempting
 *                                               └──no───> failed
 * ```
 *
 * Each hop runs its own retry state machine, with its own attempts.
 *
 * A crawl-level `AbortSignal` interrupts the rate-limit wait, the backoff
 * and the request itself; the fetcher then throws the signal's
 * {@link CrawlAbortedError} instead of a {@link FetchError}.
 *
 * @module services/fetch
 */

import type { CrawlConfig } from "../config.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { CrawlAbortedError, FetchError, RedirectBlockedError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { extractHost, isFetchableUrl, tryNormalizeUrl } from "../utils/url.js";
import { HostRateLimiter } from "./rate-limiter.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * The subset of the `fetch()` signature the fetcher calls. Tests pass an
 * in-process fake here.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * A successfully retrieved HTML document.
 *
 * @example
 * ```typescript
 * const outcome: FetchOutcome = {
 *   body: "<!DOCTYPE html><html>...</html>",
 *   statusCode: 200,
 *   finalUrl: "https://example.com/",
 *   contentType: "text/html; charset=utf-8",
 *   attempts: 1,
 * };
 * ```
 */
export interface FetchOutcome {
  body: string;
  statusCode: number;
  /**
   * Normalized URL of the document after redirects. Equal to the requested
   * URL when no redirect happened.
   */
  finalUrl: string;
  contentType: string;
  /** Number of requests issued, retries and redirect hops included. */
  attempts: number;
}

/**
 * Decides whether a redirect may be followed to `target` (normalized).
 * Resolves to `null` to follow it, or to the reason for refusing it.
 */
export type RedirectGuard = (target: string) => Promise<string | null>;

/** Settings the fetcher reads from the crawl configuration. */
export type FetcherConfig = Pick<
  CrawlConfig,
  | "delaySeconds"
  | "timeoutSeconds"
  | "maxRetries"
  | "maxRedirects"
  | "userAgent"
  | "backoff"
  | "backoffSeconds"
  | "maxResponseBytes"
>;

export interface FetcherOptions {
  config: FetcherConfig;
  fetchImpl?: FetchLike;
  clock?: Clock;
  logger?: Logger;
  /** Shared limiter; one is created from `delaySeconds` when omitted. */
  limiter?: HostRateLimiter;
}

/** What one hop produced: a document, or a pointer to the next hop. */
type HopResult =
  | { kind: "document"; body: string; statusCode: number; contentType: string }
  | { kind: "redirect"; location: string; statusCode: number };

type AttemptState =
  | { phase: "attempting"; attempt: number }
  | { phase: "retrying"; attempt: number; error: FetchError; waitMs: number }
  | { phase: "succeeded"; attempt: number; result: HopResult }
  | { phase: "failed"; attempt: number; error: FetchError };

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types treated as HTML-like. `text/xml` and `application/xml` are kept
 * because some older sites serve XHTML under them.
 */
const ALLOWED_CONTENT_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
]);

/**
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // => "text/html"
 * extractMimeType(null);                       // => ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  return contentType.split(";")[0].trim().toLowerCase();
}

export function isAcceptableContentType(contentType: string | null): boolean {
  return ALLOWED_CONTENT_TYPES.has(extractMimeType(contentType));
}

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Read a response body as UTF-8 text, giving up once it exceeds `maxBytes`.
 *
 * A declared `Content-Length` above the limit fails before reading; the
 * streaming counter catches servers that omit or misstate the header.
 *
 * @throws {FetchError} Of kind `too_large`.
 */
export async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new FetchError(
        "too_large",
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
        response.status,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  // Malformed byte sequences become U+FFFD instead of throwing.
  const decoder = new TextDecoder("utf-8", { fatal: false });
  const chunks: string[] = [];
  let totalBytes = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) {
      break;
    }

    totalBytes += value.byteLength;
    if (totalBytes > maxBytes) {
      await reader.cancel();
      throw new FetchError(
        "too_large",
        `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        response.status,
      );
    }

    chunks.push(decoder.decode(value, { stream: true }));
  }
  chunks.push(decoder.decode());

  return chunks.join("");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function abortError(signal: AbortSignal): CrawlAbortedError {
  return signal.reason instanceof CrawlAbortedError
    ? signal.reason
    : new CrawlAbortedError("aborted");
}

// ---------------------------------------------------------------------------
// Fetcher Class
// ---------------------------------------------------------------------------

/**
 * Retrieves HTML pages for one crawl run.
 *
 * @example
 * ```typescript
 * const fetcher = new Fetcher({ config: crawlConfig, logger });
 *
 * try {
 *   const page = await fetcher.fetch("https://example.com/");
 *   console.error(`${page.finalUrl} (${page.statusCode}) after ${page.attempts} attempt(s)`);
 * } catch (error) {
 *   if (error instanceof FetchError) {
 *     console.error(`failed: ${error.kind}`);
 *   }
 * } finally {
 *   fetcher.close();
 * }
 * ```
 */
export class Fetcher {
  private readonly config: FetcherConfig;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly limiter: HostRateLimiter;

  constructor(options: FetcherOptions) {
    this.config = options.config;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.limiter =
      options.limiter ??
      new HostRateLimiter(this.config.delaySeconds * 1000, this.clock);
  }

  /**
   * Apply a robots.txt `Crawl-delay` to `host`. The effective interval is
   * `max(delaySeconds, seconds)`.
   */
  setHostDelay(host: string, seconds: number): void {
    this.limiter.setMinInterval(host, seconds * 1000);
  }

  /** Current minimum spacing between requests to `host`, in milliseconds. */
  hostInterval(host: string): number {
    return this.limiter.intervalFor(host);
  }

  /**
   * Wait before attempt `attempt + 1`.
   *
   * - `fixed`: `backoffSeconds` every time
   * - `exponential`: `backoffSeconds * 2^(attempt - 1)`
   */
  backoffMs(attempt: number): number {
    const base = this.config.backoffSeconds * 1000;
    return this.config.backoff === "exponential" ? base * 2 ** (attempt - 1) : base;
  }

  /**
   * GET `url` with retries, following redirects.
   *
   * @param guard - Consulted before each redirect hop is requested.
   * @throws {FetchError} Once the last allowed attempt failed, at once for a
   *   terminal failure (4xx other than 429, non-HTML, oversized body), or
   *   with kind `redirect` when the hops run out or lead nowhere.
   * @throws {RedirectBlockedError} When `guard` refuses a hop.
   * @throws {CrawlAbortedError} When `signal` fires.
   */
  async fetch(
    url: string,
    signal?: AbortSignal,
    guard?: RedirectGuard,
  ): Promise<FetchOutcome> {
    let current = url;
    let attempts = 0;

    for (let hops = 0; ; hops++) {
      const { result, attempt } = await this.fetchHop(current, signal);
      attempts += attempt;

      if (result.kind === "document") {
        return {
          body: result.body,
          statusCode: result.statusCode,
          contentType: result.contentType,
          finalUrl: current,
          attempts,
        };
      }

      if (hops >= this.config.maxRedirects) {
        throw new FetchError(
          "redirect",
          `Too many redirects (${this.config.maxRedirects}) starting at ${url}`,
          result.statusCode,
        );
      }
      const target = this.redirectTarget(current, result);
      if (guard) {
        const refusal = await guard(target);
        if (refusal !== null) {
          throw new RedirectBlockedError(target, refusal);
        }
      }
      this.logger.debug(`${current} -> ${target} (HTTP ${result.statusCode})`);
      current = target;
    }
  }

  /** Drop the per-host queues. */
  close(): void {
    this.limiter.close();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** One URL through the retry state machine. */
  private async fetchHop(
    url: string,
    signal: AbortSignal | undefined,
  ): Promise<{ result: HopResult; attempt: number }> {
    const host = extractHost(url);
    let state: AttemptState = { phase: "attempting", attempt: 1 };

    for (;;) {
      switch (state.phase) {
        case "attempting":
          this.logger.debug(`GET ${url} (attempt ${state.attempt})`);
          state = await this.attempt(url, host, state.attempt, signal);
          break;

        case "retrying":
          this.logger.warn(
            `${url}: ${state.error.message}; retry ${state.attempt}/${this.config.maxRetries} in ${state.waitMs}ms`,
          );
          await this.wait(state.waitMs, signal);
          state = { phase: "attempting", attempt: state.attempt + 1 };
          break;

        case "succeeded":
          return { result: state.result, attempt: state.attempt };

        case "failed":
          throw state.error;
      }
    }
  }

  /**
   * @throws {FetchError} Of kind `redirect` when `Location` does not resolve
   *   to an http(s) URL.
   */
  private redirectTarget(
    from: string,
    redirect: Extract<HopResult, { kind: "redirect" }>,
  ): string {
    const resolved = tryNormalizeUrl(redirect.location, from);
    if (resolved === null || !isFetchableUrl(resolved)) {
      throw new FetchError(
        "redirect",
        `Unusable redirect from ${from} to "${redirect.location}"`,
        redirect.statusCode,
      );
    }
    return resolved;
  }

  private async attempt(
    url: string,
    host: string,
    attempt: number,
    signal: AbortSignal | undefined,
  ): Promise<AttemptState> {
    try {
      const result = await this.limiter.schedule(
        host,
        () => this.request(url, signal),
        signal,
      );
      return { phase: "succeeded", attempt, result };
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      if (!(error instanceof FetchError)) {
        throw error;
      }
      if (error.retryable && attempt <= this.config.maxRetries) {
        return { phase: "retrying", attempt, error, waitMs: this.backoffMs(attempt) };
      }
      return { phase: "failed", attempt, error };
    }
  }

  private async wait(ms: number, signal: AbortSignal | undefined): Promise<void> {
    try {
      await this.clock.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw abortError(signal);
      }
      throw error;
    }
  }

  /**
   * One GET, redirects not followed. Every failure leaves as a
   * {@link FetchError}; an unread body is cancelled first.
   */
  private async request(
    url: string,
    signal: AbortSignal | undefined,
  ): Promise<HopResult> {
    const timeoutMs = this.config.timeoutSeconds * 1000;
    const timeout = AbortSignal.timeout(timeoutMs);
    const controller = new AbortController();
    const abort = (): void => controller.abort();
    timeout.addEventListener("abort", abort, { once: true });
    signal?.addEventListener("abort", abort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {
          "User-Agent": this.config.userAgent,
          Accept: "text/html, application/xhtml+xml, */*;q=0.1",
        },
        redirect: "manual",
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        await response.body?.cancel();
        const location = response.headers.get("location");
        if (!location) {
          throw new FetchError(
            "redirect",
            `HTTP ${response.status} without Location for ${url}`,
            response.status,
          );
        }
        return { kind: "redirect", location, statusCode: response.status };
      }

      if (response.status >= 400) {
        await response.body?.cancel();
        throw new FetchError(
          "http_status",
          `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""} for ${url}`,
          response.status,
        );
      }

      const contentType = response.headers.get("content-type");
      if (!isAcceptableContentType(contentType)) {
        await response.body?.cancel();
        throw new FetchError(
          "content_type",
          `Unacceptable Content-Type "${extractMimeType(contentType) || "(none)"}" for ${url}`,
          response.status,
        );
      }

      const body = await readBodyWithLimit(response, this.config.maxResponseBytes);

      return {
        kind: "document",
        body,
        statusCode: response.status,
        contentType: contentType ?? "text/html",
      };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (
        timeout.aborted ||
        (error instanceof Error && error.name === "TimeoutError")
      ) {
        throw new FetchError("timeout", `Request to ${url} timed out after ${timeoutMs}ms`);
      }
      throw new FetchError("network", `Failed to fetch ${url}: ${errorMessage(error)}`);
    } finally {
      timeout.removeEventListener("abort", abort);
      signal?.removeEventListener("abort", abort);
    }
  }
}
