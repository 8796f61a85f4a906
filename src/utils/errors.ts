/**
 * @module utils/errors
 * @fileoverview Error class hierarchy for breadth-crawler.
 *
 * Every error raised by the crawler extends {@link CrawlerError}, which
 * carries a machine-readable `code` next to the human-readable `message`.
 * The code survives serialization (CLI output, MCP tool responses) where the
 * class identity does not.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)  ─── code: string
 *         ├── ConfigError        ─── "CONFIG_INVALID"      fatal, before the crawl
 *         ├── FilterError        ─── "URL_REJECTED"        URL could not be normalized
 *         ├── FetchError         ─── "FETCH_FAILED"        + kind, optional statusCode
 *         ├── RedirectBlockedError ─ "REDIRECT_BLOCKED"    redirect target refused
 *         ├── RobotsFetchError   ─── "ROBOTS_UNAVAILABLE"  soft, treated as allow-all
 *         ├── ExtractionError    ─── "EXTRACTION_FAILED"   soft, empty extraction
 *         └── CrawlAbortedError  ─── "CRAWL_ABORTED"       caller signal or crawl timeout
 * ```
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("http_status", "HTTP 503 for https://example.com/", 503);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[FETCH_FAILED] HTTP 503 for https://example.com/"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all breadth-crawler errors.
 *
 * Subclasses only pick a code; `name` is taken from the concrete class so
 * stack traces read "FetchError: ..." instead of "Error: ...".
 */
export class CrawlerError extends Error {
  /**
   * Stable SCREAMING_SNAKE_CASE code, e.g. `"FETCH_FAILED"`.
   */
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Invalid crawl configuration: bad seed URL, unparseable regex, out-of-range
 * numbers. Raised before any request is made.
 *
 * `issues` holds one line per problem so callers can print them all at once.
 *
 * @example
 * ```ts
 * throw new ConfigError("Invalid crawl configuration", [
 *   "seedUrl: must be an absolute http(s) URL",
 *   "urlPatterns[0]: invalid regular expression \"(\"",
 * ]);
 * ```
 */
export class ConfigError extends CrawlerError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "CONFIG_INVALID");
    this.issues = issues;
  }
}

/**
 * A URL that cannot be parsed or resolved against its base.
 */
export class FilterError extends CrawlerError {
  /** The raw input that was rejected. */
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot normalize URL "${input}": ${reason}`, "URL_REJECTED");
    this.input = input;
  }
}

/**
 * Category of a failed fetch. Becomes the `error` field of a failed record.
 *
 * - `network`: DNS, TCP or TLS failure, no response received
 * - `timeout`: the request exceeded the configured timeout
 * - `http_status`: the server answered with a non-success status
 * - `content_type`: the response is not an HTML-like document
 * - `too_large`: the body exceeded the configured byte limit
 * - `redirect`: too many hops, or a redirect without a usable `Location`
 */
export type FetchErrorKind =
  | "network"
  | "timeout"
  | "http_status"
  | "content_type"
  | "too_large"
  | "redirect";

/**
 * Thrown by the Fetcher once a URL could not be retrieved, after retries
 * where the failure kind allows them.
 *
 * @example
 * ```ts
 * // Network error (no status code):
 * throw new FetchError("network", "getaddrinfo ENOTFOUND example.invalid");
 *
 * // HTTP error (with status code):
 * throw new FetchError("http_status", "HTTP 404 Not Found for https://example.com/x", 404);
 * ```
 */
export class FetchError extends CrawlerError {
  public readonly kind: FetchErrorKind;

  /**
   * Status of the final response, `undefined` when no response was received.
   */
  public readonly statusCode?: number;

  constructor(kind: FetchErrorKind, detail: string, statusCode?: number) {
    super(detail, "FETCH_FAILED");
    this.kind = kind;
    this.statusCode = statusCode;
  }

  /** Whether another attempt could succeed. */
  get retryable(): boolean {
    switch (this.kind) {
      case "network":
      case "timeout":
        return true;
      case "http_status":
        return (
          this.statusCode !== undefined &&
          (this.statusCode === 429 || this.statusCode >= 500)
        );
      default:
        return false;
    }
  }
}

/**
 * A redirect pointed somewhere the crawl may not go. `reason` names the rule
 * that refused it (`"robots"`, `"filtered"`) and becomes the skipped
 * record's `error`.
 */
export class RedirectBlockedError extends CrawlerError {
  public readonly target: string;
  public readonly reason: string;

  constructor(target: string, reason: string) {
    super(`Redirect to ${target} refused (${reason})`, "REDIRECT_BLOCKED");
    this.target = target;
    this.reason = reason;
  }
}

/**
 * robots.txt could not be retrieved. Never surfaced as a crawl failure: the
 * checker logs it and falls back to an allow-all policy for the origin.
 */
export class RobotsFetchError extends CrawlerError {
  constructor(message: string) {
    super(message, "ROBOTS_UNAVAILABLE");
  }
}

/**
 * The HTML parser failed on a fetched page. Soft: the page is still recorded
 * as a success with an empty extraction.
 */
export class ExtractionError extends CrawlerError {
  constructor(message: string) {
    super(message, "EXTRACTION_FAILED");
  }
}

/**
 * The crawl was cancelled, either by the caller's `AbortSignal` or because
 * the global crawl timeout elapsed.
 */
export class CrawlAbortedError extends CrawlerError {
  public readonly reason: "aborted" | "timeout";

  constructor(reason: "aborted" | "timeout") {
    super(
      reason === "timeout" ? "Crawl timeout elapsed" : "Crawl aborted by caller",
      "CRAWL_ABORTED",
    );
    this.reason = reason;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Render any caught value as a single line for logs, CLI output and MCP
 * tool responses.
 *
 * @example
 * ```ts
 * formatError(new FetchError("timeout", "Request timed out after 10000ms"));
 * // => "[FETCH_FAILED] Request timed out after 10000ms"
 *
 * formatError(new TypeError("boom"));
 * // => "boom"
 *
 * formatError(42);
 * // => "42"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
