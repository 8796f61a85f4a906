/**
 * @module utils/url
 * @fileoverview URL canonicalization and classification helpers.
 *
 * {@link normalizeUrl} defines URL identity for the whole crawler: the
 * visited set, the frontier and the records all store its output, so two
 * hrefs are "the same page" exactly when they normalize to the same string.
 *
 * ## Canonicalization rules
 * | Rule                         | Before                          | After                        |
 * |------------------------------|---------------------------------|------------------------------|
 * | Resolve against base         | `../b` on `http://a.test/x/y`   | `http://a.test/b`            |
 * | Lower-case scheme and host   | `HTTP://A.Test/P`               | `http://a.test/P`            |
 * | Drop default port            | `https://a.test:443/`           | `https://a.test/`            |
 * | Drop fragment                | `http://a.test/p#top`           | `http://a.test/p`            |
 * | Sort query by key (stable)   | `?b=2&a=1`                      | `?a=1&b=2`                   |
 * | Drop empty query pairs       | `?id=1&`                        | `?id=1`                      |
 * | Drop empty query             | `http://a.test/p?`              | `http://a.test/p`            |
 *
 * Query pairs are reordered byte for byte, never decoded: `%E9`, `+` and a
 * bare `flag` come out as they went in.
 *
 * Paths are left as the WHATWG parser serializes them: the root keeps its
 * `/`, `/docs/` and `/docs` stay distinct, `index.html` is not folded.
 */

import { FilterError } from "./errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

const DEFAULT_PORTS: ReadonlyMap<string, string> = new Map([
  ["http:", "80"],
  ["https:", "443"],
]);

const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/**
 * Schemes recognised on raw hrefs before resolution. Matching is done on the
 * lower-cased, trimmed href.
 */
const NON_FETCHABLE_SCHEMES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

/* ────────────────────────────────────────────────────────────────────────────
 * Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

function queryKey(pair: string): string {
  const eq = pair.indexOf("=");
  return eq === -1 ? pair : pair.slice(0, eq);
}

/**
 * Canonicalize `url`, resolving it against `base` when it is relative.
 *
 * @throws {FilterError} If the URL (or the base) cannot be parsed.
 *
 * @example
 * ```ts
 * normalizeUrl("/page?id=1&#frag", "HTTP://A.TEST:80/");
 * // => "http://a.test/page?id=1"
 * ```
 */
export function normalizeUrl(url: string, base?: string): string {
  let parsed: URL;
  try {
    parsed = base === undefined ? new URL(url) : new URL(url, base);
  } catch (error) {
    throw new FilterError(url, error instanceof Error ? error.message : String(error));
  }

  parsed.hash = "";

  if (parsed.port === DEFAULT_PORTS.get(parsed.protocol)) {
    parsed.port = "";
  }

  // Only hierarchical URLs carry a query we can safely rewrite.
  if (FETCHABLE_SCHEMES.has(parsed.protocol)) {
    const pairs = parsed.search
      .slice(1)
      .split("&")
      .filter((pair) => pair !== "");
    pairs.sort((a, b) => {
      const keyA = queryKey(a);
      const keyB = queryKey(b);
      return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
    });
    // An empty string removes the "?" altogether.
    parsed.search = pairs.join("&");
  }

  return parsed.href;
}

/**
 * Like {@link normalizeUrl} but returns `null` instead of throwing.
 */
export function tryNormalizeUrl(url: string, base?: string): string | null {
  try {
    return normalizeUrl(url, base);
  } catch (error) {
    if (error instanceof FilterError) {
      return null;
    }
    throw error;
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Classification
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Host (hostname plus a non-default port) of an absolute URL, lower-cased.
 * This is the key for same-site checks and per-host rate limiting.
 *
 * @example
 * ```ts
 * extractHost("https://Docs.Example.com:8443/a"); // => "docs.example.com:8443"
 * extractHost("https://example.com:443/a");       // => "example.com"
 * ```
 */
export function extractHost(url: string): string {
  return new URL(url).host.toLowerCase();
}

/**
 * Scheme + host, the scope of a robots.txt file.
 *
 * @example
 * ```ts
 * originOf("http://a.test/private/page?x=1"); // => "http://a.test"
 * ```
 */
export function originOf(url: string): string {
  return new URL(url).origin;
}

/**
 * `true` for absolute http/https URLs. Invalid input is not fetchable.
 */
export function isFetchableUrl(url: string): boolean {
  try {
    return FETCHABLE_SCHEMES.has(new URL(url).protocol);
  } catch {
    return false;
  }
}

/**
 * Cheap pre-resolution check for hrefs such as `mailto:` or `javascript:void(0)`.
 */
export function hasNonFetchableScheme(href: string): boolean {
  const lower = href.trim().toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}
