/**
 * @module crawler/url-filter
 * @fileoverview Decides which normalized URLs may enter the frontier.
 *
 * Filters, cheapest first:
 *
 * 1. **Scheme**: only `http:` and `https:` (drops `mailto:`, `javascript:`, `tel:` ...)
 * 2. **Host**: unless `allowExternal` is set, the host must equal the seed host
 * 3. **Include patterns**: with any configured, at least one must match (OR)
 * 4. **Exclude patterns**: any match drops the URL
 *
 * Patterns are regular expressions tested against the full normalized URL
 * with search semantics (`RegExp.test`), so `"/docs/"` matches anywhere.
 *
 * Pure functions only: no I/O, no state.
 */

import type { CrawlConfig } from "../config.js";
import { isFetchableUrl } from "../utils/url.js";

/** The subset of {@link CrawlConfig} the filter reads. */
export type UrlFilterConfig = Pick<
  CrawlConfig,
  "allowExternal" | "urlPatterns" | "excludePatterns"
>;

/**
 * Whether `url` (already normalized) may be crawled.
 *
 * @param seedHost - Host of the normalized seed URL, see `extractHost`.
 *
 * @example
 * ```ts
 * const config = { allowExternal: false, urlPatterns: [], excludePatterns: [] };
 * shouldVisit("http://a.test/x", config, "a.test");   // true
 * shouldVisit("http://b.test/y", config, "a.test");   // false
 * shouldVisit("mailto:me@a.test", config, "a.test");  // false
 * ```
 */
export function shouldVisit(
  url: string,
  config: UrlFilterConfig,
  seedHost: string,
): boolean {
  if (!isFetchableUrl(url)) {
    return false;
  }

  if (!config.allowExternal && new URL(url).host.toLowerCase() !== seedHost) {
    return false;
  }

  if (
    config.urlPatterns.length > 0 &&
    !config.urlPatterns.some((pattern) => matches(pattern, url))
  ) {
    return false;
  }

  if (config.excludePatterns.some((pattern) => matches(pattern, url))) {
    return false;
  }

  return true;
}

/**
 * Apply {@link shouldVisit} to every candidate, keeping their order.
 */
export function filterCandidates(
  urls: readonly string[],
  config: UrlFilterConfig,
  seedHost: string,
): string[] {
  return urls.filter((url) => shouldVisit(url, config, seedHost));
}

// Global and sticky regexes carry lastIndex between calls; reset it so the
// same pattern gives the same answer for the same URL every time.
function matches(pattern: RegExp, url: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(url);
}
