/**
 * @fileoverview Turns fetched HTML into the fields of a page record.
 *
 * The {@link HtmlParser} does the structural work; this module owns the
 * crawler's rules on top of it:
 *
 * - hrefs that are empty, fragment-only (`#top`) or use a non-fetchable
 *   scheme (`mailto:`, `javascript:`, ...) are skipped
 * - every other href is resolved against the page URL and normalized;
 *   unparseable ones are dropped
 * - links are deduplicated, first occurrence wins
 * - the text is cut to `snippetLength` characters
 *
 * A parser failure never escapes. The page degrades to an empty extraction
 * carrying a `warning`, and the crawl goes on.
 *
 * @module extractor/content-extractor
 */

import { ExtractionError, formatError } from "../utils/errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { hasNonFetchableScheme, tryNormalizeUrl } from "../utils/url.js";
import { ReadabilityHtmlParser, type HtmlParser } from "./html-parser.js";

export interface Extraction {
  title: string;
  metaDescription: string;
  snippet: string;
  /** Absolute, normalized, unique links in first-seen order. */
  links: string[];
  /** Set when the parser failed and the fields above are empty. */
  warning?: string;
}

export interface ContentExtractorOptions {
  /** @default 500 */
  snippetLength?: number;
  parser?: HtmlParser;
  logger?: Logger;
}

/**
 * Resolve, normalize and dedupe raw hrefs found on `sourceUrl`.
 *
 * @example
 * ```typescript
 * resolveLinks(["/a", "#top", "mailto:x@a.test", "/a#frag", "b?"], "http://a.test/dir/");
 * // => ["http://a.test/a", "http://a.test/dir/b"]
 * ```
 */
export function resolveLinks(rawLinks: readonly string[], sourceUrl: string): string[] {
  const seen = new Set<string>();
  const links: string[] = [];

  for (const raw of rawLinks) {
    const href = raw.trim();
    if (href.length === 0 || href.startsWith("#") || hasNonFetchableScheme(href)) {
      continue;
    }

    const normalized = tryNormalizeUrl(href, sourceUrl);
    if (normalized === null || seen.has(normalized)) {
      continue;
    }
    seen.add(normalized);
    links.push(normalized);
  }

  return links;
}

/** First `length` code points of `text`; surrogate pairs are never split. */
export function cutSnippet(text: string, length: number): string {
  return Array.from(text).slice(0, length).join("");
}

export class ContentExtractor {
  private readonly snippetLength: number;
  private readonly parser: HtmlParser;
  private readonly logger: Logger;

  constructor(options: ContentExtractorOptions = {}) {
    this.snippetLength = options.snippetLength ?? 500;
    this.parser = options.parser ?? new ReadabilityHtmlParser();
    this.logger = options.logger ?? silentLogger;
  }

  extract(html: string, sourceUrl: string): Extraction {
    try {
      const page = this.parser.parse(html, sourceUrl);
      return {
        title: page.title,
        metaDescription: page.metaDescription,
        snippet: cutSnippet(page.text, this.snippetLength),
        links: resolveLinks(page.rawLinks, sourceUrl),
      };
    } catch (cause) {
      const error = new ExtractionError(
        `Could not parse ${sourceUrl}: ${formatError(cause)}`,
      );
      this.logger.warn(formatError(error));
      return {
        title: "",
        metaDescription: "",
        snippet: "",
        links: [],
        warning: error.message,
      };
    }
  }
}
