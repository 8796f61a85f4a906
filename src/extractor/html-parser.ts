/**
 * @fileoverview HTML parsing behind a small capability interface.
 *
 * The crawl engine only needs four things from a page: its title, its meta
 * description, its readable text and the raw `href` of every anchor.
 * {@link HtmlParser} captures exactly that, so the parsing stack can be
 * swapped (or faked in tests) without touching the engine.
 *
 * ## Default implementation
 *
 * {@link ReadabilityHtmlParser} runs in two stages:
 *
 * 1. **Cheerio** reads the title, the meta description and every anchor,
 *    then strips noise elements (scripts, styles, navigation, headers,
 *    footers, sidebars).
 * 2. **Readability** (on a jsdom document) isolates the main text when the
 *    page looks like an article; other pages fall back to the whitespace-
 *    separated text of the cleaned `<body>`.
 *
 * Links are read before the noise is removed: navigation menus are exactly
 * where a crawler finds most of its links.
 *
 * @module extractor/html-parser
 */

import * as cheerio from "cheerio";
import { JSDOM } from "jsdom";
import { Readability, isProbablyReaderable } from "@mozilla/readability";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * What a parser reports about one page. Strings are trimmed; absent values
 * are empty strings.
 */
export interface ParsedPage {
  title: string;
  metaDescription: string;
  /** Visible text with runs of whitespace collapsed to single spaces. */
  text: string;
  /** Trimmed `href` values of `<a href>` elements in document order. */
  rawLinks: string[];
}

export interface HtmlParser {
  /**
   * @param url - Address the HTML came from, for parsers that resolve
   *   relative references themselves.
   */
  parse(html: string, url: string): ParsedPage;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Elements removed before text extraction. These rarely hold page content
 * and would otherwise pollute the snippet.
 */
const NOISE_SELECTORS: readonly string[] = [
  "script",
  "noscript",
  "style",
  "template",
  "nav",
  "footer",
  "header",
  "aside",
  "iframe",
  "[role='navigation']",
  "[role='banner']",
  "[role='contentinfo']",
] as const;

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Title priority: `<title>`, then `og:title`, then the first `<h1>`.
 */
function extractTitle($: cheerio.CheerioAPI): string {
  const titleTag = collapseWhitespace($("title").first().text());
  if (titleTag) {
    return titleTag;
  }

  const ogTitle = $('meta[property="og:title"]').attr("content");
  if (ogTitle?.trim()) {
    return collapseWhitespace(ogTitle);
  }

  return collapseWhitespace($("h1").first().text());
}

function extractMetaDescription($: cheerio.CheerioAPI): string {
  const description = $('meta[name="description" i]').attr("content");
  return description ? collapseWhitespace(description) : "";
}

function extractRawLinks($: cheerio.CheerioAPI): string[] {
  const links: string[] = [];
  $("a[href]").each((_index, element) => {
    const href = $(element).attr("href");
    if (href !== undefined) {
      links.push(href.trim());
    }
  });
  return links;
}

/**
 * Text of the cleaned `<body>`, with a space between the text of adjacent
 * elements so `<h1>A</h1><p>B</p>` reads "A B" rather than "AB".
 */
function extractBodyText($: cheerio.CheerioAPI): string {
  const body = $("body");
  body.find("*").before(" ").after(" ");
  return collapseWhitespace(body.text());
}

function extractReadableText(cleanedHtml: string, url: string): string | null {
  const dom = new JSDOM(cleanedHtml, { url });
  try {
    const document = dom.window.document;
    if (!isProbablyReaderable(document)) {
      return null;
    }
    const article = new Readability(document).parse();
    const text = collapseWhitespace(article?.textContent ?? "");
    return text || null;
  } finally {
    dom.window.close();
  }
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * Default {@link HtmlParser}: cheerio for structure, Readability for text.
 *
 * Malformed markup is tolerated by both libraries; a throw from either
 * propagates and is handled by the content extractor.
 *
 * @example
 * ```typescript
 * const page = new ReadabilityHtmlParser().parse(
 *   '<title>Home</title><body><p>Hi</p><a href="/about">About</a></body>',
 *   "https://example.com/",
 * );
 * // page.title    => "Home"
 * // page.text     => "Hi About"
 * // page.rawLinks => ["/about"]
 * ```
 */
export class ReadabilityHtmlParser implements HtmlParser {
  parse(html: string, url: string): ParsedPage {
    const $ = cheerio.load(html);

    const title = extractTitle($);
    const metaDescription = extractMetaDescription($);
    const rawLinks = extractRawLinks($);

    for (const selector of NOISE_SELECTORS) {
      $(selector).remove();
    }

    const text = extractReadableText($.html(), url) ?? extractBodyText($);

    return { title, metaDescription, text, rawLinks };
  }
}
