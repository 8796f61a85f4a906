/**
 * @fileoverview Tests for the cheerio + Readability HTML parser.
 */

import { describe, it, expect } from "vitest";
import { ReadabilityHtmlParser } from "../../src/extractor/html-parser.js";

const parser = new ReadabilityHtmlParser();
const URL_A = "https://example.com/";

describe("ReadabilityHtmlParser", () => {
  describe("title", () => {
    it("uses <title> with whitespace collapsed", () => {
      const page = parser.parse("<html><head><title>  My\n   Page </title></head><body></body></html>", URL_A);
      expect(page.title).toBe("My Page");
    });

    it("falls back to og:title", () => {
      const html = '<html><head><meta property="og:title" content="OG Title"></head><body><h1>H</h1></body></html>';
      expect(parser.parse(html, URL_A).title).toBe("OG Title");
    });

    it("falls back to the first h1", () => {
      const html = "<html><body><h1>First</h1><h1>Second</h1></body></html>";
      expect(parser.parse(html, URL_A).title).toBe("First");
    });

    it("is empty when nothing names the page", () => {
      expect(parser.parse("<p>text</p>", URL_A).title).toBe("");
    });
  });

  describe("meta description", () => {
    it("reads the description meta tag", () => {
      const html = '<html><head><meta name="Description" content=" About  this "></head></html>';
      expect(parser.parse(html, URL_A).metaDescription).toBe("About this");
    });

    it("is empty when absent", () => {
      expect(parser.parse("<p>x</p>", URL_A).metaDescription).toBe("");
    });
  });

  describe("links", () => {
    it("collects trimmed hrefs in document order, navigation included", () => {
      const html = `<html><body>
        <nav><a href=" /home ">Home</a></nav>
        <main><a href="/a">A</a><a>no href</a><a href="mailto:x@a.test">Mail</a></main>
        <footer><a href="/contact">Contact</a></footer>
      </body></html>`;
      expect(parser.parse(html, URL_A).rawLinks).toEqual([
        "/home",
        "/a",
        "mailto:x@a.test",
        "/contact",
      ]);
    });
  });

  describe("text", () => {
    it("separates adjacent elements on short pages", () => {
      const html = "<html><head><title>T</title></head><body><h1>Hi</h1><p>Hello world</p></body></html>";
      expect(parser.parse(html, URL_A).text).toBe("Hi Hello world");
    });

    it("drops scripts, styles and navigation", () => {
      const html = `<html><body>
        <nav>Menu</nav><script>var x = 1;</script><style>p { color: red }</style>
        <p>Body text</p>
      </body></html>`;
      expect(parser.parse(html, URL_A).text).toBe("Body text");
    });

    it("extracts the main text of an article page", () => {
      const paragraph =
        "Breadth-first crawling visits every page at one depth before moving deeper, " +
        "which keeps the crawl close to the seed and makes the page budget predictable. ";
      const html = `<html><head><title>Article</title></head><body>
        <nav><a href="/">Menu entry</a></nav>
        <article>
          <h1>Article</h1>
          <p>${paragraph.repeat(3)}</p>
          <p>${paragraph.repeat(3)}</p>
          <p>${paragraph.repeat(3)}</p>
        </article>
      </body></html>`;

      const page = parser.parse(html, URL_A);
      expect(page.text).toContain("Breadth-first crawling visits every page at one depth");
      expect(page.text).not.toContain("Menu entry");
      expect(page.text).not.toMatch(/\s{2,}/);
    });
  });
});
