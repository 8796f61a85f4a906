/**
 * @fileoverview Tests for the frontier admission filter.
 */

import { describe, it, expect } from "vitest";
import { filterCandidates, shouldVisit, type UrlFilterConfig } from "../../src/crawler/url-filter.js";

const base: UrlFilterConfig = { allowExternal: false, urlPatterns: [], excludePatterns: [] };

describe("shouldVisit", () => {
  it("accepts same-host http URLs", () => {
    expect(shouldVisit("http://a.test/x", base, "a.test")).toBe(true);
  });

  it("rejects other hosts unless external links are allowed", () => {
    expect(shouldVisit("http://b.test/y", base, "a.test")).toBe(false);
    expect(shouldVisit("http://b.test/y", { ...base, allowExternal: true }, "a.test")).toBe(true);
  });

  it("treats subdomains and other ports as other hosts", () => {
    expect(shouldVisit("http://www.a.test/", base, "a.test")).toBe(false);
    expect(shouldVisit("http://a.test:8080/", base, "a.test")).toBe(false);
  });

  it("rejects non-http schemes even with external links allowed", () => {
    const open = { ...base, allowExternal: true };
    expect(shouldVisit("mailto:me@a.test", open, "a.test")).toBe(false);
    expect(shouldVisit("ftp://a.test/file", open, "a.test")).toBe(false);
  });

  it("requires at least one include pattern to match", () => {
    const config = { ...base, urlPatterns: [/\/docs\//, /\/blog\//] };
    expect(shouldVisit("http://a.test/docs/intro", config, "a.test")).toBe(true);
    expect(shouldVisit("http://a.test/blog/post", config, "a.test")).toBe(true);
    expect(shouldVisit("http://a.test/about", config, "a.test")).toBe(false);
  });

  it("drops URLs matching any exclude pattern", () => {
    const config = { ...base, urlPatterns: [/\/docs\//], excludePatterns: [/\.pdf$/] };
    expect(shouldVisit("http://a.test/docs/guide.pdf", config, "a.test")).toBe(false);
    expect(shouldVisit("http://a.test/docs/guide", config, "a.test")).toBe(true);
  });

  it("gives the same answer for global patterns on repeated calls", () => {
    const config = { ...base, urlPatterns: [/docs/g] };
    expect(shouldVisit("http://a.test/docs", config, "a.test")).toBe(true);
    expect(shouldVisit("http://a.test/docs", config, "a.test")).toBe(true);
  });
});

describe("filterCandidates", () => {
  it("keeps accepted URLs in their original order", () => {
    expect(
      filterCandidates(
        ["http://a.test/3", "http://b.test/", "http://a.test/1", "http://a.test/2"],
        base,
        "a.test",
      ),
    ).toEqual(["http://a.test/3", "http://a.test/1", "http://a.test/2"]);
  });
});
