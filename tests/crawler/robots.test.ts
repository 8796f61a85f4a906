/**
 * @fileoverview Tests for robots.txt parsing, matching and the per-run checker.
 */

import { describe, it, expect } from "vitest";
import { RobotsChecker, allowAllPolicy, parseRobotsTxt } from "../../src/crawler/robots.js";
import { CrawlAbortedError } from "../../src/utils/errors.js";
import type { Logger } from "../../src/utils/logger.js";
import { FakeWeb } from "../helpers/fake-web.js";

const UA = "breadth-crawler/1.0 (+https://example.com/bot)";
const ORIGIN = "http://a.test";

function policy(text: string, userAgent = UA) {
  return parseRobotsTxt(text, userAgent, ORIGIN);
}

function allowed(text: string, path: string, userAgent = UA): boolean {
  return policy(text, userAgent).isAllowed(`${ORIGIN}${path}`);
}

function recordingLogger(lines: string[]): Logger {
  const logger: Logger = {
    debug: (message) => lines.push(`debug ${message}`),
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    child: () => logger,
  };
  return logger;
}

// ---------------------------------------------------------------------------
// Parsing and matching
// ---------------------------------------------------------------------------

describe("parseRobotsTxt", () => {
  it("disallows by prefix", () => {
    const text = "User-agent: *\nDisallow: /private/\n";
    expect(allowed(text, "/private/page")).toBe(false);
    expect(allowed(text, "/public")).toBe(true);
    expect(allowed(text, "/private")).toBe(true);
  });

  it("lets the longest matching rule win whatever the order", () => {
    const first = "User-agent: *\nDisallow: /private/\nAllow: /private/open\n";
    const second = "User-agent: *\nAllow: /private/open\nDisallow: /private/\n";
    for (const text of [first, second]) {
      expect(allowed(text, "/private/open/doc")).toBe(true);
      expect(allowed(text, "/private/closed")).toBe(false);
    }
  });

  it("breaks a length tie in favour of allow", () => {
    expect(allowed("User-agent: *\nDisallow: /page\nAllow: /page\n", "/page")).toBe(true);
  });

  it("supports wildcards and the end anchor", () => {
    const text = "User-agent: *\nDisallow: /*.pdf$\nDisallow: /tmp*/cache\n";
    expect(allowed(text, "/files/x.pdf")).toBe(false);
    expect(allowed(text, "/files/x.pdf?dl=1")).toBe(true);
    expect(allowed(text, "/tmp42/cache/a")).toBe(false);
    expect(allowed(text, "/tmp/other")).toBe(true);
  });

  it("matches the query string", () => {
    const text = "User-agent: *\nDisallow: /search?q=\n";
    expect(allowed(text, "/search?q=cats")).toBe(false);
    expect(allowed(text, "/search")).toBe(true);
  });

  it("compares non-ASCII paths in their percent-encoded form", () => {
    const text = "User-agent: *\nDisallow: /café/\n";
    expect(allowed(text, "/café/menu")).toBe(false);
    expect(allowed(text, "/caf%C3%A9/menu")).toBe(false);
    expect(allowed(text, "/cafe/menu")).toBe(true);
  });

  it("treats an empty Disallow as allow-all", () => {
    expect(allowed("User-agent: *\nDisallow:\n", "/anything")).toBe(true);
  });

  it("prefers the group naming this crawler over *", () => {
    const text = [
      "User-agent: *",
      "Disallow: /",
      "",
      "User-agent: breadth-crawler",
      "Disallow: /admin",
    ].join("\n");
    expect(allowed(text, "/docs")).toBe(true);
    expect(allowed(text, "/admin/users")).toBe(false);
  });

  it("matches the agent name exactly, ignoring case", () => {
    const text = "User-agent: *\nDisallow: /\n\nUser-agent: Crawler\nDisallow:\n";
    // "crawler" is only a substring of "breadth-crawler", so * applies.
    expect(allowed(text, "/docs")).toBe(false);
    expect(allowed(text, "/docs", "CRAWLER/2.0")).toBe(true);
  });

  it("shares rules between consecutive User-agent lines", () => {
    const text = "User-agent: otherbot\nUser-agent: breadth-crawler\nDisallow: /x\n";
    expect(allowed(text, "/x")).toBe(false);
    expect(allowed(text, "/y")).toBe(true);
  });

  it("allows everything when only other agents are named", () => {
    expect(allowed("User-agent: otherbot\nDisallow: /\n", "/")).toBe(true);
  });

  it("allows URLs of another origin", () => {
    const rules = policy("User-agent: *\nDisallow: /\n");
    expect(rules.isAllowed("http://b.test/x")).toBe(true);
    expect(rules.isAllowed("http://a.test/x")).toBe(false);
  });

  it("reads Crawl-delay of the selected group", () => {
    const text = "User-agent: *\nCrawl-delay: 3\n\nUser-agent: other\nCrawl-delay: 60\n";
    expect(policy(text).crawlDelaySeconds).toBe(3);
    expect(policy("User-agent: *\nDisallow: /x\n").crawlDelaySeconds).toBeUndefined();
  });

  it("ignores comments, blank lines and unknown fields", () => {
    const text = [
      "# robots for a.test",
      "Sitemap: http://a.test/sitemap.xml",
      "User-agent: * # everyone",
      "Disallow: /private # keep out",
      "Host: a.test",
    ].join("\r\n");
    expect(allowed(text, "/private/x")).toBe(false);
    expect(allowed(text, "/open")).toBe(true);
  });
});

describe("allowAllPolicy", () => {
  it("allows any URL and sets no delay", () => {
    const rules = allowAllPolicy(ORIGIN);
    expect(rules.isAllowed("http://a.test/anything")).toBe(true);
    expect(rules.crawlDelaySeconds).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// RobotsChecker
// ---------------------------------------------------------------------------

describe("RobotsChecker", () => {
  function checker(web: FakeWeb, lines: string[] = [], respectRobots = true, maxBytes?: number) {
    return new RobotsChecker({
      userAgent: UA,
      respectRobots,
      timeoutSeconds: 5,
      maxBytes,
      fetchImpl: web.fetch,
      logger: recordingLogger(lines),
    });
  }

  it("fetches robots.txt once per origin", async () => {
    const web = new FakeWeb().robots(ORIGIN, "User-agent: *\nDisallow: /private/\n");
    const robots = checker(web);

    expect(await robots.isAllowed("http://a.test/private/page")).toBe(false);
    expect(await robots.isAllowed("http://a.test/public")).toBe(true);
    expect(await robots.isAllowed("http://a.test/private/other?x=1")).toBe(false);
    expect(web.count("http://a.test/robots.txt")).toBe(1);
    expect(robots.size).toBe(1);
    robots.close();
  });

  it("shares one request between concurrent lookups", async () => {
    const web = new FakeWeb().robots(ORIGIN, "User-agent: *\nDisallow: /x\n");
    const robots = checker(web);

    const [first, second] = await Promise.all([
      robots.policyFor("http://a.test/1"),
      robots.policyFor("http://a.test/2"),
    ]);
    expect(first).toBe(second);
    expect(web.count("http://a.test/robots.txt")).toBe(1);
  });

  it("sends the configured User-Agent", async () => {
    const web = new FakeWeb().robots(ORIGIN, "");
    await checker(web).policyFor("http://a.test/");
    expect(web.requests[0].headers.get("user-agent")).toBe(UA);
  });

  it("allows everything when robots.txt is missing", async () => {
    const web = new FakeWeb();
    const lines: string[] = [];
    expect(await checker(web, lines).isAllowed("http://a.test/anything")).toBe(true);
    expect(lines.filter((line) => line.startsWith("warn"))).toEqual([]);
  });

  it("allows everything and warns on a server error", async () => {
    const web = new FakeWeb().on("http://a.test/robots.txt", { status: 500 });
    const lines: string[] = [];
    expect(await checker(web, lines).isAllowed("http://a.test/x")).toBe(true);
    expect(lines).toContain(
      "warn [ROBOTS_UNAVAILABLE] HTTP 500 for http://a.test/robots.txt, allowing all",
    );
  });

  it("allows everything on a network error", async () => {
    const web = new FakeWeb().on("http://a.test/robots.txt", { error: "network" });
    const lines: string[] = [];
    expect(await checker(web, lines).isAllowed("http://a.test/x")).toBe(true);
    expect(lines).toContain(
      "warn [ROBOTS_UNAVAILABLE] Could not fetch http://a.test/robots.txt: fetch failed, allowing all",
    );
  });

  it("allows everything and warns when robots.txt is over the size cap", async () => {
    const web = new FakeWeb().robots(ORIGIN, `User-agent: *\nDisallow: /\n${"#".repeat(64)}\n`);
    const lines: string[] = [];
    const robots = checker(web, lines, true, 32);
    expect(await robots.isAllowed("http://a.test/x")).toBe(true);
    const warnings = lines.filter((line) => line.startsWith("warn"));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(
      /^warn \[ROBOTS_UNAVAILABLE\] http:\/\/a\.test\/robots\.txt: Response .*limit of 32 bytes.*, allowing all$/,
    );
  });

  it("releases the body of an error answer", async () => {
    const web = new FakeWeb().on("http://a.test/robots.txt", { status: 503, body: "busy" });
    await checker(web).policyFor("http://a.test/x");
    expect(web.responses[0].bodyUsed).toBe(true);
  });

  it("makes no request when robots are not respected", async () => {
    const web = new FakeWeb().robots(ORIGIN, "User-agent: *\nDisallow: /\n");
    const robots = checker(web, [], false);
    expect(await robots.isAllowed("http://a.test/x")).toBe(true);
    expect((await robots.policyFor("http://a.test/x")).isAllowed("http://a.test/")).toBe(true);
    expect(web.requests).toHaveLength(0);
  });

  it("keeps a policy per origin", async () => {
    const web = new FakeWeb()
      .robots(ORIGIN, "User-agent: *\nDisallow: /\n")
      .robots("http://b.test", "User-agent: *\nDisallow:\n");
    const robots = checker(web);
    expect(await robots.isAllowed("http://a.test/x")).toBe(false);
    expect(await robots.isAllowed("http://b.test/x")).toBe(true);
    expect(robots.size).toBe(2);
  });

  it("rejects with CrawlAbortedError when the crawl is aborted", async () => {
    const web = new FakeWeb().robots(ORIGIN, "");
    const controller = new AbortController();
    controller.abort();
    await expect(checker(web).policyFor("http://a.test/", controller.signal)).rejects.toBeInstanceOf(
      CrawlAbortedError,
    );
    expect(web.requests).toHaveLength(0);
  });
});
