/**
 * @fileoverview Tests for the command-line front end.
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { USAGE, runCli, type CliDeps } from "../src/cli.js";
import { parseRecords } from "../src/crawler/records.js";
import { silentLogger } from "../src/utils/logger.js";
import { FakeClock } from "./helpers/fake-clock.js";
import { FakeWeb } from "./helpers/fake-web.js";

const SEED = "http://a.test/";
const STAMP_DATE = new Date(2024, 0, 5, 9, 3, 7);

function harness(web = new FakeWeb()) {
  const out: string[] = [];
  const err: string[] = [];
  const deps: CliDeps = {
    env: {},
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    logger: silentLogger,
    fetchImpl: web.fetch,
    clock: new FakeClock(),
    now: () => STAMP_DATE,
  };
  return { out, err, deps };
}

describe("runCli", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "crawler-cli-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage for --help", async () => {
    const { out, err, deps } = harness();
    expect(await runCli(["--help"], deps)).toBe(0);
    expect(out).toEqual([USAGE]);
    expect(err).toEqual([]);
  });

  it("prints the version", async () => {
    const { out, deps } = harness();
    expect(await runCli(["--version"], deps)).toBe(0);
    expect(out).toEqual(["breadth-crawler 1.0.0"]);
  });

  it("requires a seed URL", async () => {
    const { err, deps } = harness();
    expect(await runCli([], deps)).toBe(2);
    expect(err).toEqual(["error: missing seed URL", USAGE]);
  });

  it("accepts only one seed URL", async () => {
    const { err, deps } = harness();
    expect(await runCli([SEED, "http://b.test/"], deps)).toBe(2);
    expect(err[0]).toBe("error: expected one seed URL, got 2");
  });

  it("rejects unknown options", async () => {
    const { err, deps } = harness();
    expect(await runCli(["--bogus", SEED], deps)).toBe(2);
    expect(err[0]).toMatch(/^error: Unknown option '--bogus'/);
    expect(err[1]).toBe("Run with --help for usage.");
  });

  it("rejects an unknown output format", async () => {
    const { err, deps } = harness();
    expect(await runCli([SEED, "-f", "xml"], deps)).toBe(2);
    expect(err).toEqual([
      'error: [CONFIG_INVALID] Invalid crawl configuration: outputFormat: expected json, csv or both, got "xml"',
    ]);
  });

  it("rejects a non-numeric depth", async () => {
    const { err, deps } = harness();
    expect(await runCli([SEED, "--max-depth", "abc"], deps)).toBe(2);
    expect(err[0]).toMatch(/^error: \[CONFIG_INVALID\] Invalid crawl configuration: maxDepth: /);
  });

  it("exits 2 on an invalid CRAWLER_* variable", async () => {
    const { err, deps } = harness();
    deps.env = { CRAWLER_MAX_PAGES: "abc" };
    expect(await runCli([SEED], deps)).toBe(2);
    expect(err).toEqual([
      "error: [CONFIG_INVALID] Invalid environment configuration: CRAWLER_MAX_PAGES: Expected number, received nan",
    ]);
  });

  it("rejects an invalid seed URL", async () => {
    const { err, deps } = harness();
    expect(await runCli(["not-a-url"], deps)).toBe(2);
    expect(err).toEqual([
      "error: [CONFIG_INVALID] Invalid crawl configuration: seedUrl: must be an absolute http(s) URL",
    ]);
  });

  it("crawls and writes both output files", async () => {
    const web = new FakeWeb().page(SEED, ["/x"], "Home").page("http://a.test/x", [], "X");
    const { out, err, deps } = harness(web);

    const code = await runCli([SEED, "-f", "both", "--delay", "0", "-o", dir], deps);

    const jsonFile = path.join(dir, "crawl_20240105_090307.json");
    const csvFile = path.join(dir, "crawl_20240105_090307.csv");
    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([
      "Crawl complete: 2 pages, 0 failed, 0 skipped (frontier_exhausted)",
      `Wrote ${jsonFile}`,
      `Wrote ${csvFile}`,
    ]);
    expect(parseRecords(await readFile(jsonFile, "utf-8")).map((record) => record.title)).toEqual([
      "Home",
      "X",
    ]);
    expect((await readFile(csvFile, "utf-8")).split("\n")).toHaveLength(4);
  });

  it("passes crawl options through", async () => {
    const web = new FakeWeb()
      .robots("http://a.test", "User-agent: *\nDisallow: /\n")
      .page(SEED, ["/docs/a", "/blog/b", "http://b.test/"])
      .page("http://a.test/docs/a")
      .page("http://b.test/");
    const { out, deps } = harness(web);

    const code = await runCli(
      [
        SEED,
        "--no-robots",
        "--allow-external",
        "--url-pattern",
        "/docs/",
        "--url-pattern",
        "b\\.test",
        "--max-depth",
        "1",
        "--delay",
        "0",
        "-o",
        dir,
      ],
      deps,
    );

    expect(code).toBe(0);
    expect(out[0]).toBe("Crawl complete: 3 pages, 0 failed, 0 skipped (frontier_exhausted)");
    expect(web.count("http://a.test/blog/b")).toBe(0);
    expect(web.count("http://a.test/robots.txt")).toBe(0);
  });

  it("exits with 1 when the seed cannot be fetched", async () => {
    const { out, err, deps } = harness();

    const code = await runCli([SEED, "--retries", "0", "--delay", "0", "-o", dir], deps);

    expect(code).toBe(1);
    expect(out[0]).toBe("Crawl complete: 1 pages, 1 failed, 0 skipped (frontier_exhausted)");
    expect(err).toEqual(["error: seed URL http://a.test/ could not be fetched (http_status)"]);
  });
});
