/**
 * @fileoverview Tests for page records and their JSON form.
 */

import { describe, it, expect } from "vitest";
import {
  RECORD_FIELDS,
  createRecord,
  parseRecords,
  serializeRecords,
} from "../../src/crawler/records.js";

const AT = new Date("2024-01-01T00:00:00.000Z");

describe("createRecord", () => {
  it("fills absent fields", () => {
    expect(createRecord({ url: "http://a.test/", depth: 0, status: "skipped", fetched_at: AT, error: "robots" })).toEqual({
      url: "http://a.test/",
      depth: 0,
      status: "skipped",
      status_code: null,
      title: "",
      meta_description: "",
      content_snippet: "",
      discovered_links: [],
      fetched_at: "2024-01-01T00:00:00.000Z",
      error: "robots",
    });
  });

  it("returns a frozen record with its own link array", () => {
    const links = ["http://a.test/x"];
    const record = createRecord({
      url: "http://a.test/",
      depth: 0,
      status: "success",
      fetched_at: AT,
      discovered_links: links,
    });
    links.push("http://a.test/y");
    expect(Object.isFrozen(record)).toBe(true);
    expect(record.discovered_links).toEqual(["http://a.test/x"]);
  });

  it("lists every key in RECORD_FIELDS order", () => {
    const record = createRecord({ url: "http://a.test/", depth: 0, status: "success", fetched_at: AT });
    expect(Object.keys(record)).toEqual([...RECORD_FIELDS]);
  });
});

describe("serializeRecords / parseRecords", () => {
  it("round-trips records", () => {
    const records = [
      createRecord({
        url: "http://a.test/",
        depth: 0,
        status: "success",
        status_code: 200,
        title: "Home",
        content_snippet: "Hello",
        discovered_links: ["http://a.test/x"],
        fetched_at: AT,
      }),
      createRecord({
        url: "http://a.test/x",
        depth: 1,
        status: "failed",
        status_code: 503,
        fetched_at: AT,
        error: "http_status",
      }),
    ];
    expect(parseRecords(serializeRecords(records))).toEqual(records);
  });

  it("indents with two spaces", () => {
    expect(serializeRecords([])).toBe("[]");
    const json = serializeRecords([createRecord({ url: "u", depth: 0, status: "success", fetched_at: AT })]);
    expect(json.split("\n")[1]).toBe("  {");
  });

  it("rejects documents that are not records", () => {
    expect(() => parseRecords('[{"url":"x"}]')).toThrow();
    expect(() => parseRecords('[{"url":"x","depth":0,"status":"done","status_code":null,"title":"","meta_description":"","content_snippet":"","discovered_links":[],"fetched_at":"2024-01-01T00:00:00.000Z","error":null}]')).toThrow();
  });
});
