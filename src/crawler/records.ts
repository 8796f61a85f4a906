/**
 * @module crawler/records
 * @fileoverview The per-page record the crawler emits, and its JSON form.
 *
 * Keys are snake_case because records are a wire format: they are written
 * to JSON and CSV files and returned from the MCP tool unchanged.
 *
 * @example
 * ```ts
 * const record = createRecord({
 *   url: "http://a.test/",
 *   depth: 0,
 *   status: "failed",
 *   status_code: 503,
 *   error: "http_status",
 *   fetched_at: new Date(0),
 * });
 * parseRecords(serializeRecords([record]))[0].error; // "http_status"
 * ```
 */

import { z } from "zod";

/* ────────────────────────────────────────────────────────────────────────────
 * Schema
 * ──────────────────────────────────────────────────────────────────────────── */

export const PAGE_STATUSES = ["success", "failed", "skipped"] as const;
export type PageStatus = (typeof PAGE_STATUSES)[number];

export const PageRecordSchema = z.object({
  url: z.string(),
  depth: z.number().int().min(0),
  status: z.enum(PAGE_STATUSES),
  /** Final HTTP status, `null` when no response was received. */
  status_code: z.number().int().nullable(),
  title: z.string(),
  meta_description: z.string(),
  content_snippet: z.string(),
  discovered_links: z.array(z.string()),
  /** ISO-8601 timestamp of when the record was produced. */
  fetched_at: z.string().datetime(),
  /**
   * `null` for a clean success. Otherwise a failure kind (`timeout`,
   * `http_status`, ...), `robots` for a skip, `internal` for a crawler bug,
   * or an extraction warning on a success.
   */
  error: z.string().nullable(),
});

export type PageRecord = Readonly<z.infer<typeof PageRecordSchema>>;

/** Column order for tabular output. */
export const RECORD_FIELDS = [
  "url",
  "depth",
  "status",
  "status_code",
  "title",
  "meta_description",
  "content_snippet",
  "discovered_links",
  "fetched_at",
  "error",
] as const satisfies readonly (keyof PageRecord)[];

/* ────────────────────────────────────────────────────────────────────────────
 * Construction
 * ──────────────────────────────────────────────────────────────────────────── */

export interface RecordInit {
  url: string;
  depth: number;
  status: PageStatus;
  fetched_at: Date;
  status_code?: number | null;
  title?: string;
  meta_description?: string;
  content_snippet?: string;
  discovered_links?: readonly string[];
  error?: string | null;
}

/**
 * Build a frozen record, filling absent text fields with `""`.
 */
export function createRecord(init: RecordInit): PageRecord {
  return Object.freeze({
    url: init.url,
    depth: init.depth,
    status: init.status,
    status_code: init.status_code ?? null,
    title: init.title ?? "",
    meta_description: init.meta_description ?? "",
    content_snippet: init.content_snippet ?? "",
    discovered_links: [...(init.discovered_links ?? [])],
    fetched_at: init.fetched_at.toISOString(),
    error: init.error ?? null,
  });
}

/* ────────────────────────────────────────────────────────────────────────────
 * JSON
 * ──────────────────────────────────────────────────────────────────────────── */

/** A JSON array of records, 2-space indented. */
export function serializeRecords(records: readonly PageRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * Parse and validate a JSON array produced by {@link serializeRecords}.
 *
 * @throws {z.ZodError} If the document does not hold valid records.
 * @throws {SyntaxError} If `json` is not JSON.
 */
export function parseRecords(json: string): PageRecord[] {
  const value: unknown = JSON.parse(json);
  return z
    .array(PageRecordSchema)
    .parse(value)
    .map((record) => Object.freeze(record));
}
