/**
 * @module storage/writers
 * @fileoverview JSON and CSV output files for crawl records.
 *
 * Files are named `crawl_YYYYMMDD_HHMMSS.{json,csv}` (local time) inside the
 * output directory, which is created when missing.
 *
 * - **JSON**: the record array, 2-space indented
 * - **CSV**: a header line plus one row per record. Fields containing a
 *   comma, a quote or a line break are quoted, with quotes doubled.
 *   `discovered_links` is joined with single spaces; `null` is written as
 *   an empty field.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { OutputFormat } from "../config.js";
import { RECORD_FIELDS, serializeRecords, type PageRecord } from "../crawler/records.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface WriteOptions {
  format: OutputFormat;
  outputDir: string;
  /** Timestamp used in the file names. @default new Date() */
  now?: Date;
  logger?: Logger;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * @example
 * ```ts
 * formatTimestamp(new Date(2024, 0, 5, 9, 3, 7)); // "20240105_090307"
 * ```
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function csvEscape(value: string | number | null): string {
  if (value === null) {
    return "";
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function recordsToCsv(records: readonly PageRecord[]): string {
  const lines = [RECORD_FIELDS.join(",")];
  for (const record of records) {
    lines.push(
      RECORD_FIELDS.map((field) => {
        const value = record[field];
        return csvEscape(Array.isArray(value) ? value.join(" ") : value);
      }).join(","),
    );
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Write `records` in the requested format(s).
 *
 * @returns Paths of the files written, JSON first.
 */
export async function writeRecords(
  records: readonly PageRecord[],
  options: WriteOptions,
): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const stamp = formatTimestamp(options.now ?? new Date());
  const base = path.join(options.outputDir, `crawl_${stamp}`);

  await mkdir(options.outputDir, { recursive: true });

  const written: string[] = [];
  if (options.format === "json" || options.format === "both") {
    const file = `${base}.json`;
    await writeFile(file, `${serializeRecords(records)}\n`, "utf-8");
    logger.info(`Saved JSON -> ${file}`);
    written.push(file);
  }
  if (options.format === "csv" || options.format === "both") {
    const file = `${base}.csv`;
    await writeFile(file, recordsToCsv(records), "utf-8");
    logger.info(`Saved CSV -> ${file}`);
    written.push(file);
  }
  return written;
}
