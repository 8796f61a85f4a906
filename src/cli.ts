/**
 * @module cli
 * @fileoverview Command-line front end: argument parsing, crawl, output files.
 *
 * ```
 * breadth-crawler <url> [options]
 * ```
 *
 * Exit codes:
 *
 * | Code | Meaning                                                      |
 * |------|--------------------------------------------------------------|
 * | 0    | Crawl completed, per-page failures included                  |
 * | 1    | The seed URL could not be fetched, or an unexpected error    |
 * | 2    | Invalid arguments or configuration                           |
 *
 * {@link runCli} never calls `process.exit`; `bin.ts` does that with the
 * returned code.
 */

import { parseArgs } from "node:util";
import {
  loadConfig,
  parseCrawlConfig,
  type CrawlConfig,
  type CrawlConfigInput,
} from "./config.js";
import { CrawlEngine } from "./crawler/engine.js";
import type { FetchLike } from "./services/fetch.js";
import { writeRecords } from "./storage/writers.js";
import type { Clock } from "./utils/clock.js";
import { ConfigError, formatError } from "./utils/errors.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { VERSION } from "./version.js";

export const USAGE = `Usage: breadth-crawler <url> [options]

Breadth-first web crawler. Writes one record per processed page.

Options:
  -d, --max-depth <n>        Maximum link depth (default: 2)
  -n, --max-pages <n>        Maximum pages to process (default: 100)
      --delay <seconds>      Delay between requests to one host (default: 1)
      --timeout <seconds>    HTTP request timeout (default: 10)
      --retries <n>          Retries per request (default: 2)
      --max-redirects <n>    Redirect hops followed per page (default: 5)
      --no-robots            Ignore robots.txt
      --allow-external       Follow links to other hosts
      --url-pattern <re>     Regex URLs must match (repeatable)
      --exclude-pattern <re> Regex excluding URLs (repeatable)
  -f, --format <fmt>         json, csv or both (default: json)
  -o, --output-dir <dir>     Output directory (default: output)
      --user-agent <ua>      User-Agent header and robots.txt identity
      --crawl-timeout <s>    Stop the whole crawl after this many seconds
  -v, --verbose              Debug logging
      --version              Print the version
  -h, --help                 Show this help`;

export interface CliDeps {
  env?: Readonly<Record<string, string | undefined>>;
  /** Receives result lines. @default process.stdout */
  stdout?: (line: string) => void;
  /** Receives usage and fatal error lines. @default process.stderr */
  stderr?: (line: string) => void;
  /** Replaces the logger built from `--verbose`. */
  logger?: Logger;
  fetchImpl?: FetchLike;
  clock?: Clock;
  now?: () => Date;
  signal?: AbortSignal;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      "max-depth": { type: "string", short: "d" },
      "max-pages": { type: "string", short: "n" },
      delay: { type: "string" },
      timeout: { type: "string" },
      retries: { type: "string" },
      "max-redirects": { type: "string" },
      "no-robots": { type: "boolean" },
      "allow-external": { type: "boolean" },
      "url-pattern": { type: "string", multiple: true },
      "exclude-pattern": { type: "string", multiple: true },
      format: { type: "string", short: "f" },
      "output-dir": { type: "string", short: "o" },
      "user-agent": { type: "string" },
      "crawl-timeout": { type: "string" },
      verbose: { type: "boolean", short: "v" },
      version: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
}

/**
 * Run the CLI with `argv` (without the node and script entries).
 *
 * @returns The process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    stderr(`error: ${formatError(error)}`);
    stderr("Run with --help for usage.");
    return 2;
  }
  const { values, positionals } = parsed;

  if (values.help) {
    stdout(USAGE);
    return 0;
  }
  if (values.version) {
    stdout(`breadth-crawler ${VERSION}`);
    return 0;
  }
  if (positionals.length !== 1) {
    stderr(
      positionals.length === 0
        ? "error: missing seed URL"
        : `error: expected one seed URL, got ${positionals.length}`,
    );
    stderr(USAGE);
    return 2;
  }

  let config: CrawlConfig;
  try {
    const input: CrawlConfigInput = {
      seedUrl: positionals[0],
      maxDepth: toNumber(values["max-depth"]),
      maxPages: toNumber(values["max-pages"]),
      delaySeconds: toNumber(values.delay),
      timeoutSeconds: toNumber(values.timeout),
      maxRetries: toNumber(values.retries),
      maxRedirects: toNumber(values["max-redirects"]),
      respectRobots: values["no-robots"] ? false : undefined,
      allowExternal: values["allow-external"] ? true : undefined,
      urlPatterns: values["url-pattern"],
      excludePatterns: values["exclude-pattern"],
      outputFormat: parseFormat(values.format),
      outputDir: values["output-dir"],
      userAgent: values["user-agent"],
      crawlTimeoutSeconds: toNumber(values["crawl-timeout"]),
    };
    config = parseCrawlConfig(input, loadConfig(deps.env ?? process.env));
  } catch (error) {
    if (error instanceof ConfigError) {
      stderr(`error: ${formatError(error)}`);
      return 2;
    }
    throw error;
  }

  const logger =
    deps.logger ?? createLogger({ scope: "breadth-crawler", verbose: values.verbose ?? false });

  try {
    const result = await new CrawlEngine({
      config,
      logger: logger.child("engine"),
      fetchImpl: deps.fetchImpl,
      clock: deps.clock,
      now: deps.now,
      signal: deps.signal,
    }).run();

    const files = await writeRecords(result.records, {
      format: config.outputFormat,
      outputDir: config.outputDir,
      now: deps.now?.(),
      logger: logger.child("storage"),
    });

    const { summary } = result;
    stdout(
      `Crawl complete: ${summary.pages_processed} pages, ${summary.failed} failed, ` +
        `${summary.skipped} skipped (${summary.stopped_reason})`,
    );
    for (const file of files) {
      stdout(`Wrote ${file}`);
    }

    const seedRecord = result.records[0];
    if (seedRecord?.url === result.seedUrl && seedRecord.status === "failed") {
      stderr(`error: seed URL ${result.seedUrl} could not be fetched (${seedRecord.error ?? "unknown"})`);
      return 1;
    }
    return 0;
  } catch (error) {
    stderr(`error: ${formatError(error)}`);
    return 1;
  }
}

/**
 * @throws {ConfigError} For anything but `json`, `csv` or `both`.
 */
function parseFormat(value: string | undefined): CrawlConfigInput["outputFormat"] {
  switch (value) {
    case undefined:
    case "json":
    case "csv":
    case "both":
      return value;
    default:
      throw new ConfigError("Invalid crawl configuration", [
        `outputFormat: expected json, csv or both, got "${value}"`,
      ]);
  }
}
