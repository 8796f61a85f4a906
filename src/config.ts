/**
 * @module config
 * @fileoverview Environment defaults and crawl configuration validation.
 *
 * Two layers:
 *
 * 1. {@link loadConfig} reads `CRAWLER_*` environment variables into an
 *    {@link AppConfig} of defaults and rejects values outside their bounds.
 *    Only entry points (CLI, MCP server) call it.
 * 2. {@link parseCrawlConfig} validates a caller-supplied
 *    {@link CrawlConfigInput} with zod, fills gaps from the defaults, compiles
 *    URL patterns and returns the immutable {@link CrawlConfig} the engine runs on.
 *
 * The engine and its collaborators never read `process.env`; everything they
 * need arrives through the constructor.
 *
 * ## Environment variables
 * | Variable                         | Default                                  |
 * |----------------------------------|------------------------------------------|
 * | `CRAWLER_USER_AGENT`             | `breadth-crawler/1.0 (+https://www.npmjs.com/package/breadth-crawler)` |
 * | `CRAWLER_MAX_DEPTH`              | `2`                                      |
 * | `CRAWLER_MAX_PAGES`              | `100`                                    |
 * | `CRAWLER_DELAY_SECONDS`          | `1`                                      |
 * | `CRAWLER_TIMEOUT_SECONDS`        | `10`                                     |
 * | `CRAWLER_MAX_RETRIES`            | `2`                                      |
 * | `CRAWLER_MAX_REDIRECTS`          | `5`                                      |
 * | `CRAWLER_ROBOTS_TIMEOUT_SECONDS` | `5`                                      |
 * | `CRAWLER_SNIPPET_LENGTH`         | `500`                                    |
 * | `CRAWLER_MAX_RESPONSE_BYTES`     | `10485760`                               |
 * | `CRAWLER_OUTPUT_DIR`             | `output`                                 |
 *
 * @example
 * ```ts
 * import { loadConfig, parseCrawlConfig } from "./config.js";
 *
 * const config = parseCrawlConfig(
 *   { seedUrl: "https://example.com/", maxDepth: 1, urlPatterns: ["/docs/"] },
 *   loadConfig(),
 * );
 * config.urlPatterns[0].test("https://example.com/docs/intro"); // true
 * ```
 */

import { z } from "zod";
import { ConfigError } from "./utils/errors.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Environment Defaults
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Bounds every default must satisfy, whether it comes from the environment
 * or from a caller building its own defaults.
 */
export const AppConfigSchema = z.object({
  userAgent: z.string().min(1),
  maxDepth: z.number().int().min(0),
  maxPages: z.number().int().min(1),
  /** Minimum spacing between two requests to one host, in seconds. */
  delaySeconds: z.number().finite().min(0),
  timeoutSeconds: z.number().finite().positive(),
  maxRetries: z.number().int().min(0),
  /** Redirect hops followed per page before giving up. */
  maxRedirects: z.number().int().min(0),
  /** Timeout of the single robots.txt request per origin. */
  robotsTimeoutSeconds: z.number().finite().positive(),
  snippetLength: z.number().int().min(0),
  maxResponseBytes: z.number().int().positive(),
  outputDir: z.string().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Readonly<Record<string, string | undefined>>;

const ENV_NAMES: Record<keyof AppConfig, string> = {
  userAgent: "CRAWLER_USER_AGENT",
  maxDepth: "CRAWLER_MAX_DEPTH",
  maxPages: "CRAWLER_MAX_PAGES",
  delaySeconds: "CRAWLER_DELAY_SECONDS",
  timeoutSeconds: "CRAWLER_TIMEOUT_SECONDS",
  maxRetries: "CRAWLER_MAX_RETRIES",
  maxRedirects: "CRAWLER_MAX_REDIRECTS",
  robotsTimeoutSeconds: "CRAWLER_ROBOTS_TIMEOUT_SECONDS",
  snippetLength: "CRAWLER_SNIPPET_LENGTH",
  maxResponseBytes: "CRAWLER_MAX_RESPONSE_BYTES",
  outputDir: "CRAWLER_OUTPUT_DIR",
};

/** Unset or blank means the default; anything else must be a number. */
function numberFrom(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  return Number(raw);
}

function formatIssues(
  issues: readonly z.ZodIssue[],
  label: (path: (string | number)[]) => string,
): string[] {
  return issues.map((issue) => `${label(issue.path)}: ${issue.message}`);
}

/**
 * Read `CRAWLER_*` variables from `env`, apply defaults and validate.
 *
 * @throws {ConfigError} Naming each variable whose value is out of range or
 *   not a number.
 *
 * @example
 * ```ts
 * loadConfig({ CRAWLER_MAX_PAGES: "20" }).maxPages; // 20
 * loadConfig({}).delaySeconds;                      // 1
 * loadConfig({ CRAWLER_MAX_PAGES: "abc" });         // throws ConfigError
 * ```
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse({
    userAgent:
      env.CRAWLER_USER_AGENT ??
      "breadth-crawler/1.0 (+https://www.npmjs.com/package/breadth-crawler)",
    maxDepth: numberFrom(env.CRAWLER_MAX_DEPTH, 2),
    maxPages: numberFrom(env.CRAWLER_MAX_PAGES, 100),
    delaySeconds: numberFrom(env.CRAWLER_DELAY_SECONDS, 1),
    timeoutSeconds: numberFrom(env.CRAWLER_TIMEOUT_SECONDS, 10),
    maxRetries: numberFrom(env.CRAWLER_MAX_RETRIES, 2),
    maxRedirects: numberFrom(env.CRAWLER_MAX_REDIRECTS, 5),
    robotsTimeoutSeconds: numberFrom(env.CRAWLER_ROBOTS_TIMEOUT_SECONDS, 5),
    snippetLength: numberFrom(env.CRAWLER_SNIPPET_LENGTH, 500),
    maxResponseBytes: numberFrom(env.CRAWLER_MAX_RESPONSE_BYTES, 10485760),
    outputDir: env.CRAWLER_OUTPUT_DIR ?? "output",
  });

  if (!parsed.success) {
    throw new ConfigError(
      "Invalid environment configuration",
      formatIssues(parsed.error.issues, (path) => {
        const field = AppConfigSchema.keyof().safeParse(path[0]);
        return field.success ? ENV_NAMES[field.data] : path.join(".");
      }),
    );
  }
  return parsed.data;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Crawl Configuration
 * ──────────────────────────────────────────────────────────────────────────── */

export type BackoffStrategy = "fixed" | "exponential";
export type OutputFormat = "json" | "csv" | "both";

/**
 * Validated, immutable settings for one crawl run.
 */
export interface CrawlConfig {
  readonly seedUrl: string;
  readonly maxDepth: number;
  readonly maxPages: number;
  readonly delaySeconds: number;
  readonly timeoutSeconds: number;
  readonly maxRetries: number;
  readonly maxRedirects: number;
  readonly respectRobots: boolean;
  readonly allowExternal: boolean;
  /** A candidate must match at least one; empty accepts everything. */
  readonly urlPatterns: readonly RegExp[];
  /** A candidate matching any of these is dropped. */
  readonly excludePatterns: readonly RegExp[];
  readonly userAgent: string;
  readonly backoff: BackoffStrategy;
  /** Base wait between attempts; doubled per attempt with `exponential`. */
  readonly backoffSeconds: number;
  readonly robotsTimeoutSeconds: number;
  /** Wall-clock limit for the whole crawl. Unlimited when absent. */
  readonly crawlTimeoutSeconds?: number;
  readonly snippetLength: number;
  readonly maxResponseBytes: number;
  readonly outputFormat: OutputFormat;
  readonly outputDir: string;
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

const httpUrl = z.string().refine(isHttpUrl, {
  message: "must be an absolute http(s) URL",
});

export const CrawlConfigInputSchema = z.object({
  seedUrl: httpUrl,
  maxDepth: z.number().int().min(0).optional(),
  maxPages: z.number().int().min(1).optional(),
  delaySeconds: z.number().min(0).optional(),
  timeoutSeconds: z.number().positive().optional(),
  maxRetries: z.number().int().min(0).optional(),
  maxRedirects: z.number().int().min(0).optional(),
  respectRobots: z.boolean().optional(),
  allowExternal: z.boolean().optional(),
  urlPatterns: z.array(z.string()).optional(),
  excludePatterns: z.array(z.string()).optional(),
  userAgent: z.string().min(1).optional(),
  backoff: z.enum(["fixed", "exponential"]).optional(),
  backoffSeconds: z.number().min(0).optional(),
  robotsTimeoutSeconds: z.number().positive().optional(),
  crawlTimeoutSeconds: z.number().positive().optional(),
  snippetLength: z.number().int().min(0).optional(),
  maxResponseBytes: z.number().int().positive().optional(),
  outputFormat: z.enum(["json", "csv", "both"]).optional(),
  outputDir: z.string().min(1).optional(),
});

export type CrawlConfigInput = z.input<typeof CrawlConfigInputSchema>;

function compilePatterns(
  sources: readonly string[],
  field: string,
  issues: string[],
): RegExp[] {
  const compiled: RegExp[] = [];
  sources.forEach((source, index) => {
    try {
      compiled.push(new RegExp(source));
    } catch {
      issues.push(`${field}[${index}]: invalid regular expression "${source}"`);
    }
  });
  return compiled;
}

/**
 * Validate `input` and `defaults`, then merge the first over the second.
 *
 * @throws {ConfigError} Listing every invalid field and pattern. Issues in
 *   `defaults` are prefixed `defaults.`.
 */
export function parseCrawlConfig(
  input: unknown,
  defaultsInput: AppConfig = loadConfig(),
): CrawlConfig {
  const checkedDefaults = AppConfigSchema.safeParse(defaultsInput);
  if (!checkedDefaults.success) {
    throw new ConfigError(
      "Invalid crawl configuration",
      formatIssues(checkedDefaults.error.issues, (path) => ["defaults", ...path].join(".")),
    );
  }
  const defaults = checkedDefaults.data;

  const parsed = CrawlConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid crawl configuration",
      formatIssues(parsed.error.issues, (path) => path.join(".") || "(root)"),
    );
  }

  const value = parsed.data;
  const issues: string[] = [];
  const urlPatterns = compilePatterns(value.urlPatterns ?? [], "urlPatterns", issues);
  const excludePatterns = compilePatterns(
    value.excludePatterns ?? [],
    "excludePatterns",
    issues,
  );
  if (issues.length > 0) {
    throw new ConfigError("Invalid crawl configuration", issues);
  }

  return Object.freeze({
    seedUrl: value.seedUrl,
    maxDepth: value.maxDepth ?? defaults.maxDepth,
    maxPages: value.maxPages ?? defaults.maxPages,
    delaySeconds: value.delaySeconds ?? defaults.delaySeconds,
    timeoutSeconds: value.timeoutSeconds ?? defaults.timeoutSeconds,
    maxRetries: value.maxRetries ?? defaults.maxRetries,
    maxRedirects: value.maxRedirects ?? defaults.maxRedirects,
    respectRobots: value.respectRobots ?? true,
    allowExternal: value.allowExternal ?? false,
    urlPatterns: Object.freeze(urlPatterns),
    excludePatterns: Object.freeze(excludePatterns),
    userAgent: value.userAgent ?? defaults.userAgent,
    backoff: value.backoff ?? "fixed",
    backoffSeconds: value.backoffSeconds ?? 1,
    robotsTimeoutSeconds: value.robotsTimeoutSeconds ?? defaults.robotsTimeoutSeconds,
    crawlTimeoutSeconds: value.crawlTimeoutSeconds,
    snippetLength: value.snippetLength ?? defaults.snippetLength,
    maxResponseBytes: value.maxResponseBytes ?? defaults.maxResponseBytes,
    outputFormat: value.outputFormat ?? "json",
    outputDir: value.outputDir ?? defaults.outputDir,
  });
}
