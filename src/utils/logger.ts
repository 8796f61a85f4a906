/**
 * @module utils/logger
 * @fileoverview Scoped stderr logger passed explicitly to every component.
 *
 * All output goes through `console.error`: stdout belongs to the MCP stdio
 * transport (and to piped CLI output), so log lines must never land there.
 *
 * ```
 * [engine] [3/100] depth=1 http://a.test/x - Page X
 * [robots] No robots.txt at http://a.test/robots.txt (HTTP 404), allowing all
 * ```
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Derive a logger that prefixes lines with `scope` instead. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Prefix shown in brackets on every line. */
  scope: string;
  /** When false, `debug` lines are dropped. @default false */
  verbose?: boolean;
}

/**
 * Create a logger writing `[scope] message` lines to stderr.
 *
 * @example
 * ```ts
 * const logger = createLogger({ scope: "crawler", verbose: true });
 * logger.child("fetch").debug("GET http://a.test/ (attempt 1)");
 * // stderr: [fetch] GET http://a.test/ (attempt 1)
 * ```
 */
export function createLogger(options: LoggerOptions): Logger {
  const verbose = options.verbose ?? false;
  const prefix = `[${options.scope}]`;

  return {
    debug(message) {
      if (verbose) {
        console.error(`${prefix} ${message}`);
      }
    },
    info(message) {
      console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.error(`${prefix} WARN ${message}`);
    },
    error(message) {
      console.error(`${prefix} ERROR ${message}`);
    },
    child(scope) {
      return createLogger({ scope, verbose });
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
