#!/usr/bin/env node
/**
 * @module index
 * @fileoverview breadth-crawler MCP server entry point.
 *
 * Creates an {@link McpServer}, registers the `crawl` tool and serves it over
 * stdio. Log lines go to stderr; stdout carries the JSON-RPC stream only.
 *
 * ## Architecture
 * ```
 * MCP Client
 *   |
 *   | stdio (JSON-RPC over stdin/stdout)
 *   v
 * index.ts (this file) -- McpServer
 *   |
 *   +-- crawl --> tools/crawl.ts --> crawler/engine.ts
 * ```
 *
 * Defaults for omitted tool parameters come from the `CRAWLER_*`
 * environment variables, see {@link loadConfig}. Set `CRAWLER_VERBOSE=1`
 * for debug logging.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { CrawlSchema, createCrawlHandler } from "./tools/crawl.js";
import { formatError } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";
import { VERSION } from "./version.js";

const logger = createLogger({
  scope: "breadth-crawler-mcp",
  verbose: process.env.CRAWLER_VERBOSE === "1",
});

const server = new McpServer(
  {
    name: "breadth-crawler",
    version: VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

async function main() {
  // Invalid CRAWLER_* values reject here and reach the handler below.
  const defaults = loadConfig();

  server.tool(
    "crawl",
    "Breadth-first crawl from a seed URL. Follows links up to a depth and page budget, paces requests per host and honours robots.txt. Returns a Markdown summary and one JSON record per processed page.",
    CrawlSchema,
    createCrawlHandler({ defaults, logger }),
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`Serving on stdio (v${VERSION})`);
}

main().catch((error: unknown) => {
  logger.error(`Server error: ${formatError(error)}`);
  process.exit(1);
});
