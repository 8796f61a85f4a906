/** Package version, reported by `--version` and the MCP server handshake. */
export const VERSION = "1.0.0";
