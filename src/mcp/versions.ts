/**
 * Server version announced to MCP clients. Keep in sync with package.json.
 */
export const SERVER_VERSION = "0.1.0";
