import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { QueryService } from "../service/createQueryService.js";
import { createMcpServer } from "./createMcpServer.js";

/**
 * Start the MCP server that exposes the call graph as tools, on stdio.
 *
 * @param service - Query service owning the current graph
 * @param name - Server name announced to clients
 */
export async function startMcpServer(
  service: QueryService,
  name: string,
): Promise<void> {
  const server = createMcpServer(service, { name });
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
