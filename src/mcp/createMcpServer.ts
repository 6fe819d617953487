import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { QueryService } from "../service/createQueryService.js";
import {
  analyzeCodebaseDefinition,
  executeAnalyzeCodebase,
} from "../tools/analyze-codebase/handler.js";
import {
  detectCyclesDefinition,
  executeDetectCycles,
} from "../tools/detect-cycles/handler.js";
import {
  executeGetCallees,
  getCalleesDefinition,
} from "../tools/get-callees/handler.js";
import {
  executeGetCallers,
  getCallersDefinition,
} from "../tools/get-callers/handler.js";
import {
  executeGetOrphanFunctions,
  getOrphanFunctionsDefinition,
} from "../tools/get-orphan-functions/handler.js";
import {
  executeListFunctions,
  listFunctionsDefinition,
} from "../tools/list-functions/handler.js";
import { formatToolError } from "../tools/shared/errorFormatters.js";
import { SERVER_VERSION } from "./versions.js";

/**
 * Run a tool and wrap its text, turning thrown errors into `isError`
 * results so the server keeps serving.
 */
const runTool = (execute: () => string): CallToolResult => {
  try {
    return { content: [{ type: "text", text: execute() }] };
  } catch (error) {
    return {
      content: [{ type: "text", text: formatToolError(error) }],
      isError: true,
    };
  }
};

/**
 * Create the MCP server exposing the call-graph tools over `service`.
 * The caller connects it to a transport.
 */
export function createMcpServer(
  service: QueryService,
  options: { name: string },
): McpServer {
  const server = new McpServer({
    name: options.name,
    version: SERVER_VERSION,
  });

  server.registerTool(
    analyzeCodebaseDefinition.name,
    {
      description: analyzeCodebaseDefinition.description,
      inputSchema: analyzeCodebaseDefinition.inputSchema,
    },
    ({ code_content }) =>
      runTool(() => executeAnalyzeCodebase(service, { code_content })),
  );

  server.registerTool(
    getCallersDefinition.name,
    {
      description: getCallersDefinition.description,
      inputSchema: getCallersDefinition.inputSchema,
    },
    ({ function_name }) =>
      runTool(() => executeGetCallers(service, { function_name })),
  );

  server.registerTool(
    getCalleesDefinition.name,
    {
      description: getCalleesDefinition.description,
      inputSchema: getCalleesDefinition.inputSchema,
    },
    ({ function_name }) =>
      runTool(() => executeGetCallees(service, { function_name })),
  );

  server.registerTool(
    detectCyclesDefinition.name,
    { description: detectCyclesDefinition.description },
    () => runTool(() => executeDetectCycles(service)),
  );

  server.registerTool(
    getOrphanFunctionsDefinition.name,
    { description: getOrphanFunctionsDefinition.description },
    () => runTool(() => executeGetOrphanFunctions(service)),
  );

  server.registerTool(
    listFunctionsDefinition.name,
    { description: listFunctionsDefinition.description },
    () => runTool(() => executeListFunctions(service)),
  );

  return server;
}
