import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFakeExtractor } from "../ingestion/extract/createFakeExtractor.js";
import { silentLogger } from "../logging/SilentCallGraphLogger.js";
import {
  createQueryService,
  type QueryService,
} from "../service/createQueryService.js";
import { createMcpServer } from "./createMcpServer.js";

interface ToolText {
  text: string;
  isError: boolean;
}

const toToolText = (result: unknown): ToolText => {
  if (typeof result !== "object" || result === null || !("content" in result)) {
    throw new Error("Tool result has no content");
  }
  const content: unknown = result.content;
  const first: unknown = Array.isArray(content) ? content[0] : undefined;
  if (
    typeof first !== "object" ||
    first === null ||
    !("text" in first) ||
    typeof first.text !== "string"
  ) {
    throw new Error("Tool result has no text content");
  }
  const isError = "isError" in result && result.isError === true;
  return { text: first.text, isError };
};

describe(createMcpServer.name, () => {
  let service: QueryService;
  let server: McpServer;
  let client: Client;

  const callTool = async (
    name: string,
    args: Record<string, unknown> = {},
  ): Promise<ToolText> =>
    toToolText(await client.callTool({ name, arguments: args }));

  beforeEach(async () => {
    service = createQueryService({
      extractor: createFakeExtractor(),
      logger: silentLogger,
      maxSourceBytes: 1024,
    });
    server = createMcpServer(service, { name: "call-graph-test" });
    client = new Client({ name: "test-client", version: "0.0.0" });

    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    service.close();
  });

  it("lists the call-graph tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "analyze_codebase",
      "detect_cycles",
      "get_callees",
      "get_callers",
      "get_orphan_functions",
      "list_functions",
    ]);
  });

  it("announces the configured server name", () => {
    expect(client.getServerVersion()?.name).toBe("call-graph-test");
  });

  it("analyzes source and answers queries", async () => {
    const analysis = await callTool("analyze_codebase", {
      code_content: "main: main_loop, printf\nmain_loop: main_loop, process\nprocess:",
    });
    expect(analysis).toEqual({
      text: "Successfully analyzed codebase. Graph built with 4 functions.\ndefined: 3, calls: 4",
      isError: false,
    });

    expect((await callTool("get_callers", { function_name: "process" })).text).toBe(
      "Function 'process' is called by: main_loop",
    );
    expect((await callTool("get_callees", { function_name: "main" })).text).toBe(
      "Function 'main' calls: main_loop, printf",
    );
    expect((await callTool("detect_cycles")).text).toBe(
      "Circular dependencies detected:\n- main_loop -> main_loop",
    );
    expect((await callTool("get_orphan_functions")).text).toBe(
      "Orphan functions (never called): main",
    );
    expect((await callTool("list_functions")).text).toBe(
      [
        "functions[4]:",
        "  main (defined) callers: 0, callees: 2",
        "  main_loop (defined) callers: 2, callees: 2",
        "  printf (external) callers: 1, callees: 0",
        "  process (defined) callers: 1, callees: 0",
      ].join("\n"),
    );
  });

  it("answers an unknown function with suggestions, not an error", async () => {
    await callTool("analyze_codebase", { code_content: "main_loop:" });

    expect(await callTool("get_callers", { function_name: "mainloop" })).toEqual({
      text: "Function 'mainloop' not found in graph.\n\nDid you mean: main_loop?",
      isError: false,
    });
  });

  it("reports invalid arguments as tool errors and keeps serving", async () => {
    expect(await callTool("get_callees", { function_name: "   " })).toEqual({
      text: "Error: function_name must not be empty",
      isError: true,
    });
    expect(
      await callTool("analyze_codebase", { code_content: "x".repeat(2000) }),
    ).toEqual({
      text: "Error: code_content is 2000 bytes, limit is 1024",
      isError: true,
    });
    expect((await callTool("detect_cycles")).text).toBe(
      "No circular dependencies detected.",
    );
  });
});

describe("createMcpServer with an unavailable parser", () => {
  it("reports the parser failure as a tool error", async () => {
    const service = createQueryService({
      extractor: createFakeExtractor({ unavailable: "tree-sitter-cpp not installed" }),
      logger: silentLogger,
    });
    const server = createMcpServer(service, { name: "call-graph-test" });
    const client = new Client({ name: "test-client", version: "0.0.0" });
    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    const result = toToolText(
      await client.callTool({
        name: "analyze_codebase",
        arguments: { code_content: "f: g" },
      }),
    );

    expect(result).toEqual({
      text: "Error: tree-sitter-cpp not installed",
      isError: true,
    });

    await client.close();
    await server.close();
    service.close();
  });
});
