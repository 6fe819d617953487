import { z } from "zod";
import type { QueryService } from "../../service/createQueryService.js";
import { formatAnalysis } from "./format.js";

/**
 * Input parameters for analyze_codebase tool.
 */
export interface AnalyzeCodebaseParams {
  code_content: string;
}

/**
 * MCP tool definition for analyze_codebase.
 */
export const analyzeCodebaseDefinition = {
  name: "analyze_codebase",
  description:
    "Parse C++ source and build the call graph that the other tools query. Replaces any previously analyzed code. Pass several files concatenated into one string to analyze them together.",
  inputSchema: {
    code_content: z.string().describe("C++ source code to analyze"),
  },
};

/**
 * Execute the analyze_codebase tool.
 *
 * @throws ParseUnavailableError if the C++ parser cannot be loaded
 * @throws InvalidArgumentError if the source exceeds the size limit
 */
export function executeAnalyzeCodebase(
  service: QueryService,
  params: AnalyzeCodebaseParams,
): string {
  return formatAnalysis(service.analyzeCodebase(params.code_content));
}
