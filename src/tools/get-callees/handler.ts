import { z } from "zod";
import type { QueryService } from "../../service/createQueryService.js";
import { formatNotFound } from "../shared/errorFormatters.js";
import { formatCallees } from "./format.js";

/**
 * Input parameters for get_callees tool.
 */
export interface GetCalleesParams {
  function_name: string;
}

/**
 * MCP tool definition for get_callees.
 */
export const getCalleesDefinition = {
  name: "get_callees",
  description:
    "Find the functions the target function calls directly (one hop), including library calls without a definition in the analyzed code.",
  inputSchema: {
    function_name: z
      .string()
      .describe("Function name as written in the source (e.g., 'main_loop')"),
  },
};

/**
 * Execute the get_callees tool.
 *
 * @throws InvalidArgumentError for an empty or malformed function name
 */
export function executeGetCallees(
  service: QueryService,
  params: GetCalleesParams,
): string {
  const lookup = service.lookupFunction(params.function_name);
  const name = params.function_name.trim();

  if (lookup.status === "not_found") {
    return formatNotFound(name, lookup.suggestions);
  }

  return formatCallees(name, service.getCallees(name));
}
