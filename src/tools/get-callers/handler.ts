import { z } from "zod";
import type { QueryService } from "../../service/createQueryService.js";
import { formatNotFound } from "../shared/errorFormatters.js";
import { formatCallers } from "./format.js";

/**
 * Input parameters for get_callers tool.
 */
export interface GetCallersParams {
  function_name: string;
}

/**
 * MCP tool definition for get_callers.
 */
export const getCallersDefinition = {
  name: "get_callers",
  description:
    "Find the functions that directly call the target function (one hop). Run analyze_codebase first.",
  inputSchema: {
    function_name: z
      .string()
      .describe(
        "Function name as written in the source (e.g., 'db_connect', 'Account::deposit')",
      ),
  },
};

/**
 * Execute the get_callers tool.
 *
 * @returns Formatted string for LLM consumption
 * @throws InvalidArgumentError for an empty or malformed function name
 */
export function executeGetCallers(
  service: QueryService,
  params: GetCallersParams,
): string {
  const lookup = service.lookupFunction(params.function_name);
  const name = params.function_name.trim();

  if (lookup.status === "not_found") {
    return formatNotFound(name, lookup.suggestions);
  }

  return formatCallers(name, service.getCallers(name));
}
