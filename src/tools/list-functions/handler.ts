import type { QueryService } from "../../service/createQueryService.js";
import { formatFunctionList } from "./format.js";

/**
 * MCP tool definition for list_functions.
 */
export const listFunctionsDefinition = {
  name: "list_functions",
  description:
    "List every function in the call graph, defined or only called, with its number of direct callers and callees.",
};

export function executeListFunctions(service: QueryService): string {
  return formatFunctionList(service.listFunctions());
}
