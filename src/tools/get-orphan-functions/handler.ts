import type { QueryService } from "../../service/createQueryService.js";
import { formatOrphans } from "./format.js";

/**
 * MCP tool definition for get_orphan_functions.
 */
export const getOrphanFunctionsDefinition = {
  name: "get_orphan_functions",
  description:
    "List functions defined in the analyzed code that no analyzed function calls. Entry points such as main appear here too.",
};

export function executeGetOrphanFunctions(service: QueryService): string {
  return formatOrphans(service.getOrphanFunctions());
}
