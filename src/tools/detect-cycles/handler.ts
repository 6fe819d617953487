import type { QueryService } from "../../service/createQueryService.js";
import { formatCycles } from "./format.js";

/**
 * MCP tool definition for detect_cycles.
 */
export const detectCyclesDefinition = {
  name: "detect_cycles",
  description:
    "Detect circular call dependencies, including functions that call themselves. Reports one representative cycle per group of mutually recursive functions.",
};

export function executeDetectCycles(service: QueryService): string {
  return formatCycles(service.detectCycles());
}
