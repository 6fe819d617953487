import type { FunctionSummary } from "../../analysis/traverseCalls.js";

/**
 * Format the function listing, one line per node.
 *
 * Output format:
 * ```
 * functions[3]:
 *   main (defined) callers: 0, callees: 2
 *   main_loop (defined) callers: 1, callees: 0
 *   printf (external) callers: 1, callees: 0
 * ```
 */
export function formatFunctionList(
  functions: readonly FunctionSummary[],
): string {
  if (functions.length === 0) {
    return "functions[0]:\n\n(graph is empty, run analyze_codebase first)";
  }

  const lines = [`functions[${functions.length}]:`];
  for (const fn of functions) {
    const kind = fn.defined ? "defined" : "external";
    lines.push(
      `  ${fn.name} (${kind}) callers: ${fn.callerCount}, callees: ${fn.calleeCount}`,
    );
  }
  return lines.join("\n");
}
