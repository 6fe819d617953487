import type { Cycle } from "../../analysis/detectCycles.js";

/**
 * Format detected cycles as a bullet list of call paths.
 *
 * @example
 * formatCycles([["a", "b", "a"], ["x", "x"]]);
 * // "Circular dependencies detected:\n- a -> b -> a\n- x -> x"
 */
export function formatCycles(cycles: readonly Cycle[]): string {
  if (cycles.length === 0) {
    return "No circular dependencies detected.";
  }
  const bullets = cycles.map((cycle) => `- ${cycle.join(" -> ")}`);
  return ["Circular dependencies detected:", ...bullets].join("\n");
}
