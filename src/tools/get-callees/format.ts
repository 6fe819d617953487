/**
 * Format the direct callees of a function.
 */
export function formatCallees(
  functionName: string,
  callees: readonly string[],
): string {
  if (callees.length === 0) {
    return `Function '${functionName}' does not call any other functions.`;
  }
  return `Function '${functionName}' calls: ${callees.join(", ")}`;
}
