/**
 * Format the notice for a function absent from the graph, with similar
 * names when there are any.
 *
 * @example
 * formatNotFound("mainloop", ["main_loop"]);
 * // "Function 'mainloop' not found in graph.\n\nDid you mean: main_loop?"
 */
export function formatNotFound(
  functionName: string,
  suggestions: readonly string[] = [],
): string {
  let msg = `Function '${functionName}' not found in graph.`;
  if (suggestions.length > 0) {
    msg += `\n\nDid you mean: ${suggestions.join(", ")}?`;
  }
  return msg;
}

/**
 * Format a thrown error as the text of an `isError` tool result.
 */
export function formatToolError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `Error: ${message}`;
}
