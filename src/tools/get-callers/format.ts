/**
 * Format the direct callers of a function.
 *
 * @example
 * formatCallers("db_connect", ["log_transaction", "update_balance"]);
 * // "Function 'db_connect' is called by: log_transaction, update_balance"
 */
export function formatCallers(
  functionName: string,
  callers: readonly string[],
): string {
  if (callers.length === 0) {
    return `Function '${functionName}' is not called by any other function.`;
  }
  return `Function '${functionName}' is called by: ${callers.join(", ")}`;
}
