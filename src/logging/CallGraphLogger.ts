/**
 * Logging interface for the call-graph server.
 *
 * All output goes to stderr: stdout carries the MCP stdio stream.
 *
 * @example
 * ```typescript
 * logger.success("Graph built with 8 functions");
 * logger.warn("Skipped 2 malformed regions");
 * ```
 */
export interface CallGraphLogger {
  /**
   * Log a success message (green ✓).
   */
  success(message: string): void;

  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;

  /**
   * Log an error message (red ✗).
   */
  error(message: string): void;
}
