import type { CallGraphLogger } from "./CallGraphLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: CallGraphLogger = {
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
