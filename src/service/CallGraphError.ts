/**
 * Error kinds surfaced by the query service.
 *
 * "no such function" is not an error: queries for absent names return empty
 * results, see `QueryService.lookupFunction` for the informational notice.
 */
export type CallGraphErrorKind = "ParseUnavailable" | "InvalidArgument";

export abstract class CallGraphError extends Error {
  abstract readonly kind: CallGraphErrorKind;
}

/**
 * The source extractor could not run at all (grammar or parser missing).
 * Finding zero functions is not this error.
 */
export class ParseUnavailableError extends CallGraphError {
  readonly kind = "ParseUnavailable";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParseUnavailableError";
  }
}

/**
 * A request argument is empty or malformed.
 */
export class InvalidArgumentError extends CallGraphError {
  readonly kind = "InvalidArgument";

  constructor(
    message: string,
    readonly argument: string,
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export const isCallGraphError = (error: unknown): error is CallGraphError =>
  error instanceof CallGraphError;
