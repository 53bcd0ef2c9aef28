/**
 * Deterministic error codes for caller contract violations.
 * These are surfaced as FlexUiError instances.
 *
 * Layout itself never throws; only the mutating container operations do.
 */
export type FlexUiErrorCode = "FLEX_INVALID_PROPS" | "FLEX_INVALID_CONSUMERS";

/**
 * Error class for all deterministic contract violations.
 * The `code` property identifies the specific violation.
 */
export class FlexUiError extends Error {
  override readonly name = "FlexUiError";
  readonly code: FlexUiErrorCode;

  constructor(code: FlexUiErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FlexUiError);
    }
  }
}

export function isFlexUiError(value: unknown): value is FlexUiError {
  return value instanceof FlexUiError;
}
