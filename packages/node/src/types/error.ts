/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes produced by the HTTP layer itself. Domain error codes pass
 * through unchanged.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "CLAIM_VALIDATION_FAILED"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Request errors
// =============================================================================

/**
 * Thrown by request parsing and access checks; the error handler turns
 * it into the matching 4xx envelope.
 */
export class RequestError extends Error {
  public readonly code: ApiErrorCode;
  public readonly status: 400 | 401 | 403 | 404;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ApiErrorCode,
    status: 400 | 401 | 403 | 404,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RequestError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}
