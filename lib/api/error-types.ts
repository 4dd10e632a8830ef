/**
 * API error categories for consistent HTTP status mapping.
 */

export type ApiErrorCode =
  | "validation_failed"
  | "invalid_credentials"
  | "forbidden"
  | "not_found"
  | "duplicate_email"
  | "invalid_transition"
  | "internal_error";

export interface ApiError {
  error: ApiErrorCode;
  message: string;
  details?: Record<string, string[]>;
}

/**
 * Outcome of a domain operation. Expected failures are values;
 * unexpected persistence failures are thrown.
 */
export type OperationResult<T> =
  | ({ success: true } & T)
  | { success: false; error: ApiErrorCode; message: string };

export function failure(
  error: ApiErrorCode,
  message: string
): { success: false; error: ApiErrorCode; message: string } {
  return { success: false, error, message };
}
