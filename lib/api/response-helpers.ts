/**
 * Consistent JSON response and error handling for API routes.
 */

import type { ApiError, ApiErrorCode } from "./error-types";

const HTTP_STATUS: Record<ApiErrorCode, number> = {
  validation_failed: 400,
  invalid_credentials: 401,
  forbidden: 403,
  not_found: 404,
  duplicate_email: 409,
  invalid_transition: 409,
  internal_error: 500,
};

export function json<T>(data: T, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export function errorResponse(
  error: ApiErrorCode,
  message: string,
  details?: Record<string, string[]>
): Response {
  const status = HTTP_STATUS[error];
  const body: ApiError = {
    error,
    message,
    ...(details && { details }),
  };
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (status === 401) headers["WWW-Authenticate"] = "Bearer";
  return new Response(JSON.stringify(body), { status, headers });
}

export function validationError(
  message: string,
  details?: Record<string, string[]>
): Response {
  return errorResponse("validation_failed", message, details);
}

export function unauthenticatedError(
  message = "Missing or invalid bearer token"
): Response {
  return errorResponse("invalid_credentials", message);
}

export function internalError(
  message = "An unexpected error occurred"
): Response {
  return errorResponse("internal_error", message);
}

/** Response for the failure branch of an OperationResult. */
export function failureResponse(result: {
  error: ApiErrorCode;
  message: string;
}): Response {
  return errorResponse(result.error, result.message);
}
