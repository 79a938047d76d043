/**
 * Consistent JSON response and error handling for API routes.
 */

import type { ApiError, ApiErrorCode } from "./error-types";

const HTTP_STATUS: Record<ApiErrorCode, number> = {
  validation_failed: 400,
  invalid_credentials: 401,
  not_authenticated: 403,
  permission_denied: 403,
  not_found: 404,
  conflict: 409,
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

export function noContent(): Response {
  return new Response(null, { status: 204 });
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
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "Content-Type": "application/json",
    },
  });
}

export function validationError(
  message: string,
  details?: Record<string, string[]>
): Response {
  return errorResponse("validation_failed", message, details);
}

export function notAuthenticatedError(
  message = "Authentication credentials were not provided"
): Response {
  return errorResponse("not_authenticated", message);
}

export function invalidCredentialsError(
  message = "Invalid username or password"
): Response {
  return errorResponse("invalid_credentials", message);
}

export function permissionDeniedError(
  message = "You do not have permission to perform this action"
): Response {
  return errorResponse("permission_denied", message);
}

export function notFoundError(message = "Resource not found"): Response {
  return errorResponse("not_found", message);
}

export function conflictError(
  message: string,
  details?: Record<string, string[]>
): Response {
  return errorResponse("conflict", message, details);
}

export function internalError(
  message = "An unexpected error occurred"
): Response {
  return errorResponse("internal_error", message);
}

/** Parse a JSON body; null when the body is missing or malformed. */
export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}
