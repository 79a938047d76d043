/**
 * Error codes carried in the `error` field of every non-2xx JSON body.
 */

export const API_ERROR_CODES = [
  "validation_failed",
  "invalid_credentials",
  "not_authenticated",
  "permission_denied",
  "not_found",
  "conflict",
  "internal_error",
] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];

export interface ApiError {
  error: ApiErrorCode;
  message: string;
  /** Per-field messages for validation_failed and conflict. */
  details?: Record<string, string[]>;
}

function isApiErrorCode(value: unknown): value is ApiErrorCode {
  return API_ERROR_CODES.some((code) => code === value);
}

/** Narrows a parsed response body; used by the forms to show field errors. */
export function isApiError(value: unknown): value is ApiError {
  if (typeof value !== "object" || value === null) return false;
  return "error" in value && isApiErrorCode(value.error) && "message" in value && typeof value.message === "string";
}
