export type AccountErrorCode = "duplicate_username" | "user_not_found" | "profile_exists";

export class AccountError extends Error {
  constructor(
    readonly code: AccountErrorCode,
    message: string
  ) {
    super(message);
    this.name = "AccountError";
  }
}

export function isAccountError(value: unknown, code?: AccountErrorCode): value is AccountError {
  return value instanceof AccountError && (code === undefined || value.code === code);
}
