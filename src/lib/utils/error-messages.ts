/**
 * Error codes returned by the session authenticator
 */
export const AUTH_ERROR_CODES = {
  INVALID_INPUT: "INVALID_INPUT",
  NOT_CONFIGURED: "NOT_CONFIGURED",
  INVALID_CREDENTIALS: "INVALID_CREDENTIALS",
  ACCOUNT_INACTIVE: "ACCOUNT_INACTIVE",
  INVALID_SESSION: "INVALID_SESSION",
  EXPIRED: "EXPIRED",
  INVALID_OR_EXPIRED: "INVALID_OR_EXPIRED",
} as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[keyof typeof AUTH_ERROR_CODES];

/**
 * Caller-facing messages. Unknown usernames and wrong passwords share one
 * message so that responses do not reveal which usernames exist.
 */
export const AUTH_MESSAGES = {
  CREDENTIALS_REQUIRED: "Username and password are required",
  LOOKUP_NOT_CONFIGURED: "User database not configured",
  INVALID_CREDENTIALS: "Invalid username or password",
  ACCOUNT_INACTIVE: "User account is inactive",
  LOGOUT_SUCCESS: "Logout successful",
  INVALID_SESSION_TOKEN: "Invalid session token",
  SESSION_VALID: "Session is valid",
  SESSION_EXPIRED: "Session expired",
  SESSION_INVALID_OR_EXPIRED: "Invalid or expired session",
} as const;

export function loginSuccessMessage(role: string): string {
  return `Login successful for ${role}`;
}
