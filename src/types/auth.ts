import type { AuthErrorCode } from "@/lib/utils/error-messages";
import type { UserRole } from "./user";

/**
 * Outcome of an authentication operation. Expected failures are returned,
 * never thrown.
 */
export type AuthResult<T = undefined> =
  | { ok: true; message: string; data: T }
  | { ok: false; error: string; errorCode: AuthErrorCode };

export interface LoginData {
  userId: number;
  role: UserRole;
  sessionToken: string;
}

export type LoginResult = AuthResult<LoginData>;

export type LogoutResult = AuthResult;

export type SessionInvalidReason = "INVALID_OR_EXPIRED" | "EXPIRED";

export type SessionVerification =
  | { valid: true; userId: number; role: UserRole; message: string }
  | { valid: false; reason: SessionInvalidReason; message: string };

export interface SessionOwner {
  userId: number;
  username: string;
  role: UserRole;
}
