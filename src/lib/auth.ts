import { z } from "zod";
import {
  type Clock,
  DEFAULT_IDLE_TIMEOUT_MS,
  type SessionEntry,
  type SessionStore,
  systemClock,
} from "@/lib/auth-session-store";
import { MemorySessionStore } from "@/lib/auth-session-store/memory-session-store";
import { logger, toLogError } from "@/lib/logger";
import { deriveSessionToken, verifyPasswordHash } from "@/lib/security/digest";
import {
  AUTH_ERROR_CODES,
  AUTH_MESSAGES,
  loginSuccessMessage,
} from "@/lib/utils/error-messages";
import type {
  LoginResult,
  LogoutResult,
  SessionOwner,
  SessionVerification,
} from "@/types/auth";
import type { UserCredentialRecord, UserLookup } from "@/types/user";

export interface SessionAuthenticatorOptions {
  userLookup?: UserLookup | null;
  store?: SessionStore;
  clock?: Clock;
  /** Sliding idle window; defaults to 30 minutes */
  idleTimeoutMs?: number;
}

const LoginCredentialsSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

function tokenPreview(token: string): string {
  return `${token.slice(0, 8)}…`;
}

/**
 * Issues and tracks login sessions for library accounts.
 *
 * Sessions live only in the injected store. Expiry is measured from the last
 * successful verification, not from login, and is detected lazily: by
 * `verifySession`, or by `purgeExpiredSessions` when a sweeper drives it.
 */
export class SessionAuthenticator {
  private userLookup: UserLookup | null;
  private readonly store: SessionStore;
  private readonly clock: Clock;
  readonly idleTimeoutMs: number;

  constructor(options: SessionAuthenticatorOptions = {}) {
    const idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    if (!Number.isFinite(idleTimeoutMs) || idleTimeoutMs <= 0) {
      throw new Error(`Invalid session idle timeout: ${idleTimeoutMs}`);
    }

    this.userLookup = options.userLookup ?? null;
    this.store = options.store ?? new MemorySessionStore();
    this.clock = options.clock ?? systemClock;
    this.idleTimeoutMs = idleTimeoutMs;
  }

  setUserLookup(userLookup: UserLookup | null): void {
    this.userLookup = userLookup;
  }

  get activeSessionCount(): number {
    return this.store.size;
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const parsed = LoginCredentialsSchema.safeParse({ username, password });
    if (!parsed.success) {
      return {
        ok: false,
        error: AUTH_MESSAGES.CREDENTIALS_REQUIRED,
        errorCode: AUTH_ERROR_CODES.INVALID_INPUT,
      };
    }

    const lookup = this.userLookup;
    if (!lookup) {
      logger.error("[SessionAuthenticator] Login attempted without a user lookup");
      return {
        ok: false,
        error: AUTH_MESSAGES.LOOKUP_NOT_CONFIGURED,
        errorCode: AUTH_ERROR_CODES.NOT_CONFIGURED,
      };
    }

    let user: UserCredentialRecord | null;
    try {
      user = await lookup.findUserByUsername(parsed.data.username);
    } catch (error) {
      logger.error("[SessionAuthenticator] User lookup failed", {
        username: parsed.data.username,
        error: toLogError(error),
      });
      throw error;
    }

    if (!user || !verifyPasswordHash(parsed.data.password, user.passwordHash)) {
      logger.warn("[SessionAuthenticator] Rejected credentials", {
        username: parsed.data.username,
      });
      return {
        ok: false,
        error: AUTH_MESSAGES.INVALID_CREDENTIALS,
        errorCode: AUTH_ERROR_CODES.INVALID_CREDENTIALS,
      };
    }

    if (user.status !== "active") {
      logger.warn("[SessionAuthenticator] Login refused for inactive account", {
        userId: user.id,
      });
      return {
        ok: false,
        error: AUTH_MESSAGES.ACCOUNT_INACTIVE,
        errorCode: AUTH_ERROR_CODES.ACCOUNT_INACTIVE,
      };
    }

    // No await between token selection and insert
    const sessionToken = this.issueToken(user.id);
    const now = this.clock.now();
    this.store.insert(sessionToken, {
      userId: user.id,
      username: parsed.data.username,
      role: user.role,
      createdAt: now,
      lastActivityAt: now,
    });

    logger.info("[SessionAuthenticator] Session created", {
      userId: user.id,
      role: user.role,
      token: tokenPreview(sessionToken),
    });

    return {
      ok: true,
      message: loginSuccessMessage(user.role),
      data: { userId: user.id, role: user.role, sessionToken },
    };
  }

  logout(sessionToken: string): LogoutResult {
    if (!this.store.revoke(sessionToken)) {
      return {
        ok: false,
        error: AUTH_MESSAGES.INVALID_SESSION_TOKEN,
        errorCode: AUTH_ERROR_CODES.INVALID_SESSION,
      };
    }

    logger.info("[SessionAuthenticator] Session ended", { token: tokenPreview(sessionToken) });
    return { ok: true, message: AUTH_MESSAGES.LOGOUT_SUCCESS, data: undefined };
  }

  /**
   * Checks a token and, when it is still inside the idle window, slides the
   * window forward. An expired token is evicted on the spot.
   */
  verifySession(sessionToken: string): SessionVerification {
    const session = this.store.read(sessionToken);
    if (!session) {
      return {
        valid: false,
        reason: AUTH_ERROR_CODES.INVALID_OR_EXPIRED,
        message: AUTH_MESSAGES.SESSION_INVALID_OR_EXPIRED,
      };
    }

    const now = this.clock.now();
    if (this.isIdleExpired(session, now)) {
      this.store.revoke(sessionToken);
      logger.debug("[SessionAuthenticator] Session expired", {
        userId: session.userId,
        token: tokenPreview(sessionToken),
      });
      return {
        valid: false,
        reason: AUTH_ERROR_CODES.EXPIRED,
        message: AUTH_MESSAGES.SESSION_EXPIRED,
      };
    }

    this.store.touch(sessionToken, now);

    return {
      valid: true,
      userId: session.userId,
      role: session.role,
      message: AUTH_MESSAGES.SESSION_VALID,
    };
  }

  /**
   * Who holds this token, as recorded at login. Performs no expiry check and
   * does not count as activity; call `verifySession` first when freshness
   * matters.
   */
  getSessionOwner(sessionToken: string): SessionOwner | null {
    const session = this.store.read(sessionToken);
    if (!session) return null;

    return {
      userId: session.userId,
      username: session.username,
      role: session.role,
    };
  }

  purgeExpiredSessions(): number {
    const now = this.clock.now();
    return this.store.revokeWhere((session) => this.isIdleExpired(session, now));
  }

  /**
   * Ends every session of one user, e.g. after the account is deactivated.
   */
  revokeUserSessions(userId: number): number {
    const removed = this.store.revokeWhere((session) => session.userId === userId);
    if (removed > 0) {
      logger.info("[SessionAuthenticator] Revoked user sessions", { userId, removed });
    }
    return removed;
  }

  private isIdleExpired(session: SessionEntry, now: number): boolean {
    return now - session.lastActivityAt > this.idleTimeoutMs;
  }

  private issueToken(userId: number): string {
    const timestamp = `${this.clock.now()}.${process.hrtime.bigint()}`;

    for (let attempt = 0; ; attempt++) {
      const token = deriveSessionToken(userId, timestamp, attempt);
      if (!this.store.has(token)) {
        return token;
      }
      logger.warn("[SessionAuthenticator] Session token collision, retrying", { userId, attempt });
    }
  }
}
