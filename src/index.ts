import { SessionAuthenticator } from "@/lib/auth";
import type { Clock, SessionStore } from "@/lib/auth-session-store";
import { SessionSweeper } from "@/lib/auth-session-store/session-sweeper";
import { getEnvConfig } from "@/lib/config/env.schema";
import { logger } from "@/lib/logger";
import { runMigrations } from "@/lib/migrate";
import { userRepositoryLookup } from "@/repository/user";
import type { UserLookup } from "@/types/user";

export interface LibraryAuthenticatorOptions {
  /** Defaults to the database-backed user repository */
  userLookup?: UserLookup | null;
  store?: SessionStore;
  clock?: Clock;
}

export interface LibraryAuthenticator {
  authenticator: SessionAuthenticator;
  /** Null when SESSION_SWEEP_INTERVAL_SECONDS is 0 */
  sweeper: SessionSweeper | null;
  shutdown(): void;
}

/**
 * Builds a session authenticator from the environment and starts the idle
 * session sweeper when one is configured.
 */
export function createLibraryAuthenticator(
  options: LibraryAuthenticatorOptions = {}
): LibraryAuthenticator {
  const env = getEnvConfig();

  const authenticator = new SessionAuthenticator({
    userLookup: options.userLookup === undefined ? userRepositoryLookup : options.userLookup,
    store: options.store,
    clock: options.clock,
    idleTimeoutMs: env.SESSION_IDLE_TIMEOUT_MINUTES * 60 * 1000,
  });

  let sweeper: SessionSweeper | null = null;
  if (env.SESSION_SWEEP_INTERVAL_SECONDS > 0) {
    sweeper = new SessionSweeper(authenticator, {
      intervalMs: env.SESSION_SWEEP_INTERVAL_SECONDS * 1000,
    });
    sweeper.start();
  }

  logger.info("[LibraryDesk] Authenticator ready", {
    idleTimeoutMinutes: env.SESSION_IDLE_TIMEOUT_MINUTES,
    sweepIntervalSeconds: env.SESSION_SWEEP_INTERVAL_SECONDS,
  });

  return {
    authenticator,
    sweeper,
    shutdown: () => sweeper?.stop(),
  };
}

/**
 * Brings the database schema up to date (unless AUTO_MIGRATE is false), then
 * builds the authenticator.
 */
export async function startLibraryDesk(
  options: LibraryAuthenticatorOptions = {}
): Promise<LibraryAuthenticator> {
  if (getEnvConfig().AUTO_MIGRATE) {
    await runMigrations();
  } else {
    logger.info("[LibraryDesk] AUTO_MIGRATE is false, skipping migrations");
  }

  return createLibraryAuthenticator(options);
}

export { SessionAuthenticator, type SessionAuthenticatorOptions } from "@/lib/auth";
export {
  type Clock,
  DEFAULT_IDLE_TIMEOUT_MS,
  MemorySessionStore,
  type SessionEntry,
  type SessionStore,
  SessionSweeper,
  type SessionSweeperOptions,
  systemClock,
} from "@/lib/auth-session-store";
export { type EnvConfig, getEnvConfig } from "@/lib/config";
export { logger } from "@/lib/logger";
export { hashPassword, verifyPasswordHash } from "@/lib/security/digest";
export { AUTH_ERROR_CODES, AUTH_MESSAGES, type AuthErrorCode } from "@/lib/utils/error-messages";
export { closeDb, type DbInstance, getDb } from "@/drizzle/db";
export { ensureSchema, runMigrations } from "@/lib/migrate";
export * as schema from "@/drizzle/schema";
export {
  createUser,
  findUserById,
  findUserByUsername,
  updateUserStatus,
  userRepositoryLookup,
} from "@/repository/user";
export type * from "@/types/auth";
export type * from "@/types/user";
