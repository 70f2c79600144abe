import type { UserRole } from "@/types/user";

export interface SessionEntry {
  userId: number;
  username: string;
  role: UserRole;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds; never decreases */
  lastActivityAt: number;
}

export interface SessionStore {
  insert(token: string, entry: SessionEntry): void;
  read(token: string): SessionEntry | null;
  has(token: string): boolean;
  touch(token: string, at: number): SessionEntry | null;
  revoke(token: string): boolean;
  revokeWhere(predicate: (entry: SessionEntry, token: string) => boolean): number;
  clear(): void;
  readonly size: number;
}

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export const DEFAULT_IDLE_TIMEOUT_MS = 30 * 60 * 1000;

export { MemorySessionStore } from "./memory-session-store";
export { SessionSweeper, type SessionSweeperOptions } from "./session-sweeper";
