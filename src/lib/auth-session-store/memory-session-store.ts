import type { SessionEntry, SessionStore } from "./index";

/**
 * Process-local session table. Every method is synchronous, so a
 * read-then-write sequence inside one caller cannot interleave with another.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();

  insert(token: string, entry: SessionEntry): void {
    this.sessions.set(token, { ...entry });
  }

  read(token: string): SessionEntry | null {
    const entry = this.sessions.get(token);
    return entry ? { ...entry } : null;
  }

  has(token: string): boolean {
    return this.sessions.has(token);
  }

  touch(token: string, at: number): SessionEntry | null {
    const entry = this.sessions.get(token);
    if (!entry) return null;

    entry.lastActivityAt = Math.max(entry.lastActivityAt, at);
    return { ...entry };
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  revokeWhere(predicate: (entry: SessionEntry, token: string) => boolean): number {
    let removed = 0;
    for (const [token, entry] of this.sessions) {
      if (predicate(entry, token)) {
        this.sessions.delete(token);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }
}
