import { beforeEach, describe, expect, it } from "vitest";
import type { SessionEntry } from "@/lib/auth-session-store";
import { MemorySessionStore } from "@/lib/auth-session-store/memory-session-store";

function entry(overrides: Partial<SessionEntry> = {}): SessionEntry {
  return {
    userId: 1,
    username: "alice",
    role: "Member",
    createdAt: 1000,
    lastActivityAt: 1000,
    ...overrides,
  };
}

describe("MemorySessionStore", () => {
  let store: MemorySessionStore;

  beforeEach(() => {
    store = new MemorySessionStore();
  });

  it("should return null for a missing token", () => {
    expect(store.read("missing")).toBeNull();
    expect(store.has("missing")).toBe(false);
  });

  it("should store and read an entry", () => {
    store.insert("t1", entry());

    expect(store.read("t1")).toEqual(entry());
    expect(store.has("t1")).toBe(true);
    expect(store.size).toBe(1);
  });

  it("should hand out copies that cannot mutate the table", () => {
    const original = entry();
    store.insert("t1", original);
    original.lastActivityAt = 9999;

    const read = store.read("t1");
    if (read) read.lastActivityAt = 5555;

    expect(store.read("t1")?.lastActivityAt).toBe(1000);
  });

  it("should move lastActivityAt forward on touch", () => {
    store.insert("t1", entry());

    expect(store.touch("t1", 2000)?.lastActivityAt).toBe(2000);
    expect(store.read("t1")?.lastActivityAt).toBe(2000);
  });

  it("should never move lastActivityAt backwards", () => {
    store.insert("t1", entry({ lastActivityAt: 3000 }));

    store.touch("t1", 2000);

    expect(store.read("t1")?.lastActivityAt).toBe(3000);
  });

  it("should return null when touching a missing token", () => {
    expect(store.touch("missing", 2000)).toBeNull();
  });

  it("should report whether revoke removed anything", () => {
    store.insert("t1", entry());

    expect(store.revoke("t1")).toBe(true);
    expect(store.revoke("t1")).toBe(false);
    expect(store.size).toBe(0);
  });

  it("should revoke matching entries and count them", () => {
    store.insert("a", entry({ userId: 1 }));
    store.insert("b", entry({ userId: 2 }));
    store.insert("c", entry({ userId: 1 }));

    expect(store.revokeWhere((session) => session.userId === 1)).toBe(2);
    expect(store.has("a")).toBe(false);
    expect(store.has("b")).toBe(true);
    expect(store.has("c")).toBe(false);
  });

  it("should pass the token to the predicate", () => {
    store.insert("keep", entry());
    store.insert("drop", entry());

    expect(store.revokeWhere((_session, token) => token === "drop")).toBe(1);
    expect(store.has("keep")).toBe(true);
  });

  it("should clear everything", () => {
    store.insert("a", entry());
    store.insert("b", entry());

    store.clear();

    expect(store.size).toBe(0);
  });
});
