import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetEnvConfigCache } from "@/lib/config/env.schema";
import { createLibraryAuthenticator } from "@/index";
import { userRepositoryLookup } from "@/repository/user";
import { FakeClock } from "../helpers/fake-clock";
import { InMemoryUserLookup, makeUser, TEST_PASSWORD } from "../helpers/user-lookup";

const MINUTE = 60 * 1000;

describe("createLibraryAuthenticator", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv } as NodeJS.ProcessEnv;
    resetEnvConfigCache();
  });

  afterEach(() => {
    vi.useRealTimers();
    process.env = originalEnv;
    resetEnvConfigCache();
  });

  it("applies the configured idle timeout", () => {
    process.env.SESSION_IDLE_TIMEOUT_MINUTES = "12";

    const { authenticator, sweeper } = createLibraryAuthenticator({ userLookup: null });

    expect(authenticator.idleTimeoutMs).toBe(12 * MINUTE);
    expect(sweeper).toBeNull();
  });

  it("reports NOT_CONFIGURED when the lookup is explicitly disabled", async () => {
    const { authenticator } = createLibraryAuthenticator({ userLookup: null });

    const result = await authenticator.login("alice", TEST_PASSWORD);

    expect(result).toMatchObject({ ok: false, errorCode: "NOT_CONFIGURED" });
  });

  it("defaults to the database-backed lookup", async () => {
    const spy = vi.spyOn(userRepositoryLookup, "findUserByUsername").mockResolvedValue(null);
    try {
      const { authenticator } = createLibraryAuthenticator();

      const result = await authenticator.login("alice", TEST_PASSWORD);

      expect(spy).toHaveBeenCalledWith("alice");
      expect(result).toMatchObject({ ok: false, errorCode: "INVALID_CREDENTIALS" });
    } finally {
      spy.mockRestore();
    }
  });

  it("sweeps idle sessions when a sweep interval is configured", async () => {
    process.env.SESSION_IDLE_TIMEOUT_MINUTES = "30";
    process.env.SESSION_SWEEP_INTERVAL_SECONDS = "60";
    vi.useFakeTimers();
    const clock = new FakeClock();

    const { authenticator, sweeper, shutdown } = createLibraryAuthenticator({
      userLookup: new InMemoryUserLookup([makeUser()]),
      clock,
    });
    expect(sweeper?.isRunning).toBe(true);

    const result = await authenticator.login("alice", TEST_PASSWORD);
    expect(result.ok).toBe(true);
    expect(authenticator.activeSessionCount).toBe(1);

    clock.advance(30 * MINUTE);
    vi.advanceTimersByTime(60_000);
    expect(authenticator.activeSessionCount).toBe(1);

    clock.advance(1);
    vi.advanceTimersByTime(60_000);
    expect(authenticator.activeSessionCount).toBe(0);

    shutdown();
    expect(sweeper?.isRunning).toBe(false);
  });
});
