import { logger, toLogError } from "@/lib/logger";

interface PurgeTarget {
  purgeExpiredSessions(): number;
}

export interface SessionSweeperOptions {
  intervalMs: number;
}

/**
 * Periodically evicts idle sessions that nobody has verified since they
 * expired. Verification still evicts lazily; this only bounds how long a
 * dead entry can sit in memory.
 */
export class SessionSweeper {
  private readonly intervalMs: number;
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly target: PurgeTarget,
    options: SessionSweeperOptions
  ) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`Invalid sweep interval: ${options.intervalMs}`);
    }
    this.intervalMs = options.intervalMs;
  }

  start(): void {
    if (this.intervalId !== null) return;

    this.intervalId = setInterval(() => this.sweep(), this.intervalMs);
    // Must not keep the process alive on its own
    this.intervalId.unref();
    logger.debug("[SessionSweeper] Started", { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.intervalId === null) return;

    clearInterval(this.intervalId);
    this.intervalId = null;
    logger.debug("[SessionSweeper] Stopped");
  }

  get isRunning(): boolean {
    return this.intervalId !== null;
  }

  /**
   * Runs one purge immediately. Returns the number of sessions removed,
   * or 0 when the purge failed.
   */
  sweep(): number {
    try {
      const removed = this.target.purgeExpiredSessions();
      if (removed > 0) {
        logger.debug("[SessionSweeper] Purged idle sessions", { removed });
      }
      return removed;
    } catch (error) {
      logger.error("[SessionSweeper] Purge failed", { error: toLogError(error) });
      return 0;
    }
  }
}
