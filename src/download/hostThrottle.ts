export interface TimeSource {
  nowMs(): number;
  sleepMs(ms: number): Promise<void>;
}

export class RealTimeSource implements TimeSource {
  nowMs(): number {
    return Date.now();
  }

  async sleepMs(ms: number): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Per-host minimum spacing between request starts. Hosts are tracked
 * independently; a reservation on one never delays another.
 */
export class HostThrottle {
  private readonly delayMs: number;
  private readonly timeSource: TimeSource;
  private readonly nextAllowedAt = new Map<string, number>();

  constructor(delayMs: number, timeSource: TimeSource = new RealTimeSource()) {
    if (!(delayMs >= 0)) {
      throw new Error("delayMs must be >= 0");
    }
    this.delayMs = delayMs;
    this.timeSource = timeSource;
  }

  /** Milliseconds until `host` may be requested again (0 when ready). */
  waitTime(host: string, now = this.timeSource.nowMs()): number {
    const allowedAt = this.nextAllowedAt.get(host) ?? 0;
    return Math.max(0, allowedAt - now);
  }

  /** Marks a request to `host` as started now. */
  reserve(host: string, now = this.timeSource.nowMs()): void {
    this.nextAllowedAt.set(host, now + this.delayMs);
  }
}
