import { Logger } from "./logger";
import { StatsCounterName, StatsTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface StatsSummary {
  counters: Record<StatsCounterName, number>;
  rejectedByReason: Record<string, number>;
  failuresByDetail: Record<string, number>;
  timers: Record<StatsTimerName, HistogramSummary>;
  elapsedMs: number;
  /** Succeeded artifacts per second of wall-clock time. */
  throughput: number;
}

/**
 * Run-wide counters shared by every worker.
 *
 * Each update is a synchronous read-modify-write with no await in between,
 * so concurrent workers on the event loop never lose an increment.
 */
export class StatsAggregator {
  private readonly counters = new Map<StatsCounterName, number>();
  private readonly timers = new Map<StatsTimerName, number[]>();
  private readonly rejections = new Map<string, number>();
  private readonly failures = new Map<string, number>();
  private readonly now: () => number;
  private startedAt: number;
  private finishedAt?: number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  start(): void {
    this.startedAt = this.now();
    this.finishedAt = undefined;
  }

  finish(): void {
    this.finishedAt = this.now();
  }

  incrementCounter(name: StatsCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  getCounter(name: StatsCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  recordRejection(reason: string): void {
    this.incrementCounter("rejected");
    this.rejections.set(reason, (this.rejections.get(reason) ?? 0) + 1);
  }

  /** Error-kind histogram across every non-success outcome. */
  recordFailureDetail(detail: string): void {
    this.failures.set(detail, (this.failures.get(detail) ?? 0) + 1);
  }

  recordDuration(name: StatsTimerName, durationMs: number): void {
    const values = this.timers.get(name) ?? [];
    values.push(durationMs);
    this.timers.set(name, values);
  }

  startTimer(name: StatsTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      this.recordDuration(name, durationMs);
      return durationMs;
    };
  }

  summary(): StatsSummary {
    const elapsedMs = Math.max(0, (this.finishedAt ?? this.now()) - this.startedAt);
    const succeeded = this.getCounter("succeeded");

    return {
      counters: {
        dispatched: this.getCounter("dispatched"),
        succeeded,
        rejected: this.getCounter("rejected"),
        transient_failed: this.getCounter("transient_failed"),
        permanent_failed: this.getCounter("permanent_failed"),
        store_failed: this.getCounter("store_failed"),
        skipped_existing: this.getCounter("skipped_existing"),
        duplicates: this.getCounter("duplicates"),
        bytes_stored: this.getCounter("bytes_stored"),
      },
      rejectedByReason: sortedRecord(this.rejections),
      failuresByDetail: sortedRecord(this.failures),
      timers: {
        fetch_ms: this.summarize("fetch_ms"),
        persist_ms: this.summarize("persist_ms"),
      },
      elapsedMs,
      throughput: elapsedMs > 0 ? Number((succeeded / (elapsedMs / 1000)).toFixed(2)) : 0,
    };
  }

  printSummary(logger: Logger): void {
    logger.always("stats_summary", { ...this.summary() });
  }

  private summarize(name: StatsTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}

// Highest count first, ties by key, so summaries are stable.
function sortedRecord(source: Map<string, number>): Record<string, number> {
  return Object.fromEntries(
    Array.from(source.entries()).sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0)),
  );
}
