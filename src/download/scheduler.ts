import { MAX_WORKERS, MIN_WORKERS } from "../config";
import { StoreError, errorMessage } from "../core/errors";
import { Logger, StatsAggregator, StatsSummary } from "../observability";
import { Sink } from "../sink";
import { ArtifactStore, createArtifactRecord } from "../store";
import { FailureKind, FailureOutcome, FetchOutcome, SuccessOutcome } from "../types";
import { DEFAULT_TRACKING_PARAMS, canonicalize, hostKey } from "../url";
import { DispatchQueue, WorkItem } from "./dispatchQueue";
import { ArtifactFetcher } from "./fetcher";
import { HostThrottle, RealTimeSource, TimeSource } from "./hostThrottle";
import { SeenSet } from "./seenSet";

// Upper bound on one idle wait so a stop signal is noticed promptly.
const MAX_IDLE_WAIT_MS = 100;

function describeStoreFailure(error: unknown): string {
  if (!(error instanceof StoreError)) {
    return errorMessage(error);
  }
  return error.details?.cause ? `${error.code}: ${error.details.cause}` : error.code;
}

export interface SchedulerDeps {
  workers: number;
  fetcher: ArtifactFetcher;
  store: ArtifactStore;
  sink: Sink;
  seen: SeenSet;
  stats: StatsAggregator;
  throttle: HostThrottle;
  logger: Logger;
  maxConsecutiveStoreFailures: number;
  trackingParams?: readonly string[];
  timeSource?: TimeSource;
}

export interface RunSummary {
  stats: StatsSummary;
  /** Dispatch ended early because of the stop signal or store escalation. */
  stopped: boolean;
  /** Set when consecutive store failures escalated to a fatal condition. */
  storeFailure?: StoreError;
}

/**
 * Bounded worker pool over a deduplicated URL set.
 *
 * A canonical URL is inserted into the SeenSet before its fetch starts, so
 * no two workers ever fetch or persist the same artifact. The pool is
 * work-exhausting: `run` resolves once the queue is empty and every
 * in-flight fetch has settled.
 */
export class Scheduler {
  private readonly deps: SchedulerDeps;
  private readonly timeSource: TimeSource;
  private readonly trackingParams: readonly string[];
  private consecutiveStoreFailures = 0;
  private storeFailure?: StoreError;
  private stopController?: AbortController;

  constructor(deps: SchedulerDeps) {
    if (!Number.isInteger(deps.workers) || deps.workers < MIN_WORKERS || deps.workers > MAX_WORKERS) {
      throw new RangeError(`workers must be an integer in [${MIN_WORKERS}, ${MAX_WORKERS}], got ${deps.workers}`);
    }
    this.deps = deps;
    this.timeSource = deps.timeSource ?? new RealTimeSource();
    this.trackingParams = deps.trackingParams ?? DEFAULT_TRACKING_PARAMS;
  }

  async run(rawUrls: Iterable<string>, signal?: AbortSignal): Promise<RunSummary> {
    const { stats, logger } = this.deps;
    const stop = new AbortController();
    this.stopController = stop;
    this.consecutiveStoreFailures = 0;
    this.storeFailure = undefined;
    const onStop = (): void => stop.abort();
    if (signal?.aborted) {
      stop.abort();
    }
    signal?.addEventListener("abort", onStop, { once: true });

    stats.start();
    const queue = this.enqueue(rawUrls);
    logger.info("scheduler_start", {
      queued: queue.length,
      hosts: queue.hostCount,
      workers: this.deps.workers,
    });

    try {
      const slots = Array.from({ length: Math.min(this.deps.workers, Math.max(queue.length, 1)) }, (_, index) =>
        this.workerLoop(index, queue, stop.signal),
      );
      await Promise.all(slots);
    } finally {
      signal?.removeEventListener("abort", onStop);
      stats.finish();
    }

    const stopped = stop.signal.aborted;
    if (stopped) {
      logger.warn("scheduler_stopped", { undispatched: queue.length });
    }
    logger.info("scheduler_complete", { stopped });
    return { stats: stats.summary(), stopped, storeFailure: this.storeFailure };
  }

  private enqueue(rawUrls: Iterable<string>): DispatchQueue {
    const { seen, stats, logger } = this.deps;
    const queue = new DispatchQueue();
    const queued = new Set<string>();

    for (const raw of rawUrls) {
      const requestedUrl = raw.trim();
      if (requestedUrl.length === 0) {
        continue;
      }
      const canonicalUrl = canonicalize(requestedUrl, this.trackingParams);
      if (seen.isPreloaded(canonicalUrl)) {
        stats.incrementCounter("skipped_existing");
        logger.debug("scheduler_skip_stored", { url: requestedUrl, canonicalUrl });
        continue;
      }
      if (queued.has(canonicalUrl)) {
        stats.incrementCounter("duplicates");
        logger.debug("scheduler_skip_duplicate", { url: requestedUrl, canonicalUrl });
        continue;
      }
      queued.add(canonicalUrl);
      queue.push({ requestedUrl, canonicalUrl, host: hostKey(canonicalUrl) });
    }
    return queue;
  }

  private async workerLoop(slot: number, queue: DispatchQueue, stop: AbortSignal): Promise<void> {
    const { seen, stats, throttle } = this.deps;

    while (!stop.aborted) {
      const next = queue.take(throttle, this.timeSource.nowMs());
      if (next.kind === "empty") {
        return;
      }
      if (next.kind === "wait") {
        await this.timeSource.sleepMs(Math.min(next.waitMs, MAX_IDLE_WAIT_MS));
        continue;
      }

      const item = next.item;
      // Insert before dispatch: whoever wins tryAdd owns this canonical URL.
      if (!seen.tryAdd(item.canonicalUrl)) {
        stats.incrementCounter("duplicates");
        continue;
      }
      throttle.reserve(item.host, this.timeSource.nowMs());
      stats.incrementCounter("dispatched");
      this.deps.logger.debug("scheduler_dispatch", { slot, url: item.requestedUrl, host: item.host });

      await this.process(item, stop);
      if (this.storeFailure) {
        return;
      }
    }
  }

  private async process(item: WorkItem, stop: AbortSignal): Promise<void> {
    let outcome: FetchOutcome;
    try {
      outcome = await this.deps.fetcher.fetch(item, stop);
    } catch (error) {
      outcome = {
        requestedUrl: item.requestedUrl,
        canonicalUrl: item.canonicalUrl,
        kind: "transient_error",
        errorDetail: `Unexpected fetch failure: ${errorMessage(error)}`,
        byteSize: 0,
        signatureOk: false,
        durationMs: 0,
      };
    }
    this.deps.stats.recordDuration("fetch_ms", outcome.durationMs);

    if (outcome.kind === "success") {
      await this.persist(outcome);
      return;
    }
    await this.recordOutcomeFailure(outcome);
  }

  private async persist(outcome: SuccessOutcome): Promise<void> {
    const { store, logger } = this.deps;
    const record = createArtifactRecord(
      outcome,
      store.artifactFileName(outcome.canonicalUrl),
      new Date(this.timeSource.nowMs()),
    );

    try {
      await store.persist(outcome.body, record);
      this.consecutiveStoreFailures = 0;
      logger.info("fetch_stored", {
        url: outcome.requestedUrl,
        finalUrl: outcome.finalUrl,
        canonicalUrl: outcome.canonicalUrl,
        sizeBytes: outcome.byteSize,
        durationMs: outcome.durationMs,
        contentTypeWarning: outcome.contentTypeWarning,
      });
    } catch (error) {
      const detail = describeStoreFailure(error);
      this.deps.stats.incrementCounter("store_failed");
      await this.recordFailure(
        {
          requestedUrl: outcome.requestedUrl,
          canonicalUrl: outcome.canonicalUrl,
          finalUrl: outcome.finalUrl,
          httpStatus: outcome.httpStatus,
        },
        "store_error",
        detail,
      );
      this.noteStoreFailure();
    }
  }

  private async recordOutcomeFailure(outcome: FailureOutcome): Promise<void> {
    const { stats } = this.deps;
    switch (outcome.kind) {
      case "rejected":
        stats.recordRejection(outcome.errorDetail);
        break;
      case "transient_error":
        stats.incrementCounter("transient_failed");
        break;
      case "permanent_error":
        stats.incrementCounter("permanent_failed");
        break;
    }
    await this.recordFailure(outcome, outcome.kind, outcome.errorDetail);
  }

  private async recordFailure(
    source: Pick<FetchOutcome, "requestedUrl" | "canonicalUrl" | "finalUrl" | "httpStatus">,
    outcomeKind: FailureKind,
    errorDetail: string,
  ): Promise<void> {
    const { stats, logger, sink } = this.deps;
    stats.recordFailureDetail(errorDetail);
    logger.warn(`fetch_${outcomeKind}`, {
      url: source.requestedUrl,
      canonicalUrl: source.canonicalUrl,
      finalUrl: source.finalUrl,
      httpStatus: source.httpStatus,
      outcome: outcomeKind,
      error: errorDetail,
    });

    try {
      await sink.publishFailures([
        {
          requestedUrl: source.requestedUrl,
          canonicalUrl: source.canonicalUrl,
          outcomeKind,
          errorDetail,
          timestamp: new Date(this.timeSource.nowMs()).toISOString(),
          httpStatus: source.httpStatus,
          finalUrl: source.finalUrl,
        },
      ]);
    } catch (error) {
      logger.error("failure_log_write_failed", { url: source.requestedUrl, error: errorMessage(error) });
      this.noteStoreFailure();
    }
  }

  private noteStoreFailure(): void {
    this.consecutiveStoreFailures += 1;
    if (this.storeFailure || this.consecutiveStoreFailures < this.deps.maxConsecutiveStoreFailures) {
      return;
    }

    this.storeFailure = new StoreError(
      "CONSECUTIVE_FAILURES",
      `${this.consecutiveStoreFailures} consecutive store failures; stopping dispatch`,
      { consecutiveFailures: this.consecutiveStoreFailures },
    );
    this.deps.logger.error("store_failures_escalated", { consecutiveFailures: this.consecutiveStoreFailures });
    this.stopController?.abort();
  }
}
