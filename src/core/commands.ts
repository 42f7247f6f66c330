import fs from "node:fs";
import path from "node:path";
import { Dispatcher } from "undici";
import { AppConfig } from "../config";
import { FetchFn, HostThrottle, HttpArtifactFetcher, RunSummary, Scheduler, SeenSet, TimeSource } from "../download";
import { Logger, StatsAggregator } from "../observability";
import { createSink, failureLogPath, readFailureLog } from "../sink";
import { StoreSummary, createStore } from "../store";
import { ConfigError, errorMessage } from "./errors";
import { HttpClient, createHttpClient } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  stats: StatsAggregator;
  signal?: AbortSignal;
  /** Replaces the pooled HTTP client, e.g. with an undici MockAgent. */
  dispatcher?: Dispatcher;
  fetchFn?: FetchFn;
  timeSource?: TimeSource;
}

export interface StatusReport extends StoreSummary {
  outputDir: string;
  failureLogEntries: number;
  retryableUrls: number;
}

/**
 * Reads the candidate URL list: one URL per line, blank lines and `#`
 * comments ignored. A missing or empty list is a startup error.
 */
export async function readUrlList(inputPath: string): Promise<string[]> {
  const absolutePath = path.resolve(inputPath);
  let raw: string;
  try {
    raw = await fs.promises.readFile(absolutePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Input file not readable: ${absolutePath} (${errorMessage(error)})`);
  }

  const urls = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
  if (urls.length === 0) {
    throw new ConfigError(`Input file contains no URLs: ${absolutePath}`);
  }
  return urls;
}

export async function ensureWritableDir(dir: string): Promise<string> {
  const absolutePath = path.resolve(dir);
  try {
    await fs.promises.mkdir(absolutePath, { recursive: true });
    await fs.promises.access(absolutePath, fs.constants.W_OK);
  } catch (error) {
    throw new ConfigError(`Output directory is not writable: ${absolutePath} (${errorMessage(error)})`);
  }
  return absolutePath;
}

async function runUrls(ctx: CommandContext, urls: string[]): Promise<RunSummary> {
  const { config, logger, stats } = ctx;
  await ensureWritableDir(config.outputDir);

  const store = createStore(config, logger.child("store"), stats);
  const recovery = await store.open();
  const seen = new SeenSet(recovery.storedCanonicalUrls);

  let httpClient: HttpClient | undefined;
  if (!ctx.dispatcher && !ctx.fetchFn) {
    httpClient = createHttpClient(config);
  }

  const scheduler = new Scheduler({
    workers: config.workers,
    fetcher: new HttpArtifactFetcher({
      logger: logger.child("fetcher"),
      limits: { maxBytes: config.maxBytes, minBytes: config.minBytes },
      requestTimeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
      dispatcher: ctx.dispatcher ?? httpClient?.dispatcher,
      fetchFn: ctx.fetchFn,
    }),
    store,
    sink: createSink(config.outputDir, ctx.runId),
    seen,
    stats,
    throttle: new HostThrottle(config.hostDelayMs, ctx.timeSource),
    logger: logger.child("scheduler"),
    maxConsecutiveStoreFailures: config.maxConsecutiveStoreFailures,
    trackingParams: config.trackingParams,
    timeSource: ctx.timeSource,
  });

  let summary: RunSummary;
  try {
    summary = await scheduler.run(urls, ctx.signal);
  } finally {
    await httpClient?.close();
    stats.printSummary(logger);
  }

  if (summary.storeFailure) {
    throw summary.storeFailure;
  }
  return summary;
}

export async function runIngest(ctx: CommandContext): Promise<RunSummary> {
  // The input is checked before anything is created under the output dir.
  const urls = await readUrlList(ctx.config.inputPath);
  ctx.logger.info("ingest_start", {
    inputPath: ctx.config.inputPath,
    outputDir: ctx.config.outputDir,
    urls: urls.length,
  });
  const summary = await runUrls(ctx, urls);
  ctx.logger.info("ingest_complete", { stopped: summary.stopped });
  return summary;
}

/** Re-runs every URL from the failure log; already stored ones are skipped. */
export async function runRetry(ctx: CommandContext): Promise<RunSummary> {
  const logPath = failureLogPath(ctx.config.outputDir);
  const failureLog = await readFailureLog(logPath);
  if (failureLog.malformedLines > 0) {
    ctx.logger.warn("retry_failure_log_malformed_lines", { malformedLines: failureLog.malformedLines });
  }
  if (failureLog.urls.length === 0) {
    throw new ConfigError(`Failure log has no URLs to retry: ${logPath}`);
  }

  ctx.logger.info("retry_start", { failureLog: logPath, urls: failureLog.urls.length });
  const summary = await runUrls(ctx, failureLog.urls);
  ctx.logger.info("retry_complete", { stopped: summary.stopped });
  return summary;
}

export async function runStatus(ctx: CommandContext): Promise<StatusReport> {
  ctx.logger.info("status_start", { outputDir: ctx.config.outputDir });
  const store = createStore(ctx.config, ctx.logger.child("store"));
  const summary = await store.summarize();
  const failureLog = await readFailureLog(failureLogPath(ctx.config.outputDir));

  const report: StatusReport = {
    outputDir: path.resolve(ctx.config.outputDir),
    ...summary,
    failureLogEntries: failureLog.records.length,
    retryableUrls: failureLog.urls.length,
  };
  ctx.logger.info("status_complete", { ...report });
  return report;
}
