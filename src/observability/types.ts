export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  canonicalUrl?: string;
  host?: string;
  outcome?: string;
  [key: string]: unknown;
}

export type StatsCounterName =
  | "dispatched"
  | "succeeded"
  | "rejected"
  | "transient_failed"
  | "permanent_failed"
  | "store_failed"
  | "skipped_existing"
  | "duplicates"
  | "bytes_stored";

export type StatsTimerName = "fetch_ms" | "persist_ms";
