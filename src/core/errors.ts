/**
 * Fatal, pre-run problem: missing or empty input, an argument out of range,
 * an unwritable output directory. The CLI exits non-zero on it.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export type StoreErrorCode =
  | "ARTIFACT_EXISTS" // a record for this canonical URL is already committed
  | "WRITE_FAILED" // disk full, permission denied, rename failure
  | "CONSECUTIVE_FAILURES"; // escalated after too many store failures in a row

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly details?: {
      canonicalUrl?: string;
      path?: string;
      consecutiveFailures?: number;
      cause?: string;
    },
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
