import { LogLevel } from "../observability/types";

export interface AppConfig {
  inputPath: string;
  outputDir: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  verifyArtifactsOnStartup: boolean;
  requestTimeoutMs: number;
  workers: number;
  maxBytes: number;
  minBytes: number;
  hostDelayMs: number;
  maxConsecutiveStoreFailures: number;
  trackingParams: string[];
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
