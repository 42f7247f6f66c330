import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import { DEFAULT_TRACKING_PARAMS } from "../url";
import { AppConfig, ConfigOverrides } from "./types";

const KIB = 1024;
const MIB = 1024 * KIB;

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 64;
export const MIN_REQUEST_TIMEOUT_MS = 5_000;

const DEFAULT_CONFIG: AppConfig = {
  inputPath: "policy_urls.txt",
  outputDir: "data",
  userAgent: "policy-pdf-ingestor/1.0",
  ignoreHttpsErrors: false,
  verifyArtifactsOnStartup: true,
  requestTimeoutMs: 30_000,
  workers: 8,
  maxBytes: 100 * MIB,
  minBytes: 20 * KIB,
  hostDelayMs: 500,
  maxConsecutiveStoreFailures: 5,
  trackingParams: [...DEFAULT_TRACKING_PARAMS],
  logLevel: "info",
};

const AppConfigSchema = z
  .object({
    inputPath: z.string().min(1),
    outputDir: z.string().min(1),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    verifyArtifactsOnStartup: z.boolean(),
    requestTimeoutMs: z.number().int().min(MIN_REQUEST_TIMEOUT_MS).max(600_000),
    workers: z.number().int().min(MIN_WORKERS).max(MAX_WORKERS),
    maxBytes: z.number().int().min(KIB).max(2048 * MIB),
    minBytes: z.number().int().nonnegative(),
    hostDelayMs: z.number().int().min(0).max(60_000),
    maxConsecutiveStoreFailures: z.number().int().min(1),
    trackingParams: z.array(z.string().min(1)),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
  })
  .strict()
  .refine((config) => config.minBytes < config.maxBytes, {
    message: "minBytes must be smaller than maxBytes",
    path: ["minBytes"],
  });

const ConfigFileSchema = AppConfigSchema.innerType().partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}: ${message}`);
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${absolutePath}`, formatIssues(result.error));
  }
  return result.data;
}

const INTEGER_PATTERN = /^\d+$/;

function toInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }

  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new ConfigError(`${name} expects a non-negative integer, got "${value}"`);
  }
  return Number(trimmed);
}

function toBool(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  throw new ConfigError(`${name} expects true/false, got "${value}"`);
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function toLogLevel(value: string | undefined, fallback: AppConfig["logLevel"]): AppConfig["logLevel"] {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "config";
    return `${where}: ${issue.message}`;
  });
}

export function validateConfig(config: AppConfig): AppConfig {
  const result = AppConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", formatIssues(result.error));
  }
  return result.data;
}

/**
 * Resolves configuration from defaults, an optional JSON file, the
 * environment and finally explicit overrides (CLI flags), then validates
 * the result.
 */
export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  const fromEnv: AppConfig = {
    ...merged,
    inputPath: env.INPUT_PATH ?? merged.inputPath,
    outputDir: env.OUTPUT_DIR ?? merged.outputDir,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool("IGNORE_HTTPS_ERRORS", env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    verifyArtifactsOnStartup: toBool(
      "VERIFY_ARTIFACTS_ON_STARTUP",
      env.VERIFY_ARTIFACTS_ON_STARTUP,
      merged.verifyArtifactsOnStartup,
    ),
    requestTimeoutMs: toInt("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    workers: toInt("WORKERS", env.WORKERS, merged.workers),
    maxBytes: toInt("MAX_BYTES", env.MAX_BYTES, merged.maxBytes),
    minBytes: toInt("MIN_BYTES", env.MIN_BYTES, merged.minBytes),
    hostDelayMs: toInt("HOST_DELAY_MS", env.HOST_DELAY_MS, merged.hostDelayMs),
    maxConsecutiveStoreFailures: toInt(
      "MAX_CONSECUTIVE_STORE_FAILURES",
      env.MAX_CONSECUTIVE_STORE_FAILURES,
      merged.maxConsecutiveStoreFailures,
    ),
    trackingParams: toList(env.TRACKING_PARAMS, merged.trackingParams),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
  };

  return validateConfig({
    inputPath: overrides.inputPath ?? fromEnv.inputPath,
    outputDir: overrides.outputDir ?? fromEnv.outputDir,
    userAgent: overrides.userAgent ?? fromEnv.userAgent,
    ignoreHttpsErrors: overrides.ignoreHttpsErrors ?? fromEnv.ignoreHttpsErrors,
    verifyArtifactsOnStartup: overrides.verifyArtifactsOnStartup ?? fromEnv.verifyArtifactsOnStartup,
    requestTimeoutMs: overrides.requestTimeoutMs ?? fromEnv.requestTimeoutMs,
    workers: overrides.workers ?? fromEnv.workers,
    maxBytes: overrides.maxBytes ?? fromEnv.maxBytes,
    minBytes: overrides.minBytes ?? fromEnv.minBytes,
    hostDelayMs: overrides.hostDelayMs ?? fromEnv.hostDelayMs,
    maxConsecutiveStoreFailures: overrides.maxConsecutiveStoreFailures ?? fromEnv.maxConsecutiveStoreFailures,
    trackingParams: overrides.trackingParams ?? fromEnv.trackingParams,
    logLevel: overrides.logLevel ?? fromEnv.logLevel,
  });
}

export { DEFAULT_CONFIG };
