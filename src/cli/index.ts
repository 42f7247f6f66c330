import { ConfigOverrides, loadConfig } from "../config";
import { CommandContext, runIngest, runRetry, runStatus } from "../core/commands";
import { ConfigError, StoreError, errorMessage } from "../core/errors";
import { Logger, LogWriter, StatsAggregator, createRunId } from "../observability";

export type CommandName = "ingest" | "retry" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  overrides: ConfigOverrides;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  writer?: LogWriter;
  /** Hooks for tests; see `CommandContext`. */
  context?: Pick<CommandContext, "dispatcher" | "fetchFn" | "timeSource">;
}

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CONFIG = 2;

const HELP_TEXT = `
Usage:
  pdf-ingestor <command> [options]

Commands:
  ingest   Download and store every PDF listed in the input file
  retry    Re-attempt URLs recorded in the failure log
  status   Summarize stored artifacts and logged failures

Options:
  --input <path>         URL list, one per line (default: policy_urls.txt)
  --out <dir>            Output directory (default: data)
  --workers <n>          Concurrent downloads, 1-64 (default: 8)
  --timeout-ms <n>       Per-request timeout in ms, >= 5000 (default: 30000)
  --max-bytes <n>        Reject artifacts larger than this (default: 100 MiB)
  --min-bytes <n>        Reject artifacts smaller than this (default: 20 KiB)
  --host-delay-ms <n>    Minimum spacing between requests to one host (default: 500)
  --user-agent <value>   User-Agent header sent with every request
  --log-level <level>    debug | info | warn | error
  --config <path>        Optional path to JSON config file
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

const VALUE_FLAGS = new Set([
  "--input",
  "--out",
  "--workers",
  "--timeout-ms",
  "--max-bytes",
  "--min-bytes",
  "--host-delay-ms",
  "--user-agent",
  "--log-level",
  "--config",
]);

const BOOLEAN_FLAGS = new Set(["--ignore-https-errors"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "ingest" || raw === "retry" || raw === "status") {
    return raw;
  }
  return undefined;
}

function parseIntFlag(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

function parseLogLevel(raw: string | undefined): ConfigOverrides["logLevel"] {
  if (raw === undefined) {
    return undefined;
  }
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  throw new ConfigError(`--log-level expects debug, info, warn or error, got "${raw}"`);
}

/**
 * Returns "help" for -h/--help, no arguments or an unknown command. Flag
 * values that cannot be parsed raise a ConfigError.
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const values = new Map<string, string>();
  let ignoreHttpsErrors: boolean | undefined;
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (BOOLEAN_FLAGS.has(arg)) {
      ignoreHttpsErrors = true;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new ConfigError(`Unknown option: ${arg}`);
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`${arg} requires a value`);
    }
    values.set(arg, value);
    index += 1;
  }

  return {
    command,
    configPath: values.get("--config"),
    overrides: {
      inputPath: values.get("--input"),
      outputDir: values.get("--out"),
      workers: parseIntFlag("--workers", values.get("--workers")),
      requestTimeoutMs: parseIntFlag("--timeout-ms", values.get("--timeout-ms")),
      maxBytes: parseIntFlag("--max-bytes", values.get("--max-bytes")),
      minBytes: parseIntFlag("--min-bytes", values.get("--min-bytes")),
      hostDelayMs: parseIntFlag("--host-delay-ms", values.get("--host-delay-ms")),
      userAgent: values.get("--user-agent"),
      logLevel: parseLogLevel(values.get("--log-level")),
      ignoreHttpsErrors,
    },
  };
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(errorMessage(error));
    return EXIT_CONFIG;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_OK;
  }

  const runId = createRunId();
  let context: CommandContext;
  try {
    const config = loadConfig(parsed.configPath, parsed.overrides, options.env);
    context = {
      ...options.context,
      runId,
      config,
      logger: new Logger({ component: "cli", runId, minLevel: config.logLevel, writer: options.writer }),
      stats: new StatsAggregator(),
      signal: options.signal,
    };
  } catch (error) {
    console.error(errorMessage(error));
    return error instanceof ConfigError ? EXIT_CONFIG : EXIT_FATAL;
  }

  const { logger, config } = context;
  logger.info("command_start", {
    command: parsed.command,
    inputPath: config.inputPath,
    outputDir: config.outputDir,
    workers: config.workers,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "ingest":
        await runIngest({ ...context, logger: logger.child("ingest") });
        break;
      case "retry":
        await runRetry({ ...context, logger: logger.child("retry") });
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("command_config_error", { command: parsed.command, error: error.message });
      return EXIT_CONFIG;
    }
    if (error instanceof StoreError) {
      logger.error("command_store_failure", {
        command: parsed.command,
        code: error.code,
        error: error.message,
      });
      return EXIT_FATAL;
    }
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return EXIT_FATAL;
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
