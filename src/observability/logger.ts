import { LogFields, LogLevel } from "./types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
  /** Defaults to console: errors on stderr, everything else on stdout. */
  writer?: LogWriter;
}

const consoleWriter: LogWriter = (line, level) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export function createRunId(now = new Date(), suffix = Math.random().toString(36).slice(2, 8)): string {
  return `run_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  get runId(): string {
    return this.context.runId;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  /** Info line that is written whatever the minimum level. */
  always(msg: string, fields?: LogFields): void {
    this.emit("info", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.context.minLevel ?? "debug"]) {
      return;
    }
    this.emit(level, msg, fields);
  }

  private emit(level: LogLevel, msg: string, fields?: LogFields): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    (this.context.writer ?? consoleWriter)(JSON.stringify(payload), level);
  }
}
