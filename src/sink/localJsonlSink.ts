import fs from "node:fs";
import path from "node:path";
import { FailureRecord, FailureRecordSchema } from "../types";
import { FailureEntry, Sink } from "./types";

export const FAILURE_LOG_FILE = "failures.jsonl";

export function failureLogPath(outputDir: string): string {
  return path.join(path.resolve(outputDir), FAILURE_LOG_FILE);
}

/**
 * Append-only failure log. Each line is one `FailureRecord`; a later
 * `retry` run reads the requested URLs back from it.
 */
export class LocalJsonlSink implements Sink {
  private readonly failuresPath: string;
  private readonly runId: string;

  constructor(outputDir: string, runId: string) {
    this.failuresPath = failureLogPath(outputDir);
    this.runId = runId;
  }

  get path(): string {
    return this.failuresPath;
  }

  async publishFailures(entries: FailureEntry[]): Promise<void> {
    await this.appendLines(
      entries.map(
        (entry): FailureRecord => ({
          runId: this.runId,
          ...entry,
        }),
      ),
    );
  }

  private async appendLines(records: FailureRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.mkdir(path.dirname(this.failuresPath), { recursive: true });
    await fs.promises.appendFile(this.failuresPath, content, "utf-8");
  }
}

export interface FailureLogContents {
  records: FailureRecord[];
  /** Unique requested URLs, first-seen order. */
  urls: string[];
  malformedLines: number;
}

export async function readFailureLog(filePath: string): Promise<FailureLogContents> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { records: [], urls: [], malformedLines: 0 };
    }
    throw error;
  }

  const records: FailureRecord[] = [];
  let malformedLines = 0;
  for (const line of raw.split(/\r?\n/)) {
    if (line.trim().length === 0) {
      continue;
    }
    const parsed = FailureRecordSchema.safeParse(parseJsonLine(line));
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      malformedLines += 1;
    }
  }

  const urls = Array.from(new Set(records.map((record) => record.requestedUrl)));
  return { records, urls, malformedLines };
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
