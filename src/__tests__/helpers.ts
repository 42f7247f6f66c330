import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { TimeSource } from "../download/hostThrottle";
import { Logger } from "../observability";

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test", writer: () => undefined });
}

export function captureLogger(component = "test"): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = new Logger({
    component,
    runId: "run_test",
    writer: (line) => {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

/** `%PDF-1.7\n` followed by filler up to `size` bytes. */
export function pdfBytes(size: number): Buffer {
  const header = Buffer.from("%PDF-1.7\n", "latin1");
  return Buffer.concat([header, Buffer.alloc(Math.max(0, size - header.length), 0x41)]);
}

export async function makeTempDir(prefix = "pdf-ingestor-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

/** Clock that only moves when someone sleeps on it. */
export class FakeTimeSource implements TimeSource {
  constructor(private current = 0) {}

  nowMs(): number {
    return this.current;
  }

  async sleepMs(ms: number): Promise<void> {
    this.current += ms;
    await new Promise((resolve) => setImmediate(resolve));
  }
}
