import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(outputDir: string, runId: string): Sink {
  return new LocalJsonlSink(outputDir, runId);
}

export * from "./localJsonlSink";
export * from "./types";
