import { FailureRecord } from "../types";

/** A failure before the sink stamps it with the run id. */
export type FailureEntry = Omit<FailureRecord, "runId">;

export interface Sink {
  publishFailures(entries: FailureEntry[]): Promise<void>;
}
