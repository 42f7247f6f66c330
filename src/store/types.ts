import { ArtifactRecord } from "../types";

export interface StoreSummary {
  records: number;
  artifacts: number;
  bytes: number;
  corruptRecords: number;
}

export interface RecoveryReport {
  /** Canonical URLs with a committed record; these preload the SeenSet. */
  storedCanonicalUrls: string[];
  removedTempFiles: number;
  removedOrphanArtifacts: number;
  quarantinedRecords: number;
}

export interface ArtifactStore {
  /** Creates the layout, repairs crash leftovers and lists stored URLs. */
  open(): Promise<RecoveryReport>;
  /** Deterministic artifact file name for a canonical URL. */
  artifactFileName(canonicalUrl: string): string;
  persist(bytes: Buffer, record: ArtifactRecord): Promise<void>;
  summarize(): Promise<StoreSummary>;
}
