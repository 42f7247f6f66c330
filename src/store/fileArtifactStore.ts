import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { StoreError, errorMessage } from "../core/errors";
import { Logger, StatsAggregator } from "../observability";
import { ArtifactRecord, ArtifactRecordSchema, CLASSIFICATION_PLACEHOLDER, SuccessOutcome } from "../types";
import { parseUrlSafe } from "../url";
import { KeyedMutex } from "./keyedMutex";
import { ArtifactStore, RecoveryReport, StoreSummary } from "./types";

export const ARTIFACTS_DIR = "artifacts";
export const METADATA_DIR = "metadata";
const ARTIFACT_EXT = ".pdf";
const METADATA_EXT = ".json";
const TEMP_EXT = ".part";

interface FileArtifactStoreOptions {
  outputDir: string;
  logger: Logger;
  stats?: StatsAggregator;
  verifyArtifactsOnStartup?: boolean;
}

interface ScannedRecord {
  file: string;
  record: ArtifactRecord;
}

interface MetadataScan {
  valid: ScannedRecord[];
  invalid: string[];
}

function lastPathSegment(canonicalUrl: string): string {
  const parsed = parseUrlSafe(canonicalUrl);
  const pathname = parsed ? parsed.pathname : canonicalUrl.split(/[?#]/, 1)[0];
  const segments = pathname.split("/").filter((segment) => segment.length > 0);
  const last = segments.length > 0 ? segments[segments.length - 1] : "document";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

/** `<slug>-<hash16>`: readable, deterministic, and unique per canonical URL. */
export function artifactBaseName(canonicalUrl: string): string {
  const stem = lastPathSegment(canonicalUrl)
    .toLowerCase()
    .replace(/\.pdf$/, "")
    .replace(/[^\w.-]+/g, "_")
    .replace(/^[._]+|[._]+$/g, "")
    .slice(0, 80);
  const hash = crypto.createHash("sha256").update(canonicalUrl).digest("hex").slice(0, 16);
  return `${stem || "document"}-${hash}`;
}

export function createArtifactRecord(outcome: SuccessOutcome, fileName: string, downloadedAt: Date): ArtifactRecord {
  return {
    canonicalUrl: outcome.canonicalUrl,
    requestedUrl: outcome.requestedUrl,
    finalUrl: outcome.finalUrl,
    downloadedAt: downloadedAt.toISOString(),
    httpStatus: outcome.httpStatus,
    sizeBytes: outcome.byteSize,
    contentType: outcome.contentType ?? null,
    sha256: outcome.sha256,
    fileName,
    classificationStatus: "needs_classification",
    country: CLASSIFICATION_PLACEHOLDER,
    insurer: CLASSIFICATION_PLACEHOLDER,
    insuranceLine: CLASSIFICATION_PLACEHOLDER,
    productName: CLASSIFICATION_PLACEHOLDER,
  };
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function writeDurably(filePath: string, data: Buffer | string): Promise<void> {
  const handle = await fs.promises.open(filePath, "wx");
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Artifact bytes under `artifacts/`, one JSON record per artifact under
 * `metadata/`. The metadata rename is the commit point: a record is only
 * visible once its artifact is in place, and startup recovery removes
 * artifacts that never got their record.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly artifactsDir: string;
  private readonly metadataDir: string;
  private readonly logger: Logger;
  private readonly stats?: StatsAggregator;
  private readonly verifyArtifactsOnStartup: boolean;
  private readonly locks = new KeyedMutex();
  private readonly committed = new Set<string>();

  constructor(options: FileArtifactStoreOptions) {
    const root = path.resolve(options.outputDir);
    this.artifactsDir = path.join(root, ARTIFACTS_DIR);
    this.metadataDir = path.join(root, METADATA_DIR);
    this.logger = options.logger;
    this.stats = options.stats;
    this.verifyArtifactsOnStartup = options.verifyArtifactsOnStartup ?? true;
  }

  artifactFileName(canonicalUrl: string): string {
    return `${artifactBaseName(canonicalUrl)}${ARTIFACT_EXT}`;
  }

  async open(): Promise<RecoveryReport> {
    await fs.promises.mkdir(this.artifactsDir, { recursive: true });
    await fs.promises.mkdir(this.metadataDir, { recursive: true });

    let removedTempFiles = 0;
    for (const dir of [this.artifactsDir, this.metadataDir]) {
      for (const entry of await fs.promises.readdir(dir)) {
        if (entry.endsWith(TEMP_EXT)) {
          await fs.promises.rm(path.join(dir, entry), { force: true });
          removedTempFiles += 1;
          this.logger.warn("store_temp_removed", { file: entry });
        }
      }
    }

    const scan = await this.scanMetadata();
    let quarantinedRecords = 0;
    for (const file of scan.invalid) {
      await this.quarantine(file, ".corrupt");
      quarantinedRecords += 1;
      this.logger.warn("store_record_corrupt", { file });
    }

    const liveArtifacts = new Set<string>();
    const storedCanonicalUrls: string[] = [];
    for (const { file, record } of scan.valid) {
      if (this.verifyArtifactsOnStartup && !(await pathExists(path.join(this.artifactsDir, record.fileName)))) {
        await this.quarantine(file, ".orphan");
        quarantinedRecords += 1;
        this.logger.warn("store_artifact_missing", { file, canonicalUrl: record.canonicalUrl });
        continue;
      }
      liveArtifacts.add(record.fileName);
      storedCanonicalUrls.push(record.canonicalUrl);
      this.committed.add(record.canonicalUrl);
    }

    let removedOrphanArtifacts = 0;
    for (const entry of await fs.promises.readdir(this.artifactsDir)) {
      if (entry.endsWith(ARTIFACT_EXT) && !liveArtifacts.has(entry)) {
        await fs.promises.rm(path.join(this.artifactsDir, entry), { force: true });
        removedOrphanArtifacts += 1;
        this.logger.warn("store_orphan_artifact_removed", { file: entry });
      }
    }

    const report: RecoveryReport = {
      storedCanonicalUrls,
      removedTempFiles,
      removedOrphanArtifacts,
      quarantinedRecords,
    };
    this.logger.info("store_opened", {
      stored: storedCanonicalUrls.length,
      removedTempFiles,
      removedOrphanArtifacts,
      quarantinedRecords,
    });
    return report;
  }

  async persist(bytes: Buffer, input: ArtifactRecord): Promise<void> {
    await this.locks.run(input.canonicalUrl, async () => {
      const record: ArtifactRecord = { ...input, fileName: this.artifactFileName(input.canonicalUrl) };
      const artifactPath = path.join(this.artifactsDir, record.fileName);
      const metadataPath = path.join(this.metadataDir, `${artifactBaseName(record.canonicalUrl)}${METADATA_EXT}`);

      if (this.committed.has(record.canonicalUrl) || (await pathExists(metadataPath))) {
        throw new StoreError("ARTIFACT_EXISTS", `Record already exists for ${record.canonicalUrl}`, {
          canonicalUrl: record.canonicalUrl,
          path: metadataPath,
        });
      }

      const stopTimer = this.stats?.startTimer("persist_ms");
      const created: string[] = [];
      try {
        const artifactTemp = `${artifactPath}${TEMP_EXT}`;
        const metadataTemp = `${metadataPath}${TEMP_EXT}`;
        await writeDurably(artifactTemp, bytes);
        created.push(artifactTemp);
        await writeDurably(metadataTemp, `${JSON.stringify(record, null, 2)}\n`);
        created.push(metadataTemp);

        await fs.promises.rename(artifactTemp, artifactPath);
        created.push(artifactPath);
        await fs.promises.rename(metadataTemp, metadataPath);
      } catch (error) {
        await this.removeAll(created);
        throw new StoreError("WRITE_FAILED", `Failed to persist ${record.canonicalUrl}: ${errorMessage(error)}`, {
          canonicalUrl: record.canonicalUrl,
          path: artifactPath,
          cause: errorMessage(error),
        });
      }

      this.committed.add(record.canonicalUrl);
      const durationMs = stopTimer?.();
      this.stats?.incrementCounter("succeeded");
      this.stats?.incrementCounter("bytes_stored", bytes.length);
      this.logger.info("store_persist_ok", {
        canonicalUrl: record.canonicalUrl,
        file: record.fileName,
        sizeBytes: bytes.length,
        durationMs,
      });
    });
  }

  async summarize(): Promise<StoreSummary> {
    const scan = await this.scanMetadata();
    let artifacts = 0;
    if (await pathExists(this.artifactsDir)) {
      artifacts = (await fs.promises.readdir(this.artifactsDir)).filter((entry) => entry.endsWith(ARTIFACT_EXT)).length;
    }
    return {
      records: scan.valid.length,
      artifacts,
      bytes: scan.valid.reduce((total, { record }) => total + record.sizeBytes, 0),
      corruptRecords: scan.invalid.length,
    };
  }

  private async scanMetadata(): Promise<MetadataScan> {
    const scan: MetadataScan = { valid: [], invalid: [] };
    if (!(await pathExists(this.metadataDir))) {
      return scan;
    }

    const files = (await fs.promises.readdir(this.metadataDir)).filter((entry) => entry.endsWith(METADATA_EXT)).sort();
    for (const file of files) {
      const raw = await fs.promises.readFile(path.join(this.metadataDir, file), "utf-8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        scan.invalid.push(file);
        continue;
      }
      const result = ArtifactRecordSchema.safeParse(parsed);
      if (result.success) {
        scan.valid.push({ file, record: result.data });
      } else {
        scan.invalid.push(file);
      }
    }
    return scan;
  }

  private async quarantine(file: string, suffix: string): Promise<void> {
    const source = path.join(this.metadataDir, file);
    await fs.promises.rename(source, `${source}${suffix}`);
  }

  private async removeAll(paths: string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        await fs.promises.rm(filePath, { force: true });
      } catch (error) {
        this.logger.warn("store_cleanup_failed", { file: filePath, error: errorMessage(error) });
      }
    }
  }
}
