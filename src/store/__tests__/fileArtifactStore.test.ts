import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { makeTempDir, pdfBytes, quietLogger, removeDir } from "../../__tests__/helpers";
import { StoreError } from "../../core/errors";
import { StatsAggregator } from "../../observability";
import { ArtifactRecord, SuccessOutcome } from "../../types";
import { ARTIFACTS_DIR, FileArtifactStore, METADATA_DIR, artifactBaseName, createArtifactRecord } from "../fileArtifactStore";

const DOWNLOADED_AT = new Date("2026-03-01T12:00:00.000Z");

function outcomeFor(canonicalUrl: string, body: Buffer): SuccessOutcome {
  return {
    kind: "success",
    requestedUrl: `${canonicalUrl}?utm_source=test`,
    canonicalUrl,
    finalUrl: canonicalUrl,
    httpStatus: 200,
    contentType: "application/pdf",
    byteSize: body.length,
    signatureOk: true,
    durationMs: 12,
    body,
    sha256: crypto.createHash("sha256").update(body).digest("hex"),
  };
}

function recordFor(store: FileArtifactStore, canonicalUrl: string, body: Buffer): ArtifactRecord {
  return createArtifactRecord(outcomeFor(canonicalUrl, body), store.artifactFileName(canonicalUrl), DOWNLOADED_AT);
}

async function listDir(dir: string): Promise<string[]> {
  return (await fs.promises.readdir(dir)).sort();
}

async function rejection(promise: Promise<unknown>): Promise<StoreError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof StoreError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a StoreError");
}

describe("artifactBaseName", () => {
  test("slugs the last path segment and appends a URL hash", () => {
    const url = "https://example.com/docs/Policy%20Terms.PDF";
    const hash = crypto.createHash("sha256").update(url).digest("hex").slice(0, 16);

    expect(artifactBaseName(url)).toBe(`policy_terms-${hash}`);
  });

  test("falls back to a generic stem for an empty path", () => {
    expect(artifactBaseName("https://example.com/")).toMatch(/^document-[0-9a-f]{16}$/);
  });

  test("is deterministic and distinct per URL", () => {
    expect(artifactBaseName("https://example.com/a.pdf")).toBe(artifactBaseName("https://example.com/a.pdf"));
    expect(artifactBaseName("https://example.com/a.pdf")).not.toBe(artifactBaseName("https://example.org/a.pdf"));
  });

  test("caps the slug length", () => {
    const stem = artifactBaseName(`https://example.com/${"x".repeat(200)}.pdf`).split("-")[0];
    expect(stem).toHaveLength(80);
  });
});

describe("FileArtifactStore", () => {
  let outputDir: string;
  let stats: StatsAggregator;
  let store: FileArtifactStore;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    stats = new StatsAggregator();
    store = new FileArtifactStore({ outputDir, logger: quietLogger("store"), stats });
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  test("persists the artifact and its record", async () => {
    await store.open();
    const body = pdfBytes(256);
    const url = "https://example.com/plans/policy.pdf";

    await store.persist(body, recordFor(store, url, body));

    const base = artifactBaseName(url);
    const artifact = await fs.promises.readFile(path.join(outputDir, ARTIFACTS_DIR, `${base}.pdf`));
    expect(artifact.equals(body)).toBe(true);

    const record = JSON.parse(await fs.promises.readFile(path.join(outputDir, METADATA_DIR, `${base}.json`), "utf-8"));
    expect(record).toEqual({
      canonicalUrl: url,
      requestedUrl: `${url}?utm_source=test`,
      finalUrl: url,
      downloadedAt: "2026-03-01T12:00:00.000Z",
      httpStatus: 200,
      sizeBytes: 256,
      contentType: "application/pdf",
      sha256: crypto.createHash("sha256").update(body).digest("hex"),
      fileName: `${base}.pdf`,
      classificationStatus: "needs_classification",
      country: "Unknown",
      insurer: "Unknown",
      insuranceLine: "Unknown",
      productName: "Unknown",
    });

    expect(stats.getCounter("succeeded")).toBe(1);
    expect(stats.getCounter("bytes_stored")).toBe(256);
    expect(stats.summary().timers.persist_ms.count).toBe(1);
  });

  test("derives the file name itself", async () => {
    await store.open();
    const body = pdfBytes(64);
    const url = "https://example.com/a.pdf";

    await store.persist(body, { ...recordFor(store, url, body), fileName: "../escape.pdf" });

    expect(await listDir(path.join(outputDir, ARTIFACTS_DIR))).toEqual([`${artifactBaseName(url)}.pdf`]);
  });

  test("refuses a second record for the same canonical URL", async () => {
    await store.open();
    const body = pdfBytes(64);
    const record = recordFor(store, "https://example.com/a.pdf", body);
    await store.persist(body, record);

    const error = await rejection(store.persist(body, record));
    expect(error.code).toBe("ARTIFACT_EXISTS");

    const reopened = new FileArtifactStore({ outputDir, logger: quietLogger("store") });
    expect((await rejection(reopened.persist(body, record))).code).toBe("ARTIFACT_EXISTS");
  });

  test("lets exactly one of two concurrent writers commit", async () => {
    await store.open();
    const body = pdfBytes(64);
    const record = recordFor(store, "https://example.com/a.pdf", body);

    const results = await Promise.allSettled([store.persist(body, record), store.persist(body, record)]);

    expect(results.map((result) => result.status).sort()).toEqual(["fulfilled", "rejected"]);
    expect(await listDir(path.join(outputDir, METADATA_DIR))).toHaveLength(1);
  });

  test("fails with WRITE_FAILED when the layout is missing", async () => {
    const body = pdfBytes(64);
    const error = await rejection(store.persist(body, recordFor(store, "https://example.com/a.pdf", body)));

    expect(error.code).toBe("WRITE_FAILED");
    expect(error.details?.cause).toMatch(/ENOENT/);
  });

  test("removes the artifact temp file when the record cannot be written", async () => {
    await store.open();
    const body = pdfBytes(64);
    const url = "https://example.com/a.pdf";
    await fs.promises.writeFile(path.join(outputDir, METADATA_DIR, `${artifactBaseName(url)}.json.part`), "stale");

    const error = await rejection(store.persist(body, recordFor(store, url, body)));

    expect(error.code).toBe("WRITE_FAILED");
    expect(await listDir(path.join(outputDir, ARTIFACTS_DIR))).toEqual([]);
  });

  test("recovers from an interrupted run", async () => {
    await store.open();
    const body = pdfBytes(64);
    const keptUrl = "https://example.com/kept.pdf";
    await store.persist(body, recordFor(store, keptUrl, body));

    const artifactsDir = path.join(outputDir, ARTIFACTS_DIR);
    const metadataDir = path.join(outputDir, METADATA_DIR);
    await fs.promises.writeFile(path.join(artifactsDir, "half.pdf.part"), "partial");
    await fs.promises.writeFile(path.join(metadataDir, "half.json.part"), "{");
    await fs.promises.writeFile(path.join(artifactsDir, "stray.pdf"), body);
    await fs.promises.writeFile(path.join(metadataDir, "broken.json"), "{ not json");
    const missing = recordFor(store, "https://example.com/missing.pdf", body);
    await fs.promises.writeFile(path.join(metadataDir, "missing.json"), JSON.stringify(missing));

    const fresh = new FileArtifactStore({ outputDir, logger: quietLogger("store") });
    const report = await fresh.open();

    expect(report).toEqual({
      storedCanonicalUrls: [keptUrl],
      removedTempFiles: 2,
      removedOrphanArtifacts: 1,
      quarantinedRecords: 2,
    });
    expect(await listDir(artifactsDir)).toEqual([`${artifactBaseName(keptUrl)}.pdf`]);
    expect(await listDir(metadataDir)).toEqual([
      "broken.json.corrupt",
      `${artifactBaseName(keptUrl)}.json`,
      "missing.json.orphan",
    ].sort());
  });

  test("keeps records without artifacts when verification is off", async () => {
    const metadataDir = path.join(outputDir, METADATA_DIR);
    await fs.promises.mkdir(metadataDir, { recursive: true });
    const body = pdfBytes(64);
    const record = recordFor(store, "https://example.com/missing.pdf", body);
    await fs.promises.writeFile(path.join(metadataDir, "missing.json"), JSON.stringify(record));

    const lenient = new FileArtifactStore({ outputDir, logger: quietLogger("store"), verifyArtifactsOnStartup: false });
    const report = await lenient.open();

    expect(report.storedCanonicalUrls).toEqual(["https://example.com/missing.pdf"]);
    expect(report.quarantinedRecords).toBe(0);
  });

  test("summarizes an output directory without changing it", async () => {
    expect(await store.summarize()).toEqual({ records: 0, artifacts: 0, bytes: 0, corruptRecords: 0 });

    await store.open();
    const first = pdfBytes(100);
    const second = pdfBytes(50);
    await store.persist(first, recordFor(store, "https://example.com/1.pdf", first));
    await store.persist(second, recordFor(store, "https://example.com/2.pdf", second));
    await fs.promises.writeFile(path.join(outputDir, METADATA_DIR, "bad.json"), "[]");

    expect(await store.summarize()).toEqual({ records: 2, artifacts: 2, bytes: 150, corruptRecords: 1 });
    expect(await listDir(path.join(outputDir, METADATA_DIR))).toContain("bad.json");
  });
});
