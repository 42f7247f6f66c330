import { z } from "zod";

export type OutcomeKind = "success" | "rejected" | "transient_error" | "permanent_error";

export type RejectReason =
  | { kind: "HTTPStatus"; status: number }
  | { kind: "TooLarge" }
  | { kind: "EmptyBody" }
  | { kind: "BadSignature" }
  | { kind: "TooSmall" };

export function describeRejectReason(reason: RejectReason): string {
  return reason.kind === "HTTPStatus" ? `HTTPStatus(${reason.status})` : reason.kind;
}

export interface FetchRequest {
  requestedUrl: string;
  canonicalUrl: string;
}

interface OutcomeBase {
  readonly requestedUrl: string;
  readonly canonicalUrl: string;
  readonly finalUrl?: string;
  readonly httpStatus?: number;
  readonly contentType?: string;
  readonly byteSize: number;
  readonly signatureOk: boolean;
  readonly durationMs: number;
}

export interface SuccessOutcome extends OutcomeBase {
  readonly kind: "success";
  readonly finalUrl: string;
  readonly httpStatus: number;
  readonly contentTypeWarning?: string;
  /** Complete artifact bytes. */
  readonly body: Buffer;
  readonly sha256: string;
}

export interface FailureOutcome extends OutcomeBase {
  readonly kind: Exclude<OutcomeKind, "success">;
  readonly errorDetail: string;
  readonly rejectReason?: RejectReason;
}

export type FetchOutcome = SuccessOutcome | FailureOutcome;

export const CLASSIFICATION_PLACEHOLDER = "Unknown";

export const ArtifactRecordSchema = z.object({
  canonicalUrl: z.string().min(1),
  requestedUrl: z.string().min(1),
  finalUrl: z.string().min(1),
  /** ISO-8601, UTC */
  downloadedAt: z.string().datetime(),
  httpStatus: z.number().int(),
  sizeBytes: z.number().int().nonnegative(),
  contentType: z.string().nullable(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  fileName: z.string().min(1),
  classificationStatus: z.literal("needs_classification"),

  // Filled by a later classification stage.
  country: z.string(),
  insurer: z.string(),
  insuranceLine: z.string(),
  productName: z.string(),
});

export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;

export type FailureKind = Exclude<OutcomeKind, "success"> | "store_error";

export const FailureRecordSchema = z.object({
  requestedUrl: z.string().min(1),
  canonicalUrl: z.string(),
  outcomeKind: z.enum(["rejected", "transient_error", "permanent_error", "store_error"]),
  errorDetail: z.string(),
  timestamp: z.string(),
  runId: z.string(),
  httpStatus: z.number().int().optional(),
  finalUrl: z.string().optional(),
});

export type FailureRecord = z.infer<typeof FailureRecordSchema>;
