import { RejectReason } from "../types";

export const PDF_SIGNATURE = Buffer.from("%PDF", "latin1");

export interface ValidationLimits {
  maxBytes: number;
  minBytes: number;
}

export type ValidationResult = { ok: true; warning?: string } | { ok: false; reason: RejectReason };

/** Header-level view the validator needs; satisfied by fetch `Headers`. */
export interface HeaderSource {
  get(name: string): string | null;
}

const OK: ValidationResult = { ok: true };

/** Content-Length as a byte count, or undefined when absent or not a number. */
export function parseDeclaredLength(headers: HeaderSource): number | undefined {
  const raw = headers.get("content-length");
  if (raw === null || raw.trim() === "") {
    return undefined;
  }
  const parsed = Number(raw.trim());
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function mediaType(contentType: string | null | undefined): string {
  return (contentType ?? "").split(";", 1)[0].trim().toLowerCase();
}

/**
 * Advisory only: a non-PDF content type is logged but never decides the
 * outcome on its own.
 */
export function contentTypeWarning(contentType: string | null | undefined): string | undefined {
  const type = mediaType(contentType);
  if (type === "application/pdf" || type === "application/x-pdf") {
    return undefined;
  }
  return type ? `Content-Type not PDF: ${type}` : "Content-Type missing";
}

export function validateHeaders(
  status: number,
  declaredLength: number | undefined,
  limits: Pick<ValidationLimits, "maxBytes">,
): ValidationResult {
  if (status !== 200) {
    return { ok: false, reason: { kind: "HTTPStatus", status } };
  }
  if (declaredLength !== undefined && declaredLength > limits.maxBytes) {
    return { ok: false, reason: { kind: "TooLarge" } };
  }
  return OK;
}

export function validateSignature(peekedBytes: Uint8Array): ValidationResult {
  if (peekedBytes.length === 0) {
    return { ok: false, reason: { kind: "EmptyBody" } };
  }
  if (peekedBytes.length < PDF_SIGNATURE.length) {
    return { ok: false, reason: { kind: "BadSignature" } };
  }
  for (let i = 0; i < PDF_SIGNATURE.length; i += 1) {
    if (peekedBytes[i] !== PDF_SIGNATURE[i]) {
      return { ok: false, reason: { kind: "BadSignature" } };
    }
  }
  return OK;
}

export function validateFinalSize(byteCount: number, limits: ValidationLimits): ValidationResult {
  if (byteCount > limits.maxBytes) {
    return { ok: false, reason: { kind: "TooLarge" } };
  }
  if (byteCount < limits.minBytes) {
    return { ok: false, reason: { kind: "TooSmall" } };
  }
  return OK;
}

/**
 * Checks a response before the rest of the body is read: status, declared
 * length, then the peeked signature window. First failing rule wins. The
 * final size check runs separately once the body is fully streamed.
 */
export function validate(
  status: number,
  headers: HeaderSource,
  peekedBytes: Uint8Array,
  declaredLength: number | undefined,
  limits: ValidationLimits,
): ValidationResult {
  const headerResult = validateHeaders(status, declaredLength, limits);
  if (!headerResult.ok) {
    return headerResult;
  }

  const signatureResult = validateSignature(peekedBytes);
  if (!signatureResult.ok) {
    return signatureResult;
  }

  const warning = contentTypeWarning(headers.get("content-type"));
  return warning ? { ok: true, warning } : OK;
}
