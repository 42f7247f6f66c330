import crypto from "node:crypto";
import type { ReadableStreamDefaultReader } from "node:stream/web";
import { Dispatcher, Response, fetch as undiciFetch } from "undici";
import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import {
  FailureOutcome,
  FetchOutcome,
  FetchRequest,
  OutcomeKind,
  RejectReason,
  SuccessOutcome,
  describeRejectReason,
} from "../types";
import { parseUrlSafe } from "../url";
import {
  PDF_SIGNATURE,
  ValidationLimits,
  parseDeclaredLength,
  validate,
  validateFinalSize,
  validateHeaders,
} from "./validator";

export type FetchFn = typeof undiciFetch;

export interface ArtifactFetcher {
  /** Resolves to exactly one outcome; never rejects. */
  fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchOutcome>;
}

export interface FetcherDeps {
  logger: Logger;
  limits: ValidationLimits;
  requestTimeoutMs: number;
  userAgent: string;
  dispatcher?: Dispatcher;
  fetchFn?: FetchFn;
  now?: () => number;
}

type StreamReader = ReadableStreamDefaultReader<unknown>;

type OutcomeFields = "durationMs" | "requestedUrl" | "canonicalUrl";
type PartialFailure = Omit<FailureOutcome, OutcomeFields>;
type PartialOutcome = Omit<SuccessOutcome, OutcomeFields> | PartialFailure;

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const PERMANENT_CODES = new Map([
  ["ENOTFOUND", "DNS failure (ENOTFOUND)"],
  ["ERR_INVALID_URL", "InvalidUrl"],
]);

const PERMANENT_MESSAGE_PATTERN = /redirect count exceeded|unexpected redirect|invalid url|url scheme must be/i;

function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

function errorMessages(error: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth += 1) {
    messages.push(current.message);
    current = current.cause;
  }
  if (messages.length === 0) {
    messages.push(errorMessage(error));
  }
  return messages;
}

function failure(kind: Exclude<OutcomeKind, "success" | "rejected">, errorDetail: string): PartialFailure {
  return { kind, errorDetail, byteSize: 0, signatureOk: false };
}

/**
 * Downloads one candidate artifact through the shared HTTP client.
 *
 * Header checks run before any body byte is read, the signature is checked
 * on the first bytes, and the size ceiling is enforced on the running byte
 * count so a missing or lying Content-Length cannot bypass it.
 */
export class HttpArtifactFetcher implements ArtifactFetcher {
  private readonly logger: Logger;
  private readonly limits: ValidationLimits;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(deps: FetcherDeps) {
    this.logger = deps.logger;
    this.limits = deps.limits;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.userAgent = deps.userAgent;
    this.dispatcher = deps.dispatcher;
    this.fetchFn = deps.fetchFn ?? undiciFetch;
    this.now = deps.now ?? Date.now;
  }

  async fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchOutcome> {
    const startedAt = this.now();
    const complete = (partial: PartialOutcome): FetchOutcome => ({
      requestedUrl: request.requestedUrl,
      canonicalUrl: request.canonicalUrl,
      ...partial,
      durationMs: this.now() - startedAt,
    });

    const target = parseUrlSafe(request.requestedUrl.trim());
    if (!target || (target.protocol !== "http:" && target.protocol !== "https:")) {
      return complete(failure("permanent_error", "InvalidUrl"));
    }
    if (signal?.aborted) {
      return complete(failure("transient_error", "Aborted"));
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onStop = (): void => controller.abort();
    signal?.addEventListener("abort", onStop, { once: true });

    try {
      const response = await this.fetchFn(target.toString(), {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept: "application/pdf,*/*",
        },
        redirect: "follow",
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      return complete(await this.readResponse(request, response));
    } catch (error) {
      return complete(this.classifyError(error, timedOut, signal?.aborted === true));
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onStop);
    }
  }

  private async readResponse(request: FetchRequest, response: Response): Promise<PartialOutcome> {
    const status = response.status;
    const finalUrl = response.url || request.requestedUrl;
    const contentType = response.headers.get("content-type") ?? undefined;
    const seen = { finalUrl, httpStatus: status, contentType };

    if (status === 429 || status >= 500) {
      await this.discard(response.body?.getReader(), request);
      return { ...seen, ...failure("transient_error", `HTTP ${status}`) };
    }
    if (status >= 400) {
      await this.discard(response.body?.getReader(), request);
      return { ...seen, ...failure("permanent_error", `HTTP ${status}`) };
    }

    const declaredLength = parseDeclaredLength(response.headers);
    const headerCheck = validateHeaders(status, declaredLength, this.limits);
    if (!headerCheck.ok) {
      await this.discard(response.body?.getReader(), request);
      return { ...seen, ...this.rejected(headerCheck.reason, 0, false) };
    }

    if (!response.body) {
      return { ...seen, ...this.rejected({ kind: "EmptyBody" }, 0, false) };
    }

    const reader: StreamReader = response.body.getReader();
    const chunks: Buffer[] = [];
    let total = 0;
    let signatureChecked = false;
    let warning: string | undefined;

    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      if (!(value instanceof Uint8Array) || value.byteLength === 0) {
        continue;
      }

      const chunk = Buffer.from(value.buffer, value.byteOffset, value.byteLength);
      chunks.push(chunk);
      total += chunk.length;

      if (!signatureChecked && total >= PDF_SIGNATURE.length) {
        const peek = validate(status, response.headers, Buffer.concat(chunks, total), declaredLength, this.limits);
        if (!peek.ok) {
          await this.discard(reader, request);
          return { ...seen, ...this.rejected(peek.reason, total, false) };
        }
        warning = peek.warning;
        signatureChecked = true;
      }

      if (total > this.limits.maxBytes) {
        await this.discard(reader, request);
        return { ...seen, ...this.rejected({ kind: "TooLarge" }, total, signatureChecked) };
      }
    }

    if (!signatureChecked) {
      // Stream ended inside the signature window: empty, or fewer than 4 bytes.
      const peek = validate(status, response.headers, Buffer.concat(chunks, total), declaredLength, this.limits);
      if (!peek.ok) {
        return { ...seen, ...this.rejected(peek.reason, total, false) };
      }
      warning = peek.warning;
    }

    const sizeCheck = validateFinalSize(total, this.limits);
    if (!sizeCheck.ok) {
      return { ...seen, ...this.rejected(sizeCheck.reason, total, true) };
    }

    if (warning) {
      this.logger.warn("fetch_content_type_mismatch", {
        url: request.requestedUrl,
        canonicalUrl: request.canonicalUrl,
        contentType,
      });
    }

    const body = Buffer.concat(chunks, total);
    return {
      ...seen,
      kind: "success",
      byteSize: total,
      signatureOk: true,
      contentTypeWarning: warning,
      body,
      sha256: crypto.createHash("sha256").update(body).digest("hex"),
    };
  }

  private rejected(reason: RejectReason, byteSize: number, signatureOk: boolean): PartialFailure {
    return {
      kind: "rejected",
      rejectReason: reason,
      errorDetail: describeRejectReason(reason),
      byteSize,
      signatureOk,
    };
  }

  private classifyError(error: unknown, timedOut: boolean, stopped: boolean): PartialFailure {
    if (timedOut) {
      return failure("transient_error", `Timeout (${this.requestTimeoutMs}ms)`);
    }
    if (stopped) {
      return failure("transient_error", "Aborted");
    }

    const code = errorCode(error);
    if (code && TIMEOUT_CODES.has(code)) {
      return failure("transient_error", `Timeout (${code})`);
    }
    const permanentDetail = code ? PERMANENT_CODES.get(code) : undefined;
    if (permanentDetail) {
      return failure("permanent_error", permanentDetail);
    }

    const messages = errorMessages(error);
    const permanent = messages.find((message) => PERMANENT_MESSAGE_PATTERN.test(message));
    if (permanent) {
      return failure("permanent_error", `Redirect error: ${permanent.slice(0, 120)}`);
    }

    const detail = code ?? messages[messages.length - 1].slice(0, 120);
    return failure("transient_error", `Network error (${detail})`);
  }

  // Releases the connection; the bytes read so far are dropped with it.
  private async discard(reader: StreamReader | undefined, request: FetchRequest): Promise<void> {
    if (!reader) {
      return;
    }
    try {
      await reader.cancel();
    } catch (error) {
      this.logger.debug("fetch_body_cancel_failed", {
        url: request.requestedUrl,
        error: errorMessage(error),
      });
    }
  }
}
