import { Headers } from "undici";
import { describe, expect, test } from "vitest";
import {
  contentTypeWarning,
  mediaType,
  parseDeclaredLength,
  validate,
  validateFinalSize,
  validateHeaders,
  validateSignature,
} from "../validator";

const limits = { maxBytes: 1024, minBytes: 16 };
const pdfHeaders = new Headers({ "content-type": "application/pdf" });
const pdfPeek = Buffer.from("%PDF-1.7", "latin1");

describe("validate", () => {
  test("accepts a 200 PDF response", () => {
    expect(validate(200, pdfHeaders, pdfPeek, 512, limits)).toEqual({ ok: true });
  });

  test("rejects a non-200 status first", () => {
    expect(validate(404, pdfHeaders, pdfPeek, 4096, limits)).toEqual({
      ok: false,
      reason: { kind: "HTTPStatus", status: 404 },
    });
  });

  test("rejects a declared length above the ceiling before looking at bytes", () => {
    expect(validate(200, pdfHeaders, Buffer.alloc(0), 2048, limits)).toEqual({
      ok: false,
      reason: { kind: "TooLarge" },
    });
  });

  test("rejects an empty body", () => {
    expect(validate(200, pdfHeaders, Buffer.alloc(0), undefined, limits)).toEqual({
      ok: false,
      reason: { kind: "EmptyBody" },
    });
  });

  test("rejects a body that does not start with %PDF whatever the content type says", () => {
    expect(validate(200, pdfHeaders, Buffer.from("<html>", "latin1"), undefined, limits)).toEqual({
      ok: false,
      reason: { kind: "BadSignature" },
    });
  });

  test("rejects a peek window shorter than the signature", () => {
    expect(validateSignature(Buffer.from("%PD", "latin1"))).toEqual({ ok: false, reason: { kind: "BadSignature" } });
  });

  test("a non-PDF content type only warns", () => {
    const headers = new Headers({ "content-type": "text/html; charset=utf-8" });
    expect(validate(200, headers, pdfPeek, undefined, limits)).toEqual({
      ok: true,
      warning: "Content-Type not PDF: text/html",
    });
  });
});

describe("validator steps", () => {
  test("validateHeaders ignores an absent declared length", () => {
    expect(validateHeaders(200, undefined, limits)).toEqual({ ok: true });
  });

  test("validateFinalSize enforces both bounds", () => {
    expect(validateFinalSize(15, limits)).toEqual({ ok: false, reason: { kind: "TooSmall" } });
    expect(validateFinalSize(16, limits)).toEqual({ ok: true });
    expect(validateFinalSize(1024, limits)).toEqual({ ok: true });
    expect(validateFinalSize(1025, limits)).toEqual({ ok: false, reason: { kind: "TooLarge" } });
  });

  test("parseDeclaredLength reads only non-negative integers", () => {
    expect(parseDeclaredLength(new Headers({ "content-length": "123" }))).toBe(123);
    expect(parseDeclaredLength(new Headers({ "content-length": "abc" }))).toBeUndefined();
    expect(parseDeclaredLength(new Headers({ "content-length": "-1" }))).toBeUndefined();
    expect(parseDeclaredLength(new Headers())).toBeUndefined();
  });

  test("content type comparison strips parameters and case", () => {
    expect(mediaType("Application/PDF; charset=binary")).toBe("application/pdf");
    expect(contentTypeWarning("Application/PDF; charset=binary")).toBeUndefined();
    expect(contentTypeWarning("application/x-pdf")).toBeUndefined();
    expect(contentTypeWarning("application/octet-stream")).toBe("Content-Type not PDF: application/octet-stream");
    expect(contentTypeWarning(null)).toBe("Content-Type missing");
  });
});
