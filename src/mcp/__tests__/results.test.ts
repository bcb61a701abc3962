import { describe, expect, it } from "vitest";

import {
  ApplicationError,
  PROTOCOL_CODES,
  ProtocolError,
  TRANSPORT_CODES,
  TransportError,
} from "../../errors.js";
import { failureToError } from "../failures.js";
import { normalizeToolResult } from "../parseContent.js";

describe("failureToError", () => {
  it("lifts transport failures and keeps the status", () => {
    const err = failureToError({
      ok: false,
      id: 1,
      kind: "transport",
      code: TRANSPORT_CODES.HTTP_STATUS,
      message: "HTTP 503:",
      status: 503,
    });

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ code: TRANSPORT_CODES.HTTP_STATUS, status: 503, message: "HTTP 503:" });
  });

  it("lifts protocol failures", () => {
    const err = failureToError({ ok: false, id: 1, kind: "protocol", code: PROTOCOL_CODES.MISMATCHED_ID, message: "x" });

    expect(err).toBeInstanceOf(ProtocolError);
    expect(err.code).toBe(PROTOCOL_CODES.MISMATCHED_ID);
  });

  it("lifts application failures with their data", () => {
    const err = failureToError({ ok: false, id: 1, kind: "application", code: 42, message: "nope", data: { a: 1 } });

    expect(err).toBeInstanceOf(ApplicationError);
    expect(err).toMatchObject({ code: 42, message: "nope", data: { a: 1 } });
  });

  it("turns a code that does not fit its kind into a protocol error", () => {
    const err = failureToError({ ok: false, id: 1, kind: "transport", code: 7, message: "odd" });

    expect(err).toBeInstanceOf(ProtocolError);
    expect(err.code).toBe(PROTOCOL_CODES.UNEXPECTED_RESULT);
  });
});

describe("TransportError.transient", () => {
  it("is true for timeouts, network failures and retryable statuses", () => {
    expect(new TransportError("t", TRANSPORT_CODES.TIMEOUT).transient).toBe(true);
    expect(new TransportError("n", TRANSPORT_CODES.NETWORK).transient).toBe(true);
    expect(new TransportError("h", TRANSPORT_CODES.HTTP_STATUS, 503).transient).toBe(true);
    expect(new TransportError("h", TRANSPORT_CODES.HTTP_STATUS, 429).transient).toBe(true);
  });

  it("is false for client errors, malformed bodies and cancellation", () => {
    expect(new TransportError("h", TRANSPORT_CODES.HTTP_STATUS, 400).transient).toBe(false);
    expect(new TransportError("h", TRANSPORT_CODES.HTTP_STATUS, 500).transient).toBe(false);
    expect(new TransportError("m", TRANSPORT_CODES.MALFORMED_ENVELOPE).transient).toBe(false);
    expect(new TransportError("a", TRANSPORT_CODES.ABORTED).transient).toBe(false);
  });
});

describe("normalizeToolResult", () => {
  it("passes plain values through", () => {
    expect(normalizeToolResult(["alpha1", "alpha2"])).toEqual({ isError: false, value: ["alpha1", "alpha2"] });
    expect(normalizeToolResult({ temp: 21 })).toEqual({ isError: false, value: { temp: 21 } });
    expect(normalizeToolResult(null)).toEqual({ isError: false, value: null });
  });

  it("parses a single JSON text block", () => {
    const raw = { content: [{ type: "text", text: '["alpha1","alpha2"]' }] };

    expect(normalizeToolResult(raw)).toEqual({ isError: false, value: ["alpha1", "alpha2"] });
  });

  it("keeps a single non-JSON text block as a string", () => {
    expect(normalizeToolResult({ content: [{ type: "text", text: "Sunny, 21C" }] })).toEqual({
      isError: false,
      value: "Sunny, 21C",
    });
  });

  it("joins several text blocks and skips other content", () => {
    const raw = {
      content: [
        { type: "text", text: "line one" },
        { type: "image", data: "AAAA", mimeType: "image/png" },
        { type: "text", text: "line two" },
      ],
    };

    expect(normalizeToolResult(raw)).toEqual({ isError: false, value: "line one\nline two" });
  });

  it("prefers structuredContent over text", () => {
    const raw = { content: [{ type: "text", text: "ignored" }], structuredContent: { items: ["a"] } };

    expect(normalizeToolResult(raw)).toEqual({ isError: false, value: { items: ["a"] } });
  });

  it("yields null for a result with no text", () => {
    expect(normalizeToolResult({ content: [] })).toEqual({ isError: false, value: null });
  });

  it("reports isError results with their text", () => {
    expect(normalizeToolResult({ content: [{ type: "text", text: "owner not found" }], isError: true })).toEqual({
      isError: true,
      message: "owner not found",
    });
    expect(normalizeToolResult({ content: [], isError: true })).toEqual({
      isError: true,
      message: "Unknown MCP error",
    });
  });
});
