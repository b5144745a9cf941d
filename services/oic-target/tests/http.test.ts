// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/tests/http`
 * Purpose: Unit tests for HTTP status classification, error bodies, Retry-After and request timeouts.
 * Scope: Test-only. Global fetch is stubbed.
 * Invariants: 429/5xx transient, 401/403 authentication, other 4xx permanent.
 * Side-effects: global (fetch stub)
 * Links: services/oic-target/src/adapters/oic/http.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

const mockFetch = vi.fn<typeof fetch>();
vi.stubGlobal("fetch", mockFetch);

import {
  classifyStatus,
  describeErrorBody,
  fetchWithTimeout,
  parseOAuthErrorBody,
  parseRetryAfterMs,
  RequestTimeoutError,
} from "../src/adapters/oic/http.js";

describe("classifyStatus", () => {
  it.each([
    [401, "authentication", false],
    [403, "authentication", false],
    [408, "client_error", false],
    [429, "rate_limited", true],
    [500, "server_error", true],
    [503, "server_error", true],
    [400, "client_error", false],
    [404, "client_error", false],
    [422, "client_error", false],
  ] as const)("%i → %s (retryable=%s)", (code, kind, retryable) => {
    expect(classifyStatus(code)).toEqual({ kind, retryable });
  });
});

describe("parseOAuthErrorBody", () => {
  it("extracts error and error_description", () => {
    expect(
      parseOAuthErrorBody('{"error":"invalid_grant","error_description":"expired"}')
    ).toEqual({ error: "invalid_grant", errorDescription: "expired" });
  });

  it("ignores non-JSON and non-string fields", () => {
    expect(parseOAuthErrorBody("<html>")).toEqual({});
    expect(parseOAuthErrorBody('{"error":42}')).toEqual({});
    expect(parseOAuthErrorBody("null")).toEqual({});
  });
});

describe("describeErrorBody", () => {
  it("prefers OAuth fields, then a body snippet, then the bare status", () => {
    expect(describeErrorBody(400, '{"error":"invalid_request"}')).toBe(
      "HTTP 400 invalid_request"
    );
    expect(describeErrorBody(500, "  upstream crashed \n")).toBe(
      "HTTP 500: upstream crashed"
    );
    expect(describeErrorBody(404, "")).toBe("HTTP 404");
  });

  it("truncates long bodies to 200 characters", () => {
    expect(describeErrorBody(502, "x".repeat(500))).toBe(`HTTP 502: ${"x".repeat(200)}`);
  });
});

describe("parseRetryAfterMs", () => {
  it("converts delta-seconds to milliseconds", () => {
    expect(parseRetryAfterMs("5")).toBe(5_000);
    expect(parseRetryAfterMs(" 0 ")).toBe(0);
  });

  it("ignores missing, empty, negative and date values", () => {
    expect(parseRetryAfterMs(null)).toBeUndefined();
    expect(parseRetryAfterMs("")).toBeUndefined();
    expect(parseRetryAfterMs("-1")).toBeUndefined();
    expect(parseRetryAfterMs("Wed, 21 Oct 2015 07:28:00 GMT")).toBeUndefined();
  });
});

describe("fetchWithTimeout", () => {
  it("rejects with RequestTimeoutError when the timer fires", async () => {
    mockFetch.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(Object.assign(new Error("aborted"), { name: "AbortError" }));
          });
        })
    );

    await expect(
      fetchWithTimeout("https://oic.example.test/slow", {}, 10)
    ).rejects.toBeInstanceOf(RequestTimeoutError);
  });

  it("passes other failures through", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(
      fetchWithTimeout("https://oic.example.test/down", {}, 1_000)
    ).rejects.toThrow("fetch failed");
  });

  it("returns the status, headers and body when they arrive in time", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response("ok", { status: 200, headers: { "x-request-id": "r-1" } })
    );

    const response = await fetchWithTimeout("https://oic.example.test/", {}, 1_000);

    expect(response.status).toBe(200);
    expect(response.ok).toBe(true);
    expect(response.text).toBe("ok");
    expect(response.headers.get("x-request-id")).toBe("r-1");
  });

  it("times out a body that stalls after the headers", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 503 })
    );

    await expect(
      fetchWithTimeout("https://oic.example.test/stalled", {}, 20)
    ).rejects.toBeInstanceOf(RequestTimeoutError);
  });

  it("passes a body stream error through", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(new TypeError("terminated"));
          },
        }),
        { status: 503 }
      )
    );

    await expect(
      fetchWithTimeout("https://oic.example.test/reset", {}, 1_000)
    ).rejects.toThrow("terminated");
  });
});
