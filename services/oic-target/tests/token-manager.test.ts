// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/tests/token-manager`
 * Purpose: Unit tests for OAuth2TokenManager caching, single-flight refresh and error mapping.
 * Scope: Test-only. Global fetch is stubbed; no network.
 * Invariants: Validates token reuse within the refresh window and SINGLE_FLIGHT.
 * Side-effects: global (fetch stub)
 * Links: services/oic-target/src/adapters/oic/token-manager.ts
 * @internal
 */

import { isAuthenticationError } from "@oic-target/singer-core";
import { FakeClock } from "@tests/_fakes/index.js";
import { beforeEach, describe, expect, it, vi } from "vitest";

const mockFetch = vi.fn<typeof fetch>();
vi.stubGlobal("fetch", mockFetch);

import { OAuth2TokenManager } from "../src/adapters/oic/token-manager.js";
import { makeNoopLogger } from "../src/observability/logger.js";

const TOKEN_URL = "https://idcs.example.test/oauth2/v1/token";

function tokenResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected promise to reject");
}

describe("OAuth2TokenManager", () => {
  let clock: FakeClock;
  let manager: OAuth2TokenManager;

  beforeEach(() => {
    mockFetch.mockReset();
    clock = new FakeClock();
    manager = new OAuth2TokenManager(
      {
        tokenUrl: TOKEN_URL,
        clientId: "client-id",
        clientSecret: "test-secret",
        scope: "urn:opc:resource:consumer::all",
        refreshThresholdMs: 60_000,
        requestTimeoutMs: 5_000,
      },
      makeNoopLogger(),
      clock
    );
  });

  it("reuses the token within the expiry window", async () => {
    mockFetch.mockResolvedValueOnce(
      tokenResponse({ access_token: "tok-1", expires_in: 3600, token_type: "Bearer" })
    );

    const first = await manager.acquire();
    clock.advance(60_000);
    const second = await manager.acquire();

    expect(first).toBe("Bearer tok-1");
    expect(second).toBe("Bearer tok-1");
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(manager.refreshCount).toBe(1);
  });

  it("shares one in-flight request between concurrent callers", async () => {
    mockFetch.mockResolvedValueOnce(
      tokenResponse({ access_token: "tok-1", expires_in: 3600 })
    );

    const headers = await Promise.all([
      manager.acquire(),
      manager.acquire(),
      manager.acquire(),
    ]);

    expect(headers).toEqual(["Bearer tok-1", "Bearer tok-1", "Bearer tok-1"]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("refreshes once the token is inside the refresh threshold", async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-1", expires_in: 3600 }))
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-2", expires_in: 3600 }));

    await manager.acquire();
    clock.advance(3_539_999);
    expect(await manager.acquire()).toBe("Bearer tok-1");

    clock.advance(1);
    expect(await manager.acquire()).toBe("Bearer tok-2");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("re-fetches after invalidate()", async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-1", expires_in: 3600 }))
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-2", expires_in: 3600 }));

    await manager.acquire();
    manager.invalidate();

    expect(await manager.acquire()).toBe("Bearer tok-2");
  });

  it("sends a client-credentials request with Basic auth and scope", async () => {
    mockFetch.mockResolvedValueOnce(
      tokenResponse({ access_token: "tok-1", expires_in: 3600 })
    );

    await manager.acquire();

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    const headers = new Headers(init?.headers);
    expect(url).toBe(TOKEN_URL);
    expect(init?.method).toBe("POST");
    expect(headers.get("authorization")).toBe(
      `Basic ${Buffer.from("client-id:test-secret").toString("base64")}`
    );
    expect(headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(init?.body).toBe(
      "grant_type=client_credentials&scope=urn%3Aopc%3Aresource%3Aconsumer%3A%3Aall"
    );
  });

  it("coerces a string expires_in", async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-1", expires_in: "120" }))
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-2", expires_in: "120" }));

    await manager.acquire();
    clock.advance(59_999);
    expect(await manager.acquire()).toBe("Bearer tok-1");
    clock.advance(1);
    expect(await manager.acquire()).toBe("Bearer tok-2");
  });

  it("maps an OAuth2 error body to a permanent AuthenticationError", async () => {
    mockFetch.mockResolvedValueOnce(
      tokenResponse(
        { error: "invalid_client", error_description: "Client authentication failed" },
        401
      )
    );

    const error = await caught(manager.acquire());

    expect(isAuthenticationError(error)).toBe(true);
    if (!isAuthenticationError(error)) return;
    expect(error.message).toBe(
      "Token endpoint rejected request: invalid_client: Client authentication failed"
    );
    expect(error.status).toBe(401);
    expect(error.error).toBe("invalid_client");
    expect(error.transient).toBe(false);
  });

  it("flags 5xx from the token endpoint as transient", async () => {
    mockFetch.mockResolvedValueOnce(new Response("busy", { status: 503 }));

    const error = await caught(manager.acquire());

    expect(isAuthenticationError(error) && error.transient).toBe(true);
    expect(isAuthenticationError(error) && error.message).toBe(
      "Token endpoint rejected request: HTTP 503"
    );
  });

  it("flags network failures as transient", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    const error = await caught(manager.acquire());

    expect(isAuthenticationError(error)).toBe(true);
    if (!isAuthenticationError(error)) return;
    expect(error.message).toBe("Token request failed: network error: fetch failed");
    expect(error.transient).toBe(true);
  });

  it("flags a body that fails mid-read as transient", async () => {
    mockFetch.mockResolvedValueOnce(
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(new TypeError("terminated"));
          },
        }),
        { status: 200 }
      )
    );

    const error = await caught(manager.acquire());

    expect(isAuthenticationError(error)).toBe(true);
    if (!isAuthenticationError(error)) return;
    expect(error.message).toBe("Token request failed: network error: terminated");
    expect(error.transient).toBe(true);
  });

  it("rejects a payload without access_token or expires_in", async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse({ token_type: "Bearer" }));

    await expect(manager.acquire()).rejects.toThrow(
      "Token endpoint returned a malformed payload (access_token, expires_in)"
    );
  });

  it("rejects a non-JSON payload", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    await expect(manager.acquire()).rejects.toThrow(
      "Token endpoint returned a non-JSON payload"
    );
  });

  it("retries the request on the next acquire after a failure", async () => {
    mockFetch
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(tokenResponse({ access_token: "tok-1", expires_in: 3600 }));

    await expect(manager.acquire()).rejects.toThrow();
    expect(await manager.acquire()).toBe("Bearer tok-1");
    expect(manager.refreshCount).toBe(2);
  });
});
