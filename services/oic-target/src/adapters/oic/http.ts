// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/oic/http`
 * Purpose: Shared HTTP plumbing for the OIC and IDCS adapters: timeouts, status classification, OAuth2 error bodies.
 * Scope: Stateless helpers over global fetch. Does not retry or hold credentials.
 * Invariants:
 * - Every request, body included, is bounded by timeoutMs via AbortSignal.
 * - 429 and 5xx are transient; 401/403 are authentication; every other 4xx (408 included) is permanent.
 * Side-effects: IO (HTTP via fetch)
 * Links: services/oic-target/src/adapters/oic/token-manager.ts, services/oic-target/src/adapters/oic/delivery-client.ts
 * @internal
 */

import type { DeliveryErrorKind } from "@oic-target/singer-core";

export class RequestTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

/** A fully read HTTP response. */
export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly headers: Headers;
  readonly text: string;
}

/**
 * fetch with an abort timer covering both the headers and the body.
 * Rejects with RequestTimeoutError on timeout, and with the underlying error
 * on network failure (including a body stream that errors mid-read).
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<HttpResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const timedOut = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(new RequestTimeoutError(url, timeoutMs)),
      { once: true }
    );
  });

  try {
    const response = await Promise.race([
      fetch(url, { ...init, signal: controller.signal }),
      timedOut,
    ]);
    const text = await Promise.race([response.text(), timedOut]);
    return {
      status: response.status,
      ok: response.ok,
      headers: response.headers,
      text,
    };
  } catch (error) {
    if (controller.signal.aborted || (error instanceof Error && error.name === "AbortError")) {
      throw new RequestTimeoutError(url, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface StatusClassification {
  readonly kind: DeliveryErrorKind;
  readonly retryable: boolean;
}

/**
 * Classify a non-2xx HTTP status.
 */
export function classifyStatus(status: number): StatusClassification {
  if (status === 401 || status === 403) {
    return { kind: "authentication", retryable: false };
  }
  if (status === 429) return { kind: "rate_limited", retryable: true };
  if (status >= 500 && status < 600) {
    return { kind: "server_error", retryable: true };
  }
  return { kind: "client_error", retryable: false };
}

export interface OAuthErrorBody {
  readonly error?: string;
  readonly errorDescription?: string;
}

/**
 * Extract an OAuth2-style `error` / `error_description` pair from a response body.
 * Returns an empty object for non-JSON or unrelated bodies.
 */
export function parseOAuthErrorBody(text: string): OAuthErrorBody {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return {};
  }
  if (typeof json !== "object" || json === null) return {};

  const error = "error" in json ? json.error : undefined;
  const description =
    "error_description" in json ? json.error_description : undefined;
  return {
    ...(typeof error === "string" ? { error } : {}),
    ...(typeof description === "string"
      ? { errorDescription: description }
      : {}),
  };
}

/** Human-readable summary of an error body for logs and outcomes. */
export function describeErrorBody(status: number, text: string): string {
  const { error, errorDescription } = parseOAuthErrorBody(text);
  if (error) {
    return errorDescription
      ? `HTTP ${status} ${error}: ${errorDescription}`
      : `HTTP ${status} ${error}`;
  }
  const snippet = text.trim().slice(0, 200);
  return snippet ? `HTTP ${status}: ${snippet}` : `HTTP ${status}`;
}

/**
 * Retry-After in milliseconds when given as delta-seconds; undefined otherwise.
 */
export function parseRetryAfterMs(header: string | null): number | undefined {
  if (header === null) return undefined;
  const secondsValue = Number(header.trim());
  if (header.trim() === "" || !Number.isFinite(secondsValue) || secondsValue < 0) {
    return undefined;
  }
  return secondsValue * 1000;
}
