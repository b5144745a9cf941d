// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/oic/delivery-client`
 * Purpose: Submit BatchEnvelopes to OIC REST endpoints and classify the outcome: implements BatchDeliveryPort.
 * Scope: One batch per deliver() call, with bounded retry/backoff. Does not buffer, requeue, or order batches.
 * Invariants:
 * - BATCH_ID_STABLE: every attempt for a batch carries the same Idempotency-Key.
 * - Transient failures (network, timeout, 429, 5xx) retried up to maxRetries with computeBackoffMs.
 * - 401/403 → one TokenProvider.invalidate() + retry that does not consume a retry; a second one is fatal.
 * - Other 4xx are fatal on first sight.
 * - deliver() never rejects; failures come back as DeliveryFailure.
 * Side-effects: IO (HTTP POST to OIC), time (backoff sleeps)
 * Links: packages/singer-core/src/backoff.ts, services/oic-target/src/adapters/oic/http.ts
 * @internal
 */

import { setTimeout as delay } from "node:timers/promises";

import {
  type BatchDeliveryPort,
  type BatchEnvelope,
  computeBackoffMs,
  type DeliveryErrorKind,
  type DeliveryOutcome,
  isAuthenticationError,
  type TokenProvider,
} from "@oic-target/singer-core";

import type { TargetSettings } from "../../config.js";
import { resolveEndpointPath } from "../../config.js";
import type { Logger } from "../../observability/logger.js";
import {
  classifyStatus,
  describeErrorBody,
  fetchWithTimeout,
  type HttpResponse,
  parseRetryAfterMs,
  RequestTimeoutError,
} from "./http.js";

export type DeliveryClientSettings = Pick<
  TargetSettings,
  | "baseUrl"
  | "endpointTemplate"
  | "streamEndpoints"
  | "requestTimeoutMs"
  | "maxRetries"
  | "retryDelayMs"
  | "maxRetryDelayMs"
>;

/** Result of a single HTTP attempt, before retry policy is applied. */
type AttemptResult =
  | { readonly ok: true; readonly status: number }
  | {
      readonly ok: false;
      readonly kind: DeliveryErrorKind;
      readonly retryable: boolean;
      readonly status?: number;
      readonly message: string;
      readonly retryAfterMs?: number;
    };

export interface DeliveryClientDeps {
  readonly tokens: TokenProvider;
  readonly logger: Logger;
  /** Injectable for tests; defaults to timers/promises setTimeout */
  readonly sleep?: (ms: number) => Promise<void>;
}

export class OicDeliveryClient implements BatchDeliveryPort {
  private readonly tokens: TokenProvider;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: DeliveryClientSettings,
    deps: DeliveryClientDeps
  ) {
    this.tokens = deps.tokens;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  endpointFor(stream: string): string {
    return `${this.settings.baseUrl}${resolveEndpointPath(stream, this.settings)}`;
  }

  async deliver(batch: BatchEnvelope): Promise<DeliveryOutcome> {
    const log = this.logger.child({
      stream: batch.stream,
      batchId: batch.batchId,
      sequence: batch.sequence,
    });
    const url = this.endpointFor(batch.stream);
    const body = JSON.stringify({
      batch_id: batch.batchId,
      stream: batch.stream,
      created_at: batch.createdAt,
      records: batch.records,
    });

    let attempts = 0;
    let retriesUsed = 0;
    let authRefreshed = false;

    for (;;) {
      attempts += 1;
      const result = await this.attempt(url, batch.batchId, body);

      if (result.ok) {
        log.info(
          { records: batch.records.length, attempts, status: result.status },
          "batch delivered"
        );
        return { ok: true, processed: batch.records.length, attempts };
      }

      if (result.kind === "authentication" && result.status !== undefined && !authRefreshed) {
        authRefreshed = true;
        this.tokens.invalidate();
        log.warn(
          { status: result.status, attempts },
          "authentication rejected; retrying with a fresh token"
        );
        continue;
      }

      if (!result.retryable || retriesUsed >= this.settings.maxRetries) {
        log.error(
          {
            kind: result.kind,
            status: result.status,
            attempts,
            retryable: result.retryable,
          },
          `batch delivery failed: ${result.message}`
        );
        return {
          ok: false,
          kind: result.kind,
          retryable: result.retryable,
          ...(result.status !== undefined ? { status: result.status } : {}),
          message: result.message,
          attempts,
        };
      }

      const backoffMs = computeBackoffMs(retriesUsed, {
        baseDelayMs: this.settings.retryDelayMs,
        maxDelayMs: this.settings.maxRetryDelayMs,
      });
      const waitMs = Math.min(
        Math.max(backoffMs, result.retryAfterMs ?? 0),
        this.settings.maxRetryDelayMs
      );
      retriesUsed += 1;
      log.warn(
        {
          kind: result.kind,
          status: result.status,
          attempt: attempts,
          retry: retriesUsed,
          maxRetries: this.settings.maxRetries,
          waitMs,
        },
        `delivery attempt failed, retrying: ${result.message}`
      );
      await this.sleep(waitMs);
    }
  }

  private async attempt(
    url: string,
    batchId: string,
    body: string
  ): Promise<AttemptResult> {
    let authorization: string;
    try {
      authorization = await this.tokens.acquire();
    } catch (error) {
      if (isAuthenticationError(error) && error.transient) {
        return { ok: false, kind: "network", retryable: true, message: error.message };
      }
      return {
        ok: false,
        kind: "authentication",
        retryable: false,
        message: error instanceof Error ? error.message : String(error),
      };
    }

    let response: HttpResponse;
    try {
      response = await fetchWithTimeout(
        url,
        {
          method: "POST",
          headers: {
            Authorization: authorization,
            "Content-Type": "application/json",
            Accept: "application/json",
            "Idempotency-Key": batchId,
          },
          body,
        },
        this.settings.requestTimeoutMs
      );
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        return { ok: false, kind: "timeout", retryable: true, message: error.message };
      }
      const reason = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        kind: "network",
        retryable: true,
        message: `network error: ${reason}`,
      };
    }

    if (response.ok) {
      return { ok: true, status: response.status };
    }

    const { kind, retryable } = classifyStatus(response.status);
    const retryAfterMs = parseRetryAfterMs(response.headers.get("retry-after"));
    return {
      ok: false,
      kind,
      retryable,
      status: response.status,
      message: describeErrorBody(response.status, response.text),
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    };
  }
}
