// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/oic/token-manager`
 * Purpose: OAuth2 client-credentials token lifecycle: implements TokenProvider for IDCS-issued OIC tokens.
 * Scope: Fetches, caches, and proactively refreshes one access token in memory. Does not persist tokens.
 * Invariants:
 * - A token within refreshThresholdMs of expiry is never handed out.
 * - SINGLE_FLIGHT: concurrent acquire() calls share one in-flight token request.
 * - The raw token never leaves this module except as a formatted header value.
 * Side-effects: IO (HTTP POST to the token endpoint), time
 * Links: packages/singer-core/src/port.ts (TokenProvider)
 * @internal
 */

import {
  AuthenticationError,
  type Clock,
  systemClock,
  type TokenProvider,
} from "@oic-target/singer-core";
import { z } from "zod";

import type { Logger } from "../../observability/logger.js";
import {
  fetchWithTimeout,
  type HttpResponse,
  parseOAuthErrorBody,
  RequestTimeoutError,
} from "./http.js";

export interface TokenManagerConfig {
  readonly tokenUrl: string;
  readonly clientId: string;
  /** Treat as secret - never log */
  readonly clientSecret: string;
  readonly scope?: string;
  readonly refreshThresholdMs: number;
  readonly requestTimeoutMs: number;
}

interface AccessToken {
  readonly value: string;
  readonly tokenType: string;
  readonly issuedAt: number;
  readonly expiresInSeconds: number;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
  token_type: z.string().min(1).default("Bearer"),
});

export class OAuth2TokenManager implements TokenProvider {
  private token: AccessToken | null = null;
  private refreshing: Promise<AccessToken> | null = null;
  private fetchCount = 0;

  constructor(
    private readonly config: TokenManagerConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  /** Number of token endpoint round trips made so far */
  get refreshCount(): number {
    return this.fetchCount;
  }

  async acquire(): Promise<string> {
    const cached = this.token;
    if (cached && this.isReusable(cached)) {
      return this.format(cached);
    }

    if (!this.refreshing) {
      this.refreshing = this.requestToken().finally(() => {
        this.refreshing = null;
      });
    }
    return this.format(await this.refreshing);
  }

  invalidate(): void {
    if (this.token) {
      this.logger.debug({}, "access token invalidated");
    }
    this.token = null;
  }

  private isReusable(token: AccessToken): boolean {
    const expiresAt = token.issuedAt + token.expiresInSeconds * 1000;
    return this.clock.now() < expiresAt - this.config.refreshThresholdMs;
  }

  private format(token: AccessToken): string {
    return `Bearer ${token.value}`;
  }

  private async requestToken(): Promise<AccessToken> {
    const { tokenUrl, clientId, clientSecret, scope, requestTimeoutMs } =
      this.config;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString(
      "base64"
    );
    const body = new URLSearchParams({ grant_type: "client_credentials" });
    if (scope) body.set("scope", scope);

    this.fetchCount += 1;
    const issuedAt = this.clock.now();

    let response: HttpResponse;
    try {
      response = await fetchWithTimeout(
        tokenUrl,
        {
          method: "POST",
          headers: {
            Authorization: `Basic ${basic}`,
            "Content-Type": "application/x-www-form-urlencoded",
            Accept: "application/json",
          },
          body: body.toString(),
        },
        requestTimeoutMs
      );
    } catch (error) {
      const reason =
        error instanceof RequestTimeoutError
          ? error.message
          : `network error: ${error instanceof Error ? error.message : String(error)}`;
      throw new AuthenticationError(`Token request failed: ${reason}`, {
        transient: true,
      });
    }

    const { text } = response;

    if (!response.ok) {
      const { error, errorDescription } = parseOAuthErrorBody(text);
      const detail = error
        ? `${error}${errorDescription ? `: ${errorDescription}` : ""}`
        : `HTTP ${response.status}`;
      throw new AuthenticationError(`Token endpoint rejected request: ${detail}`, {
        status: response.status,
        ...(error !== undefined ? { error } : {}),
        ...(errorDescription !== undefined ? { errorDescription } : {}),
        transient: response.status >= 500 || response.status === 429,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new AuthenticationError(
        "Token endpoint returned a non-JSON payload",
        { status: response.status }
      );
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      const missing = parsed.error.errors.map((e) => e.path.join(".")).join(", ");
      throw new AuthenticationError(
        `Token endpoint returned a malformed payload (${missing})`,
        { status: response.status }
      );
    }

    const token: AccessToken = {
      value: parsed.data.access_token,
      tokenType: parsed.data.token_type,
      issuedAt,
      expiresInSeconds: parsed.data.expires_in,
    };

    if (token.expiresInSeconds * 1000 <= this.config.refreshThresholdMs) {
      this.logger.warn(
        {
          expiresInSeconds: token.expiresInSeconds,
          refreshThresholdMs: this.config.refreshThresholdMs,
        },
        "token lifetime is inside the refresh threshold; every acquire will refresh"
      );
    }

    this.token = token;
    this.logger.info(
      { tokenType: token.tokenType, expiresInSeconds: token.expiresInSeconds },
      "access token refreshed"
    );
    return token;
  }
}
