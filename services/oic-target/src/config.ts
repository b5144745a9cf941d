// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/config`
 * Purpose: Singer config file schema with Zod validation, resolved into immutable TargetSettings.
 * Scope: Reads the JSON config file, applies env overrides, validates, converts units. Does not contain runtime logic.
 * Invariants:
 * - base_url, oauth_client_id, oauth_client_secret, oauth_token_url required (file or env)
 * - oauth_client_secret is a secret - never log
 * - All durations in the file are seconds; TargetSettings carries milliseconds
 * - Fails fast with every invalid path listed
 * Side-effects: IO (reads config file)
 * Links: services/oic-target/src/bootstrap/env.ts, services/oic-target/src/bootstrap/container.ts
 * @internal
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { z } from "zod";

import type { Env } from "./bootstrap/env.js";
import { ConfigError } from "./errors.js";

const DEFAULT_OIC_SCOPE = "urn:opc:resource:consumer::all";

export const TargetConfigSchema = z.object({
  /** OIC instance base URL, e.g. https://myinstance-region.integration.ocp.oraclecloud.com */
  base_url: z.string().url("base_url must be a valid URL"),

  /** OAuth2 client id from the IDCS application */
  oauth_client_id: z.string().min(1, "oauth_client_id is required"),

  /** OAuth2 client secret (treat as secret - never log) */
  oauth_client_secret: z.string().min(1, "oauth_client_secret is required"),

  /** IDCS token endpoint */
  oauth_token_url: z.string().url("oauth_token_url must be a valid URL"),

  /** IDCS client audience; when set, the OIC scope pair is derived from it */
  oauth_client_aud: z.string().min(1).optional(),

  /** Explicit scope, used when no audience is configured */
  oauth_scope: z.string().min(1).optional(),

  /** Seconds before expiry at which a cached token stops being reused */
  token_refresh_threshold: z.number().nonnegative().default(60),

  batch_size: z.number().int().positive().max(10_000).default(25),

  /** Seconds a non-empty buffer may wait before it is flushed */
  max_batch_age: z.number().positive().default(30),

  /** Seconds between periodic flush checks */
  flush_check_interval: z.number().positive().default(1),

  /** Seconds per HTTP request (token and data endpoints) */
  request_timeout: z.number().positive().max(300).default(30),

  max_retries: z.number().int().min(0).max(10).default(3),

  /** Base backoff delay in seconds */
  retry_delay: z.number().nonnegative().default(1),

  /** Backoff cap in seconds */
  max_retry_delay: z.number().nonnegative().default(30),

  max_concurrent_batches: z.number().int().positive().default(4),

  /** Queued + in-flight batches above which the reader pauses */
  max_pending_batches: z.number().int().positive().default(32),

  /** Seconds to wait for in-flight deliveries on shutdown */
  shutdown_grace_period: z.number().nonnegative().default(30),

  /** Fraction of records (0..1) allowed to fail validation before the run aborts */
  validation_error_threshold: z.number().min(0).max(1).default(0),

  /** Path template for streams without an explicit mapping; `{stream}` is substituted */
  endpoint_template: z
    .string()
    .startsWith("/", "endpoint_template must start with /")
    .default("/ic/api/integration/v1/{stream}"),

  /** Per-stream endpoint paths, e.g. { "lookups": "/ic/api/integration/v1/lookups" } */
  stream_endpoints: z
    .record(z.string().startsWith("/", "endpoint paths must start with /"))
    .default({}),

  /** Validate and batch without calling OIC */
  dry_run: z.boolean().default(false),
});

export type TargetConfig = z.infer<typeof TargetConfigSchema>;

/** Immutable settings consumed by the pipeline. Milliseconds throughout. */
export interface TargetSettings {
  readonly baseUrl: string;
  readonly auth: {
    readonly clientId: string;
    readonly clientSecret: string;
    readonly tokenUrl: string;
    readonly scope: string;
    readonly refreshThresholdMs: number;
  };
  readonly batchSize: number;
  readonly maxBatchAgeMs: number;
  readonly flushCheckIntervalMs: number;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly maxRetryDelayMs: number;
  readonly maxConcurrentBatches: number;
  readonly maxPendingBatches: number;
  readonly shutdownGracePeriodMs: number;
  readonly validationErrorThreshold: number;
  readonly endpointTemplate: string;
  readonly streamEndpoints: Readonly<Record<string, string>>;
  readonly dryRun: boolean;
}

/**
 * OIC scope resolution: audience-derived pair, else explicit scope, else consumer-all.
 *
 * @example
 * buildOicScope({ oauth_client_aud: "https://idcs.example.com" })
 * // => "https://idcs.example.com:443urn:opc:resource:consumer::all https://idcs.example.com:443/ic/api/"
 */
export function buildOicScope(
  config: Pick<TargetConfig, "oauth_client_aud" | "oauth_scope">
): string {
  if (config.oauth_client_aud) {
    const aud = config.oauth_client_aud;
    return `${aud}:443${DEFAULT_OIC_SCOPE} ${aud}:443/ic/api/`;
  }
  return config.oauth_scope ?? DEFAULT_OIC_SCOPE;
}

const seconds = (s: number): number => Math.round(s * 1000);

export function resolveSettings(config: TargetConfig): TargetSettings {
  return Object.freeze({
    baseUrl: config.base_url.replace(/\/+$/, ""),
    auth: Object.freeze({
      clientId: config.oauth_client_id,
      clientSecret: config.oauth_client_secret,
      tokenUrl: config.oauth_token_url,
      scope: buildOicScope(config),
      refreshThresholdMs: seconds(config.token_refresh_threshold),
    }),
    batchSize: config.batch_size,
    maxBatchAgeMs: seconds(config.max_batch_age),
    flushCheckIntervalMs: seconds(config.flush_check_interval),
    requestTimeoutMs: seconds(config.request_timeout),
    maxRetries: config.max_retries,
    retryDelayMs: seconds(config.retry_delay),
    maxRetryDelayMs: seconds(config.max_retry_delay),
    maxConcurrentBatches: config.max_concurrent_batches,
    maxPendingBatches: config.max_pending_batches,
    shutdownGracePeriodMs: seconds(config.shutdown_grace_period),
    validationErrorThreshold: config.validation_error_threshold,
    endpointTemplate: config.endpoint_template,
    streamEndpoints: Object.freeze(
      Object.fromEntries(Object.entries(config.stream_endpoints))
    ),
    dryRun: config.dry_run,
  });
}

/**
 * Validate a raw config object (already merged with env overrides).
 * Throws ConfigError listing every invalid path.
 */
export function parseTargetConfig(raw: unknown): TargetConfig {
  const result = TargetConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      "Invalid target configuration",
      result.error.errors.map(
        (e) => `  ${e.path.join(".") || "(root)"}: ${e.message}`
      )
    );
  }
  return result.data;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load the Singer config file, apply OIC_* env overrides, validate.
 */
export function loadTargetConfig(
  configPath: string,
  environment: Pick<
    Env,
    "OIC_OAUTH_CLIENT_ID" | "OIC_OAUTH_CLIENT_SECRET" | "OIC_BASE_URL"
  >
): TargetConfig {
  const resolvedPath = resolve(configPath);

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolvedPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${resolvedPath}: ${reason}`);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${resolvedPath} must contain a JSON object`);
  }

  // Environment variable overrides for secrets
  const merged: Record<string, unknown> = { ...parsed };
  if (environment.OIC_OAUTH_CLIENT_ID) {
    merged["oauth_client_id"] = environment.OIC_OAUTH_CLIENT_ID;
  }
  if (environment.OIC_OAUTH_CLIENT_SECRET) {
    merged["oauth_client_secret"] = environment.OIC_OAUTH_CLIENT_SECRET;
  }
  if (environment.OIC_BASE_URL) {
    merged["base_url"] = environment.OIC_BASE_URL;
  }

  return parseTargetConfig(merged);
}

/**
 * Endpoint path for a stream: explicit mapping first, then the template.
 *
 * @example
 * resolveEndpointPath("lookups", { endpointTemplate: "/ic/api/integration/v1/{stream}", streamEndpoints: {} })
 * // => "/ic/api/integration/v1/lookups"
 */
export function resolveEndpointPath(
  stream: string,
  settings: Pick<TargetSettings, "endpointTemplate" | "streamEndpoints">
): string {
  if (Object.hasOwn(settings.streamEndpoints, stream)) {
    const mapped = settings.streamEndpoints[stream];
    if (mapped !== undefined) return mapped;
  }
  return settings.endpointTemplate.replaceAll(
    "{stream}",
    encodeURIComponent(stream)
  );
}
