// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Process-level settings and secret overrides only: the Singer config file is parsed in config.ts.
 * Invariants:
 * - OIC_* secrets, when set, override the config file
 * - Empty strings are treated as unset
 * - Fails fast with clear errors on invalid env
 * Side-effects: process.env
 * Links: services/oic-target/src/config.ts
 * @internal
 */

import { z } from "zod";

import { ConfigError } from "../errors.js";

const optionalNonEmpty = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

const EnvSchema = z.object({
  /** OAuth2 client id override (optional) */
  OIC_OAUTH_CLIENT_ID: optionalNonEmpty,

  /** OAuth2 client secret override (optional, treat as secret - never log) */
  OIC_OAUTH_CLIENT_SECRET: optionalNonEmpty,

  /** OIC instance base URL override (optional) */
  OIC_BASE_URL: optionalNonEmpty,

  /** Log level (default: info) */
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),

  /** Service name for logging (default: oic-target) */
  SERVICE_NAME: z.string().default("oic-target"),

  NODE_ENV: z.string().default("production"),
});

export type Env = z.infer<typeof EnvSchema>;

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 * Throws on invalid config with clear error messages.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      "Invalid environment configuration",
      result.error.errors.map((e) => `  ${e.path.join(".")}: ${e.message}`)
    );
  }
  return result.data;
}
