// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module; defines sensitive path patterns.
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "access_token",
  "refresh_token",
  "secret",
  "client_secret",
  // Target config secrets
  "oauth_client_secret",
  "config.oauth_client_secret",
  "auth.clientSecret",
  "settings.auth.clientSecret",
  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",
];
