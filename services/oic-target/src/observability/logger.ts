// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only stderr emission.
 * Scope: Create configured pino loggers. Does not format output.
 * Invariants: Emits JSON to stderr (fd 2) because stdout carries Singer state lines. Safe to call at module scope.
 * Side-effects: none
 * Notes: Use makeLogger for the target; use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Links: Initializes redaction paths via REDACT_PATHS; used by main and the composition root.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level?: string;
  readonly serviceName?: string;
  readonly bindings?: Record<string, unknown>;
}

let destination: ReturnType<typeof pino.destination> | null = null;

export function makeLogger(options: LoggerOptions = {}): Logger {
  // Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "production";
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const serviceName =
    options.serviceName ?? process.env.SERVICE_NAME ?? "oic-target";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level,
    enabled: !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...options.bindings, service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  // stdout is the Singer state channel; logs always go to fd 2
  destination ??= pino.destination({ dest: 2, sync: true });
  return pino(config, destination);
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Flush buffered log lines before process.exit */
export function flushLogger(): void {
  destination?.flushSync();
}
