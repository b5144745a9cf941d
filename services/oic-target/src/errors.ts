// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/errors`
 * Purpose: Service-level errors raised before the pipeline starts (config, env, CLI usage).
 * Scope: Error definitions and type guards. Pipeline errors live in @oic-target/singer-core.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: services/oic-target/src/main.ts (exit code 2)
 * @internal
 */

export class ConfigError extends Error {
  public readonly code = "CONFIG_INVALID" as const;
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.join("\n")}` : message);
    this.name = "ConfigError";
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof Error && error.name === "ConfigError";
}

export class UsageError extends Error {
  public readonly code = "USAGE" as const;
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function isUsageError(error: unknown): error is UsageError {
  return error instanceof Error && error.name === "UsageError";
}
