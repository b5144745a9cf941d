// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/errors`
 * Purpose: Error taxonomy for the target pipeline.
 * Scope: Error definitions and type guards. Does not perform I/O or decide propagation policy.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: services/oic-target/src/main.ts (exit code mapping)
 * @public
 */

import type { DeliveryFailure } from "./model.js";

export interface AuthenticationErrorDetails {
  readonly status?: number;
  /** OAuth2 `error` field from the response body */
  readonly error?: string;
  /** OAuth2 `error_description` field from the response body */
  readonly errorDescription?: string;
  /** Network failure, timeout, or 5xx from the identity provider */
  readonly transient?: boolean;
}

export class AuthenticationError extends Error {
  public readonly code = "AUTHENTICATION_FAILED" as const;
  public readonly status: number | undefined;
  public readonly error: string | undefined;
  public readonly errorDescription: string | undefined;
  public readonly transient: boolean;

  constructor(message: string, details: AuthenticationErrorDetails = {}) {
    super(message);
    this.name = "AuthenticationError";
    this.status = details.status;
    this.error = details.error;
    this.errorDescription = details.errorDescription;
    this.transient = details.transient ?? false;
  }
}

export class DataValidationError extends Error {
  public readonly code = "DATA_VALIDATION_FAILED" as const;
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super(`Field "${field}": ${reason}`);
    this.name = "DataValidationError";
  }
}

export class UnknownStreamError extends Error {
  public readonly code = "UNKNOWN_STREAM" as const;
  constructor(public readonly stream: string) {
    super(`Record for stream "${stream}" arrived before its SCHEMA message`);
    this.name = "UnknownStreamError";
  }
}

export class DeliveryError extends Error {
  public readonly code = "DELIVERY_FAILED" as const;
  public readonly transient: boolean;
  constructor(
    public readonly stream: string,
    public readonly batchId: string,
    public readonly outcome: DeliveryFailure
  ) {
    super(
      `Batch ${batchId} for stream "${stream}" failed after ${outcome.attempts} attempt(s): ${outcome.kind}: ${outcome.message}`
    );
    this.name = "DeliveryError";
    this.transient = outcome.retryable;
  }
}

export interface UnconfirmedBatch {
  readonly stream: string;
  readonly batchId: string;
  readonly records: number;
}

export class ShutdownTimeoutError extends Error {
  public readonly code = "SHUTDOWN_TIMEOUT" as const;
  constructor(
    public readonly gracePeriodMs: number,
    public readonly unconfirmed: readonly UnconfirmedBatch[]
  ) {
    super(
      `Shutdown grace period of ${gracePeriodMs}ms elapsed with ${unconfirmed.length} batch(es) unconfirmed`
    );
    this.name = "ShutdownTimeoutError";
  }
}

export class MessageParseError extends Error {
  public readonly code = "MESSAGE_PARSE_FAILED" as const;
  constructor(
    public readonly lineNumber: number,
    public readonly reason: string
  ) {
    super(`Invalid Singer message on line ${lineNumber}: ${reason}`);
    this.name = "MessageParseError";
  }
}

export class ValidationThresholdError extends Error {
  public readonly code = "VALIDATION_THRESHOLD_EXCEEDED" as const;
  constructor(
    public readonly failed: number,
    public readonly total: number,
    public readonly threshold: number,
    public readonly lastError: DataValidationError
  ) {
    super(
      `${failed} of ${total} records failed validation, exceeding threshold ${threshold} (last: ${lastError.message})`
    );
    this.name = "ValidationThresholdError";
  }
}

// Type guards

export function isAuthenticationError(
  error: unknown
): error is AuthenticationError {
  return error instanceof Error && error.name === "AuthenticationError";
}

export function isDataValidationError(
  error: unknown
): error is DataValidationError {
  return error instanceof Error && error.name === "DataValidationError";
}

export function isUnknownStreamError(
  error: unknown
): error is UnknownStreamError {
  return error instanceof Error && error.name === "UnknownStreamError";
}

export function isDeliveryError(error: unknown): error is DeliveryError {
  return error instanceof Error && error.name === "DeliveryError";
}

export function isShutdownTimeoutError(
  error: unknown
): error is ShutdownTimeoutError {
  return error instanceof Error && error.name === "ShutdownTimeoutError";
}

export function isMessageParseError(
  error: unknown
): error is MessageParseError {
  return error instanceof Error && error.name === "MessageParseError";
}

export function isValidationThresholdError(
  error: unknown
): error is ValidationThresholdError {
  return error instanceof Error && error.name === "ValidationThresholdError";
}
