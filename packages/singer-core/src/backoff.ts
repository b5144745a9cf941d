// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/backoff`
 * Purpose: Exponential backoff delay as a pure function of the retry attempt.
 * Scope: Delay computation only. Does not sleep or decide retryability.
 * Invariants: delay = min(baseMs * 2^attempt, capMs); never negative.
 * Side-effects: none
 * Links: services/oic-target/src/adapters/oic/delivery-client.ts
 * @public
 */

export interface BackoffPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/**
 * @param attempt - zero-based retry index (0 for the first retry)
 *
 * @example
 * computeBackoffMs(0, { baseDelayMs: 1000, maxDelayMs: 30_000 }) // => 1000
 * computeBackoffMs(3, { baseDelayMs: 1000, maxDelayMs: 30_000 }) // => 8000
 * computeBackoffMs(9, { baseDelayMs: 1000, maxDelayMs: 30_000 }) // => 30000
 */
export function computeBackoffMs(
  attempt: number,
  policy: BackoffPolicy
): number {
  const raw = policy.baseDelayMs * 2 ** Math.max(0, attempt);
  return Math.max(0, Math.min(raw, policy.maxDelayMs));
}
