// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/port`
 * Purpose: Port interfaces between the pipeline core and its adapters (auth, delivery, state output, time).
 * Scope: Pure interfaces. Implementations live in services/oic-target/src/adapters/.
 * Invariants:
 * - ADAPTERS_NOT_IN_CORE: HTTP, stdout, and timers stay behind these ports.
 * - BatchDeliveryPort.deliver() resolves with an outcome; it does not reject for HTTP or network failures.
 * Side-effects: none
 * Links: services/oic-target/src/adapters/oic/token-manager.ts, services/oic-target/src/adapters/oic/delivery-client.ts
 * @public
 */

import type { BatchEnvelope, DeliveryOutcome } from "./model.js";

/** Source of bearer credentials for outbound calls. */
export interface TokenProvider {
  /**
   * Returns a ready-to-send `Authorization` header value.
   * Refreshes first when the cached token is inside the refresh threshold.
   */
  acquire(): Promise<string>;

  /** Drop the cached token so the next acquire() re-fetches. */
  invalidate(): void;
}

export interface BatchDeliveryPort {
  deliver(batch: BatchEnvelope): Promise<DeliveryOutcome>;
}

/** Receives bookmarks once every batch they depend on has been delivered. */
export interface StateSink {
  emit(state: Readonly<Record<string, unknown>>): void;
}

export interface Clock {
  /** Epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
