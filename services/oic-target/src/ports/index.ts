// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/ports`
 * Purpose: Port barrel: canonical import surface for all port interfaces used by this service.
 * Scope: Re-exports only. No implementations, no runtime objects.
 * Invariants: Named exports only, no concrete adapter types
 * Side-effects: none
 * Links: Consumed by pipeline/ and bootstrap/
 * @public
 */

export type {
  BatchDeliveryPort,
  Clock,
  StateSink,
  TokenProvider,
} from "@oic-target/singer-core";
