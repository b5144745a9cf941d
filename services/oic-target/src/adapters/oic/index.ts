// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/oic`
 * Purpose: Barrel export for OIC and IDCS adapters.
 * Scope: Re-exports token and delivery adapters. Does not contain logic.
 * Invariants: none
 * Side-effects: none
 * Links: services/oic-target/src/bootstrap/container.ts
 * @internal
 */

export {
  type DeliveryClientDeps,
  type DeliveryClientSettings,
  OicDeliveryClient,
} from "./delivery-client.js";
export { DryRunDeliveryAdapter } from "./dry-run-delivery.js";
export { RequestTimeoutError } from "./http.js";
export { OAuth2TokenManager, type TokenManagerConfig } from "./token-manager.js";
