// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/singer`
 * Purpose: Barrel export for the Singer stdio adapters.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * Links: services/oic-target/src/main.ts
 * @internal
 */

export { readSingerMessages } from "./message-reader.js";
export { StreamStateSink } from "./state-sink.js";
