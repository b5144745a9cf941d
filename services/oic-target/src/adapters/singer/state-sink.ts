// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/singer/state-sink`
 * Purpose: StateSink writing one JSON line per emitted bookmark.
 * Scope: Serialization and write only. Ordering is the orchestrator's job.
 * Invariants: Exactly one newline-terminated JSON object per emit().
 * Side-effects: IO (writes to the given stream, stdout in production)
 * Links: packages/singer-core/src/port.ts (StateSink)
 * @internal
 */

import type { Writable } from "node:stream";

import type { StateSink } from "@oic-target/singer-core";

export class StreamStateSink implements StateSink {
  constructor(private readonly output: Writable) {}

  emit(state: Readonly<Record<string, unknown>>): void {
    this.output.write(`${JSON.stringify(state)}\n`);
  }
}
