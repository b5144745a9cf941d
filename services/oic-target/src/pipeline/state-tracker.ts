// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/pipeline/state-tracker`
 * Purpose: Holds STATE messages until every batch they depend on is confirmed.
 * Scope: Pure bookkeeping over per-stream batch sequence numbers. Does not write output.
 * Invariants:
 * - STATE_AFTER_DELIVERY: a held state is released only when, for each stream it depends on,
 *   the delivered sequence has reached the required sequence.
 * - Released states keep arrival order; when several become ready together only the latest is returned.
 * Side-effects: none
 * Links: services/oic-target/src/pipeline/orchestrator.ts
 * @internal
 */

import type { StateMessage } from "@oic-target/singer-core";

type StateValue = StateMessage["value"];

interface HeldState {
  readonly value: StateValue;
  /** stream → batch sequence that must be confirmed before release */
  readonly requires: ReadonlyMap<string, number>;
}

export class StateTracker {
  private held: HeldState[] = [];
  private readonly delivered = new Map<string, number>();

  get heldCount(): number {
    return this.held.length;
  }

  /** Highest confirmed batch sequence for a stream (0 when none). */
  deliveredSequence(stream: string): number {
    return this.delivered.get(stream) ?? 0;
  }

  hold(value: StateValue, requires: ReadonlyMap<string, number>): void {
    this.held.push({ value, requires });
  }

  markDelivered(stream: string, sequence: number): void {
    if (sequence > this.deliveredSequence(stream)) {
      this.delivered.set(stream, sequence);
    }
  }

  /**
   * Remove and return the latest state whose dependencies are all confirmed,
   * together with every earlier held state. `undefined` when none is ready.
   */
  takeReady(): { readonly value: StateValue } | undefined {
    let readyIndex = -1;
    for (let i = 0; i < this.held.length; i++) {
      const entry = this.held[i];
      if (entry && this.isSatisfied(entry)) readyIndex = i;
      else break;
    }
    if (readyIndex < 0) return undefined;

    const entry = this.held[readyIndex];
    this.held = this.held.slice(readyIndex + 1);
    return entry ? { value: entry.value } : undefined;
  }

  private isSatisfied(entry: HeldState): boolean {
    for (const [stream, sequence] of entry.requires) {
      if (this.deliveredSequence(stream) < sequence) return false;
    }
    return true;
  }
}
