// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/fake-delivery`
 * Purpose: In-memory BatchDeliveryPort and StateSink for pipeline tests.
 * Scope: Records every batch and state; outcomes are scripted per call or settled manually.
 * Invariants: deliver() never touches the network.
 * Side-effects: none
 * Links: packages/singer-core/src/port.ts
 * @public
 */

import type {
  BatchDeliveryPort,
  BatchEnvelope,
  DeliveryOutcome,
  StateSink,
} from "@oic-target/singer-core";

type Responder = (batch: BatchEnvelope) => DeliveryOutcome | Promise<DeliveryOutcome>;

const succeed: Responder = (batch) => ({
  ok: true,
  processed: batch.records.length,
  attempts: 1,
});

/** Delivers immediately with scripted outcomes; defaults to success. */
export class FakeDeliveryPort implements BatchDeliveryPort {
  readonly delivered: BatchEnvelope[] = [];
  private responder: Responder = succeed;

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  async deliver(batch: BatchEnvelope): Promise<DeliveryOutcome> {
    this.delivered.push(batch);
    return this.responder(batch);
  }
}

interface Held {
  readonly batch: BatchEnvelope;
  readonly resolve: (outcome: DeliveryOutcome) => void;
}

/** Holds every delivery open until the test settles it. */
export class ManualDeliveryPort implements BatchDeliveryPort {
  readonly started: BatchEnvelope[] = [];
  private readonly held: Held[] = [];

  get openCount(): number {
    return this.held.length;
  }

  deliver(batch: BatchEnvelope): Promise<DeliveryOutcome> {
    this.started.push(batch);
    return new Promise((resolve) => {
      this.held.push({ batch, resolve });
    });
  }

  /** Settle the open delivery for `batchId` (success unless an outcome is given). */
  settle(batchId: string, outcome?: DeliveryOutcome): void {
    const index = this.held.findIndex((h) => h.batch.batchId === batchId);
    const entry = this.held[index];
    if (!entry) throw new Error(`No open delivery for ${batchId}`);
    this.held.splice(index, 1);
    entry.resolve(
      outcome ?? { ok: true, processed: entry.batch.records.length, attempts: 1 }
    );
  }
}

export class MemoryStateSink implements StateSink {
  readonly states: Readonly<Record<string, unknown>>[] = [];

  emit(state: Readonly<Record<string, unknown>>): void {
    this.states.push(state);
  }
}

/** Run every queued microtask before continuing. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
