// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/buffer`
 * Purpose: Per-stream record accumulator with size/age flush triggers.
 * Scope: In-memory buffering and batch construction. Does not deliver batches or schedule flush checks.
 * Invariants:
 * - drain() hands off every buffered record exactly once; the buffer retains nothing afterwards.
 * - add() and drain() run to completion on the event loop, so an add lands wholly before or after a drain.
 * - Sequence numbers start at 1 and increase by one per drained batch.
 * - shouldFlush() is false for an empty buffer.
 * Side-effects: randomness (batch ids)
 * Links: packages/singer-core/src/model.ts (BatchEnvelope)
 * @public
 */

import { randomUUID } from "node:crypto";

import type { BatchEnvelope, TransformedRecord } from "./model.js";
import { type Clock, systemClock } from "./port.js";

export interface StreamBufferOptions {
  readonly batchSize: number;
  readonly maxBatchAgeMs: number;
  readonly clock?: Clock;
  /** Defaults to crypto.randomUUID */
  readonly newBatchId?: () => string;
}

export class StreamBuffer {
  private records: TransformedRecord[] = [];
  private lastFlushAt: number;
  private drained = 0;
  private readonly clock: Clock;
  private readonly newBatchId: () => string;

  constructor(
    public readonly stream: string,
    private readonly options: StreamBufferOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.newBatchId = options.newBatchId ?? randomUUID;
    this.lastFlushAt = this.clock.now();
  }

  /** Records added since the last drain */
  get size(): number {
    return this.records.length;
  }

  /** Sequence of the most recently drained batch (0 before the first drain) */
  get lastSequence(): number {
    return this.drained;
  }

  /** Sequence the next drained batch will carry */
  get nextSequence(): number {
    return this.drained + 1;
  }

  add(record: TransformedRecord): void {
    this.records.push(record);
  }

  shouldFlush(): boolean {
    if (this.records.length === 0) return false;
    if (this.records.length >= this.options.batchSize) return true;
    return this.clock.now() - this.lastFlushAt >= this.options.maxBatchAgeMs;
  }

  drain(): BatchEnvelope | null {
    const now = this.clock.now();
    this.lastFlushAt = now;
    if (this.records.length === 0) return null;

    const records = this.records;
    this.records = [];
    this.drained += 1;

    return {
      batchId: this.newBatchId(),
      stream: this.stream,
      sequence: this.drained,
      records,
      createdAt: new Date(now).toISOString(),
    };
  }
}
