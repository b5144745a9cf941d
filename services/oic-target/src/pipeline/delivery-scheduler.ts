// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/pipeline/delivery-scheduler`
 * Purpose: Bounded worker pool for drained batches: concurrent across streams, FIFO within a stream.
 * Scope: Queues batches, runs them through BatchDeliveryPort under a semaphore, reports each outcome once.
 * Invariants:
 * - STREAM_FIFO: a stream's batches start in submit order and never overlap.
 * - At most maxConcurrentBatches deliveries in flight.
 * - After a stream's batch fails, its later batches are not sent (outcome `aborted`).
 * - After halt(), queued batches are not sent (outcome `aborted`); in-flight ones finish.
 * - onSettled is called exactly once per submitted batch.
 * Side-effects: none (IO happens in the injected port)
 * Links: services/oic-target/src/pipeline/semaphore.ts, services/oic-target/src/pipeline/orchestrator.ts
 * @internal
 */

import type {
  BatchDeliveryPort,
  BatchEnvelope,
  DeliveryOutcome,
} from "@oic-target/singer-core";

import type { Logger } from "../observability/logger.js";
import { Semaphore } from "./semaphore.js";

export type SettledHandler = (
  batch: BatchEnvelope,
  outcome: DeliveryOutcome
) => void;

export interface DeliverySchedulerOptions {
  readonly maxConcurrentBatches: number;
  readonly onSettled: SettledHandler;
}

interface Waiter {
  readonly ready: () => boolean;
  readonly resolve: () => void;
}

export class DeliveryScheduler {
  private readonly semaphore: Semaphore;
  private readonly onSettled: SettledHandler;
  private readonly tails = new Map<string, Promise<void>>();
  private readonly failedStreams = new Set<string>();
  private readonly pending = new Map<string, BatchEnvelope>();
  private readonly inFlight = new Set<string>();
  private waiters: Waiter[] = [];
  private halted = false;

  constructor(
    private readonly port: BatchDeliveryPort,
    options: DeliverySchedulerOptions,
    private readonly logger: Logger
  ) {
    this.semaphore = new Semaphore(options.maxConcurrentBatches);
    this.onSettled = options.onSettled;
  }

  /** Batches queued or in flight */
  get pendingCount(): number {
    return this.pending.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Snapshot of queued and in-flight batches, oldest first */
  pendingBatches(): BatchEnvelope[] {
    return [...this.pending.values()];
  }

  submit(batch: BatchEnvelope): void {
    this.pending.set(batch.batchId, batch);
    const previous = this.tails.get(batch.stream) ?? Promise.resolve();
    const next = previous.then(() => this.runOne(batch));
    this.tails.set(batch.stream, next);
  }

  /** Stop sending queued batches. In-flight deliveries are left to finish. */
  halt(): void {
    this.halted = true;
  }

  /** Resolves once nothing is queued or in flight. */
  waitForIdle(): Promise<void> {
    return this.waitUntil(() => this.pending.size === 0);
  }

  /** Resolves once fewer than `limit` batches are queued or in flight. */
  waitForCapacity(limit: number): Promise<void> {
    return this.waitUntil(() => this.pending.size < limit);
  }

  private waitUntil(ready: () => boolean): Promise<void> {
    if (ready()) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push({ ready, resolve });
    });
  }

  private notify(): void {
    const still: Waiter[] = [];
    for (const waiter of this.waiters) {
      if (waiter.ready()) waiter.resolve();
      else still.push(waiter);
    }
    this.waiters = still;
  }

  private async runOne(batch: BatchEnvelope): Promise<void> {
    const outcome = await this.deliverOne(batch);
    if (!outcome.ok) {
      this.failedStreams.add(batch.stream);
    }
    this.pending.delete(batch.batchId);

    try {
      this.onSettled(batch, outcome);
    } catch (error) {
      this.logger.error(
        { err: error, stream: batch.stream, batchId: batch.batchId },
        "outcome handler threw"
      );
    }
    this.notify();
  }

  private async deliverOne(batch: BatchEnvelope): Promise<DeliveryOutcome> {
    if (this.halted || this.failedStreams.has(batch.stream)) {
      return {
        ok: false,
        kind: "aborted",
        retryable: false,
        message: this.halted
          ? "delivery halted before this batch was sent"
          : "an earlier batch for this stream failed",
        attempts: 0,
      };
    }

    return this.semaphore.run(async () => {
      // Re-check after waiting for a permit
      if (this.halted) {
        return {
          ok: false,
          kind: "aborted",
          retryable: false,
          message: "delivery halted before this batch was sent",
          attempts: 0,
        } satisfies DeliveryOutcome;
      }
      this.inFlight.add(batch.batchId);
      try {
        return await this.port.deliver(batch);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return {
          ok: false,
          kind: "network",
          retryable: false,
          message: `unexpected delivery error: ${reason}`,
          attempts: 1,
        } satisfies DeliveryOutcome;
      } finally {
        this.inFlight.delete(batch.batchId);
      }
    });
  }
}
