// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/pipeline/orchestrator`
 * Purpose: Routes Singer messages through transform → buffer → delivery and releases STATE in delivery order.
 * Scope: Owns StreamContexts, the flush timer, the DeliveryScheduler and the StateTracker. Does not read stdin or talk HTTP.
 * Invariants:
 * - Single ordered message loop: handle() is awaited per message.
 * - STATE_AFTER_DELIVERY: a STATE value is written only after every batch drained before it has been confirmed.
 * - A stream's buffer is drained before its schema is replaced.
 * - Validation failures above validationErrorThreshold (fraction of records seen) abort the run.
 * - Once a fatal error is recorded, handle() and shutdown() rethrow it and `failed` aborts.
 * - Per-stream phases: UNINITIALIZED → SCHEMA_RECEIVED → ACTIVE → DRAINING → CLOSED.
 * Side-effects: time (flush timer), IO via injected ports
 * Links: services/oic-target/src/pipeline/delivery-scheduler.ts, services/oic-target/src/pipeline/state-tracker.ts
 * @public
 */

import {
  type BatchDeliveryPort,
  type BatchEnvelope,
  type Clock,
  type CompiledSchema,
  compileSchema,
  DataValidationError,
  DeliveryError,
  type DeliveryOutcome,
  isDataValidationError,
  isShutdownTimeoutError,
  type RecordMessage,
  type SchemaMessage,
  type SingerMessage,
  type StateMessage,
  type StateSink,
  StreamBuffer,
  ShutdownTimeoutError,
  systemClock,
  type TransformedRecord,
  transformRecord,
  UnknownStreamError,
  ValidationThresholdError,
} from "@oic-target/singer-core";

import type { TargetSettings } from "../config.js";
import type { Logger } from "../observability/logger.js";
import { DeliveryScheduler } from "./delivery-scheduler.js";
import { StateTracker } from "./state-tracker.js";

export type StreamPhase =
  | "UNINITIALIZED"
  | "SCHEMA_RECEIVED"
  | "ACTIVE"
  | "DRAINING"
  | "CLOSED";

export type OrchestratorSettings = Pick<
  TargetSettings,
  | "batchSize"
  | "maxBatchAgeMs"
  | "flushCheckIntervalMs"
  | "maxConcurrentBatches"
  | "maxPendingBatches"
  | "shutdownGracePeriodMs"
  | "validationErrorThreshold"
>;

export interface OrchestratorDeps {
  readonly delivery: BatchDeliveryPort;
  readonly stateSink: StateSink;
  readonly logger: Logger;
  readonly clock?: Clock;
  readonly newBatchId?: () => string;
}

export interface StreamSummary {
  readonly received: number;
  readonly delivered: number;
  readonly skipped: number;
  readonly batches: number;
}

export interface RunSummary {
  readonly streams: Readonly<Record<string, StreamSummary>>;
  readonly statesEmitted: number;
  readonly validationFailures: number;
}

/** Stream name → records not confirmed delivered (buffered + submitted but unconfirmed) */
export type UndeliveredReport = Readonly<Record<string, number>>;

interface StreamContext {
  readonly name: string;
  phase: StreamPhase;
  schema: CompiledSchema;
  schemaFingerprint: string;
  keyProperties: readonly string[];
  readonly buffer: StreamBuffer;
  /** Records drained into batches that have not succeeded */
  unconfirmed: number;
  received: number;
  delivered: number;
  skipped: number;
  batches: number;
}

export class PipelineOrchestrator {
  private readonly streams = new Map<string, StreamContext>();
  private readonly scheduler: DeliveryScheduler;
  private readonly tracker = new StateTracker();
  private readonly clock: Clock;
  private timer: ReturnType<typeof setInterval> | null = null;
  private fatal: Error | null = null;
  private readonly failure = new AbortController();
  private closed = false;
  private recordsSeen = 0;
  private validationFailures = 0;
  private statesEmitted = 0;

  constructor(
    private readonly settings: OrchestratorSettings,
    private readonly deps: OrchestratorDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.scheduler = new DeliveryScheduler(
      deps.delivery,
      {
        maxConcurrentBatches: settings.maxConcurrentBatches,
        onSettled: (batch, outcome) => this.onSettled(batch, outcome),
      },
      deps.logger
    );
  }

  phaseOf(stream: string): StreamPhase {
    return this.streams.get(stream)?.phase ?? "UNINITIALIZED";
  }

  /** Batches queued or in flight */
  get pendingBatches(): number {
    return this.scheduler.pendingCount;
  }

  /** Aborts with the first fatal error, so the caller can stop reading input. */
  get failed(): AbortSignal {
    return this.failure.signal;
  }

  /** Start the periodic flush check. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.settings.flushCheckIntervalMs);
    this.timer.unref();
  }

  private stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Consume a message stream to its end, then shut down.
   * Stops reading early when `signal` aborts; buffered records are still drained.
   */
  async run(
    messages: AsyncIterable<SingerMessage>,
    signal?: AbortSignal
  ): Promise<RunSummary> {
    this.start();
    for await (const message of messages) {
      await this.handle(message);
      if (signal?.aborted) {
        this.deps.logger.info({}, "stop requested; no further input is read");
        break;
      }
    }
    return this.shutdown();
  }

  async handle(message: SingerMessage): Promise<void> {
    if (this.fatal) throw this.fatal;
    if (this.closed) {
      throw new Error("Pipeline is closed; no further messages are accepted");
    }

    switch (message.type) {
      case "SCHEMA":
        await this.applyBackpressure();
        this.onSchema(message);
        return;
      case "RECORD":
        await this.applyBackpressure();
        this.onRecord(message);
        return;
      case "STATE":
        this.onState(message);
        return;
    }
  }

  /** Drain every buffer whose size or age trigger holds. */
  tick(): void {
    if (this.fatal || this.closed) return;
    for (const ctx of this.streams.values()) {
      if (ctx.buffer.shouldFlush()) this.flush(ctx, "age");
    }
  }

  /**
   * Graceful shutdown: drain all buffers, wait for deliveries within the grace period,
   * emit the final state and close every stream.
   *
   * @throws ShutdownTimeoutError when deliveries outlive the grace period
   * @throws the recorded fatal error (DeliveryError, UnknownStreamError, ...)
   */
  async shutdown(): Promise<RunSummary> {
    this.stop();
    if (this.fatal) throw this.fatal;

    for (const ctx of this.streams.values()) {
      ctx.phase = "DRAINING";
      this.flush(ctx, "shutdown");
    }

    await this.settle();
    if (this.fatal) throw this.fatal;

    this.emitReadyState();
    for (const ctx of this.streams.values()) ctx.phase = "CLOSED";
    this.closed = true;

    const summary = this.summary();
    this.deps.logger.info(
      { statesEmitted: summary.statesEmitted, validationFailures: summary.validationFailures },
      "pipeline shut down"
    );
    return summary;
  }

  /**
   * Fatal-path teardown: stop sending queued batches, let in-flight ones finish
   * within the grace period, and report what was not confirmed.
   */
  async abort(reason: Error): Promise<UndeliveredReport> {
    this.stop();
    this.recordFatal(reason);
    this.scheduler.halt();

    try {
      await this.settle();
    } catch (error) {
      if (!isShutdownTimeoutError(error)) throw error;
      this.deps.logger.error(
        { unconfirmed: error.unconfirmed },
        "in-flight deliveries did not finish within the grace period"
      );
    }

    for (const ctx of this.streams.values()) ctx.phase = "CLOSED";
    this.closed = true;
    return this.undeliveredReport();
  }

  undeliveredReport(): UndeliveredReport {
    const entries: Array<[string, number]> = [];
    for (const ctx of this.streams.values()) {
      const count = ctx.buffer.size + ctx.unconfirmed;
      if (count > 0) entries.push([ctx.name, count]);
    }
    // Own properties only: a stream named `__proto__` stays a key
    return Object.fromEntries(entries);
  }

  summary(): RunSummary {
    const streams = [...this.streams.values()].map(
      (ctx): [string, StreamSummary] => [
        ctx.name,
        {
          received: ctx.received,
          delivered: ctx.delivered,
          skipped: ctx.skipped,
          batches: ctx.batches,
        },
      ]
    );
    return {
      streams: Object.fromEntries(streams),
      statesEmitted: this.statesEmitted,
      validationFailures: this.validationFailures,
    };
  }

  private onSchema(message: SchemaMessage): void {
    const fingerprint = JSON.stringify([message.schema, message.keyProperties]);
    const existing = this.streams.get(message.stream);

    if (!existing) {
      this.streams.set(message.stream, {
        name: message.stream,
        phase: "SCHEMA_RECEIVED",
        schema: compileSchema(message.schema),
        schemaFingerprint: fingerprint,
        keyProperties: message.keyProperties,
        buffer: new StreamBuffer(message.stream, {
          batchSize: this.settings.batchSize,
          maxBatchAgeMs: this.settings.maxBatchAgeMs,
          clock: this.clock,
          ...(this.deps.newBatchId ? { newBatchId: this.deps.newBatchId } : {}),
        }),
        unconfirmed: 0,
        received: 0,
        delivered: 0,
        skipped: 0,
        batches: 0,
      });
      this.deps.logger.info(
        { stream: message.stream, keyProperties: message.keyProperties },
        "stream registered"
      );
      return;
    }

    if (existing.schemaFingerprint === fingerprint) return;

    this.flush(existing, "schema_change");
    existing.schema = compileSchema(message.schema);
    existing.schemaFingerprint = fingerprint;
    existing.keyProperties = message.keyProperties;
    this.deps.logger.info({ stream: message.stream }, "stream schema replaced");
  }

  private onRecord(message: RecordMessage): void {
    const ctx = this.streams.get(message.stream);
    if (!ctx) {
      throw this.recordFatal(new UnknownStreamError(message.stream));
    }

    ctx.received += 1;
    this.recordsSeen += 1;

    let transformed: TransformedRecord;
    try {
      transformed = transformRecord(message.record, ctx.schema);
    } catch (error) {
      if (!isDataValidationError(error)) throw error;
      this.onValidationFailure(ctx, error);
      return;
    }

    ctx.buffer.add(transformed);
    ctx.phase = "ACTIVE";
    if (ctx.buffer.shouldFlush()) this.flush(ctx, "size");
  }

  private onValidationFailure(ctx: StreamContext, error: DataValidationError): void {
    this.validationFailures += 1;
    ctx.skipped += 1;

    const threshold = this.settings.validationErrorThreshold;
    if (this.validationFailures / this.recordsSeen > threshold) {
      throw this.recordFatal(
        new ValidationThresholdError(
          this.validationFailures,
          this.recordsSeen,
          threshold,
          error
        )
      );
    }

    this.deps.logger.warn(
      { stream: ctx.name, field: error.field, reason: error.reason },
      "record skipped: validation failed"
    );
  }

  private onState(message: StateMessage): void {
    const requires = new Map<string, number>();
    for (const ctx of this.streams.values()) {
      if (ctx.buffer.size > 0) {
        requires.set(ctx.name, ctx.buffer.nextSequence);
      } else if (
        ctx.buffer.lastSequence > this.tracker.deliveredSequence(ctx.name)
      ) {
        requires.set(ctx.name, ctx.buffer.lastSequence);
      }
    }

    this.tracker.hold(message.value, requires);
    this.emitReadyState();
  }

  private flush(ctx: StreamContext, reason: string): void {
    const batch = ctx.buffer.drain();
    if (!batch) return;

    ctx.unconfirmed += batch.records.length;
    ctx.batches += 1;
    this.deps.logger.debug(
      {
        stream: ctx.name,
        batchId: batch.batchId,
        sequence: batch.sequence,
        records: batch.records.length,
        reason,
      },
      "batch drained"
    );
    this.scheduler.submit(batch);
  }

  private onSettled(batch: BatchEnvelope, outcome: DeliveryOutcome): void {
    const ctx = this.streams.get(batch.stream);
    if (!ctx) return;

    if (outcome.ok) {
      ctx.unconfirmed -= batch.records.length;
      ctx.delivered += outcome.processed;
      this.tracker.markDelivered(batch.stream, batch.sequence);
      this.emitReadyState();
      return;
    }

    this.deps.logger.error(
      {
        stream: batch.stream,
        batchId: batch.batchId,
        sequence: batch.sequence,
        records: batch.records.length,
        kind: outcome.kind,
        status: outcome.status,
      },
      "batch not delivered; records need manual reconciliation"
    );
    if (!this.fatal) {
      this.recordFatal(new DeliveryError(batch.stream, batch.batchId, outcome));
    }
  }

  private emitReadyState(): void {
    const ready = this.tracker.takeReady();
    if (!ready) return;
    this.deps.stateSink.emit(ready.value);
    this.statesEmitted += 1;
    this.deps.logger.info({ held: this.tracker.heldCount }, "state emitted");
  }

  private async applyBackpressure(): Promise<void> {
    const limit = this.settings.maxPendingBatches;
    if (this.scheduler.pendingCount < limit) return;
    this.deps.logger.debug(
      { pending: this.scheduler.pendingCount, limit },
      "backpressure: waiting for deliveries"
    );
    await this.scheduler.waitForCapacity(limit);
  }

  private async settle(): Promise<void> {
    const graceMs = this.settings.shutdownGracePeriodMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), graceMs);
    });

    try {
      const result = await Promise.race([
        this.scheduler.waitForIdle().then(() => "idle" as const),
        timedOut,
      ]);
      if (result === "timeout") {
        const unconfirmed = this.scheduler.pendingBatches().map((batch) => ({
          stream: batch.stream,
          batchId: batch.batchId,
          records: batch.records.length,
        }));
        this.scheduler.halt();
        throw new ShutdownTimeoutError(graceMs, unconfirmed);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private recordFatal(error: Error): Error {
    if (!this.fatal) {
      this.fatal = error;
      this.failure.abort(error);
    }
    return error;
  }
}
