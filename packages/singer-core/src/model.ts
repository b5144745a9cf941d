// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/model`
 * Purpose: Domain types for the Singer target pipeline: messages, batches, delivery outcomes.
 * Scope: Pure types. Does not contain I/O, parsing, or adapter deps.
 * Invariants:
 * - Messages are immutable once parsed.
 * - BatchEnvelope.sequence is per-stream, starts at 1, and increases in drain order.
 * - A record is delivered only when its batch has an `ok: true` DeliveryOutcome.
 * Side-effects: none
 * Links: packages/singer-core/src/messages.ts, packages/singer-core/src/buffer.ts
 * @public
 */

/** JSON-schema-like stream schema as sent by a tap. Only the parts the target reads are typed. */
export interface StreamSchema {
  readonly type?: string | readonly string[];
  readonly properties?: Readonly<Record<string, PropertySchema>>;
  readonly required?: readonly string[];
  readonly [key: string]: unknown;
}

export interface PropertySchema {
  readonly type?: string | readonly string[];
  readonly format?: string;
  readonly [key: string]: unknown;
}

export interface SchemaMessage {
  readonly type: "SCHEMA";
  readonly stream: string;
  readonly schema: StreamSchema;
  readonly keyProperties: readonly string[];
  readonly bookmarkProperties: readonly string[];
}

export interface RecordMessage {
  readonly type: "RECORD";
  readonly stream: string;
  readonly record: Readonly<Record<string, unknown>>;
  /** ISO timestamp from the tap, when provided */
  readonly timeExtracted?: string;
  readonly version?: number;
}

export interface StateMessage {
  readonly type: "STATE";
  /** Opaque bookmark mapping; emitted verbatim once its dependencies are delivered */
  readonly value: Readonly<Record<string, unknown>>;
}

export type SingerMessage = SchemaMessage | RecordMessage | StateMessage;

/** Record after schema-driven coercion. Same keys as the input record. */
export type TransformedRecord = Readonly<Record<string, unknown>>;

/** Unit submitted to OIC. Built by StreamBuffer.drain(). */
export interface BatchEnvelope {
  /** UUID v4; reused on every retry of this batch */
  readonly batchId: string;
  readonly stream: string;
  readonly sequence: number;
  readonly records: readonly TransformedRecord[];
  /** ISO-8601 creation time */
  readonly createdAt: string;
}

export type DeliveryErrorKind =
  | "network"
  | "timeout"
  | "rate_limited"
  | "server_error"
  | "authentication"
  | "client_error"
  | "aborted";

export interface DeliverySuccess {
  readonly ok: true;
  readonly processed: number;
  readonly attempts: number;
}

export interface DeliveryFailure {
  readonly ok: false;
  readonly kind: DeliveryErrorKind;
  readonly retryable: boolean;
  readonly status?: number;
  readonly message: string;
  readonly attempts: number;
}

export type DeliveryOutcome = DeliverySuccess | DeliveryFailure;
