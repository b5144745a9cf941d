// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/transformer`
 * Purpose: Apply compiled coercion rules to a raw record before it is buffered.
 * Scope: Pure per-record transformation. Does not buffer, count failures, or decide whether a failure is fatal.
 * Invariants:
 * - Deterministic: same record + schema always yields the same output.
 * - `null` stays null; `""` stays `""` (never promoted to null).
 * - Properties absent from the schema pass through unchanged.
 * - Non-string values under a string rule are stringified (objects as JSON).
 * - Numeric strings must be plain decimals; integers must be exactly representable.
 * - Date-times must be ISO-8601; naive ones (no zone designator) are read as UTC.
 * Side-effects: none
 * Links: packages/singer-core/src/schema.ts
 * @public
 */

import { DataValidationError } from "./errors.js";
import type { TransformedRecord } from "./model.js";
import type { CoercionRule, CompiledSchema } from "./schema.js";

/** ISO-8601 / RFC 3339 date or date-time, optional zone designator. */
const ISO_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})(?:[Tt ](\d{2}:\d{2})(:\d{2})?(\.\d+)?([Zz]|[+-]\d{2}:?\d{2})?)?$/;

/** Plain decimal notation only; hex, binary and `Infinity` literals are rejected. */
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function describe(value: unknown): string {
  return typeof value === "string" ? `"${value}"` : JSON.stringify(value);
}

function toNumber(field: string, value: unknown): number {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new DataValidationError(field, `expected a finite number, got ${value}`);
    }
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    const parsed = DECIMAL.test(trimmed) ? Number(trimmed) : Number.NaN;
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new DataValidationError(field, `expected a number, got ${describe(value)}`);
}

function toInteger(field: string, value: unknown): number {
  const n = toNumber(field, value);
  if (!Number.isInteger(n)) {
    throw new DataValidationError(field, `expected an integer, got ${describe(value)}`);
  }
  if (!Number.isSafeInteger(n)) {
    throw new DataValidationError(
      field,
      `integer ${describe(value)} is outside the exactly representable range`
    );
  }
  return n;
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function toBoolean(field: string, value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const lowered = value.toLowerCase();
    if (lowered === "true") return true;
    if (lowered === "false") return false;
  }
  throw new DataValidationError(field, `expected a boolean, got ${describe(value)}`);
}

function parseIsoDateTime(value: string): Date | undefined {
  const match = ISO_DATE_TIME.exec(value.trim());
  if (!match) return undefined;
  const [, date, hoursMinutes, seconds, fraction, zone] = match;
  if (hoursMinutes === undefined) return new Date(`${date}T00:00:00Z`);

  const millis = fraction ? fraction.slice(0, 4).padEnd(4, "0") : "";
  let offset = "Z";
  if (zone !== undefined && zone.toUpperCase() !== "Z") {
    offset = zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }
  return new Date(`${date}T${hoursMinutes}${seconds ?? ":00"}${millis}${offset}`);
}

function toTimestamp(field: string, value: unknown): string {
  let date: Date | undefined;
  if (typeof value === "string") {
    date = parseIsoDateTime(value);
  } else if (typeof value === "number") {
    date = new Date(value);
  }
  if (!date || Number.isNaN(date.getTime())) {
    throw new DataValidationError(
      field,
      `expected a date-time, got ${describe(value)}`
    );
  }
  return date.toISOString();
}

export function coerceValue(
  field: string,
  value: unknown,
  rule: CoercionRule
): unknown {
  if (value === null) return null;

  switch (rule.kind) {
    case "string":
      return toText(value);
    case "passthrough":
      return value;
    case "number":
      return toNumber(field, value);
    case "integer":
      return toInteger(field, value);
    case "boolean":
      return toBoolean(field, value);
    case "date-time":
      return toTimestamp(field, value);
  }
}

/**
 * Validate required fields and coerce declared properties.
 *
 * @throws DataValidationError naming the first offending field
 */
export function transformRecord(
  record: Readonly<Record<string, unknown>>,
  schema: CompiledSchema
): TransformedRecord {
  for (const field of schema.required) {
    if (!Object.hasOwn(record, field)) {
      throw new DataValidationError(field, "required field is missing");
    }
  }

  const out: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(record)) {
    const rule = schema.rules.get(field);
    out[field] = rule ? coerceValue(field, value, rule) : value;
  }
  return out;
}
