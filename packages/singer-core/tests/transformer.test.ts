// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/tests/transformer`
 * Purpose: Unit tests for record validation and type coercion.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Required fields are enforced; declared types are coerced; failures name the field.
 * Side-effects: none
 * Links: packages/singer-core/src/transformer.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { DataValidationError, isDataValidationError } from "../src/errors.js";
import { compileSchema } from "../src/schema.js";
import { coerceValue, transformRecord } from "../src/transformer.js";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}

describe("transformRecord", () => {
  it("fails with DataValidationError naming a missing required field", () => {
    const schema = compileSchema({
      properties: {
        id: { type: "string" },
        name: { type: "string" },
        email: { type: "string" },
      },
      required: ["email"],
    });

    const error = caught(() =>
      transformRecord({ id: "user_001", name: "John Doe" }, schema)
    );

    expect(isDataValidationError(error)).toBe(true);
    if (!isDataValidationError(error)) return;
    expect(error.field).toBe("email");
    expect(error.message).toBe('Field "email": required field is missing');
  });

  it("coerces a numeric string to a float", () => {
    const schema = compileSchema({
      properties: { id: { type: "string" }, amount: { type: "number" } },
    });

    const out = transformRecord({ id: "123", amount: "99.99" }, schema);

    expect(out).toEqual({ id: "123", amount: 99.99 });
    expect(typeof out["amount"]).toBe("number");
  });

  it("treats an explicit null as present for required fields", () => {
    const schema = compileSchema({
      properties: { email: { type: ["null", "string"] } },
      required: ["email"],
    });

    expect(transformRecord({ email: null }, schema)).toEqual({ email: null });
  });

  it("passes undeclared fields through untouched", () => {
    const schema = compileSchema({ properties: { id: { type: "integer" } } });
    const nested = { a: [1, 2] };

    const out = transformRecord({ id: "7", extra: nested }, schema);

    expect(out).toEqual({ id: 7, extra: { a: [1, 2] } });
    expect(out["extra"]).toBe(nested);
  });

  it("does not mutate the input record", () => {
    const schema = compileSchema({ properties: { n: { type: "number" } } });
    const input = { n: "1.5" };

    transformRecord(input, schema);

    expect(input).toEqual({ n: "1.5" });
  });

  it("reports the first failing field", () => {
    const schema = compileSchema({
      properties: { qty: { type: "integer" }, price: { type: "number" } },
    });

    expect(() => transformRecord({ qty: "2.5", price: "x" }, schema)).toThrow(
      'Field "qty": expected an integer, got "2.5"'
    );
  });
});

describe("coerceValue", () => {
  it("keeps null for every rule", () => {
    expect(coerceValue("f", null, { kind: "integer" })).toBeNull();
    expect(coerceValue("f", null, { kind: "date-time" })).toBeNull();
  });

  it("coerces numbers and trims numeric strings", () => {
    expect(coerceValue("f", " 42 ", { kind: "number" })).toBe(42);
    expect(coerceValue("f", 1.25, { kind: "number" })).toBe(1.25);
  });

  it("rejects non-numeric and empty strings for number", () => {
    expect(() => coerceValue("amount", "abc", { kind: "number" })).toThrow(
      'Field "amount": expected a number, got "abc"'
    );
    expect(() => coerceValue("amount", "", { kind: "number" })).toThrow(
      DataValidationError
    );
    expect(() => coerceValue("amount", true, { kind: "number" })).toThrow(
      'Field "amount": expected a number, got true'
    );
  });

  it("accepts whole numbers for integer", () => {
    expect(coerceValue("f", "10", { kind: "integer" })).toBe(10);
    expect(coerceValue("f", 3, { kind: "integer" })).toBe(3);
  });

  it("coerces booleans from case-insensitive strings", () => {
    expect(coerceValue("f", "TRUE", { kind: "boolean" })).toBe(true);
    expect(coerceValue("f", "false", { kind: "boolean" })).toBe(false);
    expect(coerceValue("f", false, { kind: "boolean" })).toBe(false);
    expect(() => coerceValue("active", "yes", { kind: "boolean" })).toThrow(
      'Field "active": expected a boolean, got "yes"'
    );
  });

  it("normalizes date-times to ISO-8601 UTC", () => {
    expect(
      coerceValue("ts", "2024-03-05T10:15:00+02:00", { kind: "date-time" })
    ).toBe("2024-03-05T08:15:00.000Z");
    expect(coerceValue("ts", "2024-03-05 10:15:00", { kind: "date-time" })).toBe(
      "2024-03-05T10:15:00.000Z"
    );
    expect(coerceValue("ts", 0, { kind: "date-time" })).toBe(
      "1970-01-01T00:00:00.000Z"
    );
  });

  it("rejects unparseable date-times", () => {
    expect(() => coerceValue("ts", "yesterday", { kind: "date-time" })).toThrow(
      'Field "ts": expected a date-time, got "yesterday"'
    );
  });

  it("stringifies non-string values under a string rule", () => {
    expect(coerceValue("f", 5, { kind: "string" })).toBe("5");
    expect(coerceValue("f", false, { kind: "string" })).toBe("false");
    expect(coerceValue("f", { x: 1 }, { kind: "string" })).toBe('{"x":1}');
    expect(coerceValue("f", "", { kind: "string" })).toBe("");
  });

  it("leaves passthrough values untouched", () => {
    const nested = { x: 1 };
    expect(coerceValue("f", nested, { kind: "passthrough" })).toBe(nested);
    expect(coerceValue("f", 5, { kind: "passthrough" })).toBe(5);
  });

  it("accepts decimal and exponent notation for number", () => {
    expect(coerceValue("f", "-1.5e3", { kind: "number" })).toBe(-1500);
    expect(coerceValue("f", ".5", { kind: "number" })).toBe(0.5);
    expect(coerceValue("f", "+7.", { kind: "number" })).toBe(7);
  });

  it("rejects non-decimal numeric literals", () => {
    expect(() => coerceValue("amount", "0x10", { kind: "number" })).toThrow(
      'Field "amount": expected a number, got "0x10"'
    );
    expect(() => coerceValue("amount", "0b101", { kind: "number" })).toThrow(
      DataValidationError
    );
    expect(() => coerceValue("amount", "Infinity", { kind: "number" })).toThrow(
      DataValidationError
    );
  });

  it("rejects integers that cannot be represented exactly", () => {
    expect(() =>
      coerceValue("id", "9007199254740993", { kind: "integer" })
    ).toThrow(
      'Field "id": integer "9007199254740993" is outside the exactly representable range'
    );
    expect(coerceValue("id", "9007199254740991", { kind: "integer" })).toBe(
      Number.MAX_SAFE_INTEGER
    );
  });

  it("accepts ISO dates, compact offsets and long fractions", () => {
    expect(coerceValue("ts", "2024-03-05", { kind: "date-time" })).toBe(
      "2024-03-05T00:00:00.000Z"
    );
    expect(
      coerceValue("ts", "2024-03-05T10:15:00+0200", { kind: "date-time" })
    ).toBe("2024-03-05T08:15:00.000Z");
    expect(
      coerceValue("ts", "2024-03-05T10:15:00.123456Z", { kind: "date-time" })
    ).toBe("2024-03-05T10:15:00.123Z");
    expect(coerceValue("ts", "2024-03-05T10:15", { kind: "date-time" })).toBe(
      "2024-03-05T10:15:00.000Z"
    );
  });

  it("rejects date-times outside ISO-8601 instead of reading them in local time", () => {
    expect(() =>
      coerceValue("ts", "March 5, 2024 10:15", { kind: "date-time" })
    ).toThrow('Field "ts": expected a date-time, got "March 5, 2024 10:15"');
    expect(() =>
      coerceValue("ts", "2024/03/05 10:15", { kind: "date-time" })
    ).toThrow(DataValidationError);
  });
});
