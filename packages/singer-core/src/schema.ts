// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/schema`
 * Purpose: Compile a stream's JSON schema into per-property coercion rules.
 * Scope: Runs once per SCHEMA message. Does not touch records (see transformer.ts).
 * Invariants:
 * - Rules form a closed set: string | integer | number | boolean | date-time | passthrough.
 * - "null" in a type array never selects a rule; nullability is handled at transform time.
 * Side-effects: none
 * Links: packages/singer-core/src/transformer.ts
 * @public
 */

import type { PropertySchema, StreamSchema } from "./model.js";

export type CoercionRule =
  | { readonly kind: "string" }
  | { readonly kind: "integer" }
  | { readonly kind: "number" }
  | { readonly kind: "boolean" }
  | { readonly kind: "date-time" }
  | { readonly kind: "passthrough" };

export type CoercionKind = CoercionRule["kind"];

export interface CompiledSchema {
  readonly rules: ReadonlyMap<string, CoercionRule>;
  readonly required: readonly string[];
}

const PASSTHROUGH: CoercionRule = { kind: "passthrough" };

function declaredTypes(property: PropertySchema): Set<string> {
  const raw = property.type;
  const list = typeof raw === "string" ? [raw] : (raw ?? []);
  return new Set(list.filter((t) => t !== "null"));
}

/**
 * Pick the coercion rule for one property.
 *
 * @example
 * ruleFor({ type: ["null", "number"] })              // => { kind: "number" }
 * ruleFor({ type: "string", format: "date-time" })   // => { kind: "date-time" }
 * ruleFor({ type: ["string", "integer"] })           // => { kind: "passthrough" }
 */
export function ruleFor(property: PropertySchema): CoercionRule {
  const types = declaredTypes(property);

  if (types.size === 1) {
    const [only] = types;
    switch (only) {
      case "string":
        return property.format === "date-time"
          ? { kind: "date-time" }
          : { kind: "string" };
      case "integer":
        return { kind: "integer" };
      case "number":
        return { kind: "number" };
      case "boolean":
        return { kind: "boolean" };
      default:
        return PASSTHROUGH;
    }
  }

  // integer widened to number keeps numeric coercion for ["integer", "number"]
  if (types.size === 2 && types.has("integer") && types.has("number")) {
    return { kind: "number" };
  }

  return PASSTHROUGH;
}

export function compileSchema(schema: StreamSchema): CompiledSchema {
  const rules = new Map<string, CoercionRule>();
  for (const [name, property] of Object.entries(schema.properties ?? {})) {
    rules.set(name, ruleFor(property));
  }
  return { rules, required: [...(schema.required ?? [])] };
}
