// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/singer-core/messages`
 * Purpose: Parse one line of Singer protocol input into a typed SingerMessage.
 * Scope: Envelope validation with zod. Does not read streams or validate record contents against schemas.
 * Invariants:
 * - `type` discriminates SCHEMA | RECORD | STATE; anything else is a MessageParseError.
 * - snake_case wire fields map to camelCase model fields.
 * Side-effects: none
 * Links: packages/singer-core/src/model.ts
 * @public
 */

import { z } from "zod";

import { MessageParseError } from "./errors.js";
import type { SingerMessage } from "./model.js";

const JsonObjectSchema = z.record(z.unknown());

const SchemaMessageWire = z.object({
  type: z.literal("SCHEMA"),
  stream: z.string().min(1, "stream is required"),
  schema: z
    .object({
      type: z.union([z.string(), z.array(z.string())]).optional(),
      properties: z
        .record(
          z
            .object({
              type: z.union([z.string(), z.array(z.string())]).optional(),
              format: z.string().optional(),
            })
            .passthrough()
        )
        .optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough(),
  key_properties: z.array(z.string()).default([]),
  bookmark_properties: z.array(z.string()).default([]),
});

const RecordMessageWire = z.object({
  type: z.literal("RECORD"),
  stream: z.string().min(1, "stream is required"),
  record: JsonObjectSchema,
  time_extracted: z.string().optional(),
  version: z.number().optional(),
});

const StateMessageWire = z.object({
  type: z.literal("STATE"),
  value: JsonObjectSchema,
});

const SingerMessageWire = z.discriminatedUnion("type", [
  SchemaMessageWire,
  RecordMessageWire,
  StateMessageWire,
]);

/**
 * Parse a raw JSON line. `lineNumber` is 1-based and only used for error messages.
 */
export function parseMessage(line: string, lineNumber: number): SingerMessage {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MessageParseError(lineNumber, `malformed JSON (${reason})`);
  }

  const result = SingerMessageWire.safeParse(json);
  if (!result.success) {
    const reason = result.error.errors
      .map((e) =>
        e.path.length > 0 ? `${e.path.join(".")}: ${e.message}` : e.message
      )
      .join("; ");
    throw new MessageParseError(lineNumber, reason);
  }

  const msg = result.data;
  switch (msg.type) {
    case "SCHEMA":
      return {
        type: "SCHEMA",
        stream: msg.stream,
        schema: msg.schema,
        keyProperties: msg.key_properties,
        bookmarkProperties: msg.bookmark_properties,
      };
    case "RECORD":
      return {
        type: "RECORD",
        stream: msg.stream,
        record: msg.record,
        ...(msg.time_extracted !== undefined
          ? { timeExtracted: msg.time_extracted }
          : {}),
        ...(msg.version !== undefined ? { version: msg.version } : {}),
      };
    case "STATE":
      return { type: "STATE", value: msg.value };
  }
}
