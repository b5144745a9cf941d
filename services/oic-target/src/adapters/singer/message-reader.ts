// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/singer/message-reader`
 * Purpose: Turn a line-oriented input stream into parsed Singer messages, in arrival order.
 * Scope: Line splitting and parsing only. Does not route or buffer messages.
 * Invariants: Blank lines are skipped; line numbers in errors are 1-based over the raw input.
 * Side-effects: IO (reads the given stream)
 * Links: packages/singer-core/src/messages.ts
 * @internal
 */

import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import { parseMessage, type SingerMessage } from "@oic-target/singer-core";

/**
 * Aborting `signal` closes the line reader; iteration then ends after the current line.
 */
export async function* readSingerMessages(
  input: Readable,
  signal?: AbortSignal
): AsyncGenerator<SingerMessage> {
  const lines = createInterface({
    input,
    crlfDelay: Number.POSITIVE_INFINITY,
    ...(signal ? { signal } : {}),
  });
  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber += 1;
      if (line.trim() === "") continue;
      yield parseMessage(line, lineNumber);
    }
  } finally {
    lines.close();
  }
}
