// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/cli`
 * Purpose: Command-line argument parsing and exit code mapping.
 * Scope: Pure functions over argv and errors. Does not read files or exit the process.
 * Invariants:
 * - --config is required unless --help is given
 * - Exit codes: 0 success, 1 fatal pipeline error, 2 usage or configuration error
 * Side-effects: none
 * Links: services/oic-target/src/main.ts
 * @internal
 */

import { parseArgs } from "node:util";

import { isConfigError, isUsageError, UsageError } from "./errors.js";

export const USAGE = `Usage: oic-target --config <path> [--dry-run]

Reads Singer messages on stdin, delivers records to Oracle Integration Cloud,
and writes confirmed STATE values to stdout.

Options:
  -c, --config <path>  Singer config JSON file (required)
      --dry-run        Validate and batch records without calling OIC
  -h, --help           Show this help`;

export const ExitCode = {
  Ok: 0,
  Fatal: 1,
  Usage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliOptions {
  readonly configPath: string;
  readonly dryRun: boolean;
}

export type CliCommand =
  | { readonly kind: "run"; readonly options: CliOptions }
  | { readonly kind: "help" };

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        config: { type: "string", short: "c" },
        "dry-run": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * @throws UsageError on unknown flags, stray positionals, or a missing --config
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const values = parseFlags(argv);

  if (values.help) return { kind: "help" };

  const configPath = values.config;
  if (!configPath) {
    throw new UsageError("Missing required option --config <path>");
  }
  return {
    kind: "run",
    options: { configPath, dryRun: values["dry-run"] ?? false },
  };
}

export function exitCodeFor(error: unknown): ExitCode {
  return isUsageError(error) || isConfigError(error)
    ? ExitCode.Usage
    : ExitCode.Fatal;
}
