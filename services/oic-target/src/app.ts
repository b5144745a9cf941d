// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/app`
 * Purpose: One target run from argv to exit code: config, composition, message loop, failure report.
 * Scope: Process-agnostic: streams, env and stop signal are injected. Does not install signal handlers or exit.
 * Invariants:
 * - Usage and config errors map to exit 2 before any input is read
 * - Fatal pipeline errors log per-stream undelivered record counts, then map to exit 1
 * - Only confirmed STATE values are written to `io.output`
 * Side-effects: IO (config file, input/output streams, HTTP via adapters)
 * Links: services/oic-target/src/main.ts, services/oic-target/src/bootstrap/container.ts
 * @public
 */

import type { Readable, Writable } from "node:stream";

import { isShutdownTimeoutError } from "@oic-target/singer-core";

import { readSingerMessages } from "./adapters/singer/index.js";
import { createContainer, type ServiceContainer } from "./bootstrap/container.js";
import type { Env } from "./bootstrap/env.js";
import { ExitCode, exitCodeFor, parseCliArgs, USAGE } from "./cli.js";
import { loadTargetConfig, resolveSettings } from "./config.js";
import type { Logger } from "./observability/logger.js";
import type { RunSummary } from "./pipeline/orchestrator.js";

export interface TargetIo {
  readonly input: Readable;
  /** Singer state channel */
  readonly output: Writable;
  /** Human-facing messages (usage text) */
  readonly errorOutput: Writable;
}

export interface RunTargetOptions {
  readonly argv: readonly string[];
  readonly io: TargetIo;
  readonly environment: Env;
  readonly logger: Logger;
  /** Aborting stops reading input; buffered records are still delivered */
  readonly signal?: AbortSignal;
}

export interface RunTargetResult {
  readonly exitCode: ExitCode;
  readonly summary?: RunSummary;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runTarget(options: RunTargetOptions): Promise<RunTargetResult> {
  const { io, environment, logger, signal } = options;

  let container: ServiceContainer;
  try {
    const command = parseCliArgs(options.argv);
    if (command.kind === "help") {
      io.errorOutput.write(`${USAGE}\n`);
      return { exitCode: ExitCode.Ok };
    }

    const config = loadTargetConfig(command.options.configPath, environment);
    const settings = resolveSettings(
      command.options.dryRun ? { ...config, dry_run: true } : config
    );
    logger.info(
      {
        baseUrl: settings.baseUrl,
        batchSize: settings.batchSize,
        maxConcurrentBatches: settings.maxConcurrentBatches,
        dryRun: settings.dryRun,
      },
      "starting OIC target"
    );
    container = createContainer(settings, logger, io.output);
  } catch (error) {
    const exitCode = exitCodeFor(error);
    if (exitCode === ExitCode.Usage) {
      io.errorOutput.write(`${toError(error).message}\n\n${USAGE}\n`);
    }
    logger.fatal({ err: error }, "target failed to start");
    return { exitCode };
  }

  const { orchestrator } = container;
  // Input stops on a stop request or as soon as the run can no longer succeed
  const stopReading = new AbortController();
  const stop = (): void => stopReading.abort();
  if (signal?.aborted) stop();
  signal?.addEventListener("abort", stop, { once: true });
  orchestrator.failed.addEventListener("abort", stop, { once: true });

  try {
    const summary = await orchestrator.run(
      readSingerMessages(io.input, stopReading.signal),
      signal
    );
    logger.info({ summary }, "run complete");
    return { exitCode: ExitCode.Ok, summary };
  } catch (error) {
    const undelivered = isShutdownTimeoutError(error)
      ? orchestrator.undeliveredReport()
      : await orchestrator.abort(toError(error));
    logger.fatal(
      { err: error, undelivered },
      "run aborted; records counted in `undelivered` were not confirmed by OIC"
    );
    return { exitCode: exitCodeFor(error) };
  } finally {
    signal?.removeEventListener("abort", stop);
  }
}
