#!/usr/bin/env node
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/main`
 * Purpose: CLI entry point with graceful shutdown.
 * Scope: Entry point that calls env(), installs signal handlers and runs the target over stdio. Does not contain pipeline logic.
 * Invariants:
 *   - Reads process config from env (no hardcoded values)
 *   - SIGTERM/SIGINT stop input and drain; a second signal exits immediately
 *   - stdout carries only Singer STATE lines
 * Side-effects: IO (stdio, process signals, process exit)
 * Links: services/oic-target/src/app.ts
 * @public
 */

import { runTarget } from "./app.js";
import { env } from "./bootstrap/env.js";
import { ExitCode, exitCodeFor } from "./cli.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<ExitCode> {
  // Load and validate env
  const config = env();

  // Create logger (composition root owns logger creation)
  const logger = makeLogger({
    level: config.LOG_LEVEL,
    serviceName: config.SERVICE_NAME,
  });

  // Graceful shutdown
  const stop = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    if (stop.signal.aborted) {
      logger.warn({ signal }, "Second signal, exiting without waiting for deliveries");
      flushLogger();
      process.exit(ExitCode.Fatal);
    }
    logger.info({ signal }, "Received signal, draining and shutting down");
    stop.abort();
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  try {
    const { exitCode } = await runTarget({
      argv: process.argv.slice(2),
      io: {
        input: process.stdin,
        output: process.stdout,
        errorOutput: process.stderr,
      },
      environment: config,
      logger,
      signal: stop.signal,
    });
    return exitCode;
  } finally {
    process.off("SIGTERM", onSignal);
    process.off("SIGINT", onSignal);
  }
}

const bootLogger = makeLogger({ bindings: { phase: "boot" } });

main()
  .then((exitCode) => {
    flushLogger();
    process.exit(exitCode);
  })
  .catch((err: unknown) => {
    bootLogger.fatal({ err }, "Fatal error during startup");
    flushLogger();
    process.exit(exitCodeFor(err));
  });
