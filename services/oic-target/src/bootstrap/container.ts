// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/bootstrap/container`
 * Purpose: Composition root: wires concrete adapters to port interfaces.
 * Scope: All adapter construction lives here. Returns typed container against port interfaces.
 * Invariants:
 * - Only file that instantiates concrete adapters
 * - pipeline/ imports ports only, never this module
 * - dry_run selects DryRunDeliveryAdapter; no token is ever requested
 * Side-effects: none (adapters do IO only when called)
 * Links: services/oic-target/src/ports/index.ts
 * @internal
 */

import type { Writable } from "node:stream";

import {
  DryRunDeliveryAdapter,
  OAuth2TokenManager,
  OicDeliveryClient,
} from "../adapters/oic/index.js";
import { StreamStateSink } from "../adapters/singer/index.js";
import { resolveEndpointPath, type TargetSettings } from "../config.js";
import type { Logger } from "../observability/logger.js";
import { PipelineOrchestrator } from "../pipeline/orchestrator.js";
import type { BatchDeliveryPort, StateSink, TokenProvider } from "../ports/index.js";

/**
 * Service container: all deps typed against port interfaces.
 */
export interface ServiceContainer {
  delivery: BatchDeliveryPort;
  /** null in dry-run mode */
  tokens: TokenProvider | null;
  stateSink: StateSink;
  orchestrator: PipelineOrchestrator;
  logger: Logger;
}

/**
 * Build the service container from resolved settings and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createContainer(
  settings: TargetSettings,
  logger: Logger,
  stateOutput: Writable
): ServiceContainer {
  let tokens: TokenProvider | null = null;
  let delivery: BatchDeliveryPort;

  if (settings.dryRun) {
    delivery = new DryRunDeliveryAdapter(
      logger.child({ component: "dry-run-delivery" }),
      (stream) => `${settings.baseUrl}${resolveEndpointPath(stream, settings)}`
    );
    logger.warn({}, "dry run enabled; batches will not be sent to OIC");
  } else {
    tokens = new OAuth2TokenManager(
      {
        tokenUrl: settings.auth.tokenUrl,
        clientId: settings.auth.clientId,
        clientSecret: settings.auth.clientSecret,
        scope: settings.auth.scope,
        refreshThresholdMs: settings.auth.refreshThresholdMs,
        requestTimeoutMs: settings.requestTimeoutMs,
      },
      logger.child({ component: "token-manager" })
    );
    delivery = new OicDeliveryClient(settings, {
      tokens,
      logger: logger.child({ component: "delivery-client" }),
    });
  }

  const stateSink = new StreamStateSink(stateOutput);
  const orchestrator = new PipelineOrchestrator(settings, {
    delivery,
    stateSink,
    logger: logger.child({ component: "orchestrator" }),
  });

  return { delivery, tokens, stateSink, orchestrator, logger };
}
