// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/adapters/oic/dry-run-delivery`
 * Purpose: BatchDeliveryPort that logs batches instead of sending them.
 * Scope: Selected by `dry_run: true`. Exercises validation, batching, and state ordering without network I/O.
 * Invariants: Always reports success after one attempt.
 * Side-effects: none
 * Links: services/oic-target/src/bootstrap/container.ts
 * @internal
 */

import type {
  BatchDeliveryPort,
  BatchEnvelope,
  DeliveryOutcome,
} from "@oic-target/singer-core";

import type { Logger } from "../../observability/logger.js";

export class DryRunDeliveryAdapter implements BatchDeliveryPort {
  constructor(
    private readonly logger: Logger,
    private readonly endpointFor: (stream: string) => string
  ) {}

  async deliver(batch: BatchEnvelope): Promise<DeliveryOutcome> {
    this.logger.info(
      {
        stream: batch.stream,
        batchId: batch.batchId,
        sequence: batch.sequence,
        records: batch.records.length,
        endpoint: this.endpointFor(batch.stream),
      },
      "dry run: batch not sent"
    );
    return { ok: true, processed: batch.records.length, attempts: 1 };
  }
}
