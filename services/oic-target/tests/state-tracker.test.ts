// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/tests/state-tracker`
 * Purpose: Unit tests for holding STATE values until their batches are confirmed.
 * Scope: Test-only. Does not contain production code.
 * Invariants: Validates STATE_AFTER_DELIVERY and latest-wins release.
 * Side-effects: none
 * Links: services/oic-target/src/pipeline/state-tracker.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { StateTracker } from "../src/pipeline/state-tracker.js";

describe("StateTracker", () => {
  it("releases a state with no dependencies immediately", () => {
    const tracker = new StateTracker();
    tracker.hold({ v: 1 }, new Map());

    expect(tracker.takeReady()).toEqual({ value: { v: 1 } });
    expect(tracker.takeReady()).toBeUndefined();
  });

  it("holds a state until every stream reaches its required sequence", () => {
    const tracker = new StateTracker();
    tracker.hold(
      { v: 1 },
      new Map([
        ["users", 2],
        ["orders", 1],
      ])
    );

    tracker.markDelivered("orders", 1);
    expect(tracker.takeReady()).toBeUndefined();
    tracker.markDelivered("users", 1);
    expect(tracker.takeReady()).toBeUndefined();
    tracker.markDelivered("users", 2);
    expect(tracker.takeReady()).toEqual({ value: { v: 1 } });
  });

  it("returns only the latest of several ready states", () => {
    const tracker = new StateTracker();
    tracker.hold({ v: 1 }, new Map([["users", 1]]));
    tracker.hold({ v: 2 }, new Map([["users", 1]]));
    tracker.hold({ v: 3 }, new Map([["users", 2]]));

    tracker.markDelivered("users", 1);

    expect(tracker.takeReady()).toEqual({ value: { v: 2 } });
    expect(tracker.heldCount).toBe(1);
  });

  it("never moves the delivered sequence backwards", () => {
    const tracker = new StateTracker();
    tracker.markDelivered("users", 3);
    tracker.markDelivered("users", 2);

    expect(tracker.deliveredSequence("users")).toBe(3);
    expect(tracker.deliveredSequence("orders")).toBe(0);
  });
});
