// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@oic-target/oic-target-service/pipeline/semaphore`
 * Purpose: Counting semaphore bounding concurrent batch deliveries.
 * Scope: In-process permit accounting. Does not time out waiters.
 * Invariants:
 * - At most `permits` holders at any time.
 * - Waiters are served FIFO; a released permit passes directly to the next waiter.
 * - Release functions are idempotent.
 * Side-effects: none
 * Links: services/oic-target/src/pipeline/delivery-scheduler.ts
 * @internal
 */

export type ReleaseFn = () => void;

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<(release: ReleaseFn) => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<ReleaseFn> {
    if (this.active < this.permits) {
      this.active += 1;
      return Promise.resolve(this.createReleaseFn());
    }
    return new Promise<ReleaseFn>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createReleaseFn(): ReleaseFn {
    let released = false;
    return (): void => {
      if (released) return; // Prevent double-release
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Permit handed over; active count unchanged
        next(this.createReleaseFn());
      } else {
        this.active -= 1;
      }
    };
  }
}
