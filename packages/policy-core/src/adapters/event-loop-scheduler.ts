// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/adapters/event-loop-scheduler`
 * Purpose: HostScheduler backed by the Node.js event loop.
 * Scope: Maps post/postDelayed/cancel onto setImmediate/setTimeout/clearTimeout. Does not batch or prioritize.
 * Invariants:
 *   - Handles are tracked until fired or cancelled; cancel() of anything else is a no-op
 *   - Delays are clamped to >= 0
 * Side-effects: IO (timers on the process event loop)
 * Links: src/ports/host-scheduler.port.ts
 * @public
 */

import type { HostScheduler, TimerHandle } from "../ports";

export class EventLoopScheduler implements HostScheduler {
  private nextId = 1;
  private readonly timers = new Map<number, NodeJS.Timeout>();

  post(callback: () => void): void {
    setImmediate(callback);
  }

  postDelayed(callback: () => void, delayMs: number): TimerHandle {
    const id = this.nextId++;
    const timeout = setTimeout(
      () => {
        this.timers.delete(id);
        callback();
      },
      Math.max(0, delayMs)
    );
    this.timers.set(id, timeout);
    return { id };
  }

  cancel(handle: TimerHandle): void {
    const timeout = this.timers.get(handle.id);
    if (timeout === undefined) {
      return;
    }
    clearTimeout(timeout);
    this.timers.delete(handle.id);
  }

  /** Number of delayed callbacks that have neither fired nor been cancelled. */
  get pendingTimers(): number {
    return this.timers.size;
  }
}
