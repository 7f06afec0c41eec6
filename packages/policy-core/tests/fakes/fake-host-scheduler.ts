// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/tests/fakes/fake-host-scheduler`
 * Purpose: In-process HostScheduler with an explicit clock and explicit loop turns.
 * Scope: Test double only. Nothing runs unless the test calls runPending()/advanceBy()/runUntilIdle().
 * Invariants:
 *   - post() never runs a callback inline
 *   - Timers fire in deadline order, ties in creation order
 * Side-effects: none
 * Links: src/ports/host-scheduler.port.ts
 * @internal
 */

import type { HostScheduler, TimerHandle } from "../../src";

interface FakeTimer {
  readonly id: number;
  readonly dueMs: number;
  readonly callback: () => void;
}

export class FakeHostScheduler implements HostScheduler {
  private nowMs = 0;
  private nextId = 1;
  private queue: Array<() => void> = [];
  private readonly timers = new Map<number, FakeTimer>();

  /** Delay passed to every postDelayed() call, in call order. */
  readonly requestedDelays: number[] = [];

  get now(): number {
    return this.nowMs;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  get pendingPosts(): number {
    return this.queue.length;
  }

  post(callback: () => void): void {
    this.queue.push(callback);
  }

  postDelayed(callback: () => void, delayMs: number): TimerHandle {
    const id = this.nextId++;
    this.timers.set(id, {
      id,
      dueMs: this.nowMs + Math.max(0, delayMs),
      callback,
    });
    this.requestedDelays.push(delayMs);
    return { id };
  }

  cancel(handle: TimerHandle): void {
    this.timers.delete(handle.id);
  }

  /**
   * One loop turn: runs the callbacks posted before the turn started.
   * Callbacks they post wait for the next turn.
   */
  runPending(): number {
    const batch = this.queue;
    this.queue = [];
    for (const callback of batch) {
      callback();
    }
    return batch.length;
  }

  /** Runs loop turns until nothing is posted, up to `maxTurns`. */
  runUntilIdle(maxTurns = 100): void {
    for (let turn = 0; turn < maxTurns && this.queue.length > 0; turn++) {
      this.runPending();
    }
  }

  /**
   * Moves the clock forward, firing every timer that comes due on the way.
   * Posted callbacks are left for runPending().
   */
  advanceBy(ms: number): void {
    const target = this.nowMs + ms;
    for (;;) {
      const next = this.nextDueTimer(target);
      if (next === null) {
        break;
      }
      this.timers.delete(next.id);
      this.nowMs = next.dueMs;
      next.callback();
    }
    this.nowMs = target;
  }

  private nextDueTimer(limitMs: number): FakeTimer | null {
    let earliest: FakeTimer | null = null;
    for (const timer of this.timers.values()) {
      if (timer.dueMs > limitMs) {
        continue;
      }
      if (
        earliest === null ||
        timer.dueMs < earliest.dueMs ||
        (timer.dueMs === earliest.dueMs && timer.id < earliest.id)
      ) {
        earliest = timer;
      }
    }
    return earliest;
  }
}
