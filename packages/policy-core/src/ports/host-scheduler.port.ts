// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/ports/host-scheduler`
 * Purpose: Vendor-agnostic port for the host event loop the evaluation context runs on.
 * Scope: Defines the deferral and one-shot timer contract. Does not contain implementations.
 * Invariants:
 *   - Single controlling loop: posted callbacks and timers never run concurrently with each other
 *   - post() never runs the callback inline; it runs on a later loop turn
 *   - postDelayed() fires at most once
 *   - cancel() is idempotent (no-op for fired, cancelled or unknown handles)
 * Side-effects: none (interface definition only)
 * Links: src/adapters/event-loop-scheduler.ts
 * @public
 */

/**
 * Opaque handle for a delayed callback.
 * Only meaningful to the scheduler that issued it.
 */
export interface TimerHandle {
  readonly id: number;
}

export interface HostScheduler {
  /**
   * Defers a callback to a subsequent loop turn.
   */
  post(callback: () => void): void;

  /**
   * Runs a callback once after `delayMs` milliseconds.
   *
   * @returns Handle accepted by cancel()
   */
  postDelayed(callback: () => void, delayMs: number): TimerHandle;

  /**
   * Cancels a delayed callback. Idempotent.
   */
  cancel(handle: TimerHandle): void;
}
