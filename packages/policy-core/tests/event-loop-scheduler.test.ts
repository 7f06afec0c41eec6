// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/tests/event-loop-scheduler`
 * Purpose: Unit tests for the Node.js event-loop HostScheduler.
 * Scope: Uses vitest fake timers; no real waiting.
 * Side-effects: none
 * Links: src/adapters/event-loop-scheduler.ts
 * @internal
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { EventLoopScheduler } from "../src";

describe("EventLoopScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("never runs a posted callback inline", () => {
    const scheduler = new EventLoopScheduler();
    const callback = vi.fn();

    scheduler.post(callback);
    expect(callback).not.toHaveBeenCalled();

    vi.runOnlyPendingTimers();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("fires a delayed callback once, after the delay", () => {
    const scheduler = new EventLoopScheduler();
    const callback = vi.fn();

    scheduler.postDelayed(callback, 1000);
    expect(scheduler.pendingTimers).toBe(1);

    vi.advanceTimersByTime(999);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingTimers).toBe(0);
  });

  it("cancels idempotently", () => {
    const scheduler = new EventLoopScheduler();
    const callback = vi.fn();
    const handle = scheduler.postDelayed(callback, 500);

    scheduler.cancel(handle);
    scheduler.cancel(handle);
    scheduler.cancel({ id: 12_345 });

    vi.advanceTimersByTime(1000);
    expect(callback).not.toHaveBeenCalled();
    expect(scheduler.pendingTimers).toBe(0);
  });

  it("ignores cancel for a handle that already fired", () => {
    const scheduler = new EventLoopScheduler();
    const first = vi.fn();
    const second = vi.fn();
    const fired = scheduler.postDelayed(first, 10);
    vi.advanceTimersByTime(10);

    scheduler.postDelayed(second, 10);
    scheduler.cancel(fired);
    vi.advanceTimersByTime(10);

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });
});
