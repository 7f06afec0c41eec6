// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/evaluation/wait-coordinator`
 * Purpose: Tracks which variables a pass consulted and arbitrates "value changed" against "poll timeout".
 * Scope: Wait set computation, observer subscription, one-shot timer, resolution and cancellation. Does not read or cache values.
 * Invariants:
 *   - Subscriptions and the timer exist only in the waiting state
 *   - Resolution detaches every observer and cancels the timer before the callback is posted
 *   - The callback is posted to the host loop, never invoked inline, and at most once per wait
 *   - cancel() detaches synchronously and the callback never runs afterwards
 * Side-effects: IO (observer registration on variables, timers on the host scheduler)
 * Links: src/evaluation/evaluation-context.ts, src/ports/host-scheduler.port.ts
 * @internal
 */

import type { LoggerLike } from "../observability/logger";
import type { HostScheduler, TimerHandle } from "../ports";
import type { AnyVariable, VariableObserver } from "../variables";

export const EVALUATION_STATES = [
  "idle",
  "waiting",
  "fired",
  "cancelled",
] as const;

export type EvaluationState = (typeof EVALUATION_STATES)[number];

export type ResolutionTrigger = "value_changed" | "poll_timeout";

export interface WaitSet {
  /** Async variables consulted this pass, in first-read order. */
  readonly asyncVariables: readonly AnyVariable[];
  /** Shortest consulted poll interval; null when no poll variable was consulted. */
  readonly pollTimeoutMs: number | null;
}

export interface WaitCoordinatorDeps {
  readonly scheduler: HostScheduler;
  readonly logger: LoggerLike;
  /** Lower bound for the aggregate poll deadline. Default: 0 */
  readonly pollIntervalFloorMs?: number;
}

interface Subscription {
  readonly variable: AnyVariable;
  readonly observer: VariableObserver;
}

interface ActiveWait {
  readonly subscriptions: Subscription[];
  timer: TimerHandle | null;
  readonly callback: () => void;
}

export class WaitCoordinator {
  private readonly consulted = new Set<AnyVariable>();
  private current: EvaluationState = "idle";
  private active: ActiveWait | null = null;

  constructor(private readonly deps: WaitCoordinatorDeps) {}

  get state(): EvaluationState {
    return this.current;
  }

  /**
   * Records that a pass read this variable, whatever the outcome of the read.
   */
  recordConsulted(variable: AnyVariable): void {
    this.consulted.add(variable);
  }

  computeWaitSet(): WaitSet {
    const asyncVariables: AnyVariable[] = [];
    let pollTimeoutMs: number | null = null;

    for (const variable of this.consulted) {
      switch (variable.mode) {
        case "async":
          asyncVariables.push(variable);
          break;
        case "poll":
          if (
            pollTimeoutMs === null ||
            variable.pollIntervalMs < pollTimeoutMs
          ) {
            pollTimeoutMs = variable.pollIntervalMs;
          }
          break;
        case "const":
          break;
      }
    }

    if (pollTimeoutMs !== null) {
      pollTimeoutMs = Math.max(
        pollTimeoutMs,
        this.deps.pollIntervalFloorMs ?? 0
      );
    }
    return { asyncVariables, pollTimeoutMs };
  }

  /**
   * Subscribes to the wait set and arms the poll timer.
   *
   * @returns false when already waiting, already resolved, or there is nothing to wait on
   */
  schedule(callback: () => void): boolean {
    const { logger, scheduler } = this.deps;

    if (this.current !== "idle") {
      logger.warn(
        { state: this.current },
        "run-on-value-change-or-timeout requested outside idle state"
      );
      return false;
    }

    const waitSet = this.computeWaitSet();
    if (waitSet.asyncVariables.length === 0 && waitSet.pollTimeoutMs === null) {
      logger.debug(
        { consulted: this.consulted.size },
        "no async or poll variable to wait for"
      );
      return false;
    }

    const wait: ActiveWait = { subscriptions: [], timer: null, callback };
    this.active = wait;
    this.current = "waiting";

    // A variable may notify from inside addObserver. The subscription is
    // recorded first so detach() reaches it, and nothing more is attached
    // once the wait has resolved.
    for (const variable of waitSet.asyncVariables) {
      const observer: VariableObserver = () =>
        this.resolve("value_changed", variable.name);
      logger.debug({ variable: variable.name }, "waiting for value change");
      wait.subscriptions.push({ variable, observer });
      variable.addObserver(observer);
      if (this.active !== wait) {
        return true;
      }
    }
    if (waitSet.pollTimeoutMs !== null) {
      logger.debug({ timeoutMs: waitSet.pollTimeoutMs }, "poll timer armed");
      wait.timer = scheduler.postDelayed(() => {
        wait.timer = null;
        this.resolve("poll_timeout", null);
      }, waitSet.pollTimeoutMs);
    }
    return true;
  }

  /**
   * Tears down an outstanding wait. The callback will not run.
   * No-op unless waiting.
   */
  cancel(): void {
    if (this.current !== "waiting") {
      return;
    }
    this.detach();
    this.current = "cancelled";
    this.deps.logger.debug({}, "wait cancelled");
  }

  /**
   * Forgets consulted variables and returns to idle.
   *
   * @returns false (and changes nothing) while waiting
   */
  reset(): boolean {
    if (this.current === "waiting") {
      return false;
    }
    this.consulted.clear();
    this.current = "idle";
    return true;
  }

  private resolve(trigger: ResolutionTrigger, variable: string | null): void {
    const wait = this.active;
    // The first trigger detaches everything, so a second one cannot reach here
    // with an active wait
    if (this.current !== "waiting" || wait === null) {
      return;
    }
    this.detach();
    this.current = "fired";
    this.deps.logger.debug({ trigger, variable }, "wait resolved");
    this.deps.scheduler.post(wait.callback);
  }

  private detach(): void {
    const wait = this.active;
    if (wait === null) {
      return;
    }
    this.active = null;
    for (const { variable, observer } of wait.subscriptions) {
      variable.removeObserver(observer);
    }
    if (wait.timer !== null) {
      this.deps.scheduler.cancel(wait.timer);
      wait.timer = null;
    }
  }
}
