// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/evaluation/evaluation-context`
 * Purpose: Memoized variable reads for one decision pass, plus "resume when something could change" scheduling.
 * Scope: Composes ValueCache and WaitCoordinator behind getValue() and runOnValueChangeOrTimeout(); owns reference counting and teardown. Does not evaluate policies.
 * Invariants:
 *   - All reads of a variable within a pass return the first present value
 *   - Every read marks the variable as consulted, including reads that return null
 *   - Last release() runs teardown exactly once: a pending wait is cancelled and detached before anything else
 *   - Once a wait has resolved its callback is committed and runs on the next loop turn
 * Side-effects: IO (via WaitCoordinator: observers on variables, timers on the host scheduler)
 * Links: src/evaluation/value-cache.ts, src/evaluation/wait-coordinator.ts
 * @public
 */

import { EvaluationContextReleasedError } from "../errors";
import { type LoggerLike, makeNoopLogger } from "../observability/logger";
import type { HostScheduler } from "../ports";
import type { Variable } from "../variables";
import { ValueCache } from "./value-cache";
import {
  type EvaluationState,
  WaitCoordinator,
  type WaitSet,
} from "./wait-coordinator";

export interface EvaluationContextOptions {
  readonly scheduler: HostScheduler;
  readonly logger?: LoggerLike;
  /** Lower bound for the aggregate poll deadline. Default: 0 */
  readonly pollIntervalFloorMs?: number;
}

/**
 * Usage:
 * ```typescript
 * const ctx = createEvaluationContext({ scheduler });
 * const idle = ctx.getValue(deviceIdle);
 * if (idle === null || !idle) {
 *   ctx.runOnValueChangeOrTimeout(() => reevaluate());
 * }
 * ctx.release();
 * ```
 *
 * The context starts with one reference, owned by its creator. A pending
 * re-evaluation that must keep the context alive takes its own via retain().
 */
export class EvaluationContext {
  private readonly cache = new ValueCache();
  private readonly waits: WaitCoordinator;
  private readonly logger: LoggerLike;
  private refs = 1;

  constructor(options: EvaluationContextOptions) {
    this.logger = options.logger ?? makeNoopLogger();
    this.waits = new WaitCoordinator({
      scheduler: options.scheduler,
      logger: this.logger,
      pollIntervalFloorMs: options.pollIntervalFloorMs,
    });
  }

  get state(): EvaluationState {
    return this.waits.state;
  }

  get refCount(): number {
    return this.refs;
  }

  get isReleased(): boolean {
    return this.refs === 0;
  }

  /**
   * Memoized read. Returns null for a missing variable, a variable without a
   * value, or a released context. The returned value belongs to this pass.
   */
  getValue<T>(variable: Variable<T> | null | undefined): T | null {
    if (variable === null || variable === undefined || this.isReleased) {
      return null;
    }
    this.waits.recordConsulted(variable);
    return this.cache.read(variable);
  }

  /**
   * Arranges for `callback` to run once, on a later loop turn, after any
   * consulted async variable changes or the shortest consulted poll interval
   * elapses, whichever comes first.
   *
   * @returns false when nothing consulted can change, when a wait is already
   * outstanding or resolved, or when the context was released
   */
  runOnValueChangeOrTimeout(callback: () => void): boolean {
    if (this.isReleased) {
      return false;
    }
    return this.waits.schedule(callback);
  }

  /** Wait set implied by the reads so far. */
  waitSet(): WaitSet {
    return this.waits.computeWaitSet();
  }

  /**
   * Starts a new pass on this context: drops cached values and consulted
   * variables and returns to idle.
   *
   * @returns false (and changes nothing) while waiting or after release
   */
  resetEvaluation(): boolean {
    if (this.isReleased || !this.waits.reset()) {
      return false;
    }
    this.cache.clear();
    return true;
  }

  retain(): this {
    if (this.isReleased) {
      throw new EvaluationContextReleasedError("retain");
    }
    this.refs += 1;
    return this;
  }

  /**
   * Drops one reference. The last one tears the context down; further calls are no-ops.
   */
  release(): void {
    if (this.isReleased) {
      return;
    }
    this.refs -= 1;
    if (this.refs === 0) {
      this.teardown();
    }
  }

  private teardown(): void {
    this.waits.cancel();
    this.cache.clear();
    this.logger.debug(
      { state: this.waits.state },
      "evaluation context released"
    );
  }
}

export function createEvaluationContext(
  options: EvaluationContextOptions
): EvaluationContext {
  return new EvaluationContext(options);
}
