// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/policy/async-policy-request`
 * Purpose: Re-evaluates a policy until it settles, resuming only when a consulted input could have changed.
 * Scope: Pass sequencing and context ownership for one asynchronous request. Evaluation itself is delegated.
 * Invariants:
 *   - Every pass runs on a fresh EvaluationContext, from a host loop turn
 *   - While waiting, the only reference to the pass's context is held by this request
 *   - The callback runs at most once; never after cancel()
 * Side-effects: IO (host scheduler posts; observers/timers through the evaluation context)
 * Links: src/policy-manager.ts
 * @internal
 */

import type {
  EvaluationContext,
  HostScheduler,
  LoggerLike,
} from "@policyd/policy-core";

import {
  type EvalResult,
  failed,
  type PolicyRequest,
  type SettledEvalResult,
} from "./types";

export interface PendingPolicyRequest {
  /** True once the callback has been invoked. */
  readonly settled: boolean;
  /** Number of passes evaluated so far. */
  readonly passes: number;
  /** Stops re-evaluation and releases the waiting context. Idempotent. */
  cancel(): void;
}

export interface AsyncPolicyRequestDeps<S> {
  readonly scheduler: HostScheduler;
  readonly logger: LoggerLike;
  readonly createContext: () => EvaluationContext;
  readonly evaluate: <R>(
    ctx: EvaluationContext,
    request: PolicyRequest<S, R>
  ) => EvalResult<R>;
}

export class AsyncPolicyRequest<S, R> implements PendingPolicyRequest {
  private held: EvaluationContext | null = null;
  private done = false;
  private cancelled = false;
  private count = 0;

  constructor(
    private readonly deps: AsyncPolicyRequestDeps<S>,
    private readonly request: PolicyRequest<S, R>,
    private readonly callback: (result: SettledEvalResult<R>) => void
  ) {}

  get settled(): boolean {
    return this.done;
  }

  get passes(): number {
    return this.count;
  }

  start(): void {
    this.deps.scheduler.post(() => this.runPass());
  }

  cancel(): void {
    if (this.done || this.cancelled) {
      return;
    }
    this.cancelled = true;
    this.dropHeld();
    this.deps.logger.debug({ passes: this.count }, "policy request cancelled");
  }

  private runPass(): void {
    if (this.cancelled) {
      return;
    }
    this.count += 1;
    const ctx = this.deps.createContext();
    const result = this.deps.evaluate(ctx, this.request);

    if (result.status !== "ask_me_again_later") {
      ctx.release();
      this.settle(result);
      return;
    }

    const scheduled = ctx.runOnValueChangeOrTimeout(() => {
      this.dropHeld();
      this.runPass();
    });
    if (!scheduled) {
      ctx.release();
      this.deps.logger.warn(
        { passes: this.count },
        "policy asked to be re-evaluated but consulted nothing that can change"
      );
      this.settle(failed("no variable to wait for"));
      return;
    }

    // The reference taken by createContext() passes to the pending
    // re-evaluation, which releases it in dropHeld()
    this.held = ctx;
  }

  private dropHeld(): void {
    const ctx = this.held;
    this.held = null;
    ctx?.release();
  }

  private settle(result: SettledEvalResult<R>): void {
    this.done = true;
    this.deps.logger.debug(
      { status: result.status, passes: this.count },
      "policy request settled"
    );
    this.callback(result);
  }
}
