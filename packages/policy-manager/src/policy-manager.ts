// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/policy-manager`
 * Purpose: Runs policy decisions against provider state, synchronously or until they settle.
 * Scope: Context creation per pass, fallback evaluation, conversion of thrown errors into failed results. Policies themselves are supplied by callers.
 * Invariants:
 *   - A fresh EvaluationContext per pass; released before policyRequest() returns
 *   - The fallback runs on the same context as the failed method, so it sees the same snapshot
 *   - Nothing thrown by a policy escapes; it becomes a failed result with PolicyMethodThrewError as cause
 * Side-effects: IO (host scheduler for asynchronous requests)
 * Links: src/policy/async-policy-request.ts, @policyd/policy-core EvaluationContext
 * @public
 */

import {
  createEvaluationContext,
  type EvaluationContext,
  type HostScheduler,
  type LoggerLike,
} from "@policyd/policy-core";

import { PolicyMethodThrewError } from "./errors";
import {
  AsyncPolicyRequest,
  type PendingPolicyRequest,
} from "./policy/async-policy-request";
import {
  type EvalResult,
  failed,
  type PolicyMethod,
  type PolicyRequest,
  type SettledEvalResult,
} from "./policy/types";

export interface PolicyManagerDeps<S> {
  /** Variables the policies read from. */
  readonly state: S;
  readonly scheduler: HostScheduler;
  readonly logger: LoggerLike;
  /** Lower bound for re-evaluation poll deadlines. Default: 0 */
  readonly pollIntervalFloorMs?: number;
}

export class PolicyManager<S> {
  constructor(private readonly deps: PolicyManagerDeps<S>) {}

  /**
   * Evaluates once and returns whatever the policy decided, including ask_me_again_later.
   */
  policyRequest<R>(request: PolicyRequest<S, R>): EvalResult<R> {
    const ctx = this.createContext();
    try {
      return this.evaluate(ctx, request);
    } finally {
      ctx.release();
    }
  }

  /**
   * Evaluates on the next loop turn, then again each time a consulted input
   * may have changed, until the policy succeeds or fails.
   */
  asyncPolicyRequest<R>(
    request: PolicyRequest<S, R>,
    callback: (result: SettledEvalResult<R>) => void
  ): PendingPolicyRequest {
    const pending = new AsyncPolicyRequest<S, R>(
      {
        scheduler: this.deps.scheduler,
        logger: this.deps.logger.child({ policy: request.name }),
        createContext: () => this.createContext(),
        evaluate: <T>(ctx: EvaluationContext, req: PolicyRequest<S, T>) =>
          this.evaluate(ctx, req),
      },
      request,
      callback
    );
    pending.start();
    return pending;
  }

  private createContext(): EvaluationContext {
    return createEvaluationContext({
      scheduler: this.deps.scheduler,
      logger: this.deps.logger,
      pollIntervalFloorMs: this.deps.pollIntervalFloorMs,
    });
  }

  private evaluate<R>(
    ctx: EvaluationContext,
    request: PolicyRequest<S, R>
  ): EvalResult<R> {
    const log = this.deps.logger.child({ policy: request.name });
    const result = this.invoke(ctx, request.name, request.evaluate, log);
    if (result.status !== "failed" || request.fallback === undefined) {
      return result;
    }
    log.warn({ error: result.error }, "policy failed, evaluating fallback");
    return this.invoke(ctx, request.name, request.fallback, log);
  }

  private invoke<R>(
    ctx: EvaluationContext,
    name: string,
    method: PolicyMethod<S, R>,
    log: LoggerLike
  ): EvalResult<R> {
    try {
      return method(ctx, this.deps.state);
    } catch (error) {
      const cause = new PolicyMethodThrewError(name, error);
      log.error({ err: error }, "policy method threw");
      return failed(cause.message, cause);
    }
  }
}
