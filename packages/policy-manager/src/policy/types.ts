// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/policy/types`
 * Purpose: Result and method shapes shared by policies and the policy manager.
 * Scope: Types and result constructors. Does not evaluate anything.
 * Invariants:
 *   - ask_me_again_later carries no value; the manager decides how to resume
 *   - Policy methods read inputs only through the EvaluationContext they are given
 * Side-effects: none
 * @public
 */

import type { EvaluationContext } from "@policyd/policy-core";

export const EVAL_STATUSES = [
  "failed",
  "succeeded",
  "ask_me_again_later",
] as const;

export type EvalStatus = (typeof EVAL_STATUSES)[number];

export interface EvalSucceeded<R> {
  readonly status: "succeeded";
  readonly value: R;
}

export interface EvalFailed {
  readonly status: "failed";
  readonly error: string;
  readonly cause?: Error;
}

export interface EvalAskMeAgainLater {
  readonly status: "ask_me_again_later";
}

export type EvalResult<R> = EvalSucceeded<R> | EvalFailed | EvalAskMeAgainLater;

/** Final outcome of an asynchronous request. */
export type SettledEvalResult<R> = EvalSucceeded<R> | EvalFailed;

export function succeeded<R>(value: R): EvalSucceeded<R> {
  return { status: "succeeded", value };
}

export function failed(error: string, cause?: Error): EvalFailed {
  return cause === undefined
    ? { status: "failed", error }
    : { status: "failed", error, cause };
}

export function askMeAgainLater(): EvalAskMeAgainLater {
  return { status: "ask_me_again_later" };
}

/**
 * One decision: reads variables from `state` through `ctx` and returns a result.
 * Must not keep `ctx` or values read from it beyond the call.
 */
export type PolicyMethod<S, R> = (
  ctx: EvaluationContext,
  state: S
) => EvalResult<R>;

export interface PolicyRequest<S, R> {
  /** Used in logs and error messages. */
  readonly name: string;
  readonly evaluate: PolicyMethod<S, R>;
  /** Evaluated on the same context when `evaluate` fails. */
  readonly fallback?: PolicyMethod<S, R>;
}
