// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/evaluation`
 * Purpose: Barrel export for the evaluation context.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  createEvaluationContext,
  EvaluationContext,
  type EvaluationContextOptions,
} from "./evaluation-context";
export {
  EVALUATION_STATES,
  type EvaluationState,
  type ResolutionTrigger,
  type WaitSet,
} from "./wait-coordinator";
