// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core`
 * Purpose: Reactive evaluation core for policy decisions, shared by the policy manager and variable providers.
 * Scope: Re-exports the variable contract, evaluation context, scheduler port and adapter, errors, and the logging seam.
 * Invariants: No policy logic; no process wiring (config, logger creation).
 * Side-effects: none
 * @public
 */

// Adapters
export { EventLoopScheduler } from "./adapters/event-loop-scheduler";
// Errors
export {
  EvaluationContextReleasedError,
  isEvaluationContextReleasedError,
} from "./errors";
// Evaluation context
export {
  createEvaluationContext,
  EVALUATION_STATES,
  EvaluationContext,
  type EvaluationContextOptions,
  type EvaluationState,
  type ResolutionTrigger,
  type WaitSet,
} from "./evaluation";
// Logging seam
export { type LoggerLike, makeNoopLogger } from "./observability/logger";
// Ports
export type { HostScheduler, TimerHandle } from "./ports";
// Variables
export {
  type AnyVariable,
  AsyncVariable,
  type AsyncVariableOptions,
  BaseVariable,
  ConstVariable,
  DEFAULT_POLL_INTERVAL_MS,
  PollVariable,
  VARIABLE_MODES,
  type Variable,
  type VariableMode,
  type VariableObserver,
} from "./variables";
