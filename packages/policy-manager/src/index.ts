// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager`
 * Purpose: Policy manager package exports.
 * Scope: Re-exports the manager, composition root, result helpers, config and logger factory.
 * Side-effects: none
 * @public
 */

// Composition root
export {
  type CreatePolicyManagerParams,
  createPolicyManager,
} from "./bootstrap/container";
// Config
export { env, type PolicyManagerEnv, parseEnv } from "./config";
// Errors
export { isPolicyMethodThrewError, PolicyMethodThrewError } from "./errors";
// Logging
export {
  type Logger,
  type LoggerOptions,
  makeLogger,
} from "./observability/logger";
export type { PendingPolicyRequest } from "./policy/async-policy-request";
// Policies
export {
  askMeAgainLater,
  EVAL_STATUSES,
  type EvalAskMeAgainLater,
  type EvalFailed,
  type EvalResult,
  type EvalStatus,
  type EvalSucceeded,
  failed,
  type PolicyMethod,
  type PolicyRequest,
  type SettledEvalResult,
  succeeded,
} from "./policy/types";
// Manager
export { PolicyManager, type PolicyManagerDeps } from "./policy-manager";
