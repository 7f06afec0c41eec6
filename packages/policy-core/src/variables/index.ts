// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/variables`
 * Purpose: Barrel export for the variable contract and generic variables.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { BaseVariable } from "./base-variable";
export {
  AsyncVariable,
  type AsyncVariableOptions,
  ConstVariable,
  PollVariable,
} from "./generic-variables";
export {
  type AnyVariable,
  DEFAULT_POLL_INTERVAL_MS,
  VARIABLE_MODES,
  type Variable,
  type VariableMode,
  type VariableObserver,
} from "./types";
