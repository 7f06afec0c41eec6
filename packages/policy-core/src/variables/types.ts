// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/variables/types`
 * Purpose: Variable capability contract consumed by the evaluation context.
 * Scope: Types and mode constants only. Concrete data sources (clocks, device probes, config readers) live outside this package.
 * Invariants:
 *   - getValue() is synchronous and non-blocking; null means "not currently available"
 *   - Observers receive no payload; they re-read through getValue() if they need the value
 *   - A variable never owns the contexts observing it
 * Side-effects: none
 * Links: src/variables/base-variable.ts
 * @public
 */

export const VARIABLE_MODES = ["const", "poll", "async"] as const;

/**
 * - const: value never changes after the first successful read
 * - poll: value may change only when re-queried, at most once per poll interval
 * - async: value changes are pushed to observers
 */
export type VariableMode = (typeof VARIABLE_MODES)[number];

/** Poll interval used when a poll variable does not declare one. */
export const DEFAULT_POLL_INTERVAL_MS = 5 * 60 * 1000;

/** "This variable changed" signal. */
export type VariableObserver = () => void;

export interface Variable<T> {
  /** Stable name, used in logs. Identity for caching is the object itself. */
  readonly name: string;
  readonly mode: VariableMode;
  /** Minimum time before a re-query could yield something new (poll only). */
  readonly pollIntervalMs: number;

  getValue(): T | null;

  addObserver(observer: VariableObserver): void;
  removeObserver(observer: VariableObserver): void;
}

/** Type-erased variable, as stored in caches and wait sets. */
export type AnyVariable = Variable<unknown>;
