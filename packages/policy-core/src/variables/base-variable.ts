// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/variables/base-variable`
 * Purpose: Shared observer bookkeeping for Variable implementations.
 * Scope: Name, mode, poll interval and observer list. Subclasses supply getValue().
 * Invariants:
 *   - addObserver() is idempotent per observer function
 *   - notifyValueChanged() signals a snapshot of the observers, so an observer may remove itself during delivery
 * Side-effects: none
 * Links: src/variables/types.ts
 * @public
 */

import {
  DEFAULT_POLL_INTERVAL_MS,
  type Variable,
  type VariableMode,
  type VariableObserver,
} from "./types";

export abstract class BaseVariable<T> implements Variable<T> {
  private readonly observers = new Set<VariableObserver>();

  protected constructor(
    public readonly name: string,
    public readonly mode: VariableMode,
    public readonly pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {}

  abstract getValue(): T | null;

  addObserver(observer: VariableObserver): void {
    this.observers.add(observer);
  }

  removeObserver(observer: VariableObserver): void {
    this.observers.delete(observer);
  }

  get observerCount(): number {
    return this.observers.size;
  }

  /**
   * Signals every registered observer, synchronously.
   * Receivers that need to defer work must do so themselves.
   */
  protected notifyValueChanged(): void {
    for (const observer of [...this.observers]) {
      observer();
    }
  }
}
