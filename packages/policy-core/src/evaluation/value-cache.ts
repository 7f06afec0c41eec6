// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/evaluation/value-cache`
 * Purpose: Per-context memo of variable values for one decision pass.
 * Scope: Lazy, identity-keyed, type-erased cache. Does not track observation or scheduling.
 * Invariants:
 *   - Keyed by variable object identity, not by name or value type
 *   - A present entry is never overwritten until clear()
 *   - Absence (null) is never cached
 * Side-effects: none
 * Links: src/evaluation/evaluation-context.ts
 * @internal
 */

import type { AnyVariable, Variable } from "../variables";

export class ValueCache {
  private readonly entries = new Map<AnyVariable, unknown>();

  /**
   * Returns the memoized value, or queries the variable once and memoizes a present result.
   */
  read<T>(variable: Variable<T>): T | null {
    if (this.entries.has(variable)) {
      // Entries are only written by this method with the same variable as key,
      // so the stored value has the variable's T
      return this.entries.get(variable) as T;
    }
    // undefined is absence too, and is reported as null
    const value = variable.getValue() ?? null;
    if (value !== null) {
      this.entries.set(variable, value);
    }
    return value;
  }

  has(variable: AnyVariable): boolean {
    return this.entries.has(variable);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
