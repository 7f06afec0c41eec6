// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/variables/generic-variables`
 * Purpose: Ready-made variables for each mode, for providers that do not need a custom class.
 * Scope: ConstVariable (fixed value), PollVariable (reads through a function), AsyncVariable (pushed value with change notification).
 * Invariants:
 *   - ConstVariable and PollVariable never notify observers
 *   - AsyncVariable notifies only when the observable value changes
 * Side-effects: none
 * Links: src/variables/base-variable.ts
 * @public
 */

import { BaseVariable } from "./base-variable";
import { DEFAULT_POLL_INTERVAL_MS } from "./types";

export class ConstVariable<T> extends BaseVariable<T> {
  constructor(
    name: string,
    private readonly value: T
  ) {
    super(name, "const");
  }

  getValue(): T {
    return this.value;
  }
}

/**
 * Calls `read` on every query. Return null from `read` when the value is not available yet.
 */
export class PollVariable<T> extends BaseVariable<T> {
  constructor(
    name: string,
    private readonly read: () => T | null,
    pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {
    super(name, "poll", pollIntervalMs);
  }

  getValue(): T | null {
    return this.read();
  }
}

export interface AsyncVariableOptions<T> {
  /** Initial value. Omit to start without a value. */
  readonly initial?: T;
  /** Equality used to suppress redundant notifications. Default: Object.is */
  readonly equals?: (a: T, b: T) => boolean;
}

/**
 * Holds the latest pushed value.
 * Producers call setValue()/unsetValue() from the loop; observers are signalled synchronously.
 */
export class AsyncVariable<T> extends BaseVariable<T> {
  private current: { readonly value: T } | null;
  private readonly equals: (a: T, b: T) => boolean;

  constructor(name: string, options: AsyncVariableOptions<T> = {}) {
    super(name, "async");
    this.current =
      options.initial === undefined ? null : { value: options.initial };
    this.equals = options.equals ?? Object.is;
  }

  getValue(): T | null {
    return this.current === null ? null : this.current.value;
  }

  setValue(value: T): void {
    if (this.current !== null && this.equals(this.current.value, value)) {
      return;
    }
    this.current = { value };
    this.notifyValueChanged();
  }

  unsetValue(): void {
    if (this.current === null) {
      return;
    }
    this.current = null;
    this.notifyValueChanged();
  }
}
