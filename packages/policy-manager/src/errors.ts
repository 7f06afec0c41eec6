// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/errors`
 * Purpose: Error classes surfaced as the cause of failed policy results.
 * Scope: Error definitions and type guards. The manager never throws these; they travel inside EvalResult.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

function messageOf(thrown: unknown): string {
  return thrown instanceof Error ? thrown.message : String(thrown);
}

export class PolicyMethodThrewError extends Error {
  public readonly code = "POLICY_METHOD_THREW" as const;
  constructor(
    public readonly policy: string,
    public readonly thrown: unknown
  ) {
    super(`Policy ${policy} threw: ${messageOf(thrown)}`, { cause: thrown });
    this.name = "PolicyMethodThrewError";
  }
}

export function isPolicyMethodThrewError(
  error: unknown
): error is PolicyMethodThrewError {
  return error instanceof Error && error.name === "PolicyMethodThrewError";
}
