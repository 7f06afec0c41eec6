// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/errors`
 * Purpose: Domain error classes for evaluation context ownership.
 * Scope: Error definitions and type guards. Degenerate evaluation outcomes (no value, nothing to wait on, redundant scheduling) are return values, not errors.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: src/evaluation/evaluation-context.ts
 * @public
 */

export class EvaluationContextReleasedError extends Error {
  public readonly code = "EVALUATION_CONTEXT_RELEASED" as const;
  constructor(public readonly operation: string) {
    super(`Cannot ${operation}: evaluation context was already released`);
    this.name = "EvaluationContextReleasedError";
  }
}

export function isEvaluationContextReleasedError(
  error: unknown
): error is EvaluationContextReleasedError {
  return (
    error instanceof Error && error.name === "EvaluationContextReleasedError"
  );
}
