// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/observability/logger`
 * Purpose: Logging seam for core components.
 * Scope: Structural logger interface plus a silent default. Does not create emitting loggers (composition root owns that).
 * Invariants: LoggerLike stays assignable from pino's Logger.
 * Side-effects: none
 * @public
 */

import pino from "pino";

/**
 * Logger interface expected by core components.
 * Compatible with pino's Logger type.
 */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug(obj: Record<string, unknown>, msg?: string): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

/**
 * pino with enabled:false (preserves type, silences output).
 * Default for components constructed without a logger.
 */
export function makeNoopLogger(): LoggerLike {
  return pino({ enabled: false });
}
