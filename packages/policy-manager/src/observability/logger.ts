// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not read configuration itself; the composition root passes it in.
 * Invariants: Always emits JSON to stdout; no worker transports; silenced under test tooling.
 * Side-effects: none
 * Notes: Formatting via external pipe (pino-pretty).
 * Links: src/bootstrap/container.ts
 * @public
 */

import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level: string;
  readonly serviceName: string;
}

export function makeLogger(
  options: LoggerOptions,
  bindings?: Record<string, unknown>
): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";
  // Sync in dev for immediate crash visibility, buffered async in prod
  const sync = nodeEnv !== "production";

  return pino(
    {
      level: options.level,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, service: options.serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: 1,
      sync,
      minLength: sync ? 0 : 4096,
    })
  );
}
