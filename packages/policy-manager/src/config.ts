// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/config`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No logger or scheduler construction.
 * Invariants:
 * - Every key has a default; an empty environment is valid
 * - Fails fast listing every invalid key
 * Side-effects: Reads process.env (env() only)
 * Links: src/bootstrap/container.ts
 * @public
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: policy-manager) */
  SERVICE_NAME: z.string().min(1).default("policy-manager"),

  /** Lower bound for re-evaluation poll deadlines, in ms (default: 0) */
  POLICY_POLL_INTERVAL_FLOOR_MS: z.coerce.number().int().min(0).default(0),
});

export type PolicyManagerEnv = z.infer<typeof EnvSchema>;

/**
 * Parses and validates an environment map.
 * Throws on invalid config with one line per offending key.
 */
export function parseEnv(
  source: Record<string, string | undefined>
): PolicyManagerEnv {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: PolicyManagerEnv | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): PolicyManagerEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
