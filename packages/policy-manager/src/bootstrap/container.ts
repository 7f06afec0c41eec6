// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/bootstrap/container`
 * Purpose: Composition root - wires config, logger and the event-loop scheduler into a PolicyManager.
 * Scope: All concrete adapter construction lives here.
 * Invariants: Only file that instantiates EventLoopScheduler or calls makeLogger.
 * Side-effects: Reads process.env when no env map is passed
 * Links: src/config.ts, src/observability/logger.ts
 * @public
 */

import { EventLoopScheduler } from "@policyd/policy-core";

import { env as processEnv, parseEnv } from "../config";
import { makeLogger } from "../observability/logger";
import { PolicyManager } from "../policy-manager";

export interface CreatePolicyManagerParams<S> {
  readonly state: S;
  /** Environment map to read config from. Default: process.env */
  readonly env?: Record<string, string | undefined>;
}

export function createPolicyManager<S>(
  params: CreatePolicyManagerParams<S>
): PolicyManager<S> {
  const config = params.env === undefined ? processEnv() : parseEnv(params.env);
  const logger = makeLogger(
    { level: config.LOG_LEVEL, serviceName: config.SERVICE_NAME },
    { component: "policy-manager" }
  );

  logger.info(
    { pollIntervalFloorMs: config.POLICY_POLL_INTERVAL_FLOOR_MS },
    "policy manager created"
  );

  return new PolicyManager({
    state: params.state,
    scheduler: new EventLoopScheduler(),
    logger,
    pollIntervalFloorMs: config.POLICY_POLL_INTERVAL_FLOOR_MS,
  });
}
