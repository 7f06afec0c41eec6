// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-manager/tests/fixtures`
 * Purpose: Provider state, policies and a mock logger for policy-manager tests.
 * Scope: Test data only.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import {
  AsyncVariable,
  ConstVariable,
  PollVariable,
} from "@policyd/policy-core";

import {
  askMeAgainLater,
  type EvalResult,
  failed,
  type PolicyRequest,
  succeeded,
} from "../src";

export { createMockLogger } from "../../policy-core/tests/fakes/mock-logger";

export interface DeviceState {
  readonly updatesEnabled: AsyncVariable<boolean>;
  readonly maintenanceWindowOpen: PollVariable<boolean>;
  readonly releaseChannel: ConstVariable<string>;
}

/**
 * Creates provider state. `windowOpen` backs the poll variable (interval 1000ms).
 */
export function createDeviceState(windowOpen: {
  open: boolean | null;
}): DeviceState {
  return {
    updatesEnabled: new AsyncVariable<boolean>("updates_enabled"),
    maintenanceWindowOpen: new PollVariable<boolean>(
      "maintenance_window_open",
      () => windowOpen.open,
      1000
    ),
    releaseChannel: new ConstVariable("release_channel", "stable"),
  };
}

/** Waits for the async flag; fails when updates are disabled. */
export const updateCheckAllowed: PolicyRequest<DeviceState, boolean> = {
  name: "update_check_allowed",
  evaluate: (ctx, state): EvalResult<boolean> => {
    const enabled = ctx.getValue(state.updatesEnabled);
    if (enabled === null) {
      return askMeAgainLater();
    }
    return enabled ? succeeded(true) : failed("updates disabled");
  },
};

/** Waits for the poll variable to report an open window. */
export const installAllowed: PolicyRequest<DeviceState, string> = {
  name: "install_allowed",
  evaluate: (ctx, state) => {
    const open = ctx.getValue(state.maintenanceWindowOpen);
    if (open !== true) {
      return askMeAgainLater();
    }
    return succeeded(`install from ${ctx.getValue(state.releaseChannel)}`);
  },
};
