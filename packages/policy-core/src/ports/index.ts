// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/ports`
 * Purpose: Barrel export for port interfaces.
 * Scope: Re-exports only. Does not contain implementations.
 * Side-effects: none
 * @public
 */

export type { HostScheduler, TimerHandle } from "./host-scheduler.port";
