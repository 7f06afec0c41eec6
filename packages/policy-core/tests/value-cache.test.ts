// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@policyd/policy-core/tests/value-cache`
 * Purpose: Unit tests for identity-keyed memoization in ValueCache.
 * Scope: Cache behavior only.
 * Side-effects: none
 * Links: src/evaluation/value-cache.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { ValueCache } from "../src/evaluation/value-cache";
import { FakeVariable } from "./fakes/fake-variable";

describe("ValueCache", () => {
  it("keys entries by variable identity, not by name", () => {
    const cache = new ValueCache();
    const first = new FakeVariable<number>("shared_name", "poll");
    const second = new FakeVariable<number>("shared_name", "poll");
    first.reset(1);
    second.reset(2);

    expect(cache.read(first)).toBe(1);
    expect(cache.read(second)).toBe(2);
    expect(cache.size).toBe(2);
  });

  it("records no entry for an absent value", () => {
    const cache = new ValueCache();
    const variable = new FakeVariable<string>("absent", "async");

    expect(cache.read(variable)).toBeNull();
    expect(cache.has(variable)).toBe(false);
  });

  it("records no entry for an undefined value", () => {
    const cache = new ValueCache();
    const variable = new FakeVariable<string | undefined>("unset", "poll");
    variable.reset(undefined);

    expect(cache.read(variable)).toBeNull();
    expect(cache.has(variable)).toBe(false);
  });

  it("caches falsy values", () => {
    const cache = new ValueCache();
    const variable = new FakeVariable<number>("zero", "poll");
    variable.reset(0);

    expect(cache.read(variable)).toBe(0);
    variable.reset(7);
    expect(cache.read(variable)).toBe(0);
    expect(variable.queries).toBe(1);
  });

  it("re-queries after clear()", () => {
    const cache = new ValueCache();
    const variable = new FakeVariable<boolean>("flag", "const");
    variable.reset(false);
    cache.read(variable);

    cache.clear();
    variable.reset(true);

    expect(cache.read(variable)).toBe(true);
    expect(cache.size).toBe(1);
  });
});
