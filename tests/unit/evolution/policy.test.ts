import { describe, it, expect } from "vitest";
import { DEFAULT_EVOLUTION_POLICY, resolvePolicy } from "../../../src/evolution/policy.js";
import { clampLevel, defaultMaxLevel, maxLevelOf, tierOrder, tierWeight } from "../../../src/evolution/tiers.js";

describe("resolvePolicy", () => {
  it("returns the defaults without overrides", () => {
    expect(resolvePolicy()).toEqual(DEFAULT_EVOLUTION_POLICY);
  });

  it("merges nested overrides onto the defaults", () => {
    const policy = resolvePolicy({ topK: 1, failure: { longCooldownRounds: 20 } });

    expect(policy.topK).toBe(1);
    expect(policy.failure.longCooldownRounds).toBe(20);
    expect(policy.failure.shortCooldownRounds).toBe(3);
    expect(DEFAULT_EVOLUTION_POLICY.failure.longCooldownRounds).toBe(10);
  });
});

describe("tiers", () => {
  it("maps known tiers to weight, order and ceiling", () => {
    expect(["basic", "intermediate", "advanced", "master"].map(tierWeight)).toEqual([1, 2, 3, 4]);
    expect(["basic", "intermediate", "advanced", "master"].map(tierOrder)).toEqual([0, 1, 2, 3]);
    expect(["basic", "intermediate", "advanced", "master"].map(defaultMaxLevel)).toEqual([20, 30, 50, 20]);
  });

  it("treats unknown tiers like basic", () => {
    expect(tierWeight("expert")).toBe(1);
    expect(tierOrder("expert")).toBe(0);
    expect(defaultMaxLevel("expert")).toBe(20);
  });

  it("prefers an explicit ceiling", () => {
    expect(maxLevelOf({ tier: "advanced", maxLevel: 12 })).toBe(12);
    expect(maxLevelOf({ tier: "advanced" })).toBe(50);
  });

  it("clamps levels to whole numbers within the ceiling", () => {
    expect(clampLevel(25, 20)).toBe(20);
    expect(clampLevel(-3, 20)).toBe(0);
    expect(clampLevel(4.7, 20)).toBe(4);
    expect(clampLevel(Number.NaN, 20)).toBe(0);
  });
});
