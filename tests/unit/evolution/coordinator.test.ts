import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { SkillEvolutionCoordinator } from "../../../src/evolution/coordinator.js";
import { resolvePolicy } from "../../../src/evolution/policy.js";
import type { ProposedSkill } from "../../../src/evolution/tree-optimizer.js";
import {
  coordinatorPaths,
  createTempDir,
  fixedRandom,
  makeCoordinator,
  storedSkill,
} from "../../helpers/fixtures.js";
import { createMockLogger, createMockOptimizer } from "../../helpers/mocks.js";

function ids(skills: Array<{ id: string }>): string[] {
  return skills.map((s) => s.id);
}

describe("SkillEvolutionCoordinator", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => cleanup());

  describe("recordEvolutionFailure", () => {
    it("escalates to a cooldown on the third consecutive failure", () => {
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill({ level: 3 }), b: storedSkill() },
      });

      const outcomes = [1, 2, 3].map(() => coordinator.recordEvolutionFailure("general", "a", 3));

      expect(outcomes.map((o) => o.action)).toEqual(["deprioritize", "deprioritize", "boost_prereqs"]);
      expect(outcomes[0]?.details).toEqual({ penalty: 0.2 });
      expect(outcomes[2]).toEqual({
        action: "boost_prereqs",
        consecutiveFailures: 3,
        details: { cooldown_rounds: 3, until_round: 3, boost_targets: {} },
      });
      expect(ids(coordinator.getEvolvableSkills("general"))).toEqual(["b"]);
    });

    it("boosts the direct prerequisite of a blocked skill", () => {
      const coordinator = makeCoordinator(dir, {
        general: { base: storedSkill(), top: storedSkill({ prerequisites: ["base"] }) },
      });

      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("general", "top", 0);

      expect(coordinator.getBoostTargets()).toEqual({ base: 0.3 });
    });

    it("boosts a second-hop prerequisite with the indirect bonus", () => {
      const coordinator = makeCoordinator(dir, {
        general: {
          root: storedSkill(),
          base: storedSkill({ prerequisites: ["root"] }),
          top: storedSkill({ prerequisites: ["base"] }),
        },
      });

      const outcomes = [1, 2, 3].map(() => coordinator.recordEvolutionFailure("general", "top", 0));

      expect(outcomes[2]?.details.boost_targets).toEqual({ base: 0.3, root: 0.15 });
      expect(coordinator.getBoostTargets()).toEqual({ base: 0.3, root: 0.15 });
    });

    it("does not boost a prerequisite already at half its ceiling", () => {
      const coordinator = makeCoordinator(dir, {
        general: { base: storedSkill({ level: 10 }), top: storedSkill({ prerequisites: ["base"] }) },
      });

      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("general", "top", 0);

      expect(coordinator.getBoostTargets()).toEqual({});
    });

    it("resolves boost targets within the tree the skill failed in", () => {
      const coordinator = makeCoordinator(dir, {
        general: { base: storedSkill() },
        domain: { base: storedSkill({ category: "research" }), top: storedSkill({ prerequisites: ["base"] }) },
      });

      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("domain", "top", 0);

      expect(coordinator.getBoostTargets()).toEqual({ base: 0.3 });
      expect(coordinator.getSkill("general", "base")).toBeDefined();
    });

    it("applies the long cooldown from the fifth failure", () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill() } });

      const outcomes = [1, 2, 3, 4, 5].map(() => coordinator.recordEvolutionFailure("general", "a", 0));

      expect(outcomes[3]?.action).toBe("deprioritize");
      expect(outcomes[4]).toEqual({
        action: "long_cooldown",
        consecutiveFailures: 5,
        details: { cooldown_rounds: 10, until_round: 10 },
      });
    });

    it("clamps the reported level and keeps the round across a reload", () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill(), b: storedSkill() } });
      coordinator.selectNextSkill();
      coordinator.recordEvolutionFailure("general", "a", Number.NaN);
      coordinator.recordEvolutionFailure("general", "b", 99);

      const stored = JSON.parse(readFileSync(coordinatorPaths(dir).failureTrackerPath, "utf-8"));
      expect(stored.skills.a.last_failed_level).toBe(0);
      expect(stored.skills.b.last_failed_level).toBe(20);

      const reloaded = makeCoordinator(dir);
      expect(reloaded.evolutionRound).toBe(1);
      expect(reloaded.getFailureSummary().strugglingSkills).toHaveLength(2);
    });

    it("still tracks failures for an unknown skill", () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill() } });
      expect(coordinator.recordEvolutionFailure("general", "ghost", 1)).toEqual({
        action: "deprioritize",
        consecutiveFailures: 1,
        details: { penalty: 0.2 },
      });
    });
  });

  describe("selectNextSkill", () => {
    it("advances the round and persists it", () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill() } });

      coordinator.selectNextSkill();
      coordinator.selectNextSkill();
      expect(coordinator.evolutionRound).toBe(2);

      expect(makeCoordinator(dir).evolutionRound).toBe(2);
    });

    it("returns no selection when nothing can evolve", () => {
      const coordinator = makeCoordinator(dir, {
        general: { maxed: storedSkill({ level: 20 }) },
        domain: { locked: storedSkill({ unlocked: false, prerequisites: ["maxed"], unlock_condition: "maxed > 20" }) },
      });

      expect(coordinator.selectNextSkill()).toEqual({ tree: "none", skill: null });
      expect(coordinator.evolutionRound).toBe(1);
    });

    it("returns no selection when both trees are missing", () => {
      expect(makeCoordinator(dir).selectNextSkill()).toEqual({ tree: "none", skill: null });
    });

    it("falls back to the only tree with candidates", () => {
      const coordinator = makeCoordinator(dir, {
        general: {},
        domain: { d: storedSkill({ category: "research" }) },
      });

      const selection = coordinator.selectNextSkill();
      expect(selection.tree).toBe("domain");
      expect(selection.skill?.id).toBe("d");
    });

    it("splits between trees by the stage priority", () => {
      const fixture = {
        general: { g: storedSkill() },
        domain: { d: storedSkill({ category: "research" }) },
      };

      // Index 31.25 is the growing stage: general 0.6 / domain 0.4.
      expect(makeCoordinator(dir, { ...fixture, random: fixedRandom(0.59) }).selectNextSkill().tree).toBe("general");
      expect(makeCoordinator(dir, { ...fixture, random: fixedRandom(0.6) }).selectNextSkill().tree).toBe("domain");
    });

    it("prefers the boosted prerequisite of a cooling skill", () => {
      const coordinator = makeCoordinator(dir, {
        general: {
          base: storedSkill({ level: 4 }),
          fresh: storedSkill(),
          top: storedSkill({ prerequisites: ["base"] }),
        },
      });
      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("general", "top", 0);

      const selection = coordinator.selectNextSkill();
      expect(selection.skill?.id).toBe("base");
    });

    it("excludes a cooling skill until its cooldown round is reached", () => {
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill(), b: storedSkill({ level: 5 }) },
      });
      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("general", "a", 0);

      const evolvable: string[][] = [];
      for (let i = 0; i < 3; i++) {
        coordinator.selectNextSkill();
        evolvable.push(ids(coordinator.getEvolvableSkills("general")));
      }

      expect(evolvable).toEqual([["b"], ["b"], ["a", "b"]]);
    });

    it("excludes a skill for exactly ten rounds after its fifth failure", () => {
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill(), b: storedSkill({ level: 5 }) },
      });
      for (let i = 0; i < 5; i++) coordinator.recordEvolutionFailure("general", "a", 0);
      expect(ids(coordinator.getEvolvableSkills("general"))).toEqual(["b"]);

      for (let round = 1; round <= 9; round++) {
        coordinator.selectNextSkill();
        expect(coordinator.evolutionRound).toBe(round);
        expect(ids(coordinator.getEvolvableSkills("general"))).toEqual(["b"]);
      }

      coordinator.selectNextSkill();
      expect(coordinator.evolutionRound).toBe(10);
      expect(ids(coordinator.getEvolvableSkills("general"))).toEqual(["a", "b"]);
    });

    it("unlocks skills whose prerequisites were met in the other tree", () => {
      const coordinator = makeCoordinator(dir, {
        general: { g: storedSkill({ level: 3 }) },
        domain: { d: storedSkill({ unlocked: false, prerequisites: ["g"], unlock_condition: "g >= 3" }) },
      });

      expect(coordinator.checkAndUnlockAllSkills()).toEqual([{ skillId: "d", tree: "domain" }]);
      expect(coordinator.getSkill("domain", "d")?.unlocked).toBe(true);

      const saved = JSON.parse(readFileSync(coordinatorPaths(dir).domainTreePath, "utf-8"));
      expect(saved.skills.d.unlocked).toBe(true);
    });

    it("keeps working after loading corrupt state files", () => {
      const paths = coordinatorPaths(dir);
      writeFileSync(paths.generalTreePath, "{{", "utf-8");
      writeFileSync(paths.failureTrackerPath, "[]", "utf-8");

      const coordinator = makeCoordinator(dir);
      expect(coordinator.selectNextSkill()).toEqual({ tree: "none", skill: null });
      expect(coordinator.evolutionRound).toBe(1);
    });
  });

  describe("recordEvolutionSuccess", () => {
    it("stores the level, unlocks dependents and persists the tree", async () => {
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill(), b: storedSkill({ unlocked: false, prerequisites: ["a"] }) },
      });

      const outcome = await coordinator.recordEvolutionSuccess("general", "a", 5);

      expect(outcome).toEqual({ recorded: true, level: 5, unlocked: ["b"], optimized: false });
      const saved = JSON.parse(readFileSync(coordinatorPaths(dir).generalTreePath, "utf-8"));
      expect(saved.skills.a.level).toBe(5);
      expect(saved.skills.b.unlocked).toBe(true);
    });

    it("clears the failure record", async () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill() } });
      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("general", "a", 0);

      await coordinator.recordEvolutionSuccess("general", "a", 1);

      const summary = coordinator.getFailureSummary();
      expect(summary.coolingSkills).toEqual([]);
      expect(summary.strugglingSkills).toEqual([]);
      expect(ids(coordinator.getEvolvableSkills("general"))).toEqual(["a"]);
    });

    it("clamps a level past the ceiling", async () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill() } });

      const outcome = await coordinator.recordEvolutionSuccess("general", "a", 99);

      expect(outcome.level).toBe(20);
      expect(coordinator.getSkill("general", "a")?.level).toBe(20);
      expect(coordinator.getEvolvableSkills("general")).toEqual([]);
    });

    it("reports an unknown skill without recording it", async () => {
      const coordinator = makeCoordinator(dir, { general: { a: storedSkill() } });
      expect(await coordinator.recordEvolutionSuccess("domain", "a", 2)).toEqual({
        recorded: false,
        level: 2,
        unlocked: [],
        optimized: false,
      });
    });
  });

  describe("tree optimization", () => {
    const proposal: ProposedSkill = {
      id: "api_chaining",
      name: "API Chaining",
      category: "world_interaction",
      description: "Compose API calls",
      capabilities: ["chain requests"],
      prerequisites: ["a", "ghost"],
      reason: "builds on a",
    };

    it("runs on every fifth successful general evolution", async () => {
      const optimizer = createMockOptimizer({ proposals: [proposal], summary: "one" });
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill() },
        domain: { d: storedSkill({ category: "research" }) },
        optimizer,
      });

      const results: boolean[] = [];
      for (let level = 1; level <= 4; level++) {
        results.push((await coordinator.recordEvolutionSuccess("general", "a", level)).optimized);
      }
      await coordinator.recordEvolutionSuccess("domain", "d", 1);
      expect(optimizer.optimizeMock).not.toHaveBeenCalled();

      const fifth = await coordinator.recordEvolutionSuccess("general", "a", 5);

      expect(results).toEqual([false, false, false, false]);
      expect(fifth.optimized).toBe(true);
      expect(optimizer.optimizeMock).toHaveBeenCalledTimes(1);
      expect(optimizer.optimizeMock).toHaveBeenCalledWith(
        expect.objectContaining({ triggerSkill: "a", triggerLevel: 5 })
      );
      expect(coordinator.getSkill("general", "api_chaining")).toEqual({
        id: "api_chaining",
        name: "API Chaining",
        category: "world_interaction",
        tier: "basic",
        level: 0,
        maxLevel: 20,
        unlocked: true,
        prerequisites: ["a"],
        unlockCondition: "a >= 5",
      });
    });

    it("swallows optimizer errors", async () => {
      const optimizer = createMockOptimizer();
      optimizer.optimizeMock.mockRejectedValue(new Error("model unavailable"));
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill() },
        optimizer,
        policy: { optimizerInterval: 1 },
      });

      const outcome = await coordinator.recordEvolutionSuccess("general", "a", 1);

      expect(outcome).toEqual({ recorded: true, level: 1, unlocked: [], optimized: false });
      expect(coordinator.getSkill("general", "a")?.level).toBe(1);
    });

    it("stays off when optimization is disabled", async () => {
      const optimizer = createMockOptimizer({ proposals: [proposal] });
      const coordinator = makeCoordinator(dir, {
        general: { a: storedSkill() },
        optimizer,
        policy: { optimizerInterval: 1, enableAiOptimization: false },
      });

      await coordinator.recordEvolutionSuccess("general", "a", 1);
      expect(optimizer.optimizeMock).not.toHaveBeenCalled();
    });
  });

  describe("read surface", () => {
    function statsFixture() {
      return makeCoordinator(dir, {
        general: {
          a: storedSkill({ level: 10 }),
          b: storedSkill({ unlocked: false, prerequisites: ["a"], unlock_condition: "a >= 15" }),
        },
        domain: {
          c: storedSkill({ category: "research" }),
          d: storedSkill({ category: "research", unlocked: false, prerequisites: ["c"] }),
        },
      });
    }

    it("reports stats with rounded index and dimensions", async () => {
      const coordinator = statsFixture();
      await coordinator.recordEvolutionSuccess("domain", "c", 2);

      const stats = coordinator.getStats();

      expect(stats).toMatchObject({
        stage: "growing",
        stageName: "Growing",
        evolutionIndex: 35.6,
        dimensions: { breadth: 0.5, depth: 0.3, tier: 0.125, mastery: 0.5 },
        totalLevel: 12,
        totalSkills: 4,
        unlockedSkills: 2,
        masteredSkills: 1,
        general: { levelSum: 10, unlocked: 1, total: 2, evolutions: 0 },
        domain: { levelSum: 2, unlocked: 1, total: 2, evolutions: 1 },
        evolutionsByCategory: { research: 1 },
        priority: { general: 0.6, domain: 0.4 },
      });
      expect(coordinator.getCurrentStage()).toBe("growing");
      expect(coordinator.getCurrentPriority()).toEqual({ general: 0.6, domain: 0.4 });
    });

    it("summarizes failures with boost targets", () => {
      const coordinator = makeCoordinator(dir, {
        general: { base: storedSkill(), top: storedSkill({ prerequisites: ["base"] }), weak: storedSkill() },
      });
      coordinator.recordEvolutionFailure("general", "weak", 0);
      for (let i = 0; i < 3; i++) coordinator.recordEvolutionFailure("general", "top", 0);

      expect(coordinator.getFailureSummary()).toEqual({
        evolutionRound: 0,
        coolingSkills: [{ skillId: "top", remaining: 3, consecutiveFailures: 3 }],
        strugglingSkills: [{ skillId: "weak", consecutiveFailures: 1 }],
        boostTargets: { base: 0.3 },
      });
    });

    it("builds the optimizer context", async () => {
      const coordinator = statsFixture();
      await coordinator.recordEvolutionSuccess("general", "a", 11);

      const context = coordinator.getEvolutionContext();

      expect(context.generalLevel).toBe(11);
      expect(context.domainLevel).toBe(0);
      expect(context.totalLevel).toBe(11);
      expect(context.evolutionCount).toEqual({ general: 1, domain: 0 });
      expect(context.generalSkills).toEqual({
        a: { level: 11, unlocked: true },
        b: { level: 0, unlocked: false },
      });
    });
  });

  it("accepts a fully built options object", () => {
    const coordinator = new SkillEvolutionCoordinator({
      ...coordinatorPaths(join(dir, "fresh")),
      policy: resolvePolicy(),
      logger: createMockLogger(),
    });
    expect(coordinator.calculateEvolutionIndex().index).toBe(0);
    expect(coordinator.getCurrentStage()).toBe("sprouting");
  });
});
