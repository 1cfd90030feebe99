/**
 * Multi-dimensional evolution index.
 *
 * - breadth: unlocked / total skills
 * - depth:   Σ level / Σ ceiling over unlocked skills
 * - tier:    Σ tier weight of unlocked skills / (total skills × max tier weight)
 * - mastery: unlocked skills at or past `masteryRatio` of their ceiling / unlocked
 *
 * The composite index is the weighted sum scaled to 0-100.
 */
import type { IndexWeights, StageThresholds } from "./policy.js";
import { MAX_TIER_WEIGHT, maxLevelOf, tierWeight } from "./tiers.js";
import type { EvolutionIndex, EvolutionStage, SkillTree } from "./types.js";

export const STAGE_NAMES: Record<EvolutionStage, string> = {
  sprouting: "Sprouting",
  growing: "Growing",
  maturing: "Maturing",
  specializing: "Specializing",
};

export function emptyEvolutionIndex(): EvolutionIndex {
  return {
    index: 0,
    breadth: 0,
    depth: 0,
    tier: 0,
    mastery: 0,
    detail: {
      totalSkills: 0,
      unlockedSkills: 0,
      levelSum: 0,
      maxLevelSum: 0,
      masteredSkills: 0,
    },
  };
}

export function calculateEvolutionIndex(
  trees: readonly SkillTree[],
  weights: IndexWeights,
  masteryRatio: number
): EvolutionIndex {
  let totalCount = 0;
  let unlockedCount = 0;
  let levelSum = 0;
  let maxLevelSum = 0;
  let unlockedWeight = 0;
  let mastered = 0;

  for (const tree of trees) {
    for (const skill of tree.skills.values()) {
      totalCount++;
      if (!skill.unlocked) continue;

      const ceiling = maxLevelOf(skill);
      unlockedCount++;
      levelSum += skill.level;
      maxLevelSum += ceiling;
      unlockedWeight += tierWeight(skill.tier);
      if (skill.level >= ceiling * masteryRatio) mastered++;
    }
  }

  if (totalCount === 0) return emptyEvolutionIndex();

  const breadth = unlockedCount / totalCount;
  const depth = maxLevelSum > 0 ? levelSum / maxLevelSum : 0;
  const tier = unlockedWeight / (totalCount * MAX_TIER_WEIGHT);
  const mastery = unlockedCount > 0 ? mastered / unlockedCount : 0;

  const composite =
    100 *
    (weights.breadth * breadth +
      weights.depth * depth +
      weights.tier * tier +
      weights.mastery * mastery);

  return {
    index: Math.min(Math.max(composite, 0), 100),
    breadth,
    depth,
    tier,
    mastery,
    detail: {
      totalSkills: totalCount,
      unlockedSkills: unlockedCount,
      levelSum,
      maxLevelSum,
      masteredSkills: mastered,
    },
  };
}

export function classifyStage(index: number, thresholds: StageThresholds): EvolutionStage {
  if (index >= thresholds.specializing) return "specializing";
  if (index >= thresholds.maturing) return "maturing";
  if (index >= thresholds.growing) return "growing";
  return "sprouting";
}
