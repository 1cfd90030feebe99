/**
 * Candidate filtering, scoring and the top-K draw.
 *
 * Lower score is better:
 *   score = level / ceiling + 0.05 × tier order + failure penalty − prerequisite bonus
 *
 * The winner is drawn uniformly from the K lowest scores so a single skill
 * cannot starve the rest of the tree.
 */
import { pickOne, type RandomSource } from "./random.js";
import { maxLevelOf, tierOrder } from "./tiers.js";
import type { PriorityPair, SkillNode, SkillTree, SkillView, TreeType } from "./types.js";

const TIER_STEP = 0.05;

export interface ScoredCandidate {
  skill: SkillNode;
  score: number;
  penalty: number;
  bonus: number;
}

export function toSkillView(skill: SkillNode): SkillView {
  return {
    id: skill.id,
    name: skill.name,
    category: skill.category,
    tier: skill.tier,
    level: skill.level,
    maxLevel: maxLevelOf(skill),
    unlocked: skill.unlocked,
    prerequisites: [...skill.prerequisites],
    ...(skill.unlockCondition ? { unlockCondition: skill.unlockCondition } : {}),
  };
}

/** Unlocked, below the ceiling, and not cooling down. */
export function evolvableSkills(
  tree: SkillTree,
  isCoolingDown: (skillId: string) => boolean
): SkillNode[] {
  const result: SkillNode[] = [];
  for (const skill of tree.skills.values()) {
    if (!skill.unlocked) continue;
    if (skill.level >= maxLevelOf(skill)) continue;
    if (isCoolingDown(skill.id)) continue;
    result.push(skill);
  }
  return result;
}

export function scoreCandidates(
  candidates: readonly SkillNode[],
  penaltyFor: (skillId: string) => number,
  boostTargets: ReadonlyMap<string, number>
): ScoredCandidate[] {
  const scored = candidates.map((skill) => {
    const ceiling = maxLevelOf(skill);
    const base = (ceiling > 0 ? skill.level / ceiling : 0) + tierOrder(skill.tier) * TIER_STEP;
    const penalty = penaltyFor(skill.id);
    const bonus = boostTargets.get(skill.id) ?? 0;
    return { skill, score: base + penalty - bonus, penalty, bonus };
  });

  return scored.sort(
    (a, b) =>
      a.score - b.score ||
      a.skill.level - b.skill.level ||
      tierOrder(a.skill.tier) - tierOrder(b.skill.tier) ||
      a.skill.id.localeCompare(b.skill.id)
  );
}

export function pickFromTop(
  scored: readonly ScoredCandidate[],
  topK: number,
  random: RandomSource
): SkillNode | undefined {
  return pickOne(scored.slice(0, Math.max(topK, 1)), random)?.skill;
}

/** Weighted draw between the two trees using the stage's priority pair. */
export function chooseTree(priority: PriorityPair, random: RandomSource): TreeType {
  return random.next() < priority.general ? "general" : "domain";
}
