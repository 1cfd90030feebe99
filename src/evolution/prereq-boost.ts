/**
 * Prerequisite boost propagation.
 *
 * While a skill is cooling down, its direct prerequisites get a direct bonus
 * and their own prerequisites a smaller indirect one. The walk stops after two
 * hops. Only prerequisites still below half their ceiling are boosted.
 */
import { maxLevelOf } from "./tiers.js";
import type { SkillTree } from "./types.js";

export interface BoostBonuses {
  direct: number;
  indirect: number;
  masteryRatio: number;
}

function needsBoost(tree: SkillTree, skillId: string, masteryRatio: number): boolean {
  const skill = tree.skills.get(skillId);
  if (!skill) return false;
  return skill.level < maxLevelOf(skill) * masteryRatio;
}

function raise(targets: Map<string, number>, skillId: string, bonus: number): void {
  targets.set(skillId, Math.max(targets.get(skillId) ?? 0, bonus));
}

/** Boost targets for one blocked skill, resolved within its own tree. */
export function findPrerequisiteBoostTargets(
  tree: SkillTree,
  blockedSkillId: string,
  bonuses: BoostBonuses
): Map<string, number> {
  const targets = new Map<string, number>();
  const blocked = tree.skills.get(blockedSkillId);
  if (!blocked) return targets;

  for (const prereqId of blocked.prerequisites) {
    const prereq = tree.skills.get(prereqId);
    if (!prereq) continue;

    if (needsBoost(tree, prereqId, bonuses.masteryRatio)) {
      raise(targets, prereqId, bonuses.direct);
    }

    for (const grandId of prereq.prerequisites) {
      if (grandId === blockedSkillId) continue;
      if (needsBoost(tree, grandId, bonuses.masteryRatio)) {
        raise(targets, grandId, bonuses.indirect);
      }
    }
  }

  return targets;
}

/** Merge per-skill target maps, keeping the largest bonus for each prerequisite. */
export function mergeBoostTargets(maps: Iterable<Map<string, number>>): Map<string, number> {
  const merged = new Map<string, number>();
  for (const map of maps) {
    for (const [skillId, bonus] of map) raise(merged, skillId, bonus);
  }
  return merged;
}
