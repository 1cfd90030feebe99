import type { SkillNode } from "./types.js";

export const SKILL_TIERS = ["basic", "intermediate", "advanced", "master"] as const;

export type SkillTier = (typeof SKILL_TIERS)[number];

const TIER_WEIGHTS: Record<SkillTier, number> = {
  basic: 1,
  intermediate: 2,
  advanced: 3,
  master: 4,
};

const DEFAULT_MAX_LEVELS: Record<SkillTier, number> = {
  basic: 20,
  intermediate: 30,
  advanced: 50,
  master: 20,
};

export const MAX_TIER_WEIGHT = 4;
export const FALLBACK_MAX_LEVEL = 20;

export function isSkillTier(value: string): value is SkillTier {
  return (SKILL_TIERS as readonly string[]).includes(value);
}

export function tierWeight(tier: string): number {
  return isSkillTier(tier) ? TIER_WEIGHTS[tier] : 1;
}

/** 0 for basic up to 3 for master; unknown tags sort with basic. */
export function tierOrder(tier: string): number {
  return isSkillTier(tier) ? SKILL_TIERS.indexOf(tier) : 0;
}

export function defaultMaxLevel(tier: string): number {
  return isSkillTier(tier) ? DEFAULT_MAX_LEVELS[tier] : FALLBACK_MAX_LEVEL;
}

/** The skill's level ceiling: explicit override first, then the tier default. */
export function maxLevelOf(skill: Pick<SkillNode, "tier" | "maxLevel">): number {
  return skill.maxLevel ?? defaultMaxLevel(skill.tier);
}

export function clampLevel(level: number, ceiling: number): number {
  if (!Number.isFinite(level)) return 0;
  return Math.min(Math.max(Math.trunc(level), 0), ceiling);
}
