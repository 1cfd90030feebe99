/** Shared types for the skill evolution coordinator. */

export type TreeType = "general" | "domain";

export const TREE_TYPES: readonly TreeType[] = ["general", "domain"];

/** Categories the general tree is organised around. Domain trees bring their own. */
export const GENERAL_SKILL_CATEGORIES = [
  "knowledge_acquisition",
  "world_interaction",
  "self_evolution",
] as const;

export type GeneralSkillCategory = (typeof GENERAL_SKILL_CATEGORIES)[number];

export interface SkillNode {
  id: string;
  name: string;
  category: string;
  /** Raw tier tag as stored; unknown tags fall back to basic-like defaults. */
  tier: string;
  level: number;
  /** Explicit ceiling override; absent means the tier default applies. */
  maxLevel?: number;
  unlocked: boolean;
  prerequisites: string[];
  unlockCondition?: string;
  /** Reserved, carried through persistence untouched. */
  proficiency: number;
  /** Stored fields this module does not interpret (description, capabilities, ...). */
  extras: Record<string, unknown>;
}

export interface SkillTree {
  skills: Map<string, SkillNode>;
  /** Free-form tree-level fields (history, optimization metadata). */
  metadata: Record<string, unknown>;
}

/** Read-only copy of a skill handed to callers, with its ceiling resolved. */
export interface SkillView {
  id: string;
  name: string;
  category: string;
  tier: string;
  level: number;
  maxLevel: number;
  unlocked: boolean;
  prerequisites: string[];
  unlockCondition?: string;
}

export type SkillSelection =
  | { tree: TreeType; skill: SkillView }
  | { tree: "none"; skill: null };

export type EvolutionStage = "sprouting" | "growing" | "maturing" | "specializing";

export interface PriorityPair {
  general: number;
  domain: number;
}

export interface EvolutionIndexDetail {
  totalSkills: number;
  unlockedSkills: number;
  levelSum: number;
  maxLevelSum: number;
  masteredSkills: number;
}

export interface EvolutionIndex {
  index: number;
  breadth: number;
  depth: number;
  tier: number;
  mastery: number;
  detail: EvolutionIndexDetail;
}

export type FailureAction = "none" | "deprioritize" | "boost_prereqs" | "long_cooldown";

export interface FailureOutcome {
  action: FailureAction;
  consecutiveFailures: number;
  details: {
    penalty?: number;
    cooldown_rounds?: number;
    until_round?: number;
    boost_targets?: Record<string, number>;
  };
}

export interface CoolingSkill {
  skillId: string;
  remaining: number;
  consecutiveFailures: number;
}

export interface StrugglingSkill {
  skillId: string;
  consecutiveFailures: number;
}

export interface FailureSummary {
  evolutionRound: number;
  coolingSkills: CoolingSkill[];
  strugglingSkills: StrugglingSkill[];
  boostTargets: Record<string, number>;
}

export interface TrackStats {
  levelSum: number;
  unlocked: number;
  total: number;
  evolutions: number;
}

export interface EvolutionStats {
  stage: EvolutionStage;
  stageName: string;
  evolutionIndex: number;
  dimensions: {
    breadth: number;
    depth: number;
    tier: number;
    mastery: number;
  };
  totalLevel: number;
  totalSkills: number;
  unlockedSkills: number;
  masteredSkills: number;
  general: TrackStats;
  domain: TrackStats;
  /** Successful evolutions this session, keyed by skill category. */
  evolutionsByCategory: Record<string, number>;
  priority: PriorityPair;
  failureSummary: FailureSummary;
}

export interface UnlockedSkillRef {
  skillId: string;
  tree: TreeType;
}

export interface SuccessOutcome {
  recorded: boolean;
  level: number;
  unlocked: string[];
  optimized: boolean;
}

export interface EvolutionContext {
  generalLevel: number;
  domainLevel: number;
  totalLevel: number;
  evolutionIndex: EvolutionIndex;
  stage: EvolutionStage;
  priority: PriorityPair;
  evolutionCount: Record<TreeType, number>;
  evolutionRound: number;
  failureSummary: FailureSummary;
  generalSkills: Record<string, { level: number; unlocked: boolean }>;
  domainSkills: Record<string, { level: number; unlocked: boolean }>;
}
