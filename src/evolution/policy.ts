import type { EvolutionStage, PriorityPair } from "./types.js";

export interface FailurePolicy {
  /** Consecutive failures that trigger the short cooldown and prerequisite boost. */
  shortCooldownAt: number;
  shortCooldownRounds: number;
  /** Consecutive failures from which every further failure triggers the long cooldown. */
  longCooldownAt: number;
  longCooldownRounds: number;
  penaltyStep: number;
  penaltyMax: number;
  prereqBonusDirect: number;
  prereqBonusIndirect: number;
}

export interface IndexWeights {
  breadth: number;
  depth: number;
  tier: number;
  mastery: number;
}

export interface StageThresholds {
  growing: number;
  maturing: number;
  specializing: number;
}

export interface EvolutionPolicy {
  indexWeights: IndexWeights;
  stageThresholds: StageThresholds;
  stagePriorities: Record<EvolutionStage, PriorityPair>;
  /** Implicit unlock rule: every prerequisite at or above this level. */
  unlockLevelThreshold: number;
  /** Fraction of the ceiling at which a skill counts as mastered. */
  masteryRatio: number;
  topK: number;
  /** Run the tree optimizer after every N successful general-track evolutions. */
  optimizerInterval: number;
  enableAiOptimization: boolean;
  failure: FailurePolicy;
}

export const DEFAULT_EVOLUTION_POLICY: EvolutionPolicy = {
  indexWeights: { breadth: 0.25, depth: 0.25, tier: 0.25, mastery: 0.25 },
  stageThresholds: { growing: 15, maturing: 40, specializing: 70 },
  stagePriorities: {
    sprouting: { general: 0.8, domain: 0.2 },
    growing: { general: 0.6, domain: 0.4 },
    maturing: { general: 0.4, domain: 0.6 },
    specializing: { general: 0.25, domain: 0.75 },
  },
  unlockLevelThreshold: 5,
  masteryRatio: 0.5,
  topK: 3,
  optimizerInterval: 5,
  enableAiOptimization: true,
  failure: {
    shortCooldownAt: 3,
    shortCooldownRounds: 3,
    longCooldownAt: 5,
    longCooldownRounds: 10,
    penaltyStep: 0.2,
    penaltyMax: 0.8,
    prereqBonusDirect: 0.3,
    prereqBonusIndirect: 0.15,
  },
};

/** Deep-merge partial overrides onto the defaults. */
export function resolvePolicy(overrides?: PolicyOverrides): EvolutionPolicy {
  const base = DEFAULT_EVOLUTION_POLICY;
  if (!overrides) return base;
  return {
    ...base,
    ...overrides,
    indexWeights: { ...base.indexWeights, ...overrides.indexWeights },
    stageThresholds: { ...base.stageThresholds, ...overrides.stageThresholds },
    stagePriorities: { ...base.stagePriorities, ...overrides.stagePriorities },
    failure: { ...base.failure, ...overrides.failure },
  };
}

export type PolicyOverrides = Partial<
  Omit<EvolutionPolicy, "indexWeights" | "stageThresholds" | "stagePriorities" | "failure">
> & {
  indexWeights?: Partial<IndexWeights>;
  stageThresholds?: Partial<StageThresholds>;
  stagePriorities?: Partial<Record<EvolutionStage, PriorityPair>>;
  failure?: Partial<FailurePolicy>;
};
