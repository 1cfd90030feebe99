export { SkillEvolutionCoordinator, type CoordinatorOptions } from "./evolution/coordinator.js";
export { createCoordinator } from "./evolution/factory.js";
export { DEFAULT_EVOLUTION_POLICY, resolvePolicy } from "./evolution/policy.js";
export type { EvolutionPolicy, FailurePolicy, PolicyOverrides } from "./evolution/policy.js";
export { createSeededRandom, systemRandom, type RandomSource } from "./evolution/random.js";
export { LlmTreeOptimizer, mergeProposals } from "./evolution/tree-optimizer.js";
export type { TreeOptimizer, OptimizationRequest, OptimizationResult, ProposedSkill } from "./evolution/tree-optimizer.js";
export { parseUnlockCondition, evaluateCondition } from "./evolution/unlock-condition.js";
export { formatStatusReport } from "./evolution/status-report.js";
export { UnlockConditionError, StateFileError } from "./evolution/errors.js";
export { loadConfig, toEvolutionPolicy, type AppConfig } from "./utils/config.js";
export { createLogger, type Logger } from "./utils/logger.js";
export type * from "./evolution/types.js";
