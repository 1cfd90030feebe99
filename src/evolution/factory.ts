import { createProvider } from "../core/llm/factory.js";
import type { AppConfig } from "../utils/config.js";
import { toEvolutionPolicy } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { SkillEvolutionCoordinator } from "./coordinator.js";
import { createSeededRandom, systemRandom } from "./random.js";
import { LlmTreeOptimizer, type TreeOptimizer } from "./tree-optimizer.js";

/** Wire a coordinator from loaded config: policy, random source, and optional LLM optimizer. */
export function createCoordinator(config: AppConfig, logger: Logger): SkillEvolutionCoordinator {
  const policy = toEvolutionPolicy(config);

  let optimizer: TreeOptimizer | undefined;
  if (config.llm && policy.enableAiOptimization) {
    optimizer = new LlmTreeOptimizer(
      createProvider(config.llm),
      { model: config.llm.model, maxTokens: config.llm.max_tokens, timeoutMs: config.llm.timeout_ms },
      logger.child({ component: "tree-optimizer" })
    );
  } else if (policy.enableAiOptimization) {
    logger.debug("No LLM configured, tree optimization disabled");
  }

  return new SkillEvolutionCoordinator({
    generalTreePath: config.storage.general_tree_path,
    domainTreePath: config.storage.domain_tree_path,
    failureTrackerPath: config.storage.failure_tracker_path,
    policy,
    logger,
    random: config.evolution.seed !== undefined ? createSeededRandom(config.evolution.seed) : systemRandom,
    optimizer,
  });
}
