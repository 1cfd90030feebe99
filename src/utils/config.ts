import { readFileSync, existsSync } from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";
import type { EvolutionPolicy } from "../evolution/policy.js";

const PriorityPairSchema = z
  .object({ general: z.number().min(0).max(1), domain: z.number().min(0).max(1) })
  .refine((p) => Math.abs(p.general + p.domain - 1) < 1e-6, {
    message: "general + domain priority must sum to 1",
  });

const StoragePathsSchema = z.object({
  general_tree_path: z.string().default("./data/general_tree.json"),
  domain_tree_path: z.string().default("./data/domain_tree.json"),
  failure_tracker_path: z.string().default("./data/failure_tracker.json"),
});

const FailurePolicySchema = z
  .object({
    short_cooldown_at: z.number().int().positive().default(3),
    short_cooldown_rounds: z.number().int().positive().default(3),
    long_cooldown_at: z.number().int().positive().default(5),
    long_cooldown_rounds: z.number().int().positive().default(10),
    penalty_step: z.number().min(0).default(0.2),
    penalty_max: z.number().min(0).default(0.8),
    prereq_bonus_direct: z.number().min(0).default(0.3),
    prereq_bonus_indirect: z.number().min(0).default(0.15),
  })
  .refine((f) => f.long_cooldown_at > f.short_cooldown_at, {
    message: "long_cooldown_at must be greater than short_cooldown_at",
  })
  .refine((f) => f.prereq_bonus_direct > f.prereq_bonus_indirect, {
    message: "prereq_bonus_direct must exceed prereq_bonus_indirect",
  });

const IndexWeightsSchema = z
  .object({
    breadth: z.number().min(0).default(0.25),
    depth: z.number().min(0).default(0.25),
    tier: z.number().min(0).default(0.25),
    mastery: z.number().min(0).default(0.25),
  })
  .refine((w) => Math.abs(w.breadth + w.depth + w.tier + w.mastery - 1) < 1e-6, {
    message: "index weights must sum to 1",
  });

const StageThresholdsSchema = z
  .object({
    growing: z.number().default(15),
    maturing: z.number().default(40),
    specializing: z.number().default(70),
  })
  .refine((t) => 0 < t.growing && t.growing < t.maturing && t.maturing < t.specializing && t.specializing <= 100, {
    message: "stage thresholds must be strictly increasing within (0, 100]",
  });

const EvolutionConfigSchema = z.object({
  seed: z.number().int().optional(),
  top_k: z.number().int().positive().default(3),
  enable_ai_optimization: z.boolean().default(true),
  optimizer_interval: z.number().int().positive().default(5),
  unlock_level_threshold: z.number().int().min(0).default(5),
  mastery_ratio: z.number().gt(0).max(1).default(0.5),
  index_weights: IndexWeightsSchema.default({}),
  stage_thresholds: StageThresholdsSchema.default({}),
  stage_priorities: z
    .object({
      sprouting: PriorityPairSchema.default({ general: 0.8, domain: 0.2 }),
      growing: PriorityPairSchema.default({ general: 0.6, domain: 0.4 }),
      maturing: PriorityPairSchema.default({ general: 0.4, domain: 0.6 }),
      specializing: PriorityPairSchema.default({ general: 0.25, domain: 0.75 }),
    })
    .default({}),
  failure: FailurePolicySchema.default({}),
});

const LlmConfigSchema = z.object({
  provider: z.enum(["anthropic", "openai_compat"]),
  api_key: z.string().min(1),
  model: z.string(),
  base_url: z.string().optional(),
  max_tokens: z.number().int().positive().default(1024),
  timeout_ms: z.number().int().positive().default(60_000),
});

const AppConfigSchema = z.object({
  storage: StoragePathsSchema.default({}),
  evolution: EvolutionConfigSchema.default({}),
  llm: LlmConfigSchema.optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type StoragePaths = z.infer<typeof StoragePathsSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const fileContent = readFileSync(path, "utf-8");
    const loaded: unknown = yaml.load(fileContent);
    if (isRecord(loaded)) rawConfig = loaded;
  }

  applyEnvOverrides(rawConfig);

  return AppConfigSchema.parse(rawConfig);
}

/** Convert the validated snake_case config into the coordinator's policy. */
export function toEvolutionPolicy(config: AppConfig): EvolutionPolicy {
  const evo = config.evolution;
  return {
    indexWeights: { ...evo.index_weights },
    stageThresholds: { ...evo.stage_thresholds },
    stagePriorities: {
      sprouting: { ...evo.stage_priorities.sprouting },
      growing: { ...evo.stage_priorities.growing },
      maturing: { ...evo.stage_priorities.maturing },
      specializing: { ...evo.stage_priorities.specializing },
    },
    unlockLevelThreshold: evo.unlock_level_threshold,
    masteryRatio: evo.mastery_ratio,
    topK: evo.top_k,
    optimizerInterval: evo.optimizer_interval,
    enableAiOptimization: evo.enable_ai_optimization,
    failure: {
      shortCooldownAt: evo.failure.short_cooldown_at,
      shortCooldownRounds: evo.failure.short_cooldown_rounds,
      longCooldownAt: evo.failure.long_cooldown_at,
      longCooldownRounds: evo.failure.long_cooldown_rounds,
      penaltyStep: evo.failure.penalty_step,
      penaltyMax: evo.failure.penalty_max,
      prereqBonusDirect: evo.failure.prereq_bonus_direct,
      prereqBonusIndirect: evo.failure.prereq_bonus_indirect,
    },
  };
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const storage = ensureObject(config, "storage");
  const evolution = ensureObject(config, "evolution");

  // Storage overrides
  if (process.env.GENERAL_TREE_PATH) storage.general_tree_path = process.env.GENERAL_TREE_PATH;
  if (process.env.DOMAIN_TREE_PATH) storage.domain_tree_path = process.env.DOMAIN_TREE_PATH;
  if (process.env.FAILURE_TRACKER_PATH) storage.failure_tracker_path = process.env.FAILURE_TRACKER_PATH;

  // Deterministic selection
  if (process.env.EVOLUTION_SEED) {
    const seed = parseInt(process.env.EVOLUTION_SEED, 10);
    if (!Number.isNaN(seed)) evolution.seed = seed;
  }

  // LLM provider overrides for the tree optimizer
  if (process.env.ANTHROPIC_API_KEY) {
    const llm = ensureObject(config, "llm");
    llm.api_key = process.env.ANTHROPIC_API_KEY;
    if (!llm.provider) llm.provider = "anthropic";
    if (!llm.model) llm.model = "claude-sonnet-4-5-20250514";
  } else if (process.env.OPENAI_API_KEY) {
    const llm = ensureObject(config, "llm");
    llm.api_key = process.env.OPENAI_API_KEY;
    if (!llm.provider) llm.provider = "openai_compat";
    if (!llm.base_url) llm.base_url = process.env.OPENAI_BASE_URL || "https://api.openai.com/v1";
    if (!llm.model) llm.model = "gpt-4o";
  }

  if (process.env.EVOLUTION_LLM_MODEL && isRecord(config.llm)) {
    config.llm.model = process.env.EVOLUTION_LLM_MODEL;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}
