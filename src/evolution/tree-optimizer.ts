/**
 * AI tree optimizer: proposes new general skills from recent evolution
 * context, and merges accepted proposals into the general tree.
 *
 * The coordinator only depends on the `TreeOptimizer` interface. Any error
 * an optimizer raises is the coordinator's to swallow.
 */
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import type { LLMProvider } from "../core/llm/provider.js";
import { GENERAL_SKILL_CATEGORIES, type EvolutionContext, type SkillTree } from "./types.js";
import { isConditionIdentifier } from "./unlock-condition.js";

const MAX_HISTORY_ENTRIES = 20;
const NEW_SKILL_MAX_LEVEL = 20;
const DEFAULT_TIMEOUT_MS = 60_000;

export interface ProposedSkill {
  id: string;
  name: string;
  category: string;
  description: string;
  capabilities: string[];
  prerequisites: string[];
  reason: string;
}

export interface OptimizationRequest {
  tree: SkillTree;
  triggerSkill: string;
  triggerLevel: number;
  context: EvolutionContext;
}

export interface OptimizationResult {
  proposals: ProposedSkill[];
  summary?: string;
}

export interface TreeOptimizer {
  optimize(request: OptimizationRequest): Promise<OptimizationResult>;
}

const ProposedSkillSchema = z.object({
  id: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/),
  name: z.string().min(1),
  category: z.enum(GENERAL_SKILL_CATEGORIES).catch("knowledge_acquisition"),
  description: z.string().default(""),
  capabilities: z.array(z.string()).default([]),
  prerequisites: z.array(z.string()).default([]),
  reason: z.string().default(""),
});

const SuggestionsSchema = z.object({
  suggestions: z.array(z.unknown()).default([]),
});

const OPTIMIZER_SYSTEM_PROMPT = `You are an agent capability planner. You extend a tree of general-purpose skills that a self-improving agent practices.

Return a JSON object with EXACTLY this structure:
{
  "suggestions": [
    {
      "id": "snake_case_skill_id",
      "name": "Skill name",
      "category": "knowledge_acquisition" | "world_interaction" | "self_evolution",
      "description": "What the skill does",
      "capabilities": ["capability 1", "capability 2"],
      "prerequisites": ["existing_skill_id"],
      "reason": "Why this skill fits now"
    }
  ]
}

Suggest at most 2 skills that build on what the agent already has. Return an empty array when nothing fits.
Return ONLY valid JSON, no markdown, no explanation.`;

export interface LlmTreeOptimizerOptions {
  model: string;
  maxTokens?: number;
  /** Skip discovery until the agent's total level reaches this value. */
  minTotalLevel?: number;
  /** Abort the model request after this many milliseconds. */
  timeoutMs?: number;
}

export class LlmTreeOptimizer implements TreeOptimizer {
  constructor(
    private readonly llm: LLMProvider,
    private readonly options: LlmTreeOptimizerOptions,
    private readonly logger: Logger
  ) {}

  async optimize(request: OptimizationRequest): Promise<OptimizationResult> {
    const minTotalLevel = this.options.minTotalLevel ?? 50;
    if (request.context.totalLevel < minTotalLevel) {
      return { proposals: [], summary: "Total level below discovery threshold" };
    }

    const response = await this.llm.chat({
      model: this.options.model,
      system: OPTIMIZER_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildOptimizerPrompt(request) }],
      maxTokens: this.options.maxTokens ?? 1024,
      signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!response.text) {
      this.logger.warn("Tree optimizer returned no text");
      return { proposals: [] };
    }

    const proposals = parseProposals(response.text, this.logger);
    return {
      proposals,
      summary: proposals.length > 0 ? `Proposed: ${proposals.map((p) => p.id).join(", ")}` : "No proposals",
    };
  }
}

export function buildOptimizerPrompt(request: OptimizationRequest): string {
  const current: string[] = [];
  for (const skill of request.tree.skills.values()) {
    if (skill.level > 0) current.push(`- ${skill.name} [${skill.id}] (Lv.${skill.level}, ${skill.category})`);
  }

  const lines: string[] = [
    "## Current general skills",
    ...(current.length > 0 ? current : ["(none yet)"]),
    "",
    "## Just evolved",
    `${request.triggerSkill} reached Lv.${request.triggerLevel}`,
    "",
    "## Progress",
    `- Stage: ${request.context.stage}`,
    `- Evolution index: ${request.context.evolutionIndex.index.toFixed(1)}`,
    `- Total level: ${request.context.totalLevel}`,
    "",
    "Suggest new general skills that synergize with the existing ones.",
  ];
  return lines.join("\n");
}

/** Strip markdown fences, parse, and keep only well-formed proposals. */
export function parseProposals(text: string, logger: Logger): ProposedSkill[] {
  const cleaned = text
    .replace(/^```(?:json)?\n?/m, "")
    .replace(/\n?```$/m, "")
    .trim();

  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch (err) {
    logger.warn({ error: err }, "Tree optimizer response was not valid JSON");
    return [];
  }

  const envelope = SuggestionsSchema.safeParse(raw);
  if (!envelope.success) {
    logger.warn("Tree optimizer response had no suggestions array");
    return [];
  }

  const proposals: ProposedSkill[] = [];
  for (const item of envelope.data.suggestions) {
    const parsed = ProposedSkillSchema.safeParse(item);
    if (parsed.success) proposals.push(parsed.data);
  }
  return proposals;
}

/**
 * Add proposals to the tree as locked basic skills. Ids already present are
 * skipped and prerequisites are limited to ids the tree knows. A prerequisite
 * id the condition grammar cannot express leaves the skill on the implicit
 * threshold rule. Returns the ids added and records an optimization-history
 * entry.
 */
export function mergeProposals(
  tree: SkillTree,
  proposals: readonly ProposedSkill[],
  trigger: { skillId: string; level: number; unlockLevel: number },
  now: Date = new Date()
): string[] {
  const added: string[] = [];

  for (const proposal of proposals) {
    if (tree.skills.has(proposal.id)) continue;

    const prerequisites = proposal.prerequisites.filter((id) => tree.skills.has(id));
    tree.skills.set(proposal.id, {
      id: proposal.id,
      name: proposal.name,
      category: proposal.category,
      tier: "basic",
      level: 0,
      maxLevel: NEW_SKILL_MAX_LEVEL,
      unlocked: false,
      prerequisites,
      unlockCondition: buildUnlockCondition(prerequisites, trigger.unlockLevel),
      proficiency: 0,
      extras: {
        description: proposal.description,
        capabilities: proposal.capabilities,
        ai_generated: true,
        generated_at: now.toISOString(),
      },
    });
    added.push(proposal.id);
  }

  const history: unknown[] = Array.isArray(tree.metadata.optimization_history)
    ? [...tree.metadata.optimization_history]
    : [];
  history.push({
    timestamp: now.toISOString(),
    trigger_skill: trigger.skillId,
    trigger_level: trigger.level,
    changes: added.map((id) => ({ type: "add_skill", skill_id: id })),
  });
  tree.metadata.optimization_history = history.slice(-MAX_HISTORY_ENTRIES);
  tree.metadata.last_optimized = now.toISOString();

  return added;
}

function buildUnlockCondition(prerequisites: readonly string[], unlockLevel: number): string | undefined {
  if (prerequisites.length === 0 || !prerequisites.every(isConditionIdentifier)) return undefined;
  return prerequisites.map((id) => `${id} >= ${unlockLevel}`).join(" and ");
}
