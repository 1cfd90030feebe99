import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LLMResponse } from "../../src/core/llm/provider.js";
import { SkillEvolutionCoordinator, type CoordinatorOptions } from "../../src/evolution/coordinator.js";
import { resolvePolicy, type PolicyOverrides } from "../../src/evolution/policy.js";
import type { RandomSource } from "../../src/evolution/random.js";
import type { SkillNode, SkillTree } from "../../src/evolution/types.js";
import { createMockLogger } from "./mocks.js";

export function createTextResponse(text: string | null, provider: string = "mock"): LLMResponse {
  return {
    text,
    stopReason: "end_turn",
    usage: { inputTokens: 100, outputTokens: 50 },
    model: "mock-model",
    provider,
  };
}

/** Stored (snake_case) form of a skill, as it appears in a tree file. */
export interface StoredSkillFixture {
  name?: string;
  category?: string;
  tier?: string;
  level?: number;
  max_level?: number;
  unlocked?: boolean;
  prerequisites?: string[];
  unlock_condition?: string;
  proficiency?: number;
  [extra: string]: unknown;
}

export function storedSkill(overrides: StoredSkillFixture = {}): StoredSkillFixture {
  return {
    category: "knowledge_acquisition",
    tier: "basic",
    level: 0,
    unlocked: true,
    prerequisites: [],
    proficiency: 0,
    ...overrides,
  };
}

/** In-memory skill node; unlocked basic skill at level 0 unless overridden. */
export function skillNode(id: string, overrides: Partial<SkillNode> = {}): SkillNode {
  return {
    id,
    name: id,
    category: "knowledge_acquisition",
    tier: "basic",
    level: 0,
    unlocked: true,
    prerequisites: [],
    proficiency: 0,
    extras: {},
    ...overrides,
  };
}

export function buildTree(nodes: SkillNode[], metadata: Record<string, unknown> = {}): SkillTree {
  return { skills: new Map(nodes.map((node) => [node.id, node])), metadata };
}

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "skill-evolution-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function writeTree(path: string, skills: Record<string, StoredSkillFixture>, metadata: Record<string, unknown> = {}): void {
  writeFileSync(path, JSON.stringify({ ...metadata, skills }, null, 2), "utf-8");
}

/** Always returns the same value; 0 picks the first candidate and the general tree. */
export function fixedRandom(value: number): RandomSource {
  return { next: () => value };
}

export interface CoordinatorFixture {
  general?: Record<string, StoredSkillFixture>;
  domain?: Record<string, StoredSkillFixture>;
  policy?: PolicyOverrides;
  random?: RandomSource;
  optimizer?: CoordinatorOptions["optimizer"];
}

export function coordinatorPaths(dir: string): Pick<CoordinatorOptions, "generalTreePath" | "domainTreePath" | "failureTrackerPath"> {
  return {
    generalTreePath: join(dir, "general_tree.json"),
    domainTreePath: join(dir, "domain_tree.json"),
    failureTrackerPath: join(dir, "failure_tracker.json"),
  };
}

/** Write the given trees into `dir` and open a coordinator on them. */
export function makeCoordinator(dir: string, fixture: CoordinatorFixture = {}): SkillEvolutionCoordinator {
  const paths = coordinatorPaths(dir);
  if (fixture.general) writeTree(paths.generalTreePath, fixture.general);
  if (fixture.domain) writeTree(paths.domainTreePath, fixture.domain);

  return new SkillEvolutionCoordinator({
    ...paths,
    policy: resolvePolicy(fixture.policy),
    logger: createMockLogger(),
    random: fixture.random ?? fixedRandom(0),
    optimizer: fixture.optimizer,
  });
}
