/**
 * Durable storage for the general and domain skill trees.
 *
 * Each tree is one JSON file, read whole and rewritten whole. Missing or
 * corrupt files load as an empty tree so the coordinator keeps running.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import { StateFileError } from "./errors.js";
import { clampLevel, maxLevelOf } from "./tiers.js";
import type { SkillNode, SkillTree } from "./types.js";

// A field with a bad value takes its default; only a skill that is not an
// object at all fails the file.
const StoredSkillSchema = z
  .object({
    name: z.string().optional().catch(undefined),
    category: z.string().catch(""),
    tier: z.string().catch("basic"),
    level: z.number().catch(0),
    max_level: z.number().int().positive().optional().catch(undefined),
    unlocked: z.boolean().catch(false),
    prerequisites: z.array(z.string()).catch([]),
    unlock_condition: z.string().optional().catch(undefined),
    proficiency: z.number().catch(0),
  })
  .passthrough();

const StoredTreeSchema = z
  .object({
    skills: z.record(StoredSkillSchema).default({}),
  })
  .passthrough();

type StoredSkill = z.infer<typeof StoredSkillSchema>;

const KNOWN_SKILL_KEYS = new Set([
  "name",
  "category",
  "tier",
  "level",
  "max_level",
  "unlocked",
  "prerequisites",
  "unlock_condition",
  "proficiency",
]);

export function emptyTree(): SkillTree {
  return { skills: new Map(), metadata: {} };
}

export function toSkillNode(id: string, stored: StoredSkill): SkillNode {
  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(stored)) {
    if (!KNOWN_SKILL_KEYS.has(key)) extras[key] = value;
  }

  const node: SkillNode = {
    id,
    name: stored.name ?? id,
    category: stored.category,
    tier: stored.tier,
    level: 0,
    maxLevel: stored.max_level,
    unlocked: stored.unlocked,
    prerequisites: stored.prerequisites,
    unlockCondition: stored.unlock_condition?.trim() ? stored.unlock_condition : undefined,
    proficiency: Math.min(Math.max(stored.proficiency, 0), 1),
    extras,
  };
  node.level = clampLevel(stored.level, maxLevelOf(node));
  return node;
}

export function fromSkillNode(node: SkillNode): Record<string, unknown> {
  return {
    ...node.extras,
    name: node.name,
    category: node.category,
    tier: node.tier,
    level: node.level,
    ...(node.maxLevel !== undefined ? { max_level: node.maxLevel } : {}),
    unlocked: node.unlocked,
    prerequisites: [...node.prerequisites],
    ...(node.unlockCondition ? { unlock_condition: node.unlockCondition } : {}),
    proficiency: node.proficiency,
  };
}

/** Parse raw JSON text into a tree. Throws StateFileError on any mismatch. */
export function parseTree(text: string, path: string): SkillTree {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateFileError(path, err instanceof Error ? err.message : String(err));
  }

  const result = StoredTreeSchema.safeParse(raw);
  if (!result.success) {
    throw new StateFileError(path, result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }

  const { skills, ...metadata } = result.data;
  const tree: SkillTree = { skills: new Map(), metadata };
  for (const [id, stored] of Object.entries(skills)) {
    tree.skills.set(id, toSkillNode(id, stored));
  }
  return tree;
}

export function serializeTree(tree: SkillTree): string {
  const skills: Record<string, Record<string, unknown>> = {};
  for (const [id, node] of tree.skills) {
    skills[id] = fromSkillNode(node);
  }
  return JSON.stringify({ ...tree.metadata, skills }, null, 2);
}

export class SkillTreeStore {
  constructor(private readonly logger: Logger) {}

  load(path: string): SkillTree {
    if (!existsSync(path)) {
      this.logger.debug({ path }, "Skill tree file missing, starting empty");
      return emptyTree();
    }

    try {
      return parseTree(readFileSync(path, "utf-8"), path);
    } catch (err) {
      this.logger.warn({ path, error: err }, "Skill tree file unreadable, starting empty");
      return emptyTree();
    }
  }

  /** Rewrite the whole file. Returns false (and logs) when the write fails. */
  save(path: string, tree: SkillTree): boolean {
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, serializeTree(tree), "utf-8");
      return true;
    } catch (err) {
      this.logger.error({ path, error: err }, "Failed to save skill tree");
      return false;
    }
  }
}
