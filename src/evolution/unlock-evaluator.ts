import type { Logger } from "../utils/logger.js";
import { evaluateCondition, parseUnlockCondition, type ConditionNode } from "./unlock-condition.js";
import type { SkillNode, SkillTree } from "./types.js";

/** Resolves a skill id to its current level, or undefined when no tree has it. */
export type LevelLookup = (skillId: string) => number | undefined;

/**
 * Decides which locked skills become unlocked.
 *
 * No prerequisites: unlock. An explicit condition: unlock when it evaluates
 * true; parse or lookup errors mean "not met". Otherwise every prerequisite
 * must reach `levelThreshold`. Unlocking is monotonic and is the only
 * mutation performed here.
 */
export class UnlockEvaluator {
  // null marks an expression that failed to parse, so it is reported once.
  private parsed = new Map<string, ConditionNode | null>();

  constructor(
    private readonly logger: Logger,
    private readonly levelThreshold: number
  ) {}

  isSatisfied(skill: SkillNode, levelOf: LevelLookup): boolean {
    if (skill.prerequisites.length === 0) return true;

    if (skill.unlockCondition) {
      const condition = this.parse(skill.unlockCondition);
      if (!condition) return false;
      try {
        return evaluateCondition(condition, levelOf);
      } catch (err) {
        this.logger.debug(
          { skillId: skill.id, condition: skill.unlockCondition, error: err },
          "Unlock condition not evaluable"
        );
        return false;
      }
    }

    return skill.prerequisites.every((id) => (levelOf(id) ?? 0) >= this.levelThreshold);
  }

  /** Unlock every eligible locked skill in the tree; returns the ids unlocked. */
  unlockEligible(tree: SkillTree, levelOf: LevelLookup): string[] {
    const unlocked: string[] = [];
    for (const skill of tree.skills.values()) {
      if (skill.unlocked) continue;
      if (this.isSatisfied(skill, levelOf)) {
        skill.unlocked = true;
        unlocked.push(skill.id);
      }
    }
    return unlocked;
  }

  private parse(source: string): ConditionNode | null {
    const cached = this.parsed.get(source);
    if (cached !== undefined) return cached;

    let node: ConditionNode | null = null;
    try {
      node = parseUnlockCondition(source);
    } catch (err) {
      this.logger.debug({ condition: source, error: err }, "Malformed unlock condition");
    }
    this.parsed.set(source, node);
    return node;
  }
}
