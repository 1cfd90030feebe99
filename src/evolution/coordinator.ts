/**
 * SkillEvolutionCoordinator: decides which skill to evolve next and reacts to
 * reported outcomes.
 *
 * Owns the general and domain skill trees and the failure tracker. A driver
 * calls `selectNextSkill()`, attempts the skill elsewhere, then reports back
 * through `recordEvolutionSuccess()` / `recordEvolutionFailure()`. One round
 * runs to completion before the next begins; instances are not safe for
 * concurrent mutation.
 *
 * No public method throws. Unexpected errors are logged and a neutral value
 * is returned so driver loops can run indefinitely.
 */
import type { Logger } from "../utils/logger.js";
import { calculateEvolutionIndex, classifyStage, emptyEvolutionIndex, STAGE_NAMES } from "./evolution-index.js";
import { FailureTracker } from "./failure-tracker.js";
import type { EvolutionPolicy } from "./policy.js";
import { findPrerequisiteBoostTargets, mergeBoostTargets } from "./prereq-boost.js";
import { systemRandom, type RandomSource } from "./random.js";
import { chooseTree, evolvableSkills, pickFromTop, scoreCandidates, toSkillView } from "./skill-selector.js";
import { SkillTreeStore } from "./skill-tree-store.js";
import { clampLevel, maxLevelOf } from "./tiers.js";
import { mergeProposals, type TreeOptimizer } from "./tree-optimizer.js";
import { UnlockEvaluator, type LevelLookup } from "./unlock-evaluator.js";
import type {
  EvolutionContext,
  EvolutionIndex,
  EvolutionStage,
  EvolutionStats,
  FailureOutcome,
  FailureSummary,
  PriorityPair,
  SkillSelection,
  SkillTree,
  SkillView,
  SuccessOutcome,
  TrackStats,
  TreeType,
  UnlockedSkillRef,
} from "./types.js";

const NO_SELECTION: SkillSelection = { tree: "none", skill: null };

export interface CoordinatorOptions {
  generalTreePath: string;
  domainTreePath: string;
  failureTrackerPath: string;
  policy: EvolutionPolicy;
  logger: Logger;
  random?: RandomSource;
  optimizer?: TreeOptimizer;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class SkillEvolutionCoordinator {
  private generalTree: SkillTree;
  private domainTree: SkillTree;
  private readonly paths: Record<TreeType, string>;
  private readonly tracker: FailureTracker;
  private readonly store: SkillTreeStore;
  private readonly unlocker: UnlockEvaluator;
  private readonly policy: EvolutionPolicy;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly optimizer?: TreeOptimizer;
  private evolutionCount: Record<TreeType, number> = { general: 0, domain: 0 };
  private categoryCount = new Map<string, number>();

  constructor(options: CoordinatorOptions) {
    this.policy = options.policy;
    this.logger = options.logger;
    this.random = options.random ?? systemRandom;
    this.optimizer = options.optimizer;
    this.paths = { general: options.generalTreePath, domain: options.domainTreePath };

    this.store = new SkillTreeStore(this.logger);
    this.unlocker = new UnlockEvaluator(this.logger, this.policy.unlockLevelThreshold);
    this.generalTree = this.store.load(this.paths.general);
    this.domainTree = this.store.load(this.paths.domain);
    this.tracker = new FailureTracker(options.failureTrackerPath, this.policy.failure, this.logger);

    this.logger.info(
      {
        generalSkills: this.generalTree.skills.size,
        domainSkills: this.domainTree.skills.size,
        evolutionRound: this.tracker.evolutionRound,
      },
      "Skill evolution coordinator initialized"
    );
  }

  get evolutionRound(): number {
    return this.tracker.evolutionRound;
  }

  // ---- Selection ----

  /** Advance the round, unlock what became eligible, and pick one skill to attempt. */
  selectNextSkill(): SkillSelection {
    try {
      const evolutionRound = this.tracker.advanceRound();
      this.checkAndUnlockAllSkills();

      const isCooling = (id: string) => this.tracker.isCoolingDown(id);
      const general = evolvableSkills(this.generalTree, isCooling);
      const domain = evolvableSkills(this.domainTree, isCooling);

      let treeType: TreeType;
      if (general.length === 0 && domain.length === 0) {
        this.logger.info({ evolutionRound }, "No evolvable skills in either tree");
        return NO_SELECTION;
      } else if (general.length === 0) {
        treeType = "domain";
      } else if (domain.length === 0) {
        treeType = "general";
      } else {
        treeType = chooseTree(this.getCurrentPriority(), this.random);
      }

      const candidates = treeType === "general" ? general : domain;
      const scored = scoreCandidates(
        candidates,
        (id) => this.tracker.penaltyFor(id),
        this.boostTargetsFor(treeType)
      );
      const skill = pickFromTop(scored, this.policy.topK, this.random);
      if (!skill) return NO_SELECTION;

      this.logger.info(
        { evolutionRound, tree: treeType, skillId: skill.id, level: skill.level },
        "Selected next skill"
      );
      return { tree: treeType, skill: toSkillView(skill) };
    } catch (err) {
      this.logger.error({ error: err }, "Skill selection failed");
      return NO_SELECTION;
    }
  }

  /** Unlocked skills below their ceiling that are not cooling down. */
  getEvolvableSkills(treeType: TreeType): SkillView[] {
    return evolvableSkills(this.treeOf(treeType), (id) => this.tracker.isCoolingDown(id)).map(toSkillView);
  }

  getSkill(treeType: TreeType, skillId: string): SkillView | undefined {
    const skill = this.treeOf(treeType).skills.get(skillId);
    return skill ? toSkillView(skill) : undefined;
  }

  /** Run the unlock pass on both trees and persist whichever changed. */
  checkAndUnlockAllSkills(): UnlockedSkillRef[] {
    const result: UnlockedSkillRef[] = [];
    for (const treeType of ["general", "domain"] as const) {
      const unlocked = this.unlocker.unlockEligible(this.treeOf(treeType), this.levelLookup(treeType));
      if (unlocked.length === 0) continue;

      this.logger.info({ tree: treeType, skills: unlocked }, "Unlocked skills");
      this.store.save(this.paths[treeType], this.treeOf(treeType));
      for (const skillId of unlocked) result.push({ skillId, tree: treeType });
    }
    return result;
  }

  // ---- Outcome feedback ----

  async recordEvolutionSuccess(
    treeType: TreeType,
    skillId: string,
    newLevel: number
  ): Promise<SuccessOutcome> {
    try {
      const tree = this.treeOf(treeType);
      const skill = tree.skills.get(skillId);

      if (this.tracker.clear(skillId)) {
        this.logger.info({ skillId }, "Cleared failure record");
      }

      if (!skill) {
        this.logger.warn({ tree: treeType, skillId }, "Success reported for unknown skill");
        return { recorded: false, level: newLevel, unlocked: [], optimized: false };
      }

      const ceiling = maxLevelOf(skill);
      const level = clampLevel(newLevel, ceiling);
      if (level !== newLevel) {
        this.logger.warn({ skillId, reported: newLevel, stored: level, ceiling }, "Reported level out of range, clamped");
      }
      skill.level = level;

      this.evolutionCount[treeType]++;
      this.categoryCount.set(skill.category, (this.categoryCount.get(skill.category) ?? 0) + 1);

      const unlocked = this.unlocker.unlockEligible(tree, this.levelLookup(treeType));
      if (unlocked.length > 0) {
        this.logger.info({ tree: treeType, skills: unlocked }, "Unlocked skills");
      }
      this.store.save(this.paths[treeType], tree);

      const optimized = treeType === "general" ? await this.maybeOptimize(skillId, level) : false;
      return { recorded: true, level, unlocked, optimized };
    } catch (err) {
      this.logger.error({ tree: treeType, skillId, error: err }, "Failed to record evolution success");
      return { recorded: false, level: newLevel, unlocked: [], optimized: false };
    }
  }

  recordEvolutionFailure(
    treeType: TreeType,
    skillId: string,
    level: number,
    reason?: string
  ): FailureOutcome {
    try {
      const tree = this.treeOf(treeType);
      const skill = tree.skills.get(skillId);
      if (!skill) {
        this.logger.warn({ tree: treeType, skillId }, "Failure reported for unknown skill");
      }

      const failedLevel = skill ? clampLevel(level, maxLevelOf(skill)) : level;
      const tracked = this.tracker.recordFailure(skillId, { tree: treeType, level: failedLevel, reason });
      const { action, consecutiveFailures } = tracked;

      switch (action) {
        case "deprioritize":
          this.logger.info({ skillId, consecutiveFailures, penalty: tracked.penalty }, "Skill deprioritized");
          return { action, consecutiveFailures, details: { penalty: tracked.penalty } };

        case "boost_prereqs": {
          const boost = findPrerequisiteBoostTargets(tree, skillId, this.boostBonuses());
          this.logger.info(
            { skillId, consecutiveFailures, cooldownRounds: tracked.cooldownRounds, boostTargets: [...boost.keys()] },
            "Skill cooling down, boosting prerequisites"
          );
          return {
            action,
            consecutiveFailures,
            details: {
              cooldown_rounds: tracked.cooldownRounds,
              until_round: tracked.untilRound,
              boost_targets: Object.fromEntries(boost),
            },
          };
        }

        case "long_cooldown":
          this.logger.warn(
            { skillId, consecutiveFailures, cooldownRounds: tracked.cooldownRounds },
            "Skill keeps failing, long cooldown"
          );
          return {
            action,
            consecutiveFailures,
            details: { cooldown_rounds: tracked.cooldownRounds, until_round: tracked.untilRound },
          };
      }
    } catch (err) {
      this.logger.error({ tree: treeType, skillId, error: err }, "Failed to record evolution failure");
      return { action: "none", consecutiveFailures: 0, details: {} };
    }
  }

  // ---- Read surface ----

  calculateEvolutionIndex(): EvolutionIndex {
    return calculateEvolutionIndex(
      [this.generalTree, this.domainTree],
      this.policy.indexWeights,
      this.policy.masteryRatio
    );
  }

  getCurrentStage(): EvolutionStage {
    return classifyStage(this.calculateEvolutionIndex().index, this.policy.stageThresholds);
  }

  getCurrentPriority(): PriorityPair {
    return { ...this.policy.stagePriorities[this.getCurrentStage()] };
  }

  /** Prerequisites of every cooling skill with their bonus; largest bonus wins. */
  getBoostTargets(): Record<string, number> {
    return Object.fromEntries(
      mergeBoostTargets([this.boostTargetsFor("general"), this.boostTargetsFor("domain")])
    );
  }

  getFailureSummary(): FailureSummary {
    try {
      const { cooling, struggling } = this.tracker.summarize();
      return {
        evolutionRound: this.tracker.evolutionRound,
        coolingSkills: cooling,
        strugglingSkills: struggling,
        boostTargets: this.getBoostTargets(),
      };
    } catch (err) {
      this.logger.error({ error: err }, "Failed to build failure summary");
      return { evolutionRound: this.tracker.evolutionRound, coolingSkills: [], strugglingSkills: [], boostTargets: {} };
    }
  }

  getStats(): EvolutionStats {
    let evo: EvolutionIndex;
    try {
      evo = this.calculateEvolutionIndex();
    } catch (err) {
      this.logger.error({ error: err }, "Failed to calculate evolution index");
      evo = emptyEvolutionIndex();
    }
    const stage = classifyStage(evo.index, this.policy.stageThresholds);

    return {
      stage,
      stageName: STAGE_NAMES[stage],
      evolutionIndex: round(evo.index, 1),
      dimensions: {
        breadth: round(evo.breadth, 3),
        depth: round(evo.depth, 3),
        tier: round(evo.tier, 3),
        mastery: round(evo.mastery, 3),
      },
      totalLevel: this.levelSum("general") + this.levelSum("domain"),
      totalSkills: evo.detail.totalSkills,
      unlockedSkills: evo.detail.unlockedSkills,
      masteredSkills: evo.detail.masteredSkills,
      general: this.trackStats("general"),
      domain: this.trackStats("domain"),
      evolutionsByCategory: Object.fromEntries(this.categoryCount),
      priority: { ...this.policy.stagePriorities[stage] },
      failureSummary: this.getFailureSummary(),
    };
  }

  getEvolutionContext(): EvolutionContext {
    const evolutionIndex = this.calculateEvolutionIndex();
    const stage = classifyStage(evolutionIndex.index, this.policy.stageThresholds);
    const generalLevel = this.levelSum("general");
    const domainLevel = this.levelSum("domain");

    return {
      generalLevel,
      domainLevel,
      totalLevel: generalLevel + domainLevel,
      evolutionIndex,
      stage,
      priority: { ...this.policy.stagePriorities[stage] },
      evolutionCount: { ...this.evolutionCount },
      evolutionRound: this.tracker.evolutionRound,
      failureSummary: this.getFailureSummary(),
      generalSkills: this.levelMap("general"),
      domainSkills: this.levelMap("domain"),
    };
  }

  // ---- Internals ----

  private async maybeOptimize(skillId: string, level: number): Promise<boolean> {
    if (!this.optimizer || !this.policy.enableAiOptimization) return false;
    if (this.evolutionCount.general % this.policy.optimizerInterval !== 0) return false;

    try {
      const result = await this.optimizer.optimize({
        tree: this.generalTree,
        triggerSkill: skillId,
        triggerLevel: level,
        context: this.getEvolutionContext(),
      });
      if (result.proposals.length === 0) {
        this.logger.info({ summary: result.summary }, "Tree optimizer proposed no changes");
        return false;
      }

      const added = mergeProposals(this.generalTree, result.proposals, {
        skillId,
        level,
        unlockLevel: this.policy.unlockLevelThreshold,
      });
      this.unlocker.unlockEligible(this.generalTree, this.levelLookup("general"));
      this.store.save(this.paths.general, this.generalTree);
      this.logger.info({ added, summary: result.summary }, "Tree optimizer merged new skills");
      return added.length > 0;
    } catch (err) {
      this.logger.warn({ error: err }, "Tree optimization failed, no changes this cycle");
      return false;
    }
  }

  private boostBonuses() {
    return {
      direct: this.policy.failure.prereqBonusDirect,
      indirect: this.policy.failure.prereqBonusIndirect,
      masteryRatio: this.policy.masteryRatio,
    };
  }

  private boostTargetsFor(treeType: TreeType): Map<string, number> {
    const tree = this.treeOf(treeType);
    const perSkill: Array<Map<string, number>> = [];
    for (const { skillId, tree: failedIn } of this.tracker.coolingSkills()) {
      const home = failedIn ?? (this.generalTree.skills.has(skillId) ? "general" : "domain");
      if (home !== treeType) continue;
      perSkill.push(findPrerequisiteBoostTargets(tree, skillId, this.boostBonuses()));
    }
    return mergeBoostTargets(perSkill);
  }

  private treeOf(treeType: TreeType): SkillTree {
    return treeType === "general" ? this.generalTree : this.domainTree;
  }

  /** Levels resolve in the skill's own tree first, then in the other one. */
  private levelLookup(treeType: TreeType): LevelLookup {
    const own = this.treeOf(treeType);
    const other = this.treeOf(treeType === "general" ? "domain" : "general");
    return (id) => own.skills.get(id)?.level ?? other.skills.get(id)?.level;
  }

  private levelSum(treeType: TreeType): number {
    let sum = 0;
    for (const skill of this.treeOf(treeType).skills.values()) sum += skill.level;
    return sum;
  }

  private trackStats(treeType: TreeType): TrackStats {
    const skills = [...this.treeOf(treeType).skills.values()];
    return {
      levelSum: this.levelSum(treeType),
      unlocked: skills.filter((s) => s.unlocked).length,
      total: skills.length,
      evolutions: this.evolutionCount[treeType],
    };
  }

  private levelMap(treeType: TreeType): Record<string, { level: number; unlocked: boolean }> {
    const result: Record<string, { level: number; unlocked: boolean }> = {};
    for (const [id, skill] of this.treeOf(treeType).skills) {
      result[id] = { level: skill.level, unlocked: skill.unlocked };
    }
    return result;
  }
}
