/**
 * Round-indexed record of consecutive evolution failures per skill.
 *
 * Escalation: the first failures only lower a skill's selection score; the
 * `shortCooldownAt`-th failure parks it for a few rounds and redirects effort
 * to its prerequisites; from `longCooldownAt` on, every failure parks it for
 * longer. A success deletes the record outright.
 *
 * Cooldown is a live comparison against the round clock (`round < cooldownUntil`),
 * so expiry needs no explicit wake-up step. The tracker rewrites its file after
 * every mutation.
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import { StateFileError } from "./errors.js";
import type { FailurePolicy } from "./policy.js";
import type { CoolingSkill, FailureAction, StrugglingSkill, TreeType } from "./types.js";

const MAX_FAILURE_REASONS = 5;

// Optional fields fall back individually so one bad value cannot discard
// the round clock and every other record.
const StoredFailureRecordSchema = z.object({
  consecutive_failures: z.number().int().min(0),
  cooldown_until: z.number().int().optional().catch(undefined),
  tree: z.enum(["general", "domain"]).optional().catch(undefined),
  total_failures: z.number().int().min(0).optional().catch(undefined),
  last_failed_level: z.number().optional().catch(undefined),
  failure_reasons: z.array(z.string()).optional().catch(undefined),
});

const StoredTrackerSchema = z.object({
  evolution_round: z.number().int().min(0).default(0),
  skills: z.record(StoredFailureRecordSchema).default({}),
});

export interface FailureRecord {
  consecutiveFailures: number;
  /** Round number before which the skill is excluded; absent when never cooled. */
  cooldownUntil?: number;
  tree?: TreeType;
  totalFailures: number;
  lastFailedLevel?: number;
  failureReasons: string[];
}

export interface FailureReport {
  tree: TreeType;
  level: number;
  reason?: string;
}

export interface TrackedFailure {
  action: Exclude<FailureAction, "none">;
  consecutiveFailures: number;
  penalty: number;
  cooldownRounds?: number;
  untilRound?: number;
}

export class FailureTracker {
  private round = 0;
  private records = new Map<string, FailureRecord>();

  constructor(
    private readonly path: string,
    private readonly policy: FailurePolicy,
    private readonly logger: Logger
  ) {
    this.load();
  }

  get evolutionRound(): number {
    return this.round;
  }

  /** Advance the round clock by one and persist. Returns the new round. */
  advanceRound(): number {
    this.round++;
    this.save();
    this.logger.debug({ round: this.round }, "Evolution round advanced");
    return this.round;
  }

  recordFailure(skillId: string, report: FailureReport): TrackedFailure {
    const rec = this.records.get(skillId) ?? {
      consecutiveFailures: 0,
      totalFailures: 0,
      failureReasons: [],
    };
    this.records.set(skillId, rec);

    rec.consecutiveFailures++;
    rec.totalFailures++;
    rec.tree = report.tree;
    rec.lastFailedLevel = Number.isFinite(report.level) ? Math.max(Math.trunc(report.level), 0) : undefined;
    if (report.reason && !rec.failureReasons.includes(report.reason)) {
      rec.failureReasons.push(report.reason);
    }
    rec.failureReasons = rec.failureReasons.slice(-MAX_FAILURE_REASONS);

    const consec = rec.consecutiveFailures;
    const penalty = this.penaltyFor(skillId);
    let outcome: TrackedFailure;

    if (consec >= this.policy.longCooldownAt) {
      rec.cooldownUntil = this.round + this.policy.longCooldownRounds;
      outcome = {
        action: "long_cooldown",
        consecutiveFailures: consec,
        penalty,
        cooldownRounds: this.policy.longCooldownRounds,
        untilRound: rec.cooldownUntil,
      };
    } else if (consec === this.policy.shortCooldownAt) {
      rec.cooldownUntil = this.round + this.policy.shortCooldownRounds;
      outcome = {
        action: "boost_prereqs",
        consecutiveFailures: consec,
        penalty,
        cooldownRounds: this.policy.shortCooldownRounds,
        untilRound: rec.cooldownUntil,
      };
    } else {
      // Between the two thresholds the earlier cooldown stands as it was.
      outcome = { action: "deprioritize", consecutiveFailures: consec, penalty };
    }

    this.save();
    return outcome;
  }

  /** Drop the skill's record entirely. Returns true when one existed. */
  clear(skillId: string): boolean {
    const existed = this.records.delete(skillId);
    this.save();
    return existed;
  }

  getRecord(skillId: string): Readonly<FailureRecord> | undefined {
    return this.records.get(skillId);
  }

  consecutiveFailures(skillId: string): number {
    return this.records.get(skillId)?.consecutiveFailures ?? 0;
  }

  penaltyFor(skillId: string): number {
    return Math.min(
      this.consecutiveFailures(skillId) * this.policy.penaltyStep,
      this.policy.penaltyMax
    );
  }

  isCoolingDown(skillId: string): boolean {
    return this.remainingCooldown(skillId) > 0;
  }

  remainingCooldown(skillId: string): number {
    const until = this.records.get(skillId)?.cooldownUntil;
    if (until === undefined) return 0;
    return Math.max(until - this.round, 0);
  }

  /** Skills whose cooldown is active at the current round, with the tree they failed in. */
  coolingSkills(): Array<{ skillId: string; tree?: TreeType }> {
    const result: Array<{ skillId: string; tree?: TreeType }> = [];
    for (const [skillId, rec] of this.records) {
      if (this.isCoolingDown(skillId)) result.push({ skillId, tree: rec.tree });
    }
    return result;
  }

  summarize(): { cooling: CoolingSkill[]; struggling: StrugglingSkill[] } {
    const cooling: CoolingSkill[] = [];
    const struggling: StrugglingSkill[] = [];

    for (const [skillId, rec] of this.records) {
      const remaining = this.remainingCooldown(skillId);
      if (remaining > 0) {
        cooling.push({ skillId, remaining, consecutiveFailures: rec.consecutiveFailures });
      } else if (rec.consecutiveFailures > 0) {
        struggling.push({ skillId, consecutiveFailures: rec.consecutiveFailures });
      }
    }

    return { cooling, struggling };
  }

  private load(): void {
    if (!existsSync(this.path)) return;

    try {
      const state = parseTrackerState(readFileSync(this.path, "utf-8"), this.path);
      this.round = state.round;
      this.records = state.records;
    } catch (err) {
      this.logger.warn({ path: this.path, error: err }, "Failure tracker file unreadable, resetting");
    }
  }

  private save(): void {
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, serializeTrackerState(this.round, this.records), "utf-8");
    } catch (err) {
      this.logger.error({ path: this.path, error: err }, "Failed to save failure tracker");
    }
  }
}

export function parseTrackerState(
  text: string,
  path: string
): { round: number; records: Map<string, FailureRecord> } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateFileError(path, err instanceof Error ? err.message : String(err));
  }

  const result = StoredTrackerSchema.safeParse(raw);
  if (!result.success) {
    throw new StateFileError(path, result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }

  const records = new Map<string, FailureRecord>();
  for (const [skillId, stored] of Object.entries(result.data.skills)) {
    records.set(skillId, {
      consecutiveFailures: stored.consecutive_failures,
      cooldownUntil: stored.cooldown_until,
      tree: stored.tree,
      totalFailures: stored.total_failures ?? stored.consecutive_failures,
      lastFailedLevel: stored.last_failed_level,
      failureReasons: stored.failure_reasons ?? [],
    });
  }
  return { round: result.data.evolution_round, records };
}

export function serializeTrackerState(round: number, records: Map<string, FailureRecord>): string {
  const skills: Record<string, z.infer<typeof StoredFailureRecordSchema>> = {};
  for (const [skillId, rec] of records) {
    skills[skillId] = {
      consecutive_failures: rec.consecutiveFailures,
      ...(rec.cooldownUntil !== undefined ? { cooldown_until: rec.cooldownUntil } : {}),
      ...(rec.tree ? { tree: rec.tree } : {}),
      total_failures: rec.totalFailures,
      ...(rec.lastFailedLevel !== undefined ? { last_failed_level: rec.lastFailedLevel } : {}),
      failure_reasons: rec.failureReasons,
    };
  }
  return JSON.stringify({ evolution_round: round, skills }, null, 2);
}
