import type { SkillEvolutionCoordinator } from "../evolution/coordinator.js";
import { formatStatusReport } from "../evolution/status-report.js";
import type { TreeType } from "../evolution/types.js";

export type CliCommand =
  | { name: "status" }
  | { name: "failures" }
  | { name: "select" }
  | { name: "success"; tree: TreeType; skillId: string; level: number }
  | { name: "failure"; tree: TreeType; skillId: string; level: number; reason?: string };

export const USAGE = `Usage:
  skill-evolution status
  skill-evolution failures
  skill-evolution select
  skill-evolution success <general|domain> <skill-id> <new-level>
  skill-evolution failure <general|domain> <skill-id> <level> [reason...]`;

function parseTree(value: string | undefined): TreeType | null {
  return value === "general" || value === "domain" ? value : null;
}

function parseLevel(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

/** Parse argv (without node and script) into a command, or an error message. */
export function parseCommand(args: readonly string[]): CliCommand | { error: string } {
  const [name = "status", ...rest] = args;

  switch (name) {
    case "status":
    case "failures":
    case "select":
      return { name };

    case "success":
    case "failure": {
      const [treeArg, skillId, levelArg, ...reasonParts] = rest;
      const tree = parseTree(treeArg);
      if (!tree) return { error: `Unknown tree "${treeArg ?? ""}", expected general or domain` };
      if (!skillId) return { error: "Missing skill id" };
      const level = parseLevel(levelArg);
      if (level === null) return { error: `Invalid level "${levelArg ?? ""}"` };

      if (name === "success") return { name, tree, skillId, level };
      const reason = reasonParts.join(" ").trim();
      return { name, tree, skillId, level, ...(reason ? { reason } : {}) };
    }

    default:
      return { error: `Unknown command "${name}"` };
  }
}

/** Execute a command and return the text to print. */
export async function runCommand(
  coordinator: SkillEvolutionCoordinator,
  command: CliCommand
): Promise<string> {
  switch (command.name) {
    case "status":
      return formatStatusReport(coordinator.getStats());

    case "failures":
      return JSON.stringify(coordinator.getFailureSummary(), null, 2);

    case "select": {
      const selection = coordinator.selectNextSkill();
      if (!selection.skill) return `Round ${coordinator.evolutionRound}: nothing to evolve`;
      const { skill } = selection;
      return `Round ${coordinator.evolutionRound}: ${selection.tree}/${skill.id} (${skill.name}, Lv.${skill.level}/${skill.maxLevel})`;
    }

    case "success": {
      const outcome = await coordinator.recordEvolutionSuccess(command.tree, command.skillId, command.level);
      if (!outcome.recorded) return `No such skill: ${command.tree}/${command.skillId}`;
      const unlocked = outcome.unlocked.length > 0 ? `, unlocked ${outcome.unlocked.join(", ")}` : "";
      return `${command.skillId} is now Lv.${outcome.level}${unlocked}`;
    }

    case "failure": {
      const outcome = coordinator.recordEvolutionFailure(command.tree, command.skillId, command.level, command.reason);
      return `${command.skillId}: ${outcome.action} after ${outcome.consecutiveFailures} consecutive failure(s)`;
    }
  }
}
