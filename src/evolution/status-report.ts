import type { EvolutionStats } from "./types.js";

const RULE = "=".repeat(50);
const THIN_RULE = "- ".repeat(25).trimEnd();

function pct(value: number): string {
  return `${Math.round(value * 100)}%`;
}

// ─── Operator status report ────────────────────────────────────────

export function formatStatusReport(stats: EvolutionStats): string {
  const dims = stats.dimensions;
  const lines: string[] = [
    RULE,
    `Stage: ${stats.stageName} (evolution index ${stats.evolutionIndex.toFixed(1)})`,
    `  breadth=${pct(dims.breadth)} depth=${pct(dims.depth)} tier=${pct(dims.tier)} mastery=${pct(dims.mastery)}`,
    `Skills: ${stats.unlockedSkills}/${stats.totalSkills} unlocked | mastered: ${stats.masteredSkills} | total level: ${stats.totalLevel}`,
    `Priority: general ${pct(stats.priority.general)} / domain ${pct(stats.priority.domain)}`,
    RULE,
    `General: Lv.${stats.general.levelSum} (${stats.general.unlocked}/${stats.general.total} unlocked, ${stats.general.evolutions} evolved)`,
    `Domain: Lv.${stats.domain.levelSum} (${stats.domain.unlocked}/${stats.domain.total} unlocked, ${stats.domain.evolutions} evolved)`,
  ];

  const { coolingSkills, strugglingSkills, boostTargets } = stats.failureSummary;
  if (coolingSkills.length > 0 || strugglingSkills.length > 0) {
    lines.push(THIN_RULE);
    if (coolingSkills.length > 0) {
      lines.push(`Cooling: ${coolingSkills.map((c) => `${c.skillId}(${c.remaining} rounds)`).join(", ")}`);
    }
    if (strugglingSkills.length > 0) {
      lines.push(`Struggling: ${strugglingSkills.map((s) => `${s.skillId}(x${s.consecutiveFailures})`).join(", ")}`);
    }
    const boosted = Object.keys(boostTargets);
    if (boosted.length > 0) {
      lines.push(`Boost first: ${boosted.join(", ")}`);
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}
