import type { DisciplineFlags } from "../types/trade";
import { roundTo } from "../utils/round";

/**
 * "always": score every trade, 0 when no rule was respected.
 * "any-flag": no score until at least one rule is ticked.
 */
export type DisciplinePolicy = "always" | "any-flag";

export const DISCIPLINE_POLICIES: readonly DisciplinePolicy[] = ["always", "any-flag"];

function flagValues(flags: DisciplineFlags): boolean[] {
  return [flags.followedPlan, flags.noRevenge, flags.noFomo, flags.respectedRr];
}

export function scoreDiscipline(
  flags: DisciplineFlags,
  policy: DisciplinePolicy = "any-flag"
): number | null {
  const values = flagValues(flags);
  const kept = values.filter(Boolean).length;

  if (kept === 0 && policy === "any-flag") {
    return null;
  }

  return roundTo((kept / values.length) * 100, 1);
}

export function isFullyDisciplined(flags: DisciplineFlags): boolean {
  return flagValues(flags).every(Boolean);
}
