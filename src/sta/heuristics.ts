/**
 * Per-path heuristics
 *
 * Quick tips for a single path, without grouping. Used by the CLI and the
 * suggest_path_fixes tool to annotate the first few paths of a report.
 */

import type { PathViolation, SlackSeverity } from "../types/timing.js";
import { DEFAULT_THRESHOLDS, type ClassifierThresholds } from "./thresholds.js";

const CLOCKED_BY = /clocked by\s+([^\s{]+)/g;

/**
 * Severity band for a slack value (ns)
 */
export function classifySeverity(
  slack: number,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): SlackSeverity {
  if (slack < thresholds.severeSlackNs) return "critical";
  if (slack < thresholds.moderateSlackNs) return "moderate";
  return "minor";
}

/**
 * Distinct clock names a path block refers to ("clocked by <clk>")
 */
export function clocksInPath(raw: string): string[] {
  const names = new Set<string>();
  for (const match of raw.matchAll(CLOCKED_BY)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Tips for one path. Paths that meet timing get none.
 */
export function suggestPathFixes(
  violation: PathViolation,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): string[] {
  const tips: string[] = [];
  if (violation.slack >= 0) return tips;

  const levels = violation.levels_of_logic;
  if (levels !== null && levels >= thresholds.deepLogicLevels) {
    tips.push("Pipeline long arithmetic chain (insert regs between multiplies/adds).");
  }

  const routePct = violation.route_pct;
  if (routePct !== null && routePct >= thresholds.highRoutingPct) {
    tips.push("High routing delay: reduce fanout, duplicate regs, or add pblocks/LOC hints.");
  }

  if (violation.raw.toLowerCase().includes("mul")) {
    tips.push('Ensure DSP48 inference (`(* use_dsp = "yes" *)`) or explicit DSP instantiation.');
  }

  tips.push(
    "If result not needed every cycle, use multicycle constraints (set_multicycle_path 2 ...) with care."
  );

  if (clocksInPath(violation.raw).length > 1) {
    tips.push("Check for CDC; add 2-flop sync or declare false/multicycle paths if asynchronous.");
  }

  return tips;
}
