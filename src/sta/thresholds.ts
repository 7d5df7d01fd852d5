/**
 * Classifier Thresholds
 *
 * Empirically calibrated constants used by the classifier and the per-path
 * heuristics. Callers may override any of them; the defaults should only
 * change with evidence from real reports.
 */

/**
 * Maximum number of characters retained from a path block
 */
export const MAX_RAW_CHARS = 4000;

/**
 * Upper bound on fix hints per issue, whatever maxFixHints says
 */
export const MAX_FIX_HINTS = 6;

export interface ClassifierThresholds {
  // Skew, as a fraction of the path requirement
  largeSkewFraction: number;
  moderateSkewFraction: number;

  // Fix hints per issue
  maxFixHints: number;

  // Per-path heuristics
  deepLogicLevels: number;
  highRoutingPct: number;
  severeSlackNs: number;
  moderateSlackNs: number;
}

export const DEFAULT_THRESHOLDS: ClassifierThresholds = {
  largeSkewFraction: 0.5,
  moderateSkewFraction: 0.1,
  maxFixHints: 6,
  deepLogicLevels: 6,
  highRoutingPct: 60,
  severeSlackNs: -2.0,
  moderateSlackNs: -0.5,
};

/**
 * Merge partial overrides onto the defaults
 */
export function resolveThresholds(
  overrides: Partial<ClassifierThresholds> = {}
): ClassifierThresholds {
  return { ...DEFAULT_THRESHOLDS, ...overrides };
}
