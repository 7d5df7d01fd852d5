/**
 * Violation Classifier
 *
 * Heuristics applied to the representative (worst) violation of a group:
 * - Path kind from the start/end point primitives
 * - Dominant delay contributor (logic, routing, output buffer, skew)
 * - Clock skew character from the source/destination clock delays
 * - Root-cause sentence and ranked fix hints
 */

import type {
  DominantDelay,
  DominantDelayBase,
  EnrichedFields,
  PathKind,
  PathViolation,
  SkewCharacter,
} from "../types/timing.js";
import { FLIP_FLOP_TOKEN, OBUF_TOKEN } from "./enrichment.js";
import { DEFAULT_THRESHOLDS, MAX_FIX_HINTS, type ClassifierThresholds } from "./thresholds.js";

export interface BusName {
  base: string;
  bit: number | null;
}

const BUS_BIT = /^([A-Za-z_]\w*)\[(\d+)\]/;

/**
 * Classify a path by its endpoints
 */
export function classifyPath(violation: PathViolation): PathKind {
  const raw = violation.raw;
  // Whole-word FD* primitives only
  const srcIsFlipFlop = FLIP_FLOP_TOKEN.test(raw);
  const dstIsOutput = raw.includes(" (OUT)") || raw.includes("(output port");

  if (srcIsFlipFlop && dstIsOutput) return "reg_to_out";
  if (srcIsFlipFlop) return "reg_to_reg";
  if (dstIsOutput) return "in_to_out";
  return "in_to_reg";
}

/**
 * Split "y[63]" into { base: "y", bit: 63 }
 */
export function busName(signal: string): BusName {
  const match = signal.match(BUS_BIT);
  if (match) {
    return { base: match[1], bit: Number(match[2]) };
  }
  return { base: signal, bit: null };
}

/**
 * True when |clock path skew| reaches the large fraction of the requirement
 */
export function hasLargeSkew(
  violation: PathViolation,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): boolean {
  const skew = violation.clock_path_skew_ns ?? 0;
  const requirement = violation.requirement_ns ?? 0;
  if (requirement === 0) return false;
  return Math.abs(skew) >= thresholds.largeSkewFraction * requirement;
}

/**
 * Label the main delay contributor, with "+ skew" when skew is large
 */
export function dominantDelay(
  violation: PathViolation,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): DominantDelay {
  const logicPct = violation.logic_pct ?? 0;
  const routePct = violation.route_pct ?? 0;
  const levels = violation.levels_of_logic;
  const obufPresent = OBUF_TOKEN.test(violation.raw);

  let base: DominantDelayBase;
  if (obufPresent && (routePct >= logicPct || (levels !== null && levels <= 1))) {
    base = "OBUF + routing";
  } else {
    base = logicPct > routePct ? "logic" : "routing";
  }

  return hasLargeSkew(violation, thresholds) ? `${base} + skew` : base;
}

/**
 * Bucket dcd - scd by fraction of the requirement.
 * Negative delta means the source clock arrives later than the destination clock.
 */
export function skewCharacter(
  violation: PathViolation,
  enriched: EnrichedFields,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): SkewCharacter | null {
  const { scd_ns: scd, dcd_ns: dcd } = enriched;
  const requirement = violation.requirement_ns;
  if (scd === null || dcd === null || !requirement) return null;

  const delta = dcd - scd;
  const large = thresholds.largeSkewFraction * requirement;
  const moderate = thresholds.moderateSkewFraction * requirement;

  if (delta <= -large) return "negative_source_skew_large";
  if (delta <= -moderate) return "negative_source_skew";
  if (delta >= large) return "negative_destination_skew_large";
  if (delta >= moderate) return "negative_destination_skew";
  return "balanced";
}

/**
 * One-sentence explanation of the violation
 */
export function rootCauseSentence(
  kind: PathKind,
  dominant: DominantDelay,
  violation: PathViolation,
  enriched: EnrichedFields,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): string {
  let skewNote = "";
  if (hasLargeSkew(violation, thresholds)) {
    const { scd_ns: scd, dcd_ns: dcd } = enriched;
    let direction = "";
    if (scd !== null && dcd !== null) {
      direction = scd > dcd ? " (source path > dest path)" : " (dest path > source path)";
    }
    const skew = violation.clock_path_skew_ns ?? 0;
    skewNote =
      skew < 0
        ? ` and large negative source clock skew${direction}`
        : ` and large destination clock skew${direction}`;
  }

  switch (kind) {
    case "reg_to_out":
      return `Unpipelined REG→OBUF path to top-level port with high ${dominant}${skewNote}.`;
    case "reg_to_reg":
      return `Deep combinational logic on REG→REG path with high ${dominant}${skewNote}.`;
    default:
      return `Path limited by ${dominant}${skewNote}.`;
  }
}

/**
 * Fix hints keyed by path kind
 */
export const PATH_KIND_FIXES: Record<PathKind, string[]> = {
  reg_to_out: [
    "Add output pipeline/reg in IOB (Vivado: set_property IOB TRUE [get_cells <output_reg[*]>]).",
    "Use ODDR/OSERDES or dedicated IO primitives for high-speed buses.",
    "Floorplan: LOC the output regs near the target IO bank; add Pblock over the bank; reduce long routes.",
    "If external timing allows, relax set_output_delay -max/-min or the clock period.",
  ],
  reg_to_reg: [
    "Insert a pipeline stage (retime) to split combinational depth.",
    "Duplicate high-fanout registers to reduce net delay; add MAX_FANOUT or phys_opt_design -dup_registers.",
    "Constrain/floorplan critical cells closer together; pblock and keep hierarchy.",
  ],
  in_to_out: [],
  in_to_reg: [],
};

export const OBUF_FIX =
  "Try OBUFDS (if differential) or faster IO standard/drive settings; evaluate SLEW=FAST where signal integrity permits.";

export const ROUTING_FIX =
  "Constrain placement to shorten critical nets; resolve congestion hot spots near the IO bank.";

export const SKEW_FIXES = [
  "Reduce negative source skew: place the launching FF in the same clock region as the IO bank; prefer BUFH/regional clocks if feasible.",
  "Minimize source clock insertion delay (review BUFG/clock spine usage, avoid detours; check CLOCK_DEDICATED_ROUTE and timing DRCs).",
  "Review create_clock and set_clock_uncertainty; ensure uncertainty isn't overly pessimistic.",
];

/**
 * Ranked, deduplicated fix hints (first seen wins), capped at maxFixHints
 * and never more than MAX_FIX_HINTS
 */
export function pickFixes(
  kind: PathKind,
  dominant: DominantDelay,
  violation: PathViolation,
  enriched: EnrichedFields,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): string[] {
  const fixes: string[] = [...PATH_KIND_FIXES[kind]];

  if (kind === "reg_to_out" && (enriched.io_primitive === "OBUF" || dominant.includes("OBUF"))) {
    fixes.push(OBUF_FIX);
  }

  if (dominant.includes("routing")) {
    fixes.push(ROUTING_FIX);
  }

  if (hasLargeSkew(violation, thresholds)) {
    fixes.push(...SKEW_FIXES);
  }

  return [...new Set(fixes)].slice(0, Math.min(thresholds.maxFixHints, MAX_FIX_HINTS));
}
