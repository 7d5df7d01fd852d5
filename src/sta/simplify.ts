/**
 * Report Simplifier
 *
 * Reduces a TimingSummary to one classified Issue per (path kind, bus),
 * sorted most critical first.
 */

import type {
  EnrichedFields,
  EvidenceValue,
  Issue,
  PathKind,
  PathViolation,
  SimplifiedReport,
  TimingSummary,
} from "../types/timing.js";
import {
  busName,
  classifyPath,
  dominantDelay,
  pickFixes,
  rootCauseSentence,
  skewCharacter,
} from "./classifier.js";
import { enrichFromRaw } from "./enrichment.js";
import { escapeRegExp } from "./patterns.js";
import { DEFAULT_THRESHOLDS, type ClassifierThresholds } from "./thresholds.js";

/**
 * check_timing entries that commonly block closure
 */
export const SDC_GAP_MESSAGES: Array<[check: string, message: string]> = [
  ["no_input_delay", "Missing set_input_delay on at least one input; verify external timing model."],
  ["no_output_delay", "Missing set_output_delay on outputs; confirm external device setup/hold."],
  ["generated_clocks", "Generated clocks absent; add create_generated_clock where appropriate."],
];

interface ViolationGroup {
  kind: PathKind;
  bus: string;
  base: string;
  members: PathViolation[];
}

/**
 * Compress bit indices into MSB:LSB runs, e.g. [0,1,2,5,6,9] -> "2:0,6:5,9"
 */
export function compressBitRanges(bits: number[]): string {
  const sorted = [...new Set(bits)].sort((a, b) => a - b);
  const parts: string[] = [];

  let i = 0;
  while (i < sorted.length) {
    const lsb = sorted[i];
    let msb = lsb;
    while (i + 1 < sorted.length && sorted[i + 1] === msb + 1) {
      msb = sorted[++i];
    }
    parts.push(msb === lsb ? `${lsb}` : `${msb}:${lsb}`);
    i++;
  }

  return parts.join(",");
}

/**
 * Describe the first clock as "name@freqMHz (periodns)"
 */
export function describeClock(summary: TimingSummary): string | null {
  const first = Object.entries(summary.clocks)[0];
  if (!first) return null;
  const [name, info] = first;
  return `${name}@${info.frequency_mhz}MHz (${info.period_ns}ns)`;
}

export function sdcGaps(checks: Record<string, number>): string[] {
  return SDC_GAP_MESSAGES.filter(([check]) => (checks[check] ?? 0) !== 0).map(
    ([, message]) => message
  );
}

/**
 * Regex that finds the launching registers of a bus in the RTL/netlist
 */
export function sourceRegisterRegex(base: string, indexed: boolean): string {
  if (!indexed) return String.raw`(\w+)_reg\[(\d+)\]`;
  const escaped = escapeRegExp(base);
  return base.endsWith("_reg")
    ? String.raw`${escaped}\[(\d+)\]`
    : String.raw`${escaped}_reg\[(\d+)\]`;
}

function groupViolations(violations: PathViolation[]): ViolationGroup[] {
  const groups = new Map<string, ViolationGroup>();

  for (const violation of violations) {
    const kind = classifyPath(violation);
    const { base, bit } = busName(violation.destination ?? "");
    const bus = bit !== null ? `${base}[*]` : base;
    const key = `${kind}\u0000${bus}`;

    let group = groups.get(key);
    if (!group) {
      group = { kind, bus, base, members: [] };
      groups.set(key, group);
    }
    group.members.push(violation);
  }

  return [...groups.values()];
}

function worstOf(members: PathViolation[]): PathViolation {
  return members.reduce((worst, candidate) =>
    candidate.slack < worst.slack ? candidate : worst
  );
}

function buildEvidence(
  worst: PathViolation,
  enriched: EnrichedFields
): Record<string, EvidenceValue> {
  return {
    data_path_ns: worst.data_path_delay_ns,
    logic_ns: worst.logic_delay_ns,
    route_ns: worst.route_delay_ns,
    levels_of_logic: worst.levels_of_logic,
    clock_skew_ns: worst.clock_path_skew_ns,
    output_delay_ns: worst.output_delay_ns,
    ...enriched,
  };
}

function buildIssue(group: ViolationGroup, thresholds: ClassifierThresholds): Issue {
  const worst = worstOf(group.members);
  const enriched = enrichFromRaw(worst.raw);
  const dominant = dominantDelay(worst, thresholds);

  const bits: number[] = [];
  for (const member of group.members) {
    const { bit } = busName(member.destination ?? "");
    if (bit !== null) bits.push(bit);
  }

  const destPort =
    bits.length > 0
      ? `${group.base}[${compressBitRanges(bits)}]`
      : worst.destination ?? "";

  return {
    path_kind: group.kind,
    signal_group: group.bus,
    worst_bit: busName(worst.destination ?? "").bit,
    worst_slack_ns: worst.slack,
    dominant_delay: dominant,
    skew_character: skewCharacter(worst, enriched, thresholds),
    evidence: buildEvidence(worst, enriched),
    root_cause: rootCauseSentence(group.kind, dominant, worst, enriched, thresholds),
    where_in_code: {
      dest_port: destPort,
      src_ff_regex: sourceRegisterRegex(group.base, bits.length > 0),
    },
    fix_hints: pickFixes(group.kind, dominant, worst, enriched, thresholds),
  };
}

/**
 * Build the compact, LLM-ready report
 */
export function simplifySta(
  summary: TimingSummary,
  thresholds: ClassifierThresholds = DEFAULT_THRESHOLDS
): SimplifiedReport {
  const issues = groupViolations(summary.violations).map((group) =>
    buildIssue(group, thresholds)
  );

  issues.sort((a, b) => a.worst_slack_ns - b.worst_slack_ns);

  return {
    clock: describeClock(summary),
    overview: {
      wns_ns: summary.wns,
      tns_ns: summary.tns,
      violations: summary.violations.length,
    },
    sdc_gaps: sdcGaps(summary.checks),
    issues,
  };
}
