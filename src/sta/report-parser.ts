/**
 * Timing Report Parser
 *
 * Turns a Vivado-style report_timing_summary text into a TimingSummary:
 * - WNS/TNS from the Design Timing Summary table
 * - Clock periods and frequencies from the Clock Summary table
 * - check_timing counts
 * - One PathViolation per path in the Max Delay Paths section
 *
 * Nothing here throws on malformed input. A field whose line is missing or
 * garbled is left null and parsing moves on.
 */

import type {
  ClockInfo,
  PathStatus,
  PathViolation,
  TimingSummary,
} from "../types/timing.js";
import {
  FLOAT,
  PCT,
  between,
  firstFloat,
  firstInt,
  firstMatch,
  toInt,
  toNumber,
} from "./patterns.js";
import { MAX_RAW_CHARS } from "./thresholds.js";

// Section anchors. Vivado prefixes headings with "| ", so the end anchors
// accept leading pipes as well as whitespace.
const DESIGN_SUMMARY_START = /Design Timing Summary\s*[-\s|]*\n/;
const DESIGN_SUMMARY_END = /\n[|\s]*Clock Summary/;
const CLOCK_SUMMARY_START = /Clock Summary\s*[-\s|]*\n/;
const CLOCK_SUMMARY_END = /\n[|\s]*Intra Clock Table/;
const CHECKS_START = /check_timing report/;
const CHECKS_END = /\n[|\s]*Design Timing Summary/;
const MAX_PATHS_START = /Max Delay Paths/;
const MAX_PATHS_END = /Pulse Width Checks/;

// WNS TNS <int> <int> WHS THS <int> <int>
const SUMMARY_ROW = new RegExp(
  String.raw`^\s*(${FLOAT})\s+(${FLOAT})\s+(\d+)\s+(\d+)\s+(${FLOAT})\s+(${FLOAT})\s+(\d+)\s+(\d+)`,
  "m"
);
const LABELED_WNS = new RegExp(String.raw`Worst Negative Slack\s*\(WNS\)\s*:\s*(${FLOAT})`);
const LABELED_TNS = new RegExp(String.raw`Total Negative Slack\s*\(TNS\)\s*:\s*(${FLOAT})`);

// sys_clk  {0.000 1.000}        2.000           500.000
const CLOCK_ROW = new RegExp(
  String.raw`^\s*([A-Za-z0-9_./]+)\s+\{[^}]*\}\s+(${FLOAT})\s+(${FLOAT})`
);

// 5. checking no_input_delay (1)
const CHECK_LINE = /\d+\.\s*checking\s+([a-zA-Z0-9_]+)\s*\((\d+)\)/g;

// Slack (VIOLATED) :   -7.614ns  (required time - arrival time)
const SLACK_MARKER = new RegExp(
  String.raw`^[ \t]*Slack \((VIOLATED|MET)\)\s*:\s*(${FLOAT})ns.*$`,
  "gm"
);

const SOURCE = /^\s*Source:\s*(.+)$/m;
const DESTINATION = /^\s*Destination:\s*(.+)$/m;
const PATH_GROUP = /^\s*Path Group:\s*(.+)$/m;
const REQUIREMENT = new RegExp(String.raw`^\s*Requirement:\s*(${FLOAT})ns`, "m");
const LOGIC_LEVELS = /^\s*Logic Levels:\s*(\d+)/m;
const OUTPUT_DELAY = new RegExp(String.raw`^\s*Output Delay:\s*(${FLOAT})ns`, "m");
const CLOCK_PATH_SKEW = new RegExp(String.raw`^\s*Clock Path Skew:\s*(${FLOAT})ns`, "m");

// Data Path Delay: 4.737ns  (logic 2.757ns (58.196%)  route 1.980ns (41.804%))
const DATA_PATH_DELAY = new RegExp(
  String.raw`Data Path Delay:\s*(${FLOAT})ns\s*\(logic\s*(${FLOAT})ns\s*\((${PCT})%\)\s*route\s*(${FLOAT})ns\s*\((${PCT})%\)\)`
);

/**
 * Extract WNS/TNS from the Design Timing Summary table.
 * Falls back to the labeled "Worst Negative Slack (WNS) : x" dialect.
 */
export function parseDesignTimingSummary(text: string): {
  wns: number | null;
  tns: number | null;
} {
  const block = between(text, DESIGN_SUMMARY_START, DESIGN_SUMMARY_END);
  const row = block.match(SUMMARY_ROW);
  if (row) {
    return { wns: toNumber(row[1]), tns: toNumber(row[2]) };
  }

  return {
    wns: firstFloat(LABELED_WNS, text),
    tns: firstFloat(LABELED_TNS, text),
  };
}

/**
 * Parse the Clock Summary table: name -> { period_ns, frequency_mhz }
 */
export function parseClockSummary(text: string): Record<string, ClockInfo> {
  const block = between(text, CLOCK_SUMMARY_START, CLOCK_SUMMARY_END);
  const clocks = new Map<string, ClockInfo>();

  for (const line of block.split(/\r?\n/)) {
    const match = line.match(CLOCK_ROW);
    if (!match) continue;

    const period = toNumber(match[2]);
    const frequency = toNumber(match[3]);
    if (period === null || frequency === null) continue;

    clocks.set(match[1], { period_ns: period, frequency_mhz: frequency });
  }

  return Object.fromEntries(clocks);
}

/**
 * Parse check_timing headings: check name -> occurrence count
 */
export function parseChecks(text: string): Record<string, number> {
  const block = between(text, CHECKS_START, CHECKS_END);
  const checks = new Map<string, number>();

  for (const match of block.matchAll(CHECK_LINE)) {
    const count = toInt(match[2]);
    if (count !== null) {
      checks.set(match[1], count);
    }
  }

  return Object.fromEntries(checks);
}

/**
 * Split the Max Delay Paths section into one PathViolation per path.
 * Each block starts at a "Slack (...)" line and ends at the next one or at
 * the end of the section.
 */
export function iterPathBlocks(text: string): PathViolation[] {
  const section = between(text, MAX_PATHS_START, MAX_PATHS_END);
  if (!section) return [];

  const markers = [...section.matchAll(SLACK_MARKER)];
  const paths: PathViolation[] = [];

  markers.forEach((marker, i) => {
    const start = marker.index ?? 0;
    const next = markers[i + 1];
    const end = next?.index ?? section.length;
    const block = section.slice(start, end);

    const slack = toNumber(marker[2]);
    if (slack === null) return;

    paths.push(parsePathBlock(block, marker[1] === "MET" ? "MET" : "VIOLATED", slack));
  });

  return paths;
}

function parsePathBlock(block: string, status: PathStatus, slack: number): PathViolation {
  const dataPath = block.match(DATA_PATH_DELAY);

  return {
    status,
    slack,
    source: firstMatch(SOURCE, block),
    destination: firstMatch(DESTINATION, block),
    path_group: firstMatch(PATH_GROUP, block),
    requirement_ns: firstFloat(REQUIREMENT, block),
    data_path_delay_ns: toNumber(dataPath?.[1]),
    logic_delay_ns: toNumber(dataPath?.[2]),
    logic_pct: toNumber(dataPath?.[3]),
    route_delay_ns: toNumber(dataPath?.[4]),
    route_pct: toNumber(dataPath?.[5]),
    levels_of_logic: firstInt(LOGIC_LEVELS, block),
    output_delay_ns: firstFloat(OUTPUT_DELAY, block),
    clock_path_skew_ns: firstFloat(CLOCK_PATH_SKEW, block),
    raw: block.trim().slice(0, MAX_RAW_CHARS),
  };
}

/**
 * Parse a complete report
 */
export function parseSummary(text: string): TimingSummary {
  const { wns, tns } = parseDesignTimingSummary(text);

  return {
    wns,
    tns,
    clocks: parseClockSummary(text),
    checks: parseChecks(text),
    violations: iterPathBlocks(text),
  };
}
