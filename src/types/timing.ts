/**
 * Timing Report Types for sta-triage
 *
 * Field names are snake_case on purpose: these shapes are written to JSON
 * as-is and read by prompt-assembly and presentation layers.
 */

/**
 * Status printed after "Slack" on each path header
 */
export type PathStatus = "VIOLATED" | "MET";

/**
 * One row of the Clock Summary table
 */
export interface ClockInfo {
  period_ns: number;
  frequency_mhz: number;
}

/**
 * One parsed timing path from the Max Delay Paths section
 */
export interface PathViolation {
  status: PathStatus;
  slack: number;
  source: string | null;
  destination: string | null;
  path_group: string | null;
  requirement_ns: number | null;
  data_path_delay_ns: number | null;
  logic_delay_ns: number | null;
  logic_pct: number | null;
  route_delay_ns: number | null;
  route_pct: number | null;
  levels_of_logic: number | null;
  output_delay_ns: number | null;
  clock_path_skew_ns: number | null;
  raw: string; // trimmed block text, capped at MAX_RAW_CHARS
}

/**
 * Parsed report
 */
export interface TimingSummary {
  wns: number | null; // Worst Negative Slack
  tns: number | null; // Total Negative Slack
  clocks: Record<string, ClockInfo>;
  checks: Record<string, number>;
  violations: PathViolation[];
}

/**
 * Secondary fields mined from a violation's raw snippet
 */
export interface EnrichedFields {
  // Skew components
  dcd_ns: number | null;
  scd_ns: number | null;
  cpr_ns: number | null;
  clock_uncertainty_ns: number | null;

  // Jitter
  tsj_ns: number | null;
  tij_ns: number | null;
  dj_ns: number | null;
  pe_ns: number | null;

  // Footer table
  required_time_ns: number | null;
  arrival_time_ns: number | null;

  // Placement
  io_primitive: "OBUF" | null;
  io_site: string | null;
  src_slice: string | null;

  // Clock tree (before the launching flip-flop)
  clock_net_fanout_max: number | null;
  clock_net_delay_ns_total: number | null;
}

export type PathKind = "reg_to_out" | "reg_to_reg" | "in_to_out" | "in_to_reg";

export type DominantDelayBase = "logic" | "routing" | "OBUF + routing";

export type DominantDelay = DominantDelayBase | `${DominantDelayBase} + skew`;

export type SkewCharacter =
  | "negative_source_skew_large"
  | "negative_source_skew"
  | "negative_destination_skew_large"
  | "negative_destination_skew"
  | "balanced";

export type EvidenceValue = number | string | null;

/**
 * Classified, deduplicated finding for one bus
 */
export interface Issue {
  path_kind: PathKind;
  signal_group: string;
  worst_bit: number | null;
  worst_slack_ns: number;
  dominant_delay: DominantDelay;
  skew_character: SkewCharacter | null;
  evidence: Record<string, EvidenceValue>;
  root_cause: string;
  where_in_code: {
    dest_port: string;
    src_ff_regex: string;
  };
  fix_hints: string[];
}

export interface ReportOverview {
  wns_ns: number | null;
  tns_ns: number | null;
  violations: number;
}

/**
 * Compact report handed to LLM / UI consumers
 */
export interface SimplifiedReport {
  clock: string | null;
  overview: ReportOverview;
  sdc_gaps: string[];
  issues: Issue[];
}

/**
 * Severity band for a single slack value
 */
export type SlackSeverity = "critical" | "moderate" | "minor";
