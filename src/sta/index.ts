/**
 * STA Module
 *
 * Timing report parsing and violation classification:
 * - Report parser (Vivado report_timing_summary)
 * - Raw snippet enrichment
 * - Classifier and simplifier
 * - Per-path heuristics
 */

// Parser
export {
  parseDesignTimingSummary,
  parseClockSummary,
  parseChecks,
  iterPathBlocks,
  parseSummary,
} from "./report-parser.js";

// Enrichment
export { enrichFromRaw, clockSection } from "./enrichment.js";

// Classifier
export {
  classifyPath,
  busName,
  hasLargeSkew,
  dominantDelay,
  skewCharacter,
  rootCauseSentence,
  pickFixes,
  type BusName,
} from "./classifier.js";

// Simplifier
export {
  simplifySta,
  compressBitRanges,
  describeClock,
  sdcGaps,
  sourceRegisterRegex,
} from "./simplify.js";

// Heuristics
export { classifySeverity, suggestPathFixes, clocksInPath } from "./heuristics.js";

// Formatting
export { formatSummaryLine, formatIssues, formatSimplifiedReport } from "./format.js";

// Thresholds
export {
  MAX_RAW_CHARS,
  MAX_FIX_HINTS,
  DEFAULT_THRESHOLDS,
  resolveThresholds,
  type ClassifierThresholds,
} from "./thresholds.js";

// Types
export type {
  PathStatus,
  ClockInfo,
  PathViolation,
  TimingSummary,
  EnrichedFields,
  PathKind,
  DominantDelayBase,
  DominantDelay,
  SkewCharacter,
  EvidenceValue,
  Issue,
  ReportOverview,
  SimplifiedReport,
  SlackSeverity,
} from "../types/timing.js";
