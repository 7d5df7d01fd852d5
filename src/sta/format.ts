/**
 * Plain-text formatting for parsed and simplified reports
 */

import type { SimplifiedReport, TimingSummary } from "../types/timing.js";

function fmt(value: number | null, digits = 3): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

/**
 * One-line headline: "WNS=-1.250 TNS=-7.500 paths=12"
 */
export function formatSummaryLine(summary: TimingSummary): string {
  return `WNS=${fmt(summary.wns)} TNS=${fmt(summary.tns)} paths=${summary.violations.length}`;
}

/**
 * Format the top issues with their fix hints
 */
export function formatIssues(report: SimplifiedReport, top = 5): string {
  const lines: string[] = [];

  report.issues.slice(0, top).forEach((issue, i) => {
    lines.push(
      `Issue ${i + 1}  ${issue.signal_group}  ${issue.path_kind}  slack=${fmt(issue.worst_slack_ns)}  dominant=${issue.dominant_delay}`
    );
    for (const hint of issue.fix_hints) {
      lines.push(`  - ${hint}`);
    }
  });

  return lines.join("\n");
}

/**
 * Format a simplified report for display
 */
export function formatSimplifiedReport(report: SimplifiedReport, top = 5): string {
  const lines: string[] = [];

  lines.push("=== Timing Triage ===");
  lines.push("");
  lines.push(`Clock: ${report.clock ?? "unknown"}`);
  lines.push(`WNS: ${fmt(report.overview.wns_ns)} ns`);
  lines.push(`TNS: ${fmt(report.overview.tns_ns)} ns`);
  lines.push(`Paths: ${report.overview.violations}`);

  if (report.sdc_gaps.length > 0) {
    lines.push("");
    lines.push("Constraint gaps:");
    for (const gap of report.sdc_gaps) {
      lines.push(`  - ${gap}`);
    }
  }

  if (report.issues.length > 0) {
    lines.push("");
    lines.push(`Issues (${report.issues.length}):`);
    report.issues.slice(0, top).forEach((issue, i) => {
      lines.push(`  ${i + 1}. ${issue.where_in_code.dest_port} [${issue.path_kind}] slack ${fmt(issue.worst_slack_ns)} ns`);
      lines.push(`     ${issue.root_cause}`);
      if (issue.skew_character) {
        lines.push(`     Skew: ${issue.skew_character}`);
      }
    });
  }

  return lines.join("\n");
}
