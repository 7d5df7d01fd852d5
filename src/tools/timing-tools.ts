/**
 * MCP Tools for Timing Report Triage
 *
 * Parse, simplify and annotate Vivado timing reports
 */

import { z } from "zod";
import type { AppConfig } from "../config.js";
import { loadReportText } from "../files/report-files.js";
import { runPipeline } from "../pipeline/run-pipeline.js";
import {
  classifySeverity,
  formatSimplifiedReport,
  parseSummary,
  simplifySta,
  suggestPathFixes,
} from "../sta/index.js";

export type TimingToolName =
  | "parse_timing_report"
  | "simplify_timing_report"
  | "run_timing_pipeline"
  | "suggest_path_fixes"
  | "format_timing_report";

interface ReportSource {
  report_path?: string;
  report_text?: string;
}

const EXACTLY_ONE_SOURCE = {
  message: "Provide exactly one of 'report_path' or 'report_text'",
};

function hasOneSource(args: ReportSource): boolean {
  return (args.report_path === undefined) !== (args.report_text === undefined);
}

const reportPath = z.string().min(1).describe("Path to a Vivado timing summary report (.rpt)");
const reportText = z.string().describe("Report text, as an alternative to report_path");

/**
 * Argument schemas, validated on every call
 */
export const timingToolSchemas = {
  parse_timing_report: z
    .object({
      report_path: reportPath.optional(),
      report_text: reportText.optional(),
      include_raw: z.boolean().default(true).describe("Keep each path's raw text snippet"),
    })
    .refine(hasOneSource, EXACTLY_ONE_SOURCE),
  simplify_timing_report: z
    .object({
      report_path: reportPath.optional(),
      report_text: reportText.optional(),
    })
    .refine(hasOneSource, EXACTLY_ONE_SOURCE),
  run_timing_pipeline: z.object({
    report_path: reportPath,
    out_dir: z.string().min(1).optional().describe("Output directory (default: report's folder)"),
    write_intermediate: z.boolean().default(true).describe("Also write the full parsed JSON"),
    fail_on_violations: z.boolean().default(false).describe("Exit code 10 when timing fails"),
  }),
  suggest_path_fixes: z
    .object({
      report_path: reportPath.optional(),
      report_text: reportText.optional(),
      top: z.number().int().positive().default(5).describe("Number of violated paths to annotate"),
    })
    .refine(hasOneSource, EXACTLY_ONE_SOURCE),
  format_timing_report: z
    .object({
      report_path: reportPath.optional(),
      report_text: reportText.optional(),
    })
    .refine(hasOneSource, EXACTLY_ONE_SOURCE),
} satisfies Record<TimingToolName, z.ZodTypeAny>;

const sourceProperties = {
  report_path: {
    type: "string",
    description: "Path to a Vivado timing summary report (.rpt)",
  },
  report_text: {
    type: "string",
    description: "Report text, as an alternative to report_path",
  },
};

/**
 * Tool definitions for MCP server registration
 */
export const timingToolDefinitions: Array<{
  name: TimingToolName;
  description: string;
  inputSchema: { type: "object"; properties: Record<string, object>; required?: string[] };
}> = [
  {
    name: "parse_timing_report",
    description:
      "Parse a Vivado timing summary report into WNS/TNS, clocks, check_timing counts and per-path records.",
    inputSchema: {
      type: "object",
      properties: {
        ...sourceProperties,
        include_raw: {
          type: "boolean",
          description: "Keep each path's raw text snippet (default: true)",
        },
      },
    },
  },
  {
    name: "simplify_timing_report",
    description:
      "Parse a timing report and group violations per bus into classified issues with root cause and fix hints.",
    inputSchema: {
      type: "object",
      properties: { ...sourceProperties },
    },
  },
  {
    name: "run_timing_pipeline",
    description:
      "Parse a report file and write the parsed JSON and llm_json_simple.json next to it. Returns output paths and exit code.",
    inputSchema: {
      type: "object",
      properties: {
        report_path: sourceProperties.report_path,
        out_dir: {
          type: "string",
          description: "Output directory (default: report's folder)",
        },
        write_intermediate: {
          type: "boolean",
          description: "Also write the full parsed JSON (default: true)",
        },
        fail_on_violations: {
          type: "boolean",
          description: "Return exit code 10 when WNS < 0 or any path was found (default: false)",
        },
      },
      required: ["report_path"],
    },
  },
  {
    name: "suggest_path_fixes",
    description:
      "Quick per-path tips (pipelining, routing, DSP, multicycle, CDC) and severity for the first violated paths.",
    inputSchema: {
      type: "object",
      properties: {
        ...sourceProperties,
        top: {
          type: "number",
          description: "Number of violated paths to annotate (default: 5)",
        },
      },
    },
  },
  {
    name: "format_timing_report",
    description: "Human-readable summary of the simplified report.",
    inputSchema: {
      type: "object",
      properties: { ...sourceProperties },
    },
  },
];

export function isTimingToolName(name: string): name is TimingToolName {
  return timingToolDefinitions.some((def) => def.name === name);
}

async function loadSummary(args: ReportSource) {
  const text = await loadReportText({
    reportPath: args.report_path,
    reportText: args.report_text,
  });
  return parseSummary(text);
}

/**
 * Tool handlers. Arguments are validated against timingToolSchemas;
 * a ZodError propagates for invalid arguments.
 */
export const timingToolHandlers: Record<
  TimingToolName,
  (args: unknown, config: AppConfig) => Promise<unknown>
> = {
  parse_timing_report: async (args) => {
    const input = timingToolSchemas.parse_timing_report.parse(args);
    const summary = await loadSummary(input);
    if (input.include_raw) return summary;

    return {
      ...summary,
      violations: summary.violations.map((violation) => ({ ...violation, raw: "" })),
    };
  },

  simplify_timing_report: async (args, config) => {
    const input = timingToolSchemas.simplify_timing_report.parse(args);
    const summary = await loadSummary(input);
    return simplifySta(summary, config.thresholds);
  },

  run_timing_pipeline: async (args, config) => {
    const input = timingToolSchemas.run_timing_pipeline.parse(args);
    const result = await runPipeline({
      reportPath: input.report_path,
      outDir: input.out_dir,
      outputSubdir: config.outputSubdir,
      writeIntermediate: input.write_intermediate,
      failOnViolations: input.fail_on_violations,
      thresholds: config.thresholds,
    });

    return {
      success: result.success,
      exitCode: result.exitCode,
      outputDir: result.outputDir ?? null,
      summaryPath: result.summaryPath ?? null,
      simplifiedPath: result.simplifiedPath ?? null,
      overview: result.simplified?.overview ?? null,
      issues: result.simplified?.issues.length ?? 0,
      error: result.error ?? null,
    };
  },

  suggest_path_fixes: async (args, config) => {
    const input = timingToolSchemas.suggest_path_fixes.parse(args);
    const summary = await loadSummary(input);
    const violated = summary.violations.filter((v) => v.status === "VIOLATED");

    return {
      totalViolated: violated.length,
      paths: violated.slice(0, input.top).map((v) => ({
        source: v.source,
        destination: v.destination,
        slack: v.slack,
        severity: classifySeverity(v.slack, config.thresholds),
        levelsOfLogic: v.levels_of_logic,
        routePct: v.route_pct,
        tips: suggestPathFixes(v, config.thresholds),
      })),
    };
  },

  format_timing_report: async (args, config) => {
    const input = timingToolSchemas.format_timing_report.parse(args);
    const summary = await loadSummary(input);
    return formatSimplifiedReport(simplifySta(summary, config.thresholds), config.topIssues);
  },
};
