/**
 * Timing Pipeline
 *
 * report.rpt -> TimingSummary JSON -> simplified (LLM-ready) JSON
 *
 * Outputs land in <outDir or report dir>/<outputSubdir>/:
 * - <report stem>.json       full parsed summary (optional)
 * - llm_json_simple.json     simplified report
 */

import { join, dirname, parse } from "path";
import type { SimplifiedReport, TimingSummary } from "../types/timing.js";
import { parseSummary } from "../sta/report-parser.js";
import { simplifySta } from "../sta/simplify.js";
import { DEFAULT_THRESHOLDS, type ClassifierThresholds } from "../sta/thresholds.js";
import { ReportInputError, readReportFile, writeJson } from "../files/report-files.js";

export const SIMPLIFIED_FILE_NAME = "llm_json_simple.json";

/**
 * Process exit codes (CI-friendly)
 */
export const EXIT_CODES = {
  ok: 0,
  reportNotFound: 2,
  writeFailed: 3,
  violations: 10,
} as const;

export type PipelineExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface PipelineOptions {
  reportPath: string;
  outDir?: string;
  outputSubdir?: string;
  writeIntermediate?: boolean;
  failOnViolations?: boolean;
  thresholds?: ClassifierThresholds;
  log?: (message: string) => void;
}

export interface PipelineResult {
  success: boolean;
  exitCode: PipelineExitCode;
  outputDir?: string;
  summaryPath?: string;
  simplifiedPath?: string;
  summary?: TimingSummary;
  simplified?: SimplifiedReport;
  error?: string;
}

/**
 * True when the summary reports negative WNS or any parsed path
 */
export function hasViolations(summary: TimingSummary): boolean {
  return (summary.wns !== null && summary.wns < 0) || summary.violations.length > 0;
}

/**
 * Run the full pipeline for one report file
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const log = options.log ?? ((message: string) => console.error(message));
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const writeIntermediate = options.writeIntermediate ?? true;

  let text: string;
  try {
    text = await readReportFile(options.reportPath);
  } catch (error) {
    if (!(error instanceof ReportInputError)) throw error;
    log(`[error] ${error.message}`);
    return { success: false, exitCode: EXIT_CODES.reportNotFound, error: error.message };
  }

  const summary = parseSummary(text);
  const simplified = simplifySta(summary, thresholds);

  const outputDir = join(
    options.outDir ?? dirname(options.reportPath),
    options.outputSubdir ?? "rpt_json"
  );
  const summaryPath = join(outputDir, `${parse(options.reportPath).name}.json`);
  const simplifiedPath = join(outputDir, SIMPLIFIED_FILE_NAME);

  try {
    if (writeIntermediate) {
      await writeJson(summaryPath, summary);
      log(`[ok] Wrote ${summaryPath} (violations=${summary.violations.length}, WNS=${summary.wns})`);
    }
    await writeJson(simplifiedPath, simplified);
    log(`[ok] Wrote ${simplifiedPath}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log(`[error] Writing JSON failed: ${message}`);
    return {
      success: false,
      exitCode: EXIT_CODES.writeFailed,
      outputDir,
      summary,
      simplified,
      error: message,
    };
  }

  const failed = (options.failOnViolations ?? false) && hasViolations(summary);

  return {
    success: true,
    exitCode: failed ? EXIT_CODES.violations : EXIT_CODES.ok,
    outputDir,
    summaryPath: writeIntermediate ? summaryPath : undefined,
    simplifiedPath,
    summary,
    simplified,
  };
}
