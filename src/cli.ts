#!/usr/bin/env node

/**
 * sta-triage CLI
 *
 * Usage: sta-triage <report.rpt> [--out-dir DIR] [--no-intermediate]
 *                   [--print] [--fail-on-violations] [--top N]
 */

// Load environment variables from .env file
import dotenv from "dotenv";
dotenv.config();

import { parseArgs } from "util";
import { loadConfig } from "./config.js";
import { runPipeline } from "./pipeline/run-pipeline.js";
import { formatIssues, formatSummaryLine } from "./sta/format.js";

const USAGE =
  "Usage: sta-triage <report.rpt> [--out-dir DIR] [--no-intermediate] [--print] [--fail-on-violations] [--top N]";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      "out-dir": { type: "string" },
      "no-intermediate": { type: "boolean", default: false },
      print: { type: "boolean", default: false },
      "fail-on-violations": { type: "boolean", default: false },
      top: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const reportPath = positionals[0];
  if (!reportPath || positionals.length > 1) {
    console.error(USAGE);
    return 1;
  }

  const config = loadConfig();
  const top = values.top !== undefined ? Number(values.top) : config.topIssues;
  if (!Number.isInteger(top) || top < 0) {
    console.error(`Invalid --top value: ${values.top}`);
    return 1;
  }

  const result = await runPipeline({
    reportPath,
    outDir: values["out-dir"],
    outputSubdir: config.outputSubdir,
    writeIntermediate: !values["no-intermediate"],
    failOnViolations: values["fail-on-violations"],
    thresholds: config.thresholds,
  });

  if (result.summary) {
    console.log(formatSummaryLine(result.summary));
  }
  if (result.simplified) {
    const issues = formatIssues(result.simplified, top);
    if (issues) console.log(`\n${issues}`);
    if (values.print) {
      console.log(JSON.stringify(result.simplified, null, 2));
    }
  }

  return result.exitCode;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("sta-triage failed:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
