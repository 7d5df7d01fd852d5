/**
 * Configuration - thresholds and output locations from the environment
 *
 * Values come from process.env (populated from .env by the entry points).
 * Unset variables take the defaults; set but invalid ones are rejected.
 */

import { z } from "zod";
import {
  DEFAULT_THRESHOLDS,
  MAX_FIX_HINTS,
  type ClassifierThresholds,
} from "./sta/thresholds.js";

export interface AppConfig {
  thresholds: ClassifierThresholds;
  outputSubdir: string;
  topIssues: number;
}

const fraction = z.coerce.number().gt(0).lte(1);

const envFields = z.object({
  STA_TRIAGE_LARGE_SKEW_FRACTION: fraction.default(DEFAULT_THRESHOLDS.largeSkewFraction),
  STA_TRIAGE_MODERATE_SKEW_FRACTION: fraction.default(DEFAULT_THRESHOLDS.moderateSkewFraction),
  STA_TRIAGE_MAX_FIX_HINTS: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_FIX_HINTS)
    .default(DEFAULT_THRESHOLDS.maxFixHints),
  STA_TRIAGE_DEEP_LOGIC_LEVELS: z.coerce.number().int().positive().default(DEFAULT_THRESHOLDS.deepLogicLevels),
  STA_TRIAGE_HIGH_ROUTING_PCT: z.coerce.number().min(0).max(100).default(DEFAULT_THRESHOLDS.highRoutingPct),
  STA_TRIAGE_SEVERE_SLACK_NS: z.coerce.number().default(DEFAULT_THRESHOLDS.severeSlackNs),
  STA_TRIAGE_MODERATE_SLACK_NS: z.coerce.number().default(DEFAULT_THRESHOLDS.moderateSlackNs),
  STA_TRIAGE_OUTPUT_SUBDIR: z.string().min(1).default("rpt_json"),
  STA_TRIAGE_TOP_ISSUES: z.coerce.number().int().positive().default(5),
});

const envSchema = envFields.refine(
  (values) => values.STA_TRIAGE_MODERATE_SKEW_FRACTION < values.STA_TRIAGE_LARGE_SKEW_FRACTION,
  {
    message: "must be smaller than STA_TRIAGE_LARGE_SKEW_FRACTION",
    path: ["STA_TRIAGE_MODERATE_SKEW_FRACTION"],
  }
);

/**
 * Empty strings count as unset
 */
function pickEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(envFields.shape)) {
    const value = env[key]?.trim();
    if (value) picked[key] = value;
  }
  return picked;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(pickEnv(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    thresholds: {
      largeSkewFraction: values.STA_TRIAGE_LARGE_SKEW_FRACTION,
      moderateSkewFraction: values.STA_TRIAGE_MODERATE_SKEW_FRACTION,
      maxFixHints: values.STA_TRIAGE_MAX_FIX_HINTS,
      deepLogicLevels: values.STA_TRIAGE_DEEP_LOGIC_LEVELS,
      highRoutingPct: values.STA_TRIAGE_HIGH_ROUTING_PCT,
      severeSlackNs: values.STA_TRIAGE_SEVERE_SLACK_NS,
      moderateSlackNs: values.STA_TRIAGE_MODERATE_SLACK_NS,
    },
    outputSubdir: values.STA_TRIAGE_OUTPUT_SUBDIR,
    topIssues: values.STA_TRIAGE_TOP_ISSUES,
  };
}
