import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config.js";
import { DEFAULT_THRESHOLDS } from "../../src/sta/thresholds.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      thresholds: DEFAULT_THRESHOLDS,
      outputSubdir: "rpt_json",
      topIssues: 5,
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const config = loadConfig({
      STA_TRIAGE_LARGE_SKEW_FRACTION: "0.4",
      STA_TRIAGE_MAX_FIX_HINTS: "3",
      STA_TRIAGE_OUTPUT_SUBDIR: "json",
      STA_TRIAGE_TOP_ISSUES: "  ",
    });
    expect(config.thresholds.largeSkewFraction).toBe(0.4);
    expect(config.thresholds.maxFixHints).toBe(3);
    expect(config.outputSubdir).toBe("json");
    expect(config.topIssues).toBe(5);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ STA_TRIAGE_LARGE_SKEW_FRACTION: "abc" })).toThrow(
      /STA_TRIAGE_LARGE_SKEW_FRACTION/
    );
    expect(() => loadConfig({ STA_TRIAGE_MAX_FIX_HINTS: "0" })).toThrow(/Invalid configuration/);
  });

  it("caps the fix hint count at six", () => {
    expect(loadConfig({ STA_TRIAGE_MAX_FIX_HINTS: "6" }).thresholds.maxFixHints).toBe(6);
    expect(() => loadConfig({ STA_TRIAGE_MAX_FIX_HINTS: "7" })).toThrow(
      /STA_TRIAGE_MAX_FIX_HINTS/
    );
  });

  it("requires the moderate skew fraction to stay below the large one", () => {
    expect(() => loadConfig({ STA_TRIAGE_MODERATE_SKEW_FRACTION: "0.9" })).toThrow(
      "Invalid configuration: STA_TRIAGE_MODERATE_SKEW_FRACTION: must be smaller than STA_TRIAGE_LARGE_SKEW_FRACTION"
    );
    expect(() =>
      loadConfig({
        STA_TRIAGE_LARGE_SKEW_FRACTION: "0.3",
        STA_TRIAGE_MODERATE_SKEW_FRACTION: "0.3",
      })
    ).toThrow(/STA_TRIAGE_MODERATE_SKEW_FRACTION/);

    const config = loadConfig({
      STA_TRIAGE_LARGE_SKEW_FRACTION: "0.9",
      STA_TRIAGE_MODERATE_SKEW_FRACTION: "0.6",
    });
    expect(config.thresholds.moderateSkewFraction).toBe(0.6);
  });
});
