import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { PathViolation } from "../../src/types/timing.js";

export const FIXTURE_REPORT = "pipe_top_timing_summary.rpt";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string = FIXTURE_REPORT): string {
  return readFileSync(fixturePath(name), "utf-8");
}

/**
 * A violated path with every numeric field unset
 */
export function makeViolation(overrides: Partial<PathViolation> = {}): PathViolation {
  return {
    status: "VIOLATED",
    slack: -0.5,
    source: null,
    destination: null,
    path_group: null,
    requirement_ns: null,
    data_path_delay_ns: null,
    logic_delay_ns: null,
    logic_pct: null,
    route_delay_ns: null,
    route_pct: null,
    levels_of_logic: null,
    output_delay_ns: null,
    clock_path_skew_ns: null,
    raw: "",
    ...overrides,
  };
}
