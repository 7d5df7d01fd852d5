/**
 * Raw Snippet Enrichment
 *
 * Second, narrower parsing pass over a single path block. Works on the
 * retained `raw` text only and shares no state with the report parser.
 */

import type { EnrichedFields } from "../types/timing.js";
import { FLOAT, firstFloat, firstMatch, toInt, toNumber } from "./patterns.js";

/**
 * Flip-flop primitive family (FDRE, FDCE, FDSE, FDPE, ...)
 */
export const FLIP_FLOP_TOKEN = /\bFD\w*\b/;

export const OBUF_TOKEN = /\bOBUF\b/;

function labeled(label: string): RegExp {
  return new RegExp(`${label}:\\s*(${FLOAT})ns`);
}

// Skew components & uncertainty
const DCD = labeled(String.raw`Destination Clock Delay\s*\(DCD\)`);
const SCD = labeled(String.raw`Source Clock Delay\s*\(SCD\)`);
const CPR = labeled(String.raw`Clock Pessimism Removal\s*\(CPR\)`);
const CLOCK_UNCERTAINTY = labeled("Clock Uncertainty");

// Jitter
const TSJ = labeled(String.raw`Total System Jitter\s*\(TSJ\)`);
const TIJ = labeled(String.raw`Total Input Jitter\s*\(TIJ\)`);
const DJ = labeled(String.raw`Discrete Jitter\s*\(DJ\)`);
const PE = labeled(String.raw`Phase Error\s*\(PE\)`);

// Footer table
const REQUIRED_TIME = new RegExp(String.raw`^\s*required time\s+(${FLOAT})`, "m");
const ARRIVAL_TIME = new RegExp(String.raw`^\s*arrival time\s+(${FLOAT})`, "m");

// Sites (first occurrence)
const IO_SITE = /^\s*([A-Z]\d+)\s+OBUF\b/m;
const SRC_SLICE = /^\s*(SLICE_[A-Z0-9XY]+)\s+FD\w+\b/m;

// net (fo=12, routed)    1.233     4.581    clk_IBUF_BUFG
const NET_FANOUT = /net\s*\(fo=(\d+)/g;
const NET_DELAY = new RegExp(String.raw`net\s*\(fo=\d+.*?\)\s+(${FLOAT})`, "g");

/**
 * Part of the snippet before the launching flip-flop, i.e. the source clock path
 */
export function clockSection(raw: string): string {
  const match = raw.match(FLIP_FLOP_TOKEN);
  return match && match.index !== undefined ? raw.slice(0, match.index) : raw;
}

/**
 * Mine skew, jitter, footer, placement and clock-tree fields from a raw snippet
 */
export function enrichFromRaw(raw: string): EnrichedFields {
  const clockPath = clockSection(raw);

  const fanouts: number[] = [];
  for (const match of clockPath.matchAll(NET_FANOUT)) {
    const fanout = toInt(match[1]);
    if (fanout !== null) fanouts.push(fanout);
  }

  const delays: number[] = [];
  for (const match of clockPath.matchAll(NET_DELAY)) {
    const delay = toNumber(match[1]);
    if (delay !== null) delays.push(delay);
  }

  return {
    dcd_ns: firstFloat(DCD, raw),
    scd_ns: firstFloat(SCD, raw),
    cpr_ns: firstFloat(CPR, raw),
    clock_uncertainty_ns: firstFloat(CLOCK_UNCERTAINTY, raw),
    tsj_ns: firstFloat(TSJ, raw),
    tij_ns: firstFloat(TIJ, raw),
    dj_ns: firstFloat(DJ, raw),
    pe_ns: firstFloat(PE, raw),
    required_time_ns: firstFloat(REQUIRED_TIME, raw),
    arrival_time_ns: firstFloat(ARRIVAL_TIME, raw),
    io_primitive: OBUF_TOKEN.test(raw) ? "OBUF" : null,
    io_site: firstMatch(IO_SITE, raw),
    src_slice: firstMatch(SRC_SLICE, raw),
    clock_net_fanout_max: fanouts.length > 0 ? Math.max(...fanouts) : null,
    clock_net_delay_ns_total:
      delays.length > 0 ? delays.reduce((sum, delay) => sum + delay, 0) : null,
  };
}
