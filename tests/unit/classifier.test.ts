import { describe, expect, it } from "vitest";
import {
  OBUF_FIX,
  PATH_KIND_FIXES,
  ROUTING_FIX,
  SKEW_FIXES,
  busName,
  classifyPath,
  dominantDelay,
  hasLargeSkew,
  pickFixes,
  rootCauseSentence,
  skewCharacter,
} from "../../src/sta/classifier.js";
import { enrichFromRaw } from "../../src/sta/enrichment.js";
import { resolveThresholds } from "../../src/sta/thresholds.js";
import type { DominantDelay, EnrichedFields, PathKind } from "../../src/types/timing.js";
import { makeViolation } from "../helpers/fixtures.js";

function enriched(overrides: Partial<EnrichedFields> = {}): EnrichedFields {
  return { ...enrichFromRaw(""), ...overrides };
}

describe("classifyPath", () => {
  it("detects register to output port", () => {
    expect(classifyPath(makeViolation({ raw: "FDRE (Prop_fdre_C_Q)\n  y[5] (OUT)" }))).toBe(
      "reg_to_out"
    );
    expect(classifyPath(makeViolation({ raw: "cell FDCE\n(output port clocked by clk)" }))).toBe(
      "reg_to_out"
    );
  });

  it("falls back through reg_to_reg, in_to_out and in_to_reg", () => {
    expect(classifyPath(makeViolation({ raw: "cell FDSE clocked by clk" }))).toBe("reg_to_reg");
    expect(classifyPath(makeViolation({ raw: "(output port clocked by clk)" }))).toBe("in_to_out");
    expect(classifyPath(makeViolation({ raw: "(input port clocked by clk)" }))).toBe("in_to_reg");
  });

  it("ignores FD embedded in a longer identifier", () => {
    expect(classifyPath(makeViolation({ raw: "net xFDRE_hold" }))).toBe("in_to_reg");
  });
});

describe("busName", () => {
  it("splits indexed names", () => {
    expect(busName("y[63]")).toEqual({ base: "y", bit: 63 });
    expect(busName("data_reg[12]/D")).toEqual({ base: "data_reg", bit: 12 });
  });

  it("keeps scalar names whole", () => {
    expect(busName("ctrl")).toEqual({ base: "ctrl", bit: null });
    expect(busName("u_core/q[1]")).toEqual({ base: "u_core/q[1]", bit: null });
  });
});

describe("hasLargeSkew", () => {
  it("compares |skew| against half the requirement", () => {
    expect(hasLargeSkew(makeViolation({ requirement_ns: 4, clock_path_skew_ns: -2 }))).toBe(true);
    expect(hasLargeSkew(makeViolation({ requirement_ns: 4, clock_path_skew_ns: 1.9 }))).toBe(false);
  });

  it("is false without a requirement", () => {
    expect(hasLargeSkew(makeViolation({ requirement_ns: 0, clock_path_skew_ns: -3 }))).toBe(false);
    expect(hasLargeSkew(makeViolation({ clock_path_skew_ns: -3 }))).toBe(false);
  });

  it("honors a custom fraction", () => {
    const thresholds = resolveThresholds({ largeSkewFraction: 0.25 });
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: 1 });
    expect(hasLargeSkew(violation, thresholds)).toBe(true);
  });
});

describe("dominantDelay", () => {
  const obufRaw = "FDRE (Prop_fdre_C_Q)\n    U16    OBUF (Prop_obuf_I_O)";

  it("labels OBUF paths with routing at least as large as logic", () => {
    const violation = makeViolation({ raw: obufRaw, logic_pct: 40, route_pct: 60, levels_of_logic: 3 });
    expect(dominantDelay(violation)).toBe("OBUF + routing");
  });

  it("labels single-level OBUF paths even when logic dominates", () => {
    const violation = makeViolation({ raw: obufRaw, logic_pct: 77.4, route_pct: 22.6, levels_of_logic: 1 });
    expect(dominantDelay(violation)).toBe("OBUF + routing");
  });

  it("does not treat unknown logic levels as single-level", () => {
    const violation = makeViolation({ raw: obufRaw, logic_pct: 70, route_pct: 30 });
    expect(dominantDelay(violation)).toBe("logic");
  });

  it("picks logic or routing without an OBUF", () => {
    expect(dominantDelay(makeViolation({ logic_pct: 70, route_pct: 30 }))).toBe("logic");
    expect(dominantDelay(makeViolation({ logic_pct: 30, route_pct: 70 }))).toBe("routing");
    expect(dominantDelay(makeViolation({ logic_pct: 50, route_pct: 50 }))).toBe("routing");
  });

  it("appends skew when skew is large", () => {
    const violation = makeViolation({
      raw: obufRaw,
      logic_pct: 40,
      route_pct: 60,
      requirement_ns: 4,
      clock_path_skew_ns: -2.5,
    });
    expect(dominantDelay(violation)).toBe("OBUF + routing + skew");
  });
});

describe("skewCharacter", () => {
  const violation = makeViolation({ requirement_ns: 4 });

  it("buckets dcd - scd against the requirement", () => {
    expect(skewCharacter(violation, enriched({ dcd_ns: 0.5, scd_ns: 3 }))).toBe(
      "negative_source_skew_large"
    );
    expect(skewCharacter(violation, enriched({ dcd_ns: 1, scd_ns: 1.5 }))).toBe(
      "negative_source_skew"
    );
    expect(skewCharacter(violation, enriched({ dcd_ns: 3, scd_ns: 1 }))).toBe(
      "negative_destination_skew_large"
    );
    expect(skewCharacter(violation, enriched({ dcd_ns: 1.5, scd_ns: 1 }))).toBe(
      "negative_destination_skew"
    );
    expect(skewCharacter(violation, enriched({ dcd_ns: 1.1, scd_ns: 1 }))).toBe("balanced");
  });

  it("is null without both delays or a requirement", () => {
    expect(skewCharacter(violation, enriched({ dcd_ns: 1 }))).toBeNull();
    expect(
      skewCharacter(makeViolation({ requirement_ns: 0 }), enriched({ dcd_ns: 1, scd_ns: 3 }))
    ).toBeNull();
  });
});

describe("rootCauseSentence", () => {
  it("describes REG to OBUF paths", () => {
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: -0.5 });
    expect(rootCauseSentence("reg_to_out", "OBUF + routing", violation, enriched())).toBe(
      "Unpipelined REG→OBUF path to top-level port with high OBUF + routing."
    );
  });

  it("adds the skew direction when both clock delays are known", () => {
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: -2.1 });
    expect(
      rootCauseSentence("reg_to_reg", "routing + skew", violation, enriched({ dcd_ns: 1.2, scd_ns: 3.3 }))
    ).toBe(
      "Deep combinational logic on REG→REG path with high routing + skew and large negative source clock skew (source path > dest path)."
    );
  });

  it("describes destination skew on other paths", () => {
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: 2.5 });
    expect(rootCauseSentence("in_to_reg", "routing + skew", violation, enriched())).toBe(
      "Path limited by routing + skew and large destination clock skew."
    );
  });
});

describe("pickFixes", () => {
  it("combines path kind, OBUF and routing hints", () => {
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: -0.5 });
    expect(
      pickFixes("reg_to_out", "OBUF + routing", violation, enriched({ io_primitive: "OBUF" }))
    ).toEqual([...PATH_KIND_FIXES.reg_to_out, OBUF_FIX, ROUTING_FIX]);
  });

  it("caps the list and keeps the earliest hints", () => {
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: -2.1 });
    expect(pickFixes("reg_to_reg", "routing + skew", violation, enriched())).toEqual([
      ...PATH_KIND_FIXES.reg_to_reg,
      ROUTING_FIX,
      SKEW_FIXES[0],
      SKEW_FIXES[1],
    ]);
  });

  it("gives input paths only the delay and skew hints", () => {
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: 3 });
    expect(pickFixes("in_to_out", "routing + skew", violation, enriched())).toEqual([
      ROUTING_FIX,
      ...SKEW_FIXES,
    ]);
  });

  it("holds six hints even when maxFixHints asks for more", () => {
    const thresholds = resolveThresholds({ maxFixHints: 9 });
    const violation = makeViolation({ requirement_ns: 4, clock_path_skew_ns: -3 });
    const fixes = pickFixes(
      "reg_to_out",
      "OBUF + routing + skew",
      violation,
      enriched({ io_primitive: "OBUF" }),
      thresholds
    );
    expect(fixes).toEqual([...PATH_KIND_FIXES.reg_to_out, OBUF_FIX, ROUTING_FIX]);
  });

  it("never exceeds the cap or repeats a hint", () => {
    const kinds: PathKind[] = ["reg_to_out", "reg_to_reg", "in_to_out", "in_to_reg"];
    const labels: DominantDelay[] = [
      "logic",
      "routing",
      "OBUF + routing",
      "logic + skew",
      "routing + skew",
      "OBUF + routing + skew",
    ];
    const violations = [
      makeViolation({ requirement_ns: 4, clock_path_skew_ns: 0 }),
      makeViolation({ requirement_ns: 4, clock_path_skew_ns: -3 }),
    ];

    for (const kind of kinds) {
      for (const label of labels) {
        for (const violation of violations) {
          const fixes = pickFixes(kind, label, violation, enriched({ io_primitive: "OBUF" }));
          expect(fixes.length).toBeLessThanOrEqual(6);
          expect(new Set(fixes).size).toBe(fixes.length);
        }
      }
    }
  });
});
