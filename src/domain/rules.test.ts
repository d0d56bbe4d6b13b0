import { describe, expect, it } from "vitest";
import { CLASS_IDS } from "./constants";
import {
  buildValidationReport,
  countTeacherLoads,
  ruleAllAssigned,
  ruleDistinctWithinClass,
  ruleLoadBalance,
  ruleNoAllCombinations,
  teacherCombinations,
  teachersCoveringAllCombinations,
} from "./rules";
import { buildSnapshot, slotKey } from "./store";
import type { SlotKey, TeacherId } from "./types";

type Overrides = Partial<Record<SlotKey, TeacherId>>;

function fill(micro: TeacherId, macro: TeacherId): Overrides {
  const overrides: Overrides = {};
  for (const classId of CLASS_IDS) {
    overrides[slotKey(classId, "Micro")] = micro;
    overrides[slotKey(classId, "Macro")] = macro;
  }
  return overrides;
}

// CFE 5, AHA 5, TOB 6; each teacher covers three year/unit combinations.
const BALANCED: Overrides = {
  Y13a_Micro: "CFE",
  Y13b_Micro: "CFE",
  Y13c_Micro: "AHA",
  Y13a_Macro: "TOB",
  Y13b_Macro: "TOB",
  Y13c_Macro: "TOB",
  Y12a_Micro: "AHA",
  Y12b_Micro: "AHA",
  Y12c_Micro: "TOB",
  Y12d_Micro: "TOB",
  Y12e_Micro: "CFE",
  Y12a_Macro: "CFE",
  Y12b_Macro: "CFE",
  Y12c_Macro: "AHA",
  Y12d_Macro: "AHA",
  Y12e_Macro: "TOB",
};

describe("all-assigned rule", () => {
  it("fails on the initial state", () => {
    expect(ruleAllAssigned(buildSnapshot())).toBe(false);
  });

  it("passes only once every slot has a teacher", () => {
    expect(ruleAllAssigned(buildSnapshot(fill("CFE", "AHA")))).toBe(true);
    expect(ruleAllAssigned(buildSnapshot({ ...fill("CFE", "AHA"), Y12e_Macro: "none" }))).toBe(false);
  });
});

describe("distinct-within-class rule", () => {
  it("fails when both units of a class are unassigned", () => {
    expect(ruleDistinctWithinClass(buildSnapshot(fill("CFE", "AHA")))).toBe(true);
    expect(ruleDistinctWithinClass(buildSnapshot({ ...fill("CFE", "AHA"), Y13c_Micro: "none", Y13c_Macro: "none" }))).toBe(false);
    expect(ruleDistinctWithinClass(buildSnapshot())).toBe(false);
  });

  it("fails when a class has the same teacher for Micro and Macro", () => {
    expect(ruleDistinctWithinClass(buildSnapshot({ ...fill("CFE", "AHA"), Y12a_Micro: "TOB", Y12a_Macro: "TOB" }))).toBe(false);
  });
});

describe("load-balance rule", () => {
  it("counts every teacher including unassigned", () => {
    expect(countTeacherLoads(buildSnapshot({ Y13a_Micro: "CFE", Y13a_Macro: "AHA", Y12b_Micro: "CFE" }))).toEqual({
      none: 13,
      CFE: 2,
      AHA: 1,
      TOB: 0,
    });
  });

  it("reports a single teacher holding all sixteen slots", () => {
    expect(ruleLoadBalance(buildSnapshot(fill("TOB", "TOB")))).toEqual({ none: 0, CFE: 0, AHA: 0, TOB: 16 });
  });

  it("reports both halves of an 8/8 split along with the empty teachers", () => {
    expect(ruleLoadBalance(buildSnapshot(fill("CFE", "AHA")))).toEqual({ none: 0, CFE: 8, AHA: 8, TOB: 0 });
  });

  it("leaves teachers within bounds out of the result", () => {
    expect(ruleLoadBalance(buildSnapshot(BALANCED))).toEqual({ none: 0 });
  });

  it("honours custom bounds", () => {
    expect(ruleLoadBalance(buildSnapshot(fill("CFE", "AHA")), { min: 0, max: 8 })).toEqual({});
  });
});

describe("no-all-combinations rule", () => {
  const covering: Overrides = {
    ...fill("AHA", "TOB"),
    Y13a_Micro: "CFE",
    Y13b_Macro: "CFE",
    Y12a_Micro: "CFE",
    Y12b_Macro: "CFE",
  };

  it("fails when one teacher covers both year groups and both units", () => {
    const snapshot = buildSnapshot(covering);

    expect(teacherCombinations(snapshot).CFE).toEqual(new Set(["Y13|Micro", "Y13|Macro", "Y12|Micro", "Y12|Macro"]));
    expect(teachersCoveringAllCombinations(snapshot)).toEqual(["CFE"]);
    expect(ruleNoAllCombinations(snapshot)).toBe(false);
  });

  it("passes again once any one combination is removed", () => {
    for (const key of ["Y13a_Micro", "Y13b_Macro", "Y12a_Micro", "Y12b_Macro"] as const) {
      const replacement = key.endsWith("Micro") ? "AHA" : "TOB";
      expect(ruleNoAllCombinations(buildSnapshot({ ...covering, [key]: replacement }))).toBe(true);
    }
  });

  it("counts unassigned as a teacher", () => {
    expect(teachersCoveringAllCombinations(buildSnapshot())).toEqual(["none"]);
  });
});

describe("validation report", () => {
  it("lists the four rules in order", () => {
    const report = buildValidationReport(buildSnapshot());

    expect(report.results).toEqual([
      { id: "allAssigned", passed: false },
      { id: "distinctWithinClass", passed: false },
      { id: "loadBalance", passed: false },
      { id: "noAllCombinations", passed: false },
    ]);
    expect(report.loadViolations).toEqual({ none: 16, CFE: 0, AHA: 0, TOB: 0 });
  });

  it("passes every rule except load balance for a complete balanced schedule", () => {
    const report = buildValidationReport(buildSnapshot(BALANCED));

    expect(report.results.map((result) => result.passed)).toEqual([true, true, false, true]);
    expect(report.loadViolations).toEqual({ none: 0 });
  });

  it("passes load balance when the bounds admit an empty unassigned count", () => {
    const report = buildValidationReport(buildSnapshot(BALANCED), { min: 0, max: 6 });

    expect(report.results.find((result) => result.id === "loadBalance")?.passed).toBe(true);
    expect(report.loadViolations).toEqual({});
  });
});
