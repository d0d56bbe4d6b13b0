import { CLASSES, DEFAULT_LOAD_BOUNDS, TEACHER_ORDER, UNASSIGNED, UNITS } from "./constants";
import { teacherAt } from "./store";
import type { AssignmentSnapshot, LoadBounds, LoadViolations, TeacherId, Unit, ValidationReport, YearGroup } from "./types";

export type Combination = `${YearGroup}|${Unit}`;

export const ALL_COMBINATIONS = 4;

export function ruleAllAssigned(snapshot: AssignmentSnapshot) {
  return CLASSES.every(({ id }) => UNITS.every((unit) => teacherAt(snapshot, id, unit) !== UNASSIGNED));
}

// Unassigned compares like any other teacher, so a class with both units empty fails.
export function ruleDistinctWithinClass(snapshot: AssignmentSnapshot) {
  return CLASSES.every(({ id }) => teacherAt(snapshot, id, "Micro") !== teacherAt(snapshot, id, "Macro"));
}

export function countTeacherLoads(snapshot: AssignmentSnapshot) {
  const counts: Record<TeacherId, number> = { none: 0, CFE: 0, AHA: 0, TOB: 0 };
  for (const { id } of CLASSES) {
    for (const unit of UNITS) {
      counts[teacherAt(snapshot, id, unit)] += 1;
    }
  }
  return counts;
}

export function ruleLoadBalance(snapshot: AssignmentSnapshot, bounds: LoadBounds = DEFAULT_LOAD_BOUNDS): LoadViolations {
  const counts = countTeacherLoads(snapshot);
  const violations: LoadViolations = {};

  for (const teacher of TEACHER_ORDER) {
    const count = counts[teacher];
    if (count < bounds.min || count > bounds.max) violations[teacher] = count;
  }

  return violations;
}

export function teacherCombinations(snapshot: AssignmentSnapshot) {
  const combos: Record<TeacherId, Set<Combination>> = {
    none: new Set(),
    CFE: new Set(),
    AHA: new Set(),
    TOB: new Set(),
  };

  for (const { id, yearGroup } of CLASSES) {
    for (const unit of UNITS) {
      combos[teacherAt(snapshot, id, unit)].add(`${yearGroup}|${unit}`);
    }
  }

  return combos;
}

export function teachersCoveringAllCombinations(snapshot: AssignmentSnapshot) {
  const combos = teacherCombinations(snapshot);
  return TEACHER_ORDER.filter((teacher) => combos[teacher].size >= ALL_COMBINATIONS);
}

export function ruleNoAllCombinations(snapshot: AssignmentSnapshot) {
  return teachersCoveringAllCombinations(snapshot).length === 0;
}

export function buildValidationReport(snapshot: AssignmentSnapshot, bounds: LoadBounds = DEFAULT_LOAD_BOUNDS): ValidationReport {
  const loadViolations = ruleLoadBalance(snapshot, bounds);

  return {
    results: [
      { id: "allAssigned", passed: ruleAllAssigned(snapshot) },
      { id: "distinctWithinClass", passed: ruleDistinctWithinClass(snapshot) },
      { id: "loadBalance", passed: Object.keys(loadViolations).length === 0 },
      { id: "noAllCombinations", passed: ruleNoAllCombinations(snapshot) },
    ],
    loadViolations,
  };
}
