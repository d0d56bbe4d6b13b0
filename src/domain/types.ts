export type Lang = "en" | "ar";
export type YearGroup = "Y13" | "Y12";
export type Unit = "Micro" | "Macro";

export type ClassId = "Y13a" | "Y13b" | "Y13c" | "Y12a" | "Y12b" | "Y12c" | "Y12d" | "Y12e";
export type TeacherId = "none" | "CFE" | "AHA" | "TOB";

export type SlotKey = `${ClassId}_${Unit}`;

export interface ClassDef {
  id: ClassId;
  yearGroup: YearGroup;
}

export interface TeacherDef {
  id: TeacherId;
  color: string;
  colorKey: "colorGray" | "colorBlue" | "colorRed" | "colorGreen";
}

export type AssignmentSnapshot = ReadonlyMap<SlotKey, TeacherId>;

export interface LoadBounds {
  min: number;
  max: number;
}

export type LoadViolations = Partial<Record<TeacherId, number>>;

export type RuleId = "allAssigned" | "distinctWithinClass" | "loadBalance" | "noAllCombinations";

export interface RuleResult {
  id: RuleId;
  passed: boolean;
}

export interface ValidationReport {
  results: RuleResult[];
  loadViolations: LoadViolations;
}

export interface Translations {
  [key: string]: string;
}
