import type { ClassDef, ClassId, LoadBounds, TeacherDef, TeacherId, Unit, YearGroup } from "./types";

export const CLASS_IDS: ClassId[] = ["Y13a", "Y13b", "Y13c", "Y12a", "Y12b", "Y12c", "Y12d", "Y12e"];

export const UNITS: Unit[] = ["Micro", "Macro"];

// Button rows are drawn Macro first.
export const BUTTON_ROW_UNITS: Unit[] = ["Macro", "Micro"];

export const TEACHER_ORDER: TeacherId[] = ["none", "CFE", "AHA", "TOB"];

export const UNASSIGNED: TeacherId = "none";

export const TEACHERS: Record<TeacherId, TeacherDef> = {
  none: { id: "none", color: "#CCCCCC", colorKey: "colorGray" },
  CFE: { id: "CFE", color: "#1E90FF", colorKey: "colorBlue" },
  AHA: { id: "AHA", color: "#FF4500", colorKey: "colorRed" },
  TOB: { id: "TOB", color: "#32CD32", colorKey: "colorGreen" },
};

export const YEAR_GROUP_TINTS: Record<YearGroup, string> = {
  Y13: "rgba(255, 200, 200, 0.6)",
  Y12: "rgba(200, 200, 255, 0.6)",
};

export const DEFAULT_LOAD_BOUNDS: LoadBounds = { min: 5, max: 6 };

export function yearGroupOf(classId: ClassId): YearGroup {
  return classId.startsWith("Y13") ? "Y13" : "Y12";
}

export const CLASSES: ClassDef[] = CLASS_IDS.map((id) => ({ id, yearGroup: yearGroupOf(id) }));

export const TOTAL_SLOTS = CLASS_IDS.length * UNITS.length;
