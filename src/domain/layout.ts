import { CLASSES, TEACHERS, YEAR_GROUP_TINTS } from "./constants";
import { slotKey, teacherAt } from "./store";
import type { AssignmentSnapshot, ClassId, SlotKey, TeacherId, Unit, YearGroup } from "./types";

export const UNIT_Y: Record<Unit, number> = { Micro: 1, Macro: 1.25 };

const BAND_Y0 = 0.85;
const BAND_Y1 = 1.4;

export interface LayoutPoint {
  key: SlotKey;
  x: number;
  y: number;
  classId: ClassId;
  unit: Unit;
  teacher: TeacherId;
  color: string;
}

export interface LayoutBand {
  yearGroup: YearGroup;
  x0: number;
  x1: number;
  y0: number;
  y1: number;
  fill: string;
}

export interface ClassLayout {
  points: LayoutPoint[];
  bands: LayoutBand[];
  xTicks: number[];
  yTicks: number[];
}

export function buildClassLayout(snapshot: AssignmentSnapshot): ClassLayout {
  const points: LayoutPoint[] = [];
  const bands: LayoutBand[] = [];

  CLASSES.forEach(({ id, yearGroup }, index) => {
    for (const unit of ["Micro", "Macro"] as const) {
      const teacher = teacherAt(snapshot, id, unit);
      points.push({
        key: slotKey(id, unit),
        x: index,
        y: UNIT_Y[unit],
        classId: id,
        unit,
        teacher,
        color: TEACHERS[teacher].color,
      });
    }

    const last = bands[bands.length - 1];
    if (last && last.yearGroup === yearGroup) {
      last.x1 = index + 0.5;
    } else {
      bands.push({ yearGroup, x0: index - 0.5, x1: index + 0.5, y0: BAND_Y0, y1: BAND_Y1, fill: YEAR_GROUP_TINTS[yearGroup] });
    }
  });

  return {
    points,
    bands,
    xTicks: CLASSES.map((_, index) => index),
    yTicks: [UNIT_Y.Micro, UNIT_Y.Macro],
  };
}

export function isLayoutPoint(value: unknown): value is LayoutPoint {
  if (typeof value !== "object" || value === null) return false;
  if (!("key" in value && "classId" in value && "unit" in value && "teacher" in value)) return false;
  return (
    typeof value.key === "string" &&
    typeof value.classId === "string" &&
    (value.unit === "Micro" || value.unit === "Macro") &&
    typeof value.teacher === "string" &&
    value.teacher in TEACHERS
  );
}
