import { TEACHER_ORDER } from "./constants";
import type { AssignmentStore } from "./store";
import type { ClassId, TeacherId, Unit } from "./types";

export function nextTeacher(current: TeacherId): TeacherId {
  const index = TEACHER_ORDER.indexOf(current);
  return TEACHER_ORDER[(index + 1) % TEACHER_ORDER.length];
}

export function cycleTeacher(store: AssignmentStore, classId: ClassId, unit: Unit) {
  const next = nextTeacher(store.get(classId, unit));
  store.set(classId, unit, next);
  return next;
}
