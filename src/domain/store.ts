import { CLASS_IDS, UNASSIGNED, UNITS } from "./constants";
import type { AssignmentSnapshot, ClassId, SlotKey, TeacherId, Unit } from "./types";

type Listener = () => void;

export class UnknownSlotError extends Error {
  readonly slot: string;

  constructor(slot: string) {
    super(`Unknown slot "${slot}"`);
    this.name = "UnknownSlotError";
    this.slot = slot;
  }
}

export function slotKey(classId: ClassId, unit: Unit): SlotKey {
  return `${classId}_${unit}`;
}

export function buildSnapshot(overrides: Partial<Record<SlotKey, TeacherId>> = {}): AssignmentSnapshot {
  const snapshot = new Map<SlotKey, TeacherId>();
  for (const classId of CLASS_IDS) {
    for (const unit of UNITS) {
      const key = slotKey(classId, unit);
      snapshot.set(key, overrides[key] ?? UNASSIGNED);
    }
  }
  return snapshot;
}

export function teacherAt(snapshot: AssignmentSnapshot, classId: ClassId, unit: Unit): TeacherId {
  const key = slotKey(classId, unit);
  const teacher = snapshot.get(key);
  if (teacher === undefined) throw new UnknownSlotError(key);
  return teacher;
}

/**
 * Session-scoped teacher assignments for every (class, unit) slot.
 *
 * The key set is fixed at construction. Every write replaces the snapshot and
 * notifies subscribers synchronously, so a view that renders from
 * `getSnapshot()` is never behind the store.
 */
export class AssignmentStore {
  private snapshot: AssignmentSnapshot;
  private readonly listeners = new Set<Listener>();

  constructor(initial: AssignmentSnapshot = buildSnapshot()) {
    this.snapshot = new Map(initial);
  }

  get(classId: ClassId, unit: Unit): TeacherId {
    return teacherAt(this.snapshot, classId, unit);
  }

  set(classId: ClassId, unit: Unit, teacher: TeacherId) {
    const key = slotKey(classId, unit);
    if (!this.snapshot.has(key)) throw new UnknownSlotError(key);

    const next = new Map(this.snapshot);
    next.set(key, teacher);
    this.snapshot = next;

    for (const listener of this.listeners) listener();
  }

  getSnapshot = (): AssignmentSnapshot => this.snapshot;

  subscribe = (listener: Listener) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };
}
