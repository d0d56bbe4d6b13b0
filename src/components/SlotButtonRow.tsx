import { CLASS_IDS, TEACHERS } from "../domain/constants";
import { getTeacherName, getUnitLabel } from "../domain/i18n";
import { slotKey, teacherAt } from "../domain/store";
import type { AssignmentSnapshot, ClassId, Translations, Unit } from "../domain/types";

interface SlotButtonRowProps {
  unit: Unit;
  snapshot: AssignmentSnapshot;
  t: Translations;
  onCycle: (classId: ClassId, unit: Unit) => void;
}

export function SlotButtonRow({ unit, snapshot, t, onCycle }: SlotButtonRowProps) {
  return (
    <div className="slot-row">
      {CLASS_IDS.map((classId) => {
        const teacher = teacherAt(snapshot, classId, unit);
        return (
          <button
            key={classId}
            type="button"
            className="slot-btn"
            data-slot={slotKey(classId, unit)}
            style={{ borderColor: TEACHERS[teacher].color }}
            onClick={() => onCycle(classId, unit)}
          >
            {`${classId} ${getUnitLabel(t, unit)} (${getTeacherName(t, teacher)})`}
          </button>
        );
      })}
    </div>
  );
}
