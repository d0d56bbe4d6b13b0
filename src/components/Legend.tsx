import { TEACHERS } from "../domain/constants";
import { getColorName, getTeacherName } from "../domain/i18n";
import type { TeacherId, Translations } from "../domain/types";

// Named teachers first.
const LEGEND_ORDER: TeacherId[] = ["CFE", "AHA", "TOB", "none"];

export function Legend({ t }: { t: Translations }) {
  return (
    <>
      <h2 className="section-title">{t.legendTitle}</h2>
      <ul className="legend">
        {LEGEND_ORDER.map((teacher) => (
          <li key={teacher}>
            <span className="legend-dot" style={{ background: TEACHERS[teacher].color }} />
            <strong>{getTeacherName(t, teacher)}</strong>: {getColorName(t, teacher)}
          </li>
        ))}
      </ul>
    </>
  );
}
