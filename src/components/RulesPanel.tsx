import { formatLoadRange, formatT, getRuleLabel, getTeacherName } from "../domain/i18n";
import { TEACHER_ORDER } from "../domain/constants";
import type { LoadBounds, Translations, ValidationReport } from "../domain/types";

export function RulesPanel({ report, bounds, t }: { report: ValidationReport; bounds: LoadBounds; t: Translations }) {
  const violators = TEACHER_ORDER.filter((teacher) => report.loadViolations[teacher] !== undefined);

  return (
    <>
      <h2 className="section-title">{t.rulesTitle}</h2>
      <ul className="rules">
        {report.results.map((result) => (
          <li key={result.id} className={result.passed ? "rule ok" : "rule bad"} data-rule={result.id}>
            <span className="rule-icon" aria-label={result.passed ? t.passed : t.failed}>
              {result.passed ? "✅" : "❌"}
            </span>
            {getRuleLabel(t, result.id, bounds)}
          </li>
        ))}
      </ul>

      {violators.length > 0 && (
        <>
          <h2 className="section-title">{t.invalidCountsTitle}</h2>
          <ul className="rules">
            {violators.map((teacher) => (
              <li key={teacher} className="rule bad" data-teacher={teacher}>
                <span className="rule-icon">❌</span>
                {formatT(t.invalidCountLine, {
                  teacher: getTeacherName(t, teacher),
                  count: report.loadViolations[teacher] ?? 0,
                  range: formatLoadRange(t, bounds),
                })}
              </li>
            ))}
          </ul>
        </>
      )}
    </>
  );
}
