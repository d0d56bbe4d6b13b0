import { useCallback, useMemo, useState } from "react";
import { LayoutDiagram } from "./components/LayoutDiagram";
import { Legend } from "./components/Legend";
import { RulesPanel } from "./components/RulesPanel";
import { SlotButtonRow } from "./components/SlotButtonRow";
import { BUTTON_ROW_UNITS, CLASS_IDS, TOTAL_SLOTS, UNASSIGNED } from "./domain/constants";
import { getRuntimeSchedulerConfig, type SchedulerConfig } from "./domain/config";
import { cycleTeacher } from "./domain/cycler";
import { formatT, getT } from "./domain/i18n";
import { buildValidationReport } from "./domain/rules";
import { AssignmentStore } from "./domain/store";
import type { ClassId, Lang, Unit } from "./domain/types";
import { useAssignments } from "./hooks/useAssignments";
import "./styles/app.css";

const RUNTIME_CONFIG = getRuntimeSchedulerConfig();

function cx(...parts: Array<string | boolean | null | undefined>) {
  return parts.filter(Boolean).join(" ");
}

interface AppProps {
  config?: SchedulerConfig;
  store?: AssignmentStore;
}

export default function App({ config = RUNTIME_CONFIG, store: providedStore }: AppProps) {
  const [store] = useState(() => providedStore ?? new AssignmentStore());
  const snapshot = useAssignments(store);

  const [lang, setLang] = useState<Lang>(config.defaultLang);
  const t = getT(lang);
  const dir = lang === "ar" ? "rtl" : "ltr";

  const report = useMemo(() => buildValidationReport(snapshot, config.loadBounds), [snapshot, config.loadBounds]);
  const assignedCount = useMemo(() => [...snapshot.values()].filter((teacher) => teacher !== UNASSIGNED).length, [snapshot]);

  const onCycle = useCallback((classId: ClassId, unit: Unit) => cycleTeacher(store, classId, unit), [store]);

  return (
    <div dir={dir}>
      <div className="app">
        <div className="topbar">
          <div>
            <h1 className="tb-t">{t.appTitle}</h1>
            <div className="tb-s">{formatT(t.appSubtitle, { classes: CLASS_IDS.length, slots: TOTAL_SLOTS, assigned: assignedCount })}</div>
          </div>
          <div className="lang">
            <span className="lang-label">{t.language}</span>
            <div className="lang-switch">
              <button type="button" className={cx("lang-btn", lang === "en" && "on")} onClick={() => setLang("en")}>
                {t.english}
              </button>
              <button type="button" className={cx("lang-btn", lang === "ar" && "on")} onClick={() => setLang("ar")}>
                {t.arabic}
              </button>
            </div>
          </div>
        </div>

        <div className="main">
          <h2 className="section-title">{t.cycleHint}</h2>
          {BUTTON_ROW_UNITS.map((unit) => (
            <SlotButtonRow key={unit} unit={unit} snapshot={snapshot} t={t} onCycle={onCycle} />
          ))}

          <h2 className="section-title">{t.layoutTitle}</h2>
          <LayoutDiagram snapshot={snapshot} t={t} />

          <RulesPanel report={report} bounds={config.loadBounds} t={t} />

          <Legend t={t} />
        </div>
      </div>
    </div>
  );
}
