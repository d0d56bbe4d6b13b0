import { useMemo } from "react";
import { Cell, ReferenceArea, Scatter, ScatterChart, Tooltip, XAxis, YAxis, ZAxis } from "recharts";
import { CLASS_IDS } from "../domain/constants";
import { getTeacherName, getUnitLabel } from "../domain/i18n";
import { UNIT_Y, buildClassLayout, isLayoutPoint } from "../domain/layout";
import type { AssignmentSnapshot, Translations } from "../domain/types";

const MARKER_AREA = 700;

function SlotTooltip({ t, active, payload }: { t: Translations; active?: boolean; payload?: Array<{ payload?: unknown }> }) {
  const point = payload?.[0]?.payload;
  if (!active || !isLayoutPoint(point)) return null;

  return (
    <div className="diagram-tip">
      <div className="diagram-tip-title">
        {point.classId} {getUnitLabel(t, point.unit)}
      </div>
      <div>
        {t.teacher}: {getTeacherName(t, point.teacher)}
      </div>
    </div>
  );
}

export function LayoutDiagram({ snapshot, t, width = 800, height = 200 }: { snapshot: AssignmentSnapshot; t: Translations; width?: number; height?: number }) {
  const layout = useMemo(() => buildClassLayout(snapshot), [snapshot]);

  return (
    <div className="diagram" dir="ltr">
      <ScatterChart width={width} height={height} margin={{ top: 20, bottom: 30, left: 30, right: 20 }}>
        {layout.bands.map((band) => (
          <ReferenceArea key={band.yearGroup} x1={band.x0} x2={band.x1} y1={band.y0} y2={band.y1} fill={band.fill} fillOpacity={0.6} strokeOpacity={0} />
        ))}
        <XAxis
          type="number"
          dataKey="x"
          domain={[-0.5, CLASS_IDS.length - 0.5]}
          ticks={layout.xTicks}
          tickFormatter={(value: number) => CLASS_IDS[value] ?? ""}
          tickLine={false}
          label={{ value: t.axisClasses, position: "insideBottom", offset: -20 }}
        />
        <YAxis
          type="number"
          dataKey="y"
          domain={[0.85, 1.4]}
          ticks={layout.yTicks}
          tickFormatter={(value: number) => getUnitLabel(t, value === UNIT_Y.Micro ? "Micro" : "Macro")}
          tickLine={false}
          label={{ value: t.axisUnits, angle: -90, position: "insideLeft", offset: -10 }}
        />
        <ZAxis range={[MARKER_AREA, MARKER_AREA]} />
        <Tooltip cursor={false} content={<SlotTooltip t={t} />} />
        <Scatter data={layout.points} isAnimationActive={false}>
          {layout.points.map((point) => (
            <Cell key={point.key} fill={point.color} stroke="DarkSlateGrey" strokeWidth={2} />
          ))}
        </Scatter>
      </ScatterChart>
    </div>
  );
}
