import { TEACHERS } from "./constants";
import type { Lang, LoadBounds, RuleId, TeacherId, Translations, Unit } from "./types";

const I18N: Record<Lang, Translations> = {
  en: {
    appTitle: "Class Scheduling Dashboard",
    appSubtitle: "{classes} classes · {slots} slots · {assigned} assigned",
    cycleHint: "Click a Class Unit to Cycle Through Teachers",
    layoutTitle: "Class Layout Diagram",
    rulesTitle: "Validation Rules",
    invalidCountsTitle: "Teachers with invalid class counts",
    invalidCountLine: "{teacher} has {count} classes (must have {range}).",
    legendTitle: "Legend",
    ruleAllAssigned: "All units in all classes have an assigned teacher",
    ruleDistinctWithinClass: "Every class has a different teacher across Micro and Macro",
    ruleLoadBalance: "Every teacher has {range} classes",
    ruleNoAllCombinations: "No teacher has a class in all four combinations (Y12 + Y13, Macro and Micro)",
    rangePair: "{min} or {max}",
    rangeSpan: "between {min} and {max}",
    passed: "Passed",
    failed: "Failed",
    unitMicro: "Micro",
    unitMacro: "Macro",
    teacherNone: "None",
    teacher: "Teacher",
    axisClasses: "Classes",
    axisUnits: "Units",
    colorGray: "Gray",
    colorBlue: "Blue",
    colorRed: "Red",
    colorGreen: "Green",
    language: "Language",
    english: "English",
    arabic: "العربية",
  },
  ar: {
    appTitle: "لوحة جدولة الفصول",
    appSubtitle: "{classes} فصول · {slots} خانة · {assigned} مُسندة",
    cycleHint: "اضغط على وحدة الفصل للتنقل بين المعلمين",
    layoutTitle: "مخطط توزيع الفصول",
    rulesTitle: "قواعد التحقق",
    invalidCountsTitle: "معلمون بعدد فصول غير صالح",
    invalidCountLine: "{teacher} لديه {count} فصول (المطلوب {range}).",
    legendTitle: "دليل الألوان",
    ruleAllAssigned: "كل الوحدات في كل الفصول لها معلم مُسند",
    ruleDistinctWithinClass: "لكل فصل معلم مختلف بين Micro و Macro",
    ruleLoadBalance: "لكل معلم {range} فصول",
    ruleNoAllCombinations: "لا يوجد معلم لديه فصل في التركيبات الأربع كلها (Y12 و Y13، Macro و Micro)",
    rangePair: "{min} أو {max}",
    rangeSpan: "بين {min} و {max}",
    passed: "ناجح",
    failed: "فاشل",
    unitMicro: "Micro",
    unitMacro: "Macro",
    teacherNone: "لا أحد",
    teacher: "المعلم",
    axisClasses: "الفصول",
    axisUnits: "الوحدات",
    colorGray: "رمادي",
    colorBlue: "أزرق",
    colorRed: "أحمر",
    colorGreen: "أخضر",
    language: "اللغة",
    english: "English",
    arabic: "العربية",
  },
};

const RULE_KEY: Record<RuleId, string> = {
  allAssigned: "ruleAllAssigned",
  distinctWithinClass: "ruleDistinctWithinClass",
  loadBalance: "ruleLoadBalance",
  noAllCombinations: "ruleNoAllCombinations",
};

export function getT(lang: Lang) {
  return I18N[lang];
}

export function formatT(template: string, vars: Record<string, string | number>) {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => (name in vars ? String(vars[name]) : match));
}

export function formatLoadRange(t: Translations, bounds: LoadBounds) {
  if (bounds.min === bounds.max) return String(bounds.min);
  const template = bounds.max - bounds.min === 1 ? t.rangePair : t.rangeSpan;
  return formatT(template, { min: bounds.min, max: bounds.max });
}

export function getRuleLabel(t: Translations, rule: RuleId, bounds: LoadBounds) {
  return formatT(t[RULE_KEY[rule]] || rule, { range: formatLoadRange(t, bounds) });
}

export function getTeacherName(t: Translations, teacher: TeacherId) {
  return teacher === "none" ? t.teacherNone : teacher;
}

export function getUnitLabel(t: Translations, unit: Unit) {
  return unit === "Micro" ? t.unitMicro : t.unitMacro;
}

export function getColorName(t: Translations, teacher: TeacherId) {
  return t[TEACHERS[teacher].colorKey];
}
