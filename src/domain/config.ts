import { DEFAULT_LOAD_BOUNDS, TEACHER_ORDER, TOTAL_SLOTS, UNASSIGNED } from "./constants";
import type { Lang, LoadBounds } from "./types";

export interface SchedulerConfig {
  loadBounds: LoadBounds;
  defaultLang: Lang;
}

export interface SchedulerConfigValidation {
  errors: string[];
  warnings: string[];
}

export type RawEnv = Record<string, string | boolean | undefined>;

const DEFAULT_CONFIG: SchedulerConfig = {
  loadBounds: { ...DEFAULT_LOAD_BOUNDS },
  defaultLang: "en",
};

const NAMED_TEACHER_COUNT = TEACHER_ORDER.filter((teacher) => teacher !== UNASSIGNED).length;

function toNumber(value: unknown, fallback: number) {
  if (typeof value === "number") return value;
  if (typeof value !== "string" || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isNaN(n) ? fallback : n;
}

function toLang(value: unknown, fallback: Lang): Lang {
  return value === "en" || value === "ar" ? value : fallback;
}

export function getDefaultSchedulerConfig(): SchedulerConfig {
  return {
    loadBounds: { ...DEFAULT_CONFIG.loadBounds },
    defaultLang: DEFAULT_CONFIG.defaultLang,
  };
}

export function normalizeSchedulerConfig(env: RawEnv): SchedulerConfig {
  const defaults = getDefaultSchedulerConfig();
  return {
    loadBounds: {
      min: toNumber(env.VITE_TEACHER_LOAD_MIN, defaults.loadBounds.min),
      max: toNumber(env.VITE_TEACHER_LOAD_MAX, defaults.loadBounds.max),
    },
    defaultLang: toLang(env.VITE_DEFAULT_LANG, defaults.defaultLang),
  };
}

export function validateSchedulerConfig(config: SchedulerConfig): SchedulerConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { min, max } = config.loadBounds;

  if (!Number.isInteger(min) || min < 0) {
    errors.push("Teacher load minimum must be a whole number >= 0.");
  }
  if (!Number.isInteger(max) || max > TOTAL_SLOTS) {
    errors.push(`Teacher load maximum must be a whole number <= ${TOTAL_SLOTS}.`);
  }
  if (max < min) {
    errors.push(`Teacher load maximum (${max}) is below the minimum (${min}).`);
  }

  if (errors.length === 0) {
    if (NAMED_TEACHER_COUNT * max < TOTAL_SLOTS) {
      warnings.push(`${NAMED_TEACHER_COUNT} teachers at most ${max} classes each cannot cover ${TOTAL_SLOTS} slots.`);
    }
    if (NAMED_TEACHER_COUNT * min > TOTAL_SLOTS) {
      warnings.push(`${NAMED_TEACHER_COUNT} teachers at least ${min} classes each need more than ${TOTAL_SLOTS} slots.`);
    }
  }

  return { errors, warnings };
}

export function resolveSchedulerConfig(env: RawEnv) {
  const config = normalizeSchedulerConfig(env);
  const validation = validateSchedulerConfig(config);

  for (const warning of validation.warnings) console.warn(`config: ${warning}`);
  if (validation.errors.length > 0) {
    console.warn("config: falling back to defaults:", validation.errors.join(" "));
    return getDefaultSchedulerConfig();
  }
  return config;
}

export function getRuntimeSchedulerConfig() {
  return resolveSchedulerConfig(import.meta.env);
}
