import { isOneOf } from "../catalog/adventure.ts";
import { DEVELOPMENT_GOALS, type DevelopmentGoal } from "../catalog/themes.ts";

export const EFFORT_LEVELS = ["low", "medium", "high"] as const;
export const LOCATION_PREFERENCES = ["indoor", "outdoor", "mixed"] as const;

export type EffortLevel = (typeof EFFORT_LEVELS)[number];
export type LocationPreference = (typeof LOCATION_PREFERENCES)[number];

const EFFORT_ALIASES: Record<string, EffortLevel> = {
  niedrig: "low",
  mittel: "medium",
  hoch: "high",
};

export const CRITERIA_LIMITS = {
  radius_km: { min: 0.5, max: 50 },
  budget_eur_max: { min: 0, max: 250 },
  child_age_years: { min: 0, max: 18 },
  max_suggestions: { min: 1, max: 10 },
  max_topics: 8,
  max_constraints: 6,
  max_materials: 7,
  max_entry_length: 80,
} as const;

export type TimeWindow = {
  readonly start: string;
  readonly end: string;
};

export type SearchCriteria = {
  readonly postal_code: string;
  readonly radius_km: number;
  readonly date: string;
  readonly time_window: TimeWindow;
  readonly available_minutes: number;
  readonly effort: EffortLevel;
  readonly budget_eur_max: number;
  readonly child_age_years: number | null;
  readonly topics: readonly string[];
  readonly location_preference: LocationPreference;
  readonly goals: readonly DevelopmentGoal[];
  readonly constraints: readonly string[];
  readonly available_materials: readonly string[];
  readonly max_suggestions: number;
};

export type SearchCriteriaInput = {
  postal_code?: unknown;
  radius_km?: unknown;
  date?: unknown;
  time_window?: unknown;
  effort?: unknown;
  budget_eur_max?: unknown;
  child_age_years?: unknown;
  topics?: unknown;
  location_preference?: unknown;
  goals?: unknown;
  constraints?: unknown;
  available_materials?: unknown;
  max_suggestions?: unknown;
};

export type CriteriaIssue = {
  field: string;
  message: string;
};

export type CriteriaParseResult =
  | { ok: true; value: SearchCriteria }
  | { ok: false; issues: readonly CriteriaIssue[] };

export class CriteriaValidationError extends Error {
  readonly code = "criteria_invalid";
  readonly issues: readonly CriteriaIssue[];

  constructor(issues: readonly CriteriaIssue[]) {
    super(`Invalid search criteria: ${issues.map((issue) => issue.field).join(", ")}`);
    this.name = "CriteriaValidationError";
    this.issues = issues;
  }
}

const POSTAL_CODE_PATTERN = /^\d{5}$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DISALLOWED_TEXT_CHARS = /[^\p{L}\p{N}\s.,!?:;()/'-]/gu;

/**
 * Validates raw search input. Every violated field is reported; nothing is
 * coerced beyond trimming, case-folding and deduplication.
 */
export function parseSearchCriteria(input: SearchCriteriaInput): CriteriaParseResult {
  const issues: CriteriaIssue[] = [];
  const fail = (field: string, message: string): void => {
    issues.push({ field, message });
  };

  const postalCode = readPostalCode(input.postal_code, fail);
  const radiusKm = readBoundedNumber(input.radius_km, "radius_km", 5, CRITERIA_LIMITS.radius_km, fail);
  const date = readIsoDate(input.date, fail);
  const timeWindow = readTimeWindow(input.time_window, fail);
  const effort = readEffort(input.effort, fail);
  const budget = readBoundedNumber(
    input.budget_eur_max,
    "budget_eur_max",
    15,
    CRITERIA_LIMITS.budget_eur_max,
    fail,
  );
  const childAge = readChildAge(input.child_age_years, fail);
  const topics = readTopics(input.topics, fail);
  const locationPreference = readLocationPreference(input.location_preference, fail);
  const goals = readGoals(input.goals, fail);
  const constraints = readSanitizedList(
    input.constraints,
    "constraints",
    CRITERIA_LIMITS.max_constraints,
    fail,
  );
  const materials = readSanitizedList(
    input.available_materials,
    "available_materials",
    CRITERIA_LIMITS.max_materials,
    fail,
  );
  const maxSuggestions = readMaxSuggestions(input.max_suggestions, fail);

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  const value: SearchCriteria = Object.freeze({
    postal_code: postalCode,
    radius_km: radiusKm,
    date,
    time_window: Object.freeze(timeWindow),
    available_minutes: clockToMinutes(timeWindow.end) - clockToMinutes(timeWindow.start),
    effort,
    budget_eur_max: budget,
    child_age_years: childAge,
    topics: Object.freeze(topics),
    location_preference: locationPreference,
    goals: Object.freeze(goals),
    constraints: Object.freeze(constraints),
    available_materials: Object.freeze(materials),
    max_suggestions: maxSuggestions,
  });
  return { ok: true, value };
}

export function createSearchCriteria(input: SearchCriteriaInput): SearchCriteria {
  const result = parseSearchCriteria(input);
  if (!result.ok) {
    throw new CriteriaValidationError(result.issues);
  }
  return result.value;
}

export function normalizeEffort(value: string): EffortLevel | null {
  const normalized = value.trim().toLowerCase();
  if (isOneOf(EFFORT_LEVELS, normalized)) {
    return normalized;
  }
  return EFFORT_ALIASES[normalized] ?? null;
}

export function sanitizeFreeTextEntry(value: string): string {
  return value
    .replace(DISALLOWED_TEXT_CHARS, "")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, CRITERIA_LIMITS.max_entry_length)
    .trim();
}

export function clockToMinutes(value: string): number {
  const match = CLOCK_PATTERN.exec(value);
  if (!match) {
    throw new RangeError(`Invalid clock time '${value}'.`);
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

type Fail = (field: string, message: string) => void;

function readPostalCode(value: unknown, fail: Fail): string {
  if (value === undefined) {
    return "40215";
  }
  const normalized = typeof value === "string" ? value.trim() : "";
  if (!POSTAL_CODE_PATTERN.test(normalized)) {
    fail("postal_code", "postal_code must be exactly 5 digits");
    return "";
  }
  return normalized;
}

function readBoundedNumber(
  value: unknown,
  field: string,
  fallback: number,
  limits: { readonly min: number; readonly max: number },
  fail: Fail,
): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < limits.min || value > limits.max) {
    fail(field, `${field} must be between ${limits.min} and ${limits.max}`);
    return fallback;
  }
  return value;
}

function readIsoDate(value: unknown, fail: Fail): string {
  const normalized = typeof value === "string" ? value.trim() : "";
  const match = ISO_DATE_PATTERN.exec(normalized);
  if (!match) {
    fail("date", "date must be an ISO date (YYYY-MM-DD)");
    return "";
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    fail("date", "date must be a real calendar day");
    return "";
  }
  return normalized;
}

function readTimeWindow(value: unknown, fail: Fail): TimeWindow {
  const fallback: TimeWindow = { start: "09:00", end: "10:00" };
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    fail("time_window", "time_window must be an object with start and end");
    return fallback;
  }

  const start = "start" in value && typeof value.start === "string" ? value.start.trim() : "";
  const end = "end" in value && typeof value.end === "string" ? value.end.trim() : "";
  let valid = true;
  if (!CLOCK_PATTERN.test(start)) {
    fail("time_window.start", "time_window.start must be HH:MM");
    valid = false;
  }
  if (!CLOCK_PATTERN.test(end)) {
    fail("time_window.end", "time_window.end must be HH:MM");
    valid = false;
  }
  if (valid && clockToMinutes(end) <= clockToMinutes(start)) {
    fail("time_window", "time_window.end must be after time_window.start");
    valid = false;
  }
  return valid ? { start, end } : fallback;
}

function readEffort(value: unknown, fail: Fail): EffortLevel {
  if (value === undefined) {
    return "medium";
  }
  const effort = typeof value === "string" ? normalizeEffort(value) : null;
  if (!effort) {
    fail("effort", "effort must be one of low, medium, high");
    return "medium";
  }
  return effort;
}

function readChildAge(value: unknown, fail: Fail): number | null {
  if (value === undefined || value === null) {
    return null;
  }
  const { min, max } = CRITERIA_LIMITS.child_age_years;
  if (typeof value !== "number" || !Number.isFinite(value) || value < min || value > max) {
    fail("child_age_years", `child_age_years must be between ${min} and ${max}`);
    return null;
  }
  return value;
}

function readStringArray(value: unknown, field: string, fail: Fail): string[] | null {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
    fail(field, `${field} must be a list of strings`);
    return null;
  }
  return value.filter((entry): entry is string => typeof entry === "string");
}

function readTopics(value: unknown, fail: Fail): string[] {
  const entries = readStringArray(value, "topics", fail);
  if (!entries) {
    return [];
  }
  const topics = dedupe(entries.map((entry) => entry.trim().toLowerCase()).filter(Boolean));
  if (topics.length > CRITERIA_LIMITS.max_topics) {
    fail("topics", `topics supports at most ${CRITERIA_LIMITS.max_topics} entries`);
  }
  return topics;
}

function readLocationPreference(value: unknown, fail: Fail): LocationPreference {
  if (value === undefined) {
    return "mixed";
  }
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : value;
  if (!isOneOf(LOCATION_PREFERENCES, normalized)) {
    fail("location_preference", "location_preference must be one of indoor, outdoor, mixed");
    return "mixed";
  }
  return normalized;
}

function readGoals(value: unknown, fail: Fail): DevelopmentGoal[] {
  if (value === undefined) {
    return ["gross_motor"];
  }
  const entries = readStringArray(value, "goals", fail);
  if (!entries) {
    return [];
  }

  const goals: DevelopmentGoal[] = [];
  for (const entry of entries) {
    const normalized = entry.trim().toLowerCase();
    if (!isOneOf(DEVELOPMENT_GOALS, normalized)) {
      fail("goals", `unknown goal '${entry}'`);
      continue;
    }
    if (!goals.includes(normalized)) {
      goals.push(normalized);
    }
  }
  if (goals.length < 1 || goals.length > 2) {
    fail("goals", "goals requires 1-2 domains");
  }
  return goals;
}

function readSanitizedList(value: unknown, field: string, max: number, fail: Fail): string[] {
  const entries = readStringArray(value, field, fail);
  if (!entries) {
    return [];
  }

  const seen = new Set<string>();
  const cleaned: string[] = [];
  for (const entry of entries) {
    const sanitized = sanitizeFreeTextEntry(entry);
    const key = sanitized.toLowerCase();
    if (!sanitized || seen.has(key)) {
      continue;
    }
    seen.add(key);
    cleaned.push(sanitized);
  }
  if (cleaned.length > max) {
    fail(field, `${field} supports at most ${max} entries`);
  }
  return cleaned;
}

function readMaxSuggestions(value: unknown, fail: Fail): number {
  if (value === undefined) {
    return 5;
  }
  const { min, max } = CRITERIA_LIMITS.max_suggestions;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    fail("max_suggestions", `max_suggestions must be an integer between ${min} and ${max}`);
    return 5;
  }
  return value;
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}
