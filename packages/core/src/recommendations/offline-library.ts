import { readFileSync } from "node:fs";

import { isOneOf } from "../catalog/adventure.ts";
import { CatalogIntegrityError } from "../catalog/catalog-loader.ts";
import {
  EFFORT_LEVELS,
  LOCATION_PREFERENCES,
  type EffortLevel,
  type LocationPreference,
  type SearchCriteria,
} from "../criteria/search-criteria.ts";
import { resolveMaterialKey } from "../materials/material-catalog.ts";
import { createLogger, type StructuredLogger } from "../observability/logger.ts";

export const DEFAULT_ACTIVITY_LIBRARY_URL = new URL("../../data/activity-library.json", import.meta.url);

export const OFFLINE_LIBRARY_LOCATION = "Offline Activity Library";

export const NO_OFFLINE_MATCHES_WARNING =
  "Keine Offline-Treffer gefunden. Bitte Budget/Zeit/Topics anpassen. / No offline matches found. Please adjust budget/time/topics.";

const DEFAULT_CHILD_AGE_YEARS = 6;

export type ActivityLibraryItem = {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly domain_tags: readonly string[];
  readonly age_min_years: number;
  readonly age_max_years: number;
  readonly indoor_outdoor: LocationPreference;
  readonly duration_min: number;
  readonly materials: readonly string[];
  readonly safety_notes: readonly string[];
  readonly effort: EffortLevel;
  readonly estimated_cost_eur: number;
};

export type OfflineSuggestion = {
  id: string;
  title: string;
  date: string;
  start_time: string;
  end_time: string;
  location: string;
  expected_cost_eur: number;
  indoor_outdoor: LocationPreference;
  description: string;
  reason_de_en: string;
  score: number;
};

export type OfflineSuggestionResult = {
  suggestions: readonly OfflineSuggestion[];
  warnings_de_en: readonly string[];
};

export function loadActivityLibrary(source: URL | string = DEFAULT_ACTIVITY_LIBRARY_URL): readonly ActivityLibraryItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(source, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown";
    throw new CatalogIntegrityError([`activity library could not be read (${message})`]);
  }
  return parseActivityLibrary(parsed);
}

export function parseActivityLibrary(raw: unknown): readonly ActivityLibraryItem[] {
  const entries = isRecord(raw) && Array.isArray(raw.activities) ? raw.activities : null;
  if (!entries) {
    throw new CatalogIntegrityError(["activity library must contain an 'activities' list"]);
  }

  const problems: string[] = [];
  const items: ActivityLibraryItem[] = [];
  entries.forEach((entry: unknown, index: number) => {
    const item = parseItem(entry, `activities[${index}]`, problems);
    if (item) {
      items.push(item);
    }
  });
  if (problems.length > 0) {
    throw new CatalogIntegrityError(problems);
  }
  return Object.freeze(items);
}

export function scoreLibraryItem(
  item: ActivityLibraryItem,
  criteria: SearchCriteria,
  childAgeYears: number,
): number {
  let score = 0;
  score += childAgeYears >= item.age_min_years && childAgeYears <= item.age_max_years ? 3 : -4;
  if (item.duration_min <= criteria.available_minutes) {
    score += 1.5;
  }
  score += item.estimated_cost_eur <= criteria.budget_eur_max ? 1.5 : -2;
  if (item.effort === criteria.effort) {
    score += 1;
  }
  if (criteria.location_preference === item.indoor_outdoor) {
    score += 1;
  } else if (criteria.location_preference === "mixed") {
    score += 0.3;
  }
  const overlap = criteria.topics.filter((topic) => item.domain_tags.includes(topic)).length;
  score += Math.min(2, 0.6 * overlap);
  return score;
}

/**
 * Ranks library items for the criteria. Unlike the daily pick, an empty result
 * is a normal outcome reported as a warning.
 */
export function suggestOfflineActivities(
  library: readonly ActivityLibraryItem[],
  criteria: SearchCriteria,
  options: { logger?: StructuredLogger; correlation_id?: string | null } = {},
): OfflineSuggestionResult {
  const childAge = criteria.child_age_years ?? DEFAULT_CHILD_AGE_YEARS;

  const suggestions = library
    .filter((item) => item.duration_min <= criteria.available_minutes)
    .filter((item) => materialsAvailable(item, criteria.available_materials))
    .map((item) => ({ item, score: scoreLibraryItem(item, criteria, childAge) }))
    .filter((entry) => entry.score >= 0)
    .sort((left, right) => right.score - left.score || left.item.id.localeCompare(right.item.id))
    .slice(0, criteria.max_suggestions)
    .map(({ item, score }) => toSuggestion(item, criteria, score));

  if (suggestions.length === 0) {
    const logger = options.logger ?? createLogger();
    logger({
      event: "recommendation.offline_no_matches",
      correlation_id: options.correlation_id ?? null,
      payload: { library_size: library.length },
    });
    return { suggestions: [], warnings_de_en: [NO_OFFLINE_MATCHES_WARNING] };
  }
  return { suggestions, warnings_de_en: [] };
}

function materialsAvailable(item: ActivityLibraryItem, available: readonly string[]): boolean {
  if (available.length === 0 || item.materials.length === 0) {
    return true;
  }
  const listed = new Set(available.map((entry) => entry.trim().toLowerCase()));
  const listedKeys = new Set(available.map(resolveMaterialKey).filter((key) => key !== null));
  return item.materials.every((material) => {
    if (listed.has(material.trim().toLowerCase())) {
      return true;
    }
    const key = resolveMaterialKey(material);
    return key !== null && listedKeys.has(key);
  });
}

function toSuggestion(item: ActivityLibraryItem, criteria: SearchCriteria, score: number): OfflineSuggestion {
  const reason = {
    age: `${item.age_min_years}-${item.age_max_years}`,
    domain_tags: item.domain_tags,
    materials: item.materials,
    safety_notes: item.safety_notes,
  };
  return {
    id: item.id,
    title: item.title,
    date: criteria.date,
    start_time: criteria.time_window.start,
    end_time: criteria.time_window.end,
    location: OFFLINE_LIBRARY_LOCATION,
    expected_cost_eur: item.estimated_cost_eur,
    indoor_outdoor: item.indoor_outdoor,
    description: item.description,
    reason_de_en: `Offline-Bibliothek Treffer / Offline library match: ${JSON.stringify(reason)}`,
    score,
  };
}

function parseItem(value: unknown, path: string, problems: string[]): ActivityLibraryItem | null {
  if (!isRecord(value)) {
    problems.push(`${path} must be an object`);
    return null;
  }
  const record = value;
  const before = problems.length;
  const text = (key: string): string => {
    const field = record[key];
    if (typeof field !== "string" || field.trim().length === 0) {
      problems.push(`${path}.${key} must be a non-empty string`);
      return "";
    }
    return field.trim();
  };
  const num = (key: string, min: number, max: number, fallback?: number): number => {
    const field = record[key] ?? fallback;
    if (typeof field !== "number" || !Number.isFinite(field) || field < min || field > max) {
      problems.push(`${path}.${key} must be a number between ${min} and ${max}`);
      return min;
    }
    return field;
  };
  const list = (key: string): readonly string[] => {
    const field = record[key] ?? [];
    if (!Array.isArray(field) || field.some((entry) => typeof entry !== "string")) {
      problems.push(`${path}.${key} must be a list of strings`);
      return [];
    }
    return Object.freeze(field.filter((entry): entry is string => typeof entry === "string"));
  };

  const indoorOutdoor = record.indoor_outdoor;
  const effort = record.effort ?? "medium";
  if (!isOneOf(LOCATION_PREFERENCES, indoorOutdoor)) {
    problems.push(`${path}.indoor_outdoor must be one of ${LOCATION_PREFERENCES.join(", ")}`);
  }
  if (!isOneOf(EFFORT_LEVELS, effort)) {
    problems.push(`${path}.effort must be one of ${EFFORT_LEVELS.join(", ")}`);
  }

  const item = {
    id: text("id"),
    title: text("title"),
    description: text("description"),
    domain_tags: list("domain_tags"),
    age_min_years: num("age_min_years", 0, 18),
    age_max_years: num("age_max_years", 0, 18),
    duration_min: num("duration_min", 15, 360),
    materials: list("materials"),
    safety_notes: list("safety_notes"),
    estimated_cost_eur: num("estimated_cost_eur", 0, 250, 0),
  };
  if (item.age_min_years > item.age_max_years) {
    problems.push(`${path}.age_min_years must be <= age_max_years`);
  }
  if (problems.length > before || !isOneOf(LOCATION_PREFERENCES, indoorOutdoor) || !isOneOf(EFFORT_LEVELS, effort)) {
    return null;
  }
  return Object.freeze({ ...item, indoor_outdoor: indoorOutdoor, effort });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
