import { readFileSync } from "node:fs";

import {
  DIFFICULTY_LEVELS,
  ENERGY_LEVELS,
  isOneOf,
  SAFETY_LEVELS,
  SEASON_TAGS,
  WEATHER_TAGS,
  type Adventure,
  type Difficulty,
  type EnergyLevel,
  type SafetyLevel,
} from "./adventure.ts";

export const DEFAULT_CATALOG_URL = new URL("../../data/adventures.json", import.meta.url);

export class CatalogIntegrityError extends Error {
  readonly code = "catalog_invalid";
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Adventure catalog is invalid: ${problems.join("; ")}`);
    this.name = "CatalogIntegrityError";
    this.problems = problems;
  }
}

/**
 * Validates raw catalog data and returns frozen adventures. Any problem in any
 * entry rejects the whole catalog.
 */
export function parseAdventureCatalog(raw: unknown): readonly Adventure[] {
  if (!Array.isArray(raw)) {
    throw new CatalogIntegrityError(["catalog must be an array"]);
  }

  const problems: string[] = [];
  const adventures: Adventure[] = [];
  raw.forEach((entry, index) => {
    const adventure = parseAdventure(entry, `adventures[${index}]`, problems);
    if (adventure) {
      adventures.push(adventure);
    }
  });

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const adventure of adventures) {
    if (seen.has(adventure.id)) {
      duplicates.add(adventure.id);
    }
    seen.add(adventure.id);
  }
  if (duplicates.size > 0) {
    problems.push(`Duplicate ids found: ${[...duplicates].sort().join(", ")}`);
  }

  if (problems.length > 0) {
    throw new CatalogIntegrityError(problems);
  }
  return Object.freeze(adventures);
}

export function loadAdventureCatalog(source: URL | string = DEFAULT_CATALOG_URL): readonly Adventure[] {
  const text = readFileSync(source, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown";
    throw new CatalogIntegrityError([`catalog is not valid JSON (${message})`]);
  }
  return parseAdventureCatalog(parsed);
}

function parseAdventure(value: unknown, path: string, problems: string[]): Adventure | null {
  if (!isRecord(value)) {
    problems.push(`${path} must be an object`);
    return null;
  }
  const before = problems.length;
  const reader = createFieldReader(value, path, problems);

  const adventure: Adventure = {
    id: reader.requiredString("id"),
    title: reader.requiredString("title"),
    area: reader.requiredString("area"),
    short_description: reader.requiredString("short_description"),
    duration_minutes: reader.number("duration_minutes", { min: 1 }),
    distance_km: reader.number("distance_km", { min: 0 }),
    best_time: reader.optionalString("best_time"),
    stroller_ok: reader.boolean("stroller_ok", false),
    start_point: reader.optionalString("start_point"),
    route_steps: reader.stringList("route_steps", { nonEmpty: true }),
    preparation: reader.stringList("preparation"),
    packing_list: reader.stringList("packing_list"),
    execution_tips: reader.stringList("execution_tips"),
    variations: reader.stringList("variations"),
    toddler_benefits: reader.stringList("toddler_benefits", { nonEmpty: true }),
    tip: reader.optionalString("tip"),
    risks: reader.stringList("risks"),
    mitigations: reader.stringList("mitigations"),
    tags: reader.stringList("tags"),
    accessibility: reader.stringList("accessibility"),
    season_tags: reader.enumList("season_tags", SEASON_TAGS),
    weather_tags: reader.enumList("weather_tags", WEATHER_TAGS),
    energy_level: reader.enumValue<EnergyLevel>("energy_level", ENERGY_LEVELS, "medium"),
    difficulty: reader.enumValue<Difficulty>("difficulty", DIFFICULTY_LEVELS, "easy"),
    age_min: reader.number("age_min", { min: 0, fallback: 2 }),
    age_max: reader.number("age_max", { min: 0, fallback: 6 }),
    mood_tags: reader.stringList("mood_tags"),
    safety_level: reader.enumValue<SafetyLevel>("safety_level", SAFETY_LEVELS, "low"),
  };

  if (adventure.age_min > adventure.age_max) {
    problems.push(`${path}.age_min must be <= age_max`);
  }

  if (problems.length > before) {
    return null;
  }
  return Object.freeze(adventure);
}

function createFieldReader(record: Record<string, unknown>, path: string, problems: string[]) {
  const fail = (key: string, message: string): void => {
    problems.push(`${path}.${key} ${message}`);
  };

  return {
    requiredString(key: string): string {
      const value = record[key];
      if (typeof value !== "string" || value.trim().length === 0) {
        fail(key, "must be a non-empty string");
        return "";
      }
      return value.trim();
    },
    optionalString(key: string): string {
      const value = record[key];
      if (value === undefined || value === null) {
        return "";
      }
      if (typeof value !== "string") {
        fail(key, "must be a string");
        return "";
      }
      return value.trim();
    },
    boolean(key: string, fallback: boolean): boolean {
      const value = record[key];
      if (value === undefined) {
        return fallback;
      }
      if (typeof value !== "boolean") {
        fail(key, "must be a boolean");
        return fallback;
      }
      return value;
    },
    number(key: string, options: { min: number; fallback?: number }): number {
      const value = record[key];
      if (value === undefined && options.fallback !== undefined) {
        return options.fallback;
      }
      if (typeof value !== "number" || !Number.isFinite(value) || value < options.min) {
        fail(key, `must be a number >= ${options.min}`);
        return options.min;
      }
      return value;
    },
    stringList(key: string, options: { nonEmpty?: boolean } = {}): readonly string[] {
      const value = record[key];
      if (value === undefined && !options.nonEmpty) {
        return [];
      }
      if (!Array.isArray(value) || value.some((entry) => typeof entry !== "string")) {
        fail(key, "must be a list of strings");
        return [];
      }
      const entries = value
        .filter((entry): entry is string => typeof entry === "string")
        .map((entry) => entry.trim())
        .filter(Boolean);
      if (options.nonEmpty && entries.length === 0) {
        fail(key, "must not be empty");
      }
      return Object.freeze(entries);
    },
    enumList<T extends string>(key: string, allowed: readonly T[]): readonly T[] {
      const value = record[key];
      if (value === undefined) {
        return [];
      }
      if (!Array.isArray(value)) {
        fail(key, "must be a list");
        return [];
      }
      const entries: T[] = [];
      for (const entry of value) {
        if (isOneOf(allowed, entry)) {
          entries.push(entry);
        } else {
          fail(key, `contains unknown value '${String(entry)}'`);
        }
      }
      return Object.freeze(entries);
    },
    enumValue<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
      const value = record[key];
      if (value === undefined) {
        return fallback;
      }
      if (!isOneOf(allowed, value)) {
        fail(key, `must be one of ${allowed.join(", ")}`);
        return fallback;
      }
      return value;
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
