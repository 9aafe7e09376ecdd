import type { Adventure } from "../catalog/adventure.ts";
import { resolveThemeTags } from "../catalog/themes.ts";
import type { EffortLevel, SearchCriteria } from "../criteria/search-criteria.ts";

/** Tags a requested topic can match against: generic, weather, mood and season tags. */
export function adventureSignalTags(adventure: Adventure): ReadonlySet<string> {
  return new Set<string>([
    ...adventure.tags,
    ...adventure.weather_tags,
    ...adventure.mood_tags,
    ...adventure.season_tags,
  ]);
}

export function topicMatches(topic: string, signals: ReadonlySet<string>): boolean {
  return resolveThemeTags(topic).some((tag) => signals.has(tag));
}

export function matchesTopics(adventure: Adventure, topics: readonly string[]): boolean {
  if (topics.length === 0) {
    return true;
  }
  const signals = adventureSignalTags(adventure);
  return topics.some((topic) => topicMatches(topic, signals));
}

export function passesEffortGate(adventure: Adventure, effort: EffortLevel): boolean {
  if (effort === "low") {
    return adventure.energy_level !== "high" && adventure.difficulty === "easy";
  }
  if (effort === "medium") {
    return adventure.difficulty !== "demanding";
  }
  return true;
}

export function fitsChildAge(adventure: Adventure, childAgeYears: number | null): boolean {
  if (childAgeYears === null) {
    return true;
  }
  return childAgeYears >= adventure.age_min && childAgeYears <= adventure.age_max;
}

export function filterAdventures(
  catalog: readonly Adventure[],
  criteria: SearchCriteria,
): Adventure[] {
  return catalog.filter((adventure) =>
    adventure.duration_minutes <= criteria.available_minutes &&
    passesEffortGate(adventure, criteria.effort) &&
    matchesTopics(adventure, criteria.topics) &&
    fitsChildAge(adventure, criteria.child_age_years)
  );
}
