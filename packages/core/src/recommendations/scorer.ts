import type { Adventure } from "../catalog/adventure.ts";
import { GOAL_SIGNAL_TAGS } from "../catalog/themes.ts";
import type { SearchCriteria } from "../criteria/search-criteria.ts";
import type { WeatherSummary } from "../weather/weather-summary.ts";
import { adventureSignalTags, topicMatches } from "./filter.ts";

export const HOME_AREA = "Volksgarten";

export const SCORE_WEIGHTS = {
  home_area: 1.5,
  topic: 1,
  weather_tag: 1.25,
  rain_elevated_safety: -0.25,
  effort_energy: 0.5,
  low_effort_easy: 0.5,
  high_effort_difficulty: 0.25,
  goal: 1,
  low_safety: 0.2,
} as const;

/**
 * Additive relevance score. Values only order candidates within one call;
 * they are not comparable across different criteria.
 */
export function scoreAdventure(
  adventure: Adventure,
  criteria: SearchCriteria,
  weather: WeatherSummary | null,
): number {
  let score = 0;

  if (adventure.area.includes(HOME_AREA)) {
    score += SCORE_WEIGHTS.home_area;
  }

  if (criteria.topics.length > 0) {
    const signals = adventureSignalTags(adventure);
    for (const topic of criteria.topics) {
      if (topicMatches(topic, signals)) {
        score += SCORE_WEIGHTS.topic;
      }
    }
  }

  if (weather) {
    for (const tag of weather.derived_tags) {
      if (adventure.weather_tags.includes(tag)) {
        score += SCORE_WEIGHTS.weather_tag;
      }
    }
    if (weather.derived_tags.includes("rain") && adventure.safety_level === "elevated") {
      score += SCORE_WEIGHTS.rain_elevated_safety;
    }
  }

  if (criteria.effort === "low") {
    if (adventure.energy_level === "low") {
      score += SCORE_WEIGHTS.effort_energy;
    }
    if (adventure.difficulty === "easy") {
      score += SCORE_WEIGHTS.low_effort_easy;
    }
  } else if (criteria.effort === "high") {
    if (adventure.energy_level === "high") {
      score += SCORE_WEIGHTS.effort_energy;
    }
    if (adventure.difficulty === "medium" || adventure.difficulty === "demanding") {
      score += SCORE_WEIGHTS.high_effort_difficulty;
    }
  }

  const benefitTags = new Set<string>([
    ...adventure.toddler_benefits,
    ...adventure.tags,
    ...adventure.mood_tags,
  ]);
  for (const goal of criteria.goals) {
    if (GOAL_SIGNAL_TAGS[goal].some((tag) => benefitTags.has(tag))) {
      score += SCORE_WEIGHTS.goal;
    }
  }

  if (adventure.safety_level === "low") {
    score += SCORE_WEIGHTS.low_safety;
  }

  return score;
}
