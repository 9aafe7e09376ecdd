import type { WeatherTag } from "../catalog/adventure.ts";

export type WeatherCondition =
  | "sunny"
  | "cloudy"
  | "rainy"
  | "stormy"
  | "snowy"
  | "foggy"
  | "unknown";

export type WeatherReadings = {
  temperature_min_c: number | null;
  temperature_max_c: number | null;
  precipitation_probability_pct: number | null;
  precipitation_sum_mm: number | null;
  wind_speed_max_kmh: number | null;
};

export type WeatherSummary = Readonly<WeatherReadings> & {
  readonly condition: WeatherCondition;
  readonly summary_de_en: string;
  readonly derived_tags: readonly WeatherTag[];
};

export const WEATHER_THRESHOLDS = {
  rain_probability_pct: 40,
  rain_sum_mm: 0.5,
  wind_kmh: 25,
  hot_max_c: 27,
  cold_max_c: 5,
} as const;

const CONDITION_SUMMARIES: Record<WeatherCondition, string> = {
  sunny: "Sonnig / Sunny",
  cloudy: "Bewölkt / Cloudy",
  rainy: "Regen / Rain",
  snowy: "Schnee / Snow",
  stormy: "Gewitter/Sturm / Storm",
  foggy: "Nebel / Fog",
  unknown: "Unbekannt / Unknown",
};

export function deriveWeatherTags(readings: Partial<WeatherReadings>): WeatherTag[] {
  const tags: WeatherTag[] = [];
  const probability = readings.precipitation_probability_pct ?? null;
  const sum = readings.precipitation_sum_mm ?? null;
  const wind = readings.wind_speed_max_kmh ?? null;
  const max = readings.temperature_max_c ?? null;

  if (
    (probability !== null && probability >= WEATHER_THRESHOLDS.rain_probability_pct) ||
    (sum !== null && sum >= WEATHER_THRESHOLDS.rain_sum_mm)
  ) {
    tags.push("rain");
  }
  if (wind !== null && wind >= WEATHER_THRESHOLDS.wind_kmh) {
    tags.push("wind");
  }
  if (max !== null && max >= WEATHER_THRESHOLDS.hot_max_c) {
    tags.push("hot");
  }
  if (max !== null && max <= WEATHER_THRESHOLDS.cold_max_c) {
    tags.push("cold");
  }

  if (tags.length === 0) {
    tags.push("cloudy");
  }
  return tags;
}

/** Maps a WMO weather interpretation code to a coarse condition. */
export function conditionFromWeatherCode(code: number | null | undefined): WeatherCondition {
  if (code === null || code === undefined || !Number.isFinite(code)) {
    return "unknown";
  }
  if (code === 0) {
    return "sunny";
  }
  if (code >= 1 && code <= 3) {
    return "cloudy";
  }
  if (code === 45 || code === 48) {
    return "foggy";
  }
  if ((code >= 51 && code <= 67) || (code >= 80 && code <= 82)) {
    return "rainy";
  }
  if ((code >= 71 && code <= 77) || code === 85 || code === 86) {
    return "snowy";
  }
  if (code >= 95) {
    return "stormy";
  }
  return "unknown";
}

export function createWeatherSummary(
  condition: WeatherCondition,
  readings: Partial<WeatherReadings>,
): WeatherSummary {
  return Object.freeze({
    condition,
    summary_de_en: CONDITION_SUMMARIES[condition],
    temperature_min_c: readings.temperature_min_c ?? null,
    temperature_max_c: readings.temperature_max_c ?? null,
    precipitation_probability_pct: readings.precipitation_probability_pct ?? null,
    precipitation_sum_mm: readings.precipitation_sum_mm ?? null,
    wind_speed_max_kmh: readings.wind_speed_max_kmh ?? null,
    derived_tags: Object.freeze(deriveWeatherTags(readings)),
  });
}
