export const ENERGY_LEVELS = ["low", "medium", "high"] as const;
export const DIFFICULTY_LEVELS = ["easy", "medium", "demanding"] as const;
export const SAFETY_LEVELS = ["low", "medium", "elevated"] as const;
export const SEASON_TAGS = ["spring", "summer", "autumn", "winter"] as const;
export const WEATHER_TAGS = ["sun", "cloudy", "rain", "wind", "cold", "hot"] as const;

export type EnergyLevel = (typeof ENERGY_LEVELS)[number];
export type Difficulty = (typeof DIFFICULTY_LEVELS)[number];
export type SafetyLevel = (typeof SAFETY_LEVELS)[number];
export type SeasonTag = (typeof SEASON_TAGS)[number];
export type WeatherTag = (typeof WEATHER_TAGS)[number];

export type Adventure = {
  id: string;
  title: string;
  area: string;
  short_description: string;
  duration_minutes: number;
  distance_km: number;
  best_time: string;
  stroller_ok: boolean;
  start_point: string;
  route_steps: readonly string[];
  preparation: readonly string[];
  packing_list: readonly string[];
  execution_tips: readonly string[];
  variations: readonly string[];
  toddler_benefits: readonly string[];
  tip: string;
  risks: readonly string[];
  mitigations: readonly string[];
  tags: readonly string[];
  accessibility: readonly string[];
  season_tags: readonly SeasonTag[];
  weather_tags: readonly WeatherTag[];
  energy_level: EnergyLevel;
  difficulty: Difficulty;
  age_min: number;
  age_max: number;
  mood_tags: readonly string[];
  safety_level: SafetyLevel;
};

export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === "string" && values.some((candidate) => candidate === value);
}
