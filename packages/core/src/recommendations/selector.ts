import type { Adventure } from "../catalog/adventure.ts";
import type { SearchCriteria } from "../criteria/search-criteria.ts";
import { createLogger, type StructuredLogger } from "../observability/logger.ts";
import type { WeatherSummary } from "../weather/weather-summary.ts";
import { filterAdventures } from "./filter.ts";
import { scoreAdventure } from "./scorer.ts";
import { createSeededRandom, pickSeededIndex, seedFromParts } from "./seeded-random.ts";

export const TOP_N_MIN = 3;
export const TOP_N_MAX = 8;

export type ScoredAdventure = {
  adventure: Adventure;
  score: number;
};

export type AdventurePick = {
  pick: Adventure;
  candidates: readonly Adventure[];
  top: readonly ScoredAdventure[];
  used_full_catalog: boolean;
};

export function formatRadiusForSeed(radiusKm: number): string {
  return Number.isInteger(radiusKm) ? radiusKm.toFixed(1) : String(radiusKm);
}

export function criteriaSeed(criteria: SearchCriteria): bigint {
  return seedFromParts([
    criteria.date,
    criteria.postal_code,
    formatRadiusForSeed(criteria.radius_km),
    criteria.effort,
  ]);
}

/** Score descending; `Array.prototype.sort` is stable, so ties keep catalog order. */
export function rankAdventures(
  candidates: readonly Adventure[],
  criteria: SearchCriteria,
  weather: WeatherSummary | null,
): ScoredAdventure[] {
  return candidates
    .map((adventure) => ({ adventure, score: scoreAdventure(adventure, criteria, weather) }))
    .sort((left, right) => right.score - left.score);
}

/**
 * Deterministic pick: the same catalog, criteria and weather tags always yield
 * the same adventure, across processes.
 */
export function pickAdventure(
  catalog: readonly Adventure[],
  criteria: SearchCriteria,
  weather: WeatherSummary | null,
  options: { logger?: StructuredLogger; correlation_id?: string | null } = {},
): AdventurePick {
  if (catalog.length === 0) {
    throw new RangeError("Cannot pick from an empty catalog.");
  }

  const filtered = filterAdventures(catalog, criteria);
  const usedFullCatalog = filtered.length === 0;
  const candidates = usedFullCatalog ? [...catalog] : filtered;

  const ranked = rankAdventures(candidates, criteria, weather);
  const topN = Math.max(TOP_N_MIN, Math.min(TOP_N_MAX, ranked.length));
  const top = ranked.slice(0, topN);

  const random = createSeededRandom(criteriaSeed(criteria));
  const picked = top[pickSeededIndex(random, top.length)];

  const logger = options.logger ?? createLogger();
  logger({
    event: "recommendation.adventure_picked",
    correlation_id: options.correlation_id ?? null,
    payload: {
      adventure_id: picked.adventure.id,
      candidate_count: candidates.length,
      top_n: top.length,
      used_full_catalog: usedFullCatalog,
      score: picked.score,
    },
  });

  return {
    pick: picked.adventure,
    candidates,
    top,
    used_full_catalog: usedFullCatalog,
  };
}
