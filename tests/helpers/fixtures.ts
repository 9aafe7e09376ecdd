import type { Adventure } from "../../packages/core/src/catalog/adventure.ts";
import { freezePlan, type ActivityPlan } from "../../packages/core/src/plans/activity-plan.ts";
import { GENERIC_PROMPTS } from "../../packages/core/src/plans/parent-child-prompts.ts";
import {
  createSearchCriteria,
  type SearchCriteria,
  type SearchCriteriaInput,
} from "../../packages/core/src/criteria/search-criteria.ts";
import type { StructuredLogEvent, StructuredLogEventInput, StructuredLogger } from "../../packages/core/src/observability/logger.ts";

export function makeAdventure(overrides: Partial<Adventure> = {}): Adventure {
  return {
    id: "test-adventure",
    title: "Testrunde / Test round",
    area: "Südpark",
    short_description: "Eine kurze Runde. / A short round.",
    duration_minutes: 30,
    distance_km: 1,
    best_time: "Vormittag",
    stroller_ok: true,
    start_point: "Haupteingang",
    route_steps: ["Zum Teich gehen", "Enten zählen", "Zurück zum Eingang"],
    preparation: [],
    packing_list: [],
    execution_tips: [],
    variations: [],
    toddler_benefits: ["Bewegung"],
    tip: "",
    risks: [],
    mitigations: [],
    tags: ["nature"],
    accessibility: [],
    season_tags: [],
    weather_tags: [],
    energy_level: "medium",
    difficulty: "easy",
    age_min: 1,
    age_max: 6,
    mood_tags: [],
    safety_level: "medium",
    ...overrides,
  };
}

export function makeCriteria(overrides: SearchCriteriaInput = {}): SearchCriteria {
  return createSearchCriteria({
    date: "2026-05-02",
    time_window: { start: "09:00", end: "11:00" },
    ...overrides,
  });
}

export function makePlan(overrides: Partial<ActivityPlan> = {}): ActivityPlan {
  return freezePlan({
    title: "Testplan / Test plan",
    summary: "Eine kleine Runde. / A small round.",
    steps: ["Zum Baum gehen", "Blätter zählen", "Zurück nach Hause"],
    safety_notes: ["Bleib in der Nähe. / Stay close."],
    parent_child_prompts: GENERIC_PROMPTS.slice(0, 3),
    variants: [],
    supports: ["gross_motor"],
    ...overrides,
  });
}

/** Logger that records events instead of writing them. */
export function createRecordingLogger(): StructuredLogger & { events: StructuredLogEventInput[] } {
  const events: StructuredLogEventInput[] = [];
  const logger = (input: StructuredLogEventInput): StructuredLogEvent => {
    events.push(input);
    return {
      ts: "2026-05-02T00:00:00.000Z",
      level: input.level ?? "info",
      event: input.event,
      category: "test",
      env: "local",
      correlation_id: input.correlation_id ?? null,
      payload: input.payload,
    };
  };
  return Object.assign(logger, { events });
}

export function eventNames(logger: { events: readonly StructuredLogEventInput[] }): string[] {
  return logger.events.map((entry) => entry.event);
}
