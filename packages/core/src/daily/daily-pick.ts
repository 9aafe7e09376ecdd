import type { Adventure } from "../catalog/adventure.ts";
import type { AppConfig } from "../config/app-config.ts";
import {
  clockToMinutes,
  createSearchCriteria,
  type SearchCriteria,
} from "../criteria/search-criteria.ts";
import { buildIcsEvent } from "../exports/ics.ts";
import { buildPlanExport, serializePlanExport } from "../exports/plan-export.ts";
import { createLogger, type StructuredLogger } from "../observability/logger.ts";
import { startSentrySpan } from "../observability/sentry.ts";
import { buildActivityPlan, type ActivityPlanGenerator, type PlanMode, type PlanOutcome } from "../plans/plan-builder.ts";
import { renderActivityPlanMarkdown } from "../plans/plan-markdown.ts";
import type { RetryOptions } from "../plans/retry.ts";
import { pickAdventure } from "../recommendations/selector.ts";
import type { WeatherClient } from "../weather/open-meteo-client.ts";
import type { WeatherSummary } from "../weather/weather-summary.ts";

export type DailyPickInput = {
  catalog: readonly Adventure[];
  criteria: SearchCriteria;
  weatherClient?: WeatherClient | null;
  generator?: ActivityPlanGenerator | null;
  retry?: RetryOptions;
  mode?: PlanMode;
  timezone?: string;
  now?: Date;
  logger?: StructuredLogger;
  correlation_id?: string | null;
};

export type DailyPickResult = {
  adventure: Adventure;
  candidates: readonly Adventure[];
  weather: WeatherSummary | null;
  outcome: PlanOutcome;
  markdown: string;
  ics: string;
  json: string;
};

const LAST_MINUTE_OF_DAY = 23 * 60 + 59;

/** Calendar date (YYYY-MM-DD) of `now` as seen in `timezone`. */
export function localDateInTimezone(now: Date, timezone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((entry) => entry.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
}

export function minutesToClock(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

/** Criteria for an unattended daily run; the window never crosses midnight. */
export function dailyCriteriaFromConfig(config: AppConfig, date: string): SearchCriteria {
  const start = clockToMinutes(config.default_start_time);
  const end = Math.min(start + config.default_available_minutes, LAST_MINUTE_OF_DAY);
  return createSearchCriteria({
    postal_code: config.default_postal_code,
    radius_km: config.default_radius_km,
    date,
    time_window: { start: config.default_start_time, end: minutesToClock(end) },
    effort: config.default_effort,
    budget_eur_max: config.default_budget_eur,
  });
}

export async function resolveWeather(
  client: WeatherClient,
  criteria: SearchCriteria,
  logger: StructuredLogger,
  correlationId: string | null,
): Promise<WeatherSummary | null> {
  let stage: "geocode" | "forecast" = "geocode";
  try {
    const location = await client.geocodePostalCode(criteria.postal_code);
    stage = "forecast";
    return await client.getDailySummary({
      latitude: location.latitude,
      longitude: location.longitude,
      date: criteria.date,
    });
  } catch (error) {
    logger({
      event: "weather.fetch_failed",
      level: "warn",
      correlation_id: correlationId,
      payload: {
        stage,
        error_name: error instanceof Error ? error.name : "UnknownError",
        error_code: typeof error === "object" && error !== null && "code" in error ? String(error.code) : null,
      },
    });
    return null;
  }
}

export function renderDailyMarkdown(
  adventure: Adventure,
  outcome: PlanOutcome,
  weather: WeatherSummary | null,
): string {
  const header = outcome.notice ? `> ${outcome.notice}\n\n` : "";
  const details = [
    "",
    "## Abenteuer / Adventure",
    `- Ort / Area: ${adventure.area}`,
    `- Dauer / Duration: ${adventure.duration_minutes} min`,
  ];
  if (adventure.start_point) {
    details.push(`- Start: ${adventure.start_point}`);
  }
  if (weather) {
    details.push(`- Wetter / Weather: ${weather.summary_de_en}`);
  }
  return `${header}${renderActivityPlanMarkdown(outcome.plan)}${details.join("\n")}\n`;
}

/** Picks today's adventure, builds its plan and renders every export. */
export async function runDailyPick(input: DailyPickInput): Promise<DailyPickResult> {
  const logger = input.logger ?? createLogger({ correlation_id: input.correlation_id });
  const correlationId = input.correlation_id ?? null;
  const { criteria } = input;

  const weather = input.weatherClient
    ? await resolveWeather(input.weatherClient, criteria, logger, correlationId)
    : null;

  const { pick, candidates } = pickAdventure(input.catalog, criteria, weather, {
    logger,
    correlation_id: correlationId,
  });

  const outcome = await startSentrySpan(
    { name: "daily.build_plan", op: "plan.build", attributes: { adventure_id: pick.id } },
    () =>
      buildActivityPlan({
        adventure: pick,
        criteria,
        weather,
        mode: input.mode ?? "standard",
        generator: input.generator ?? null,
        retry: input.retry,
        logger,
        correlation_id: correlationId,
      }),
  );

  const ics = buildIcsEvent({
    date: criteria.date,
    summary: outcome.plan.title,
    description: [outcome.plan.summary, ...outcome.plan.steps].join("\n"),
    location: pick.start_point || pick.area,
    tzid: input.timezone,
    start_time: criteria.time_window.start,
    duration_minutes: outcome.request.duration_minutes,
    now: input.now,
  });

  logger({
    event: "daily.pick_completed",
    correlation_id: correlationId,
    payload: {
      adventure_id: pick.id,
      date: criteria.date,
      source: outcome.source,
      weather_available: weather !== null,
    },
  });

  return {
    adventure: pick,
    candidates,
    weather,
    outcome,
    markdown: renderDailyMarkdown(pick, outcome, weather),
    ics,
    json: serializePlanExport(buildPlanExport(pick, criteria, outcome)),
  };
}
