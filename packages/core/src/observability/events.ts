import type { CanonicalEventName } from "./event-catalog.ts";

export const EVENTS = {
  catalog: {
    loaded: "catalog.loaded",
  },
  recommendation: {
    adventurePicked: "recommendation.adventure_picked",
    offlineNoMatches: "recommendation.offline_no_matches",
  },
  plan: {
    built: "plan.built",
    generatorFailed: "plan.generator_failed",
  },
  safety: {
    planRejected: "safety.plan_rejected",
  },
  materials: {
    planAdjusted: "materials.plan_adjusted",
  },
  weather: {
    fetchFailed: "weather.fetch_failed",
  },
  report: {
    planReported: "report.plan_reported",
  },
  llm: {
    planCall: "llm.plan_call",
    planOutputRejected: "llm.plan_output_rejected",
    planFailure: "llm.plan_failure",
  },
  daily: {
    pickCompleted: "daily.pick_completed",
    exportsWritten: "daily.exports_written",
  },
  system: {
    unhandledError: "system.unhandled_error",
  },
} as const satisfies Record<string, Record<string, CanonicalEventName>>;
