export type EventCategory =
  | "catalog"
  | "recommendation"
  | "plan"
  | "safety"
  | "materials"
  | "weather"
  | "report"
  | "llm"
  | "daily"
  | "system";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "catalog.loaded",
    category: "catalog",
    description: "Adventure catalog parsed and validated at startup.",
    required_fields: ["adventure_count"],
  },
  {
    event_name: "recommendation.adventure_picked",
    category: "recommendation",
    description: "Selector chose the adventure for a set of criteria.",
    required_fields: ["adventure_id", "candidate_count", "top_n", "used_full_catalog"],
  },
  {
    event_name: "recommendation.offline_no_matches",
    category: "recommendation",
    description: "Offline activity library produced no suggestion for the criteria.",
    required_fields: ["library_size"],
  },
  {
    event_name: "plan.built",
    category: "plan",
    description: "Activity plan delivered through the plan pipeline.",
    required_fields: ["adventure_id", "source", "mode"],
  },
  {
    event_name: "plan.generator_failed",
    category: "plan",
    description: "External plan generator exhausted its attempts; safe fallback used.",
    required_fields: ["adventure_id", "error_name"],
  },
  {
    event_name: "safety.plan_rejected",
    category: "safety",
    description: "Plan failed the hazard validator and was replaced.",
    required_fields: ["adventure_id", "rules_version", "violation_rules"],
  },
  {
    event_name: "materials.plan_adjusted",
    category: "materials",
    description: "Plan lines referencing unavailable materials were removed.",
    required_fields: ["blocked_materials", "matched_materials"],
  },
  {
    event_name: "weather.fetch_failed",
    category: "weather",
    description: "Weather lookup failed; planning continues without weather bias.",
    required_fields: ["error_name"],
  },
  {
    event_name: "report.plan_reported",
    category: "report",
    description: "Anonymized plan report stored for moderation review.",
    required_fields: ["plan_hash", "reason"],
  },
  {
    event_name: "llm.plan_call",
    category: "llm",
    description: "Plan generator calls the LLM provider.",
    required_fields: ["prompt_version"],
  },
  {
    event_name: "llm.plan_output_rejected",
    category: "llm",
    description: "LLM output failed JSON or guardrail validation.",
    required_fields: ["prompt_version", "violation_codes"],
  },
  {
    event_name: "llm.plan_failure",
    category: "llm",
    description: "Plan generator call failed.",
    required_fields: ["prompt_version", "error_code", "transient"],
  },
  {
    event_name: "daily.pick_completed",
    category: "daily",
    description: "Daily pick produced an adventure, plan, and exports.",
    required_fields: ["adventure_id", "date", "source"],
  },
  {
    event_name: "daily.exports_written",
    category: "daily",
    description: "Daily pick exports were written to the output directory.",
    required_fields: ["output_dir", "files"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "Unhandled error at a process boundary.",
    required_fields: ["phase", "error_name"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry>> = Object.fromEntries(
  EVENT_CATALOG.map((entry) => [entry.event_name, entry]),
);
