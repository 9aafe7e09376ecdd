import { normalizeEffort, type EffortLevel } from "../criteria/search-criteria.ts";
import { normalizeRuntimeEnv, type RuntimeEnv } from "../observability/runtime-env.ts";

export type AppConfig = {
  readonly app_env: RuntimeEnv;
  readonly timezone: string;
  readonly default_city: string;
  readonly default_area: string;
  readonly default_postal_code: string;
  readonly default_radius_km: number;
  readonly default_budget_eur: number;
  readonly default_available_minutes: number;
  readonly default_effort: EffortLevel;
  readonly default_start_time: string;
  readonly enable_llm: boolean;
  readonly anthropic_api_key: string | null;
  readonly llm_model: string | null;
  readonly llm_max_input_chars: number;
  readonly llm_max_output_tokens: number;
  readonly llm_timeout_ms: number;
  readonly enable_weather: boolean;
  readonly plan_reports_path: string;
  readonly supabase_url: string | null;
  readonly supabase_service_role_key: string | null;
  readonly sentry_dsn: string | null;
  readonly sentry_environment: string | null;
  readonly sentry_release: string | null;
  readonly output_dir: string;
};

export type ConfigIssue = {
  key: string;
  message: string;
};

export class ConfigError extends Error {
  readonly code = "config_invalid";
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.key} (${issue.message})`).join(", ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

type Env = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/** Reads and validates process configuration; every invalid key is reported at once. */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const issues: ConfigIssue[] = [];
  const read = (key: string): string | null => {
    const value = env[key];
    if (typeof value !== "string") {
      return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  };
  const text = (key: string, fallback: string): string => read(key) ?? fallback;
  const flag = (key: string, fallback: boolean): boolean => {
    const value = read(key);
    if (value === null) {
      return fallback;
    }
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (!FALSE_VALUES.has(normalized)) {
      issues.push({ key, message: "must be a boolean" });
    }
    return false;
  };
  const number = (key: string, fallback: number, bounds: { min: number; max?: number; integer?: boolean }): number => {
    const value = read(key);
    if (value === null) {
      return fallback;
    }
    const parsed = Number(value);
    const tooHigh = bounds.max !== undefined && parsed > bounds.max;
    if (!Number.isFinite(parsed) || parsed < bounds.min || tooHigh || (bounds.integer && !Number.isInteger(parsed))) {
      const range = bounds.max !== undefined ? `${bounds.min}-${bounds.max}` : `>= ${bounds.min}`;
      issues.push({ key, message: `must be a number ${range}` });
      return fallback;
    }
    return parsed;
  };

  const postalCode = text("DEFAULT_POSTAL_CODE", "40215");
  if (!/^\d{5}$/.test(postalCode)) {
    issues.push({ key: "DEFAULT_POSTAL_CODE", message: "must be exactly 5 digits" });
  }

  const effortRaw = text("DEFAULT_EFFORT", "medium");
  const effort = normalizeEffort(effortRaw);
  if (!effort) {
    issues.push({ key: "DEFAULT_EFFORT", message: "must be low, medium or high" });
  }

  const startTime = text("DEFAULT_START_TIME", "09:00");
  if (!/^([01]\d|2[0-3]):[0-5]\d$/.test(startTime)) {
    issues.push({ key: "DEFAULT_START_TIME", message: "must be HH:MM" });
  }

  const enableLlm = flag("ENABLE_LLM", false);
  const apiKey = read("ANTHROPIC_API_KEY");
  if (enableLlm && !apiKey) {
    issues.push({ key: "ANTHROPIC_API_KEY", message: "is required when ENABLE_LLM is true" });
  }

  const config: AppConfig = {
    app_env: normalizeRuntimeEnv(text("APP_ENV", "local")),
    timezone: text("TIMEZONE", "Europe/Berlin"),
    default_city: text("DEFAULT_CITY", "Düsseldorf"),
    default_area: text("DEFAULT_AREA", "Volksgarten / Südpark"),
    default_postal_code: postalCode,
    default_radius_km: number("DEFAULT_RADIUS_KM", 5, { min: 0.5, max: 50 }),
    default_budget_eur: number("DEFAULT_BUDGET_EUR", 15, { min: 0, max: 250 }),
    default_available_minutes: number("DEFAULT_AVAILABLE_MINUTES", 60, { min: 15, max: 720, integer: true }),
    default_effort: effort ?? "medium",
    default_start_time: startTime,
    enable_llm: enableLlm,
    anthropic_api_key: apiKey,
    llm_model: read("LLM_MODEL"),
    llm_max_input_chars: number("LLM_MAX_INPUT_CHARS", 4000, { min: 200, integer: true }),
    llm_max_output_tokens: number("LLM_MAX_OUTPUT_TOKENS", 1200, { min: 100, integer: true }),
    llm_timeout_ms: number("LLM_TIMEOUT_MS", 20000, { min: 1000, integer: true }),
    enable_weather: flag("ENABLE_WEATHER", true),
    plan_reports_path: text("PLAN_REPORTS_PATH", "data/plan_reports.jsonl"),
    supabase_url: read("SUPABASE_URL"),
    supabase_service_role_key: read("SUPABASE_SERVICE_ROLE_KEY"),
    sentry_dsn: read("SENTRY_DSN"),
    sentry_environment: read("SENTRY_ENVIRONMENT"),
    sentry_release: read("SENTRY_RELEASE"),
    output_dir: text("OUTPUT_DIR", "out"),
  };

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return Object.freeze(config);
}
