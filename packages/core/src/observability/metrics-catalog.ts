export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Unhandled runtime errors at script and pipeline boundaries.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "system.request.latency",
    type: "histogram",
    description: "Latency for plan pipeline runs, weather lookups, and LLM calls.",
    tags: ["component", "operation", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "plan.built.count",
    type: "counter",
    description: "Plans delivered by the plan pipeline, by source and mode.",
    tags: ["component", "source", "mode"],
    unit: "count",
  },
  {
    metric_name: "plan.fallback.count",
    type: "counter",
    description: "Safe fallback substitutions, by trigger.",
    tags: ["component", "trigger"],
    unit: "count",
  },
  {
    metric_name: "safety.plan_rejected.count",
    type: "counter",
    description: "Plans rejected by the hazard validator, by first violated rule.",
    tags: ["component", "rule", "rules_version"],
    unit: "count",
  },
  {
    metric_name: "weather.fetch.failure.count",
    type: "counter",
    description: "Weather or geocoding lookups that failed.",
    tags: ["component", "stage"],
    unit: "count",
  },
  {
    metric_name: "llm.request.count",
    type: "counter",
    description: "LLM plan generation requests issued to a provider.",
    tags: ["component", "provider", "model", "outcome"],
    unit: "count",
  },
  {
    metric_name: "llm.token.input",
    type: "counter",
    description: "Input tokens consumed by plan generation calls.",
    tags: ["component", "provider", "model"],
    unit: "tokens",
  },
  {
    metric_name: "llm.token.output",
    type: "counter",
    description: "Output tokens consumed by plan generation calls.",
    tags: ["component", "provider", "model"],
    unit: "tokens",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export const METRIC_CATALOG_BY_NAME: Readonly<Record<string, MetricCatalogEntry>> = Object.freeze(
  Object.fromEntries(METRIC_CATALOG.map((entry) => [entry.metric_name, entry])),
);

export function isMetricName(value: string): value is MetricName {
  return Object.hasOwn(METRIC_CATALOG_BY_NAME, value);
}

const METRIC_NAME_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/;
const TAG_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function validateMetricCatalog(
  entries: readonly MetricCatalogEntry[] = METRIC_CATALOG,
): { valid: true } {
  const seenNames = new Set<string>();
  for (const entry of entries) {
    if (!METRIC_NAME_PATTERN.test(entry.metric_name)) {
      throw new Error(`Invalid metric_name '${entry.metric_name}'.`);
    }
    if (seenNames.has(entry.metric_name)) {
      throw new Error(`Duplicate metric_name '${entry.metric_name}'.`);
    }
    seenNames.add(entry.metric_name);

    if (entry.description.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty description.`);
    }
    if (entry.unit.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty unit.`);
    }

    const seenTags = new Set<string>();
    for (const tag of entry.tags) {
      if (!TAG_NAME_PATTERN.test(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has invalid tag '${tag}'.`);
      }
      if (seenTags.has(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has duplicate tag '${tag}'.`);
      }
      seenTags.add(tag);
    }
  }
  return { valid: true };
}

validateMetricCatalog(METRIC_CATALOG);
