import {
  isMetricName,
  METRIC_CATALOG_BY_NAME,
  type MetricName,
  type MetricType,
} from "./metrics-catalog.ts";
import { detectRuntimeEnv, type RuntimeEnv } from "./runtime-env.ts";

export type MetricTagValue = string | number | boolean | null | undefined;

export type EmitMetricInput = {
  metric: string;
  value: number;
  tags?: Record<string, MetricTagValue>;
  correlation_id?: string | null;
};

export type EmittedMetric = {
  ts: string;
  metric: MetricName;
  type: MetricType;
  unit: string;
  value: number;
  env: RuntimeEnv;
  correlation_id: string | null;
  tags: Record<string, string>;
};

export type MetricSink = (metric: EmittedMetric) => void;

const MAX_RECORDED_METRICS = 500;
const MAX_TAG_VALUE_LENGTH = 64;

const recorded: EmittedMetric[] = [];
let activeSink: MetricSink | null = null;

/** Routes metrics to `sink` instead of the in-process buffer; `null` restores the buffer. */
export function registerMetricSink(sink: MetricSink | null): void {
  activeSink = sink;
}

export function clearInMemoryMetrics(): void {
  recorded.length = 0;
}

export function getInMemoryMetrics(): EmittedMetric[] {
  return [...recorded];
}

/**
 * Emits a metric declared in the catalog. Only the tag names the catalog lists
 * for the metric are kept, so contact details or plan text passed as tags
 * never leave the process.
 */
export function emitMetric(input: EmitMetricInput): EmittedMetric {
  const name = input.metric.trim();
  const definition = METRIC_CATALOG_BY_NAME[name];
  if (!definition || !isMetricName(name)) {
    throw new Error(`Unknown metric '${input.metric}'.`);
  }
  if (!Number.isFinite(input.value)) {
    throw new Error("Metric value must be a finite number.");
  }

  const tags: Record<string, string> = {};
  for (const tagName of definition.tags) {
    const value = input.tags?.[tagName];
    if (value === null || value === undefined) {
      continue;
    }
    const text = String(value).trim();
    if (text.length > 0) {
      tags[tagName] = text.slice(0, MAX_TAG_VALUE_LENGTH);
    }
  }

  const metric: EmittedMetric = {
    ts: new Date().toISOString(),
    metric: name,
    type: definition.type,
    unit: definition.unit,
    value: definition.unit === "ms" ? roundToThree(input.value) : Math.round(input.value),
    env: detectRuntimeEnv(),
    correlation_id: input.correlation_id?.trim() || null,
    tags,
  };

  if (activeSink) {
    activeSink(metric);
  } else {
    recorded.push(metric);
    if (recorded.length > MAX_RECORDED_METRICS) {
      recorded.splice(0, recorded.length - MAX_RECORDED_METRICS);
    }
  }
  return metric;
}

export function emitMetricBestEffort(input: EmitMetricInput): EmittedMetric | null {
  try {
    return emitMetric(input);
  } catch {
    return null;
  }
}

export function nowMetricMs(): number {
  return performance.now();
}

export function elapsedMetricMs(startedAtMs: number): number {
  return roundToThree(Math.max(0, nowMetricMs() - startedAtMs));
}

function roundToThree(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}
