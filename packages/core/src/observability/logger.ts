import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog.ts";
import { emitMetricBestEffort } from "./metrics.ts";
import { redactPII } from "./redaction.ts";
import { detectRuntimeEnv, normalizeRuntimeEnv } from "./runtime-env.ts";
import { captureSentryFromStructuredLog } from "./sentry.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName | string;
  correlation_id?: string | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  category: string;
  env: string;
  correlation_id: string | null;
  payload: Record<string, unknown>;
};

export type LoggerContext = {
  env?: string;
  correlation_id?: string | null;
};

export type StructuredLogger = (input: StructuredLogEventInput) => StructuredLogEvent;

export function createLogger(context: LoggerContext = {}): StructuredLogger {
  return (input) => logEvent({
    ...input,
    correlation_id: normalizeString(input.correlation_id) ??
      normalizeString(context.correlation_id) ??
      null,
  }, context.env);
}

export function logEvent(input: StructuredLogEventInput, explicitEnv?: string): StructuredLogEvent {
  const eventDef = resolveEventDefinition(input.event);
  const payload = ensurePayloadObject(input.payload);
  assertRequiredFields(eventDef, payload);

  const redactedPayload = redactPII(payload);
  const correlationId = normalizeString(input.correlation_id) ??
    normalizeString(redactedPayload.correlation_id) ??
    null;

  const event: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: eventDef.event_name,
    category: eventDef.category,
    env: explicitEnv ? normalizeRuntimeEnv(explicitEnv) : detectRuntimeEnv(),
    correlation_id: correlationId,
    payload: redactedPayload,
  };

  emitDerivedMetricsFromLog(event);
  console.info(JSON.stringify(event, serializeErrors));
  captureSentryFromStructuredLog(event);
  return event;
}
export { redactPII } from "./redaction.ts";

function resolveEventDefinition(event: string): EventCatalogEntry {
  const normalized = event.trim();
  const eventDef = EVENT_CATALOG_BY_NAME[normalized];
  if (!eventDef) {
    throw new Error(`Unknown structured log event: '${event}'.`);
  }
  return eventDef;
}

function ensurePayloadObject(payload: Record<string, unknown>): Record<string, unknown> {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    throw new Error("Structured log payload must be an object.");
  }
  return payload;
}

function assertRequiredFields(
  eventDef: EventCatalogEntry,
  payload: Record<string, unknown>,
): void {
  for (const requiredField of eventDef.required_fields) {
    const value = payload[requiredField];
    if (isPresent(value)) {
      continue;
    }
    throw new Error(
      `Missing required field '${requiredField}' for log event '${eventDef.event_name}'.`,
    );
  }
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return true;
}

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function serializeErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function emitDerivedMetricsFromLog(event: StructuredLogEvent): void {
  const payload = event.payload;
  switch (event.event) {
    case "system.unhandled_error":
      emitMetricBestEffort({
        metric: "system.error.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "structured_logger",
          phase: safeTagValue(payload.phase) ?? "unknown",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "plan.built":
      emitMetricBestEffort({
        metric: "plan.built.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "plan_builder",
          source: safeTagValue(payload.source) ?? "unknown",
          mode: safeTagValue(payload.mode) ?? "standard",
        },
      });
      if (payload.source === "safe_fallback") {
        emitMetricBestEffort({
          metric: "plan.fallback.count",
          value: 1,
          correlation_id: event.correlation_id,
          tags: {
            component: "plan_builder",
            trigger: safeTagValue(payload.fallback_trigger) ?? "unknown",
          },
        });
      }
      return;

    case "safety.plan_rejected": {
      const rules = Array.isArray(payload.violation_rules) ? payload.violation_rules : [];
      emitMetricBestEffort({
        metric: "safety.plan_rejected.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "plan_validator",
          rule: safeTagValue(rules[0]) ?? "unknown",
          rules_version: safeTagValue(payload.rules_version) ?? "unknown",
        },
      });
      return;
    }

    case "weather.fetch_failed":
      emitMetricBestEffort({
        metric: "weather.fetch.failure.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "weather_client",
          stage: safeTagValue(payload.stage) ?? "unknown",
        },
      });
      return;

    default:
      return;
  }
}

function safeTagValue(value: unknown): string | null {
  if (typeof value === "string") {
    const normalized = value.trim();
    return normalized.length > 0 ? normalized : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return null;
}
