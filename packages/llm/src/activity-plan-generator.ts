import {
  ACTIVITY_PLAN_PROMPT_VERSION,
  ACTIVITY_PLAN_SYSTEM_PROMPT,
} from "./prompts/activity-plan-system-prompt.ts";
import { parseActivityPlanOutput } from "./schemas/activity-plan-output.schema.ts";
import {
  DEFAULT_MAX_OUTPUT_TOKENS,
  getDefaultLlmProvider,
  LlmProviderError,
  type LlmProvider,
} from "./provider.ts";
import { validateModelOutput } from "./output-validator.ts";
import type { ActivityPlan } from "../../core/src/plans/activity-plan.ts";
import type {
  ActivityPlanGenerator,
  PlanGeneratorInput,
} from "../../core/src/plans/plan-builder.ts";
import { createLogger, type StructuredLogger } from "../../core/src/observability/logger.ts";
import {
  elapsedMetricMs,
  emitMetricBestEffort,
  nowMetricMs,
} from "../../core/src/observability/metrics.ts";
import { redactFreeText } from "../../core/src/observability/redaction.ts";
import { captureSentryException, setSentryContext } from "../../core/src/observability/sentry.ts";

export type ActivityPlanGeneratorFailureCode =
  | "provider_transient"
  | "provider_non_transient"
  | "timeout"
  | "invalid_json"
  | "schema_invalid"
  | "guardrail_violation";

export class ActivityPlanGeneratorError extends Error {
  readonly code: ActivityPlanGeneratorFailureCode;
  readonly transient: boolean;
  readonly promptVersion: string;

  constructor(
    message: string,
    options: {
      code: ActivityPlanGeneratorFailureCode;
      transient: boolean;
      cause?: unknown;
    },
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ActivityPlanGeneratorError";
    this.code = options.code;
    this.transient = options.transient;
    this.promptVersion = ACTIVITY_PLAN_PROMPT_VERSION;
  }
}

export type CreateActivityPlanGeneratorOptions = {
  provider?: LlmProvider;
  maxInputChars?: number;
  maxOutputTokens?: number;
  timeoutMs?: number;
  logger?: StructuredLogger;
  correlationId?: string | null;
};

export const DEFAULT_MAX_INPUT_CHARS = 4000;
export const DEFAULT_TIMEOUT_MS = 20_000;
export const INPUT_TRUNCATED_NOTICE = "[Eingabe gekürzt / input truncated]";

export function buildActivityPlanUserPrompt(input: PlanGeneratorInput): string {
  const { adventure, criteria, weather, request } = input;
  const freeText = (values: readonly string[]): string =>
    values.length > 0 ? values.map((value) => redactFreeText(value)).join("; ") : "(none)";

  return [
    `PromptVersion: ${ACTIVITY_PLAN_PROMPT_VERSION}`,
    `Adventure: ${adventure.title} (${adventure.area})`,
    `Description: ${adventure.short_description}`,
    `StartPoint: ${adventure.start_point}`,
    `ChildAge: ${request.age_value} ${request.age_unit}`,
    `DurationMinutes: ${request.duration_minutes}`,
    `Setting: ${request.indoor_outdoor}`,
    `Materials: ${request.materials.length > 0 ? request.materials.join(", ") : "(none)"}`,
    `AvailableMaterials: ${freeText(criteria.available_materials)}`,
    `Goals: ${request.goals.join(", ")}`,
    `Weather: ${weather ? weather.summary_de_en : "(unknown)"}`,
    `Topics: ${freeText(criteria.topics)}`,
    `ParentConstraints: ${freeText(request.constraints)}`,
    "RouteSteps:",
    ...adventure.route_steps.map((step, index) => `${index + 1}. ${step}`),
  ].join("\n");
}

export function truncatePromptInput(text: string, maxInputChars: number): string {
  if (text.length <= maxInputChars) {
    return text;
  }
  const keep = Math.max(0, maxInputChars - INPUT_TRUNCATED_NOTICE.length - 1);
  return `${text.slice(0, keep)}\n${INPUT_TRUNCATED_NOTICE}`;
}

function classifyFailure(error: unknown): { code: ActivityPlanGeneratorFailureCode; transient: boolean } {
  if (error instanceof ActivityPlanGeneratorError) {
    return { code: error.code, transient: error.transient };
  }
  if (error instanceof Error && error.name === "AbortError") {
    return { code: "timeout", transient: true };
  }
  if (error instanceof LlmProviderError) {
    return error.transient
      ? { code: "provider_transient", transient: true }
      : { code: "provider_non_transient", transient: false };
  }
  if (error instanceof SyntaxError) {
    return { code: "invalid_json", transient: false };
  }
  return { code: "schema_invalid", transient: false };
}

/**
 * One provider call per invocation. Retries are the caller's concern
 * (`retryWithBackoff` in the plan pipeline reads `transient`).
 */
export function createActivityPlanGenerator(
  options: CreateActivityPlanGeneratorOptions = {},
): ActivityPlanGenerator {
  const provider = options.provider ?? getDefaultLlmProvider();
  const maxInputChars = options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
  const maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger ?? createLogger();
  const correlationId = options.correlationId ?? null;

  return async function generateActivityPlan(input: PlanGeneratorInput): Promise<ActivityPlan> {
    const userPrompt = truncatePromptInput(buildActivityPlanUserPrompt(input), maxInputChars);
    setSentryContext({
      category: "llm",
      correlation_id: correlationId,
      adventure_id: input.adventure.id,
      tags: { prompt_version: ACTIVITY_PLAN_PROMPT_VERSION },
    });
    logger({
      event: "llm.plan_call",
      correlation_id: correlationId,
      payload: {
        prompt_version: ACTIVITY_PLAN_PROMPT_VERSION,
        adventure_id: input.adventure.id,
        prompt_chars: userPrompt.length,
      },
    });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const startedAt = nowMetricMs();
    let outcome: "success" | "error" = "success";
    let llmProvider = "anthropic";
    let llmModel = "unknown";

    try {
      const response = await provider.generateText({
        systemPrompt: ACTIVITY_PLAN_SYSTEM_PROMPT,
        userPrompt,
        timeoutMs,
        maxOutputTokens,
        signal: controller.signal,
      });
      llmProvider = response.provider;
      llmModel = response.model;

      emitMetricBestEffort({
        metric: "llm.token.input",
        value: response.usage?.input_tokens ?? 0,
        correlation_id: correlationId,
        tags: { component: "plan_generator", provider: llmProvider, model: llmModel },
      });
      emitMetricBestEffort({
        metric: "llm.token.output",
        value: response.usage?.output_tokens ?? 0,
        correlation_id: correlationId,
        tags: { component: "plan_generator", provider: llmProvider, model: llmModel },
      });

      const validation = validateModelOutput({ rawText: response.text, requireJson: true });
      if (!validation.ok) {
        const violationCodes = validation.violations.map((entry) => entry.code);
        logger({
          event: "llm.plan_output_rejected",
          level: "warn",
          correlation_id: correlationId,
          payload: {
            prompt_version: ACTIVITY_PLAN_PROMPT_VERSION,
            violation_codes: violationCodes,
          },
        });
        const jsonProblem = violationCodes.some((code) =>
          code === "invalid_json" || code === "output_wrapper_detected" || code === "empty_output"
        );
        throw new ActivityPlanGeneratorError("Model output rejected by output validator.", {
          code: jsonProblem ? "invalid_json" : "guardrail_violation",
          transient: false,
        });
      }

      const parsedJson: unknown = JSON.parse(validation.sanitizedText);
      return parseActivityPlanOutput(parsedJson);
    } catch (error) {
      outcome = "error";
      const failure = classifyFailure(error);

      logger({
        event: "llm.plan_failure",
        level: "warn",
        correlation_id: correlationId,
        payload: {
          prompt_version: ACTIVITY_PLAN_PROMPT_VERSION,
          adventure_id: input.adventure.id,
          error_code: failure.code,
          transient: failure.transient,
        },
      });

      if (!failure.transient) {
        captureSentryException(error, {
          level: "error",
          event: "llm.plan_failure",
          context: {
            category: "llm",
            correlation_id: correlationId,
            adventure_id: input.adventure.id,
            tags: { error_code: failure.code },
          },
          payload: {
            prompt_version: ACTIVITY_PLAN_PROMPT_VERSION,
            error_code: failure.code,
          },
        });
      }

      if (error instanceof ActivityPlanGeneratorError) {
        throw error;
      }
      throw new ActivityPlanGeneratorError(
        `Activity plan generation failed: ${error instanceof Error ? error.message : "unknown_error"}`,
        { code: failure.code, transient: failure.transient, cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
      emitMetricBestEffort({
        metric: "llm.request.count",
        value: 1,
        correlation_id: correlationId,
        tags: { component: "plan_generator", provider: llmProvider, model: llmModel, outcome },
      });
      emitMetricBestEffort({
        metric: "system.request.latency",
        value: elapsedMetricMs(startedAt),
        correlation_id: correlationId,
        tags: { component: "llm_call", operation: "activity_plan", outcome },
      });
    }
  };
}
