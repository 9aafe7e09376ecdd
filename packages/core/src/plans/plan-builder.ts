import type { Adventure } from "../catalog/adventure.ts";
import type { SearchCriteria } from "../criteria/search-criteria.ts";
import { applyMaterialConstraints, resolveBlockedMaterials } from "../materials/material-enforcer.ts";
import type { CommonMaterial } from "../materials/material-catalog.ts";
import { createLogger, type StructuredLogger } from "../observability/logger.ts";
import type { PlanSafetyRules } from "../safety/hazard-catalog.ts";
import { validateActivityPlan, type PlanSafetyResult } from "../safety/plan-validator.ts";
import type { WeatherSummary } from "../weather/weather-summary.ts";
import {
  buildActivityRequest,
  type ActivityPlan,
  type ActivityRequest,
} from "./activity-plan.ts";
import { completePlanBVariants } from "./plan-b-variants.ts";
import { buildSafeFallbackPlan, buildTemplatePlan, toParentScript } from "./plan-templates.ts";
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, type RetryOptions } from "./retry.ts";

export type PlanMode = "standard" | "parent_script";
export type PlanSource = "template" | "generator" | "safe_fallback";
export type FallbackTrigger = "generator_failed" | "safety_rejected";

export type PlanGeneratorInput = {
  adventure: Adventure;
  criteria: SearchCriteria;
  weather: WeatherSummary | null;
  request: ActivityRequest;
};

/** May reject; errors with `transient === false` are not retried. */
export type ActivityPlanGenerator = (input: PlanGeneratorInput) => Promise<ActivityPlan>;

export type BuildActivityPlanInput = {
  adventure: Adventure;
  criteria: SearchCriteria;
  weather: WeatherSummary | null;
  mode?: PlanMode;
  generator?: ActivityPlanGenerator | null;
  retry?: RetryOptions;
  rules?: PlanSafetyRules;
  logger?: StructuredLogger;
  correlation_id?: string | null;
};

export type PlanOutcome = {
  plan: ActivityPlan;
  request: ActivityRequest;
  source: PlanSource;
  notice: string | null;
  rejection: PlanSafetyResult | null;
  blocked_materials: readonly CommonMaterial[];
};

export const GENERATOR_UNAVAILABLE_NOTICE =
  "Online-Planung war vorübergehend nicht verfügbar. Wir zeigen einen sicheren Ersatzplan. / " +
  "Online planning was temporarily unavailable. Showing a safe fallback plan instead.";

export const SAFETY_REJECTION_NOTICE =
  "Der Plan hat die Sicherheitsprüfung nicht bestanden. Wir zeigen einen sicheren Ersatzplan. / " +
  "The plan did not pass the safety check. Showing a safe fallback plan instead.";

/**
 * build -> Plan B completion -> validate (+ safe fallback) -> parent script ->
 * material enforcement. Generator failure never escapes; the caller always
 * receives a plan.
 */
export async function buildActivityPlan(input: BuildActivityPlanInput): Promise<PlanOutcome> {
  const { adventure, criteria, weather } = input;
  const mode = input.mode ?? "standard";
  const logger = input.logger ?? createLogger();
  const correlationId = input.correlation_id ?? null;
  const request = buildActivityRequest(adventure, criteria);

  let source: PlanSource = input.generator ? "generator" : "template";
  let notice: string | null = null;
  let fallbackTrigger: FallbackTrigger | null = null;
  let plan: ActivityPlan;

  if (input.generator) {
    const generator = input.generator;
    try {
      plan = await retryWithBackoff(
        () => generator({ adventure, criteria, weather, request }),
        input.retry ?? DEFAULT_RETRY_OPTIONS,
      );
    } catch (error) {
      logger({
        event: "plan.generator_failed",
        level: "warn",
        correlation_id: correlationId,
        payload: {
          adventure_id: adventure.id,
          error_name: error instanceof Error ? error.name : "UnknownError",
          error_code: readErrorCode(error),
          transient: readTransient(error),
        },
      });
      plan = buildSafeFallbackPlan(request);
      source = "safe_fallback";
      notice = GENERATOR_UNAVAILABLE_NOTICE;
      fallbackTrigger = "generator_failed";
    }
  } else {
    plan = buildTemplatePlan(adventure, criteria);
  }

  plan = completePlanBVariants(plan);

  let rejection: PlanSafetyResult | null = null;
  const verdict = validateActivityPlan(plan, request, input.rules);
  if (!verdict.safe) {
    rejection = verdict;
    logger({
      event: "safety.plan_rejected",
      level: "warn",
      correlation_id: correlationId,
      payload: {
        adventure_id: adventure.id,
        source,
        rules_version: verdict.rules_version,
        violation_rules: verdict.violations.map((violation) => violation.rule),
        violation_terms: verdict.violations.map((violation) => violation.term),
      },
    });
    plan = buildSafeFallbackPlan(request);
    source = "safe_fallback";
    notice = SAFETY_REJECTION_NOTICE;
    fallbackTrigger = "safety_rejected";
  }

  if (mode === "parent_script") {
    plan = toParentScript(plan, request);
  }

  const enforcement = applyMaterialConstraints(plan, resolveBlockedMaterials(criteria.available_materials));
  if (enforcement.matched.length > 0) {
    logger({
      event: "materials.plan_adjusted",
      correlation_id: correlationId,
      payload: {
        adventure_id: adventure.id,
        blocked_materials: [...enforcement.blocked],
        matched_materials: [...enforcement.matched],
      },
    });
  }
  // Stripping can remove the only variant of a category; the canned texts are material-free.
  plan = completePlanBVariants(enforcement.plan);

  logger({
    event: "plan.built",
    correlation_id: correlationId,
    payload: {
      adventure_id: adventure.id,
      source,
      mode,
      fallback_trigger: fallbackTrigger,
      step_count: plan.steps.length,
    },
  });

  return {
    plan,
    request,
    source,
    notice,
    rejection,
    blocked_materials: enforcement.blocked,
  };
}

function readErrorCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

function readTransient(error: unknown): boolean | null {
  if (typeof error === "object" && error !== null && "transient" in error && typeof error.transient === "boolean") {
    return error.transient;
  }
  return null;
}
