import type { Adventure } from "../catalog/adventure.ts";
import type { SearchCriteria } from "../criteria/search-criteria.ts";
import { DEVELOPMENT_GOALS } from "../catalog/themes.ts";
import type { ActivityPlan } from "../plans/activity-plan.ts";
import type { PlanOutcome, PlanSource } from "../plans/plan-builder.ts";

export const PLAN_EXPORT_VERSION = 1;

export type PlanExport = {
  export_version: number;
  adventure_id: string;
  adventure_title: string;
  date: string;
  source: PlanSource;
  notice: string | null;
  plan: ActivityPlan;
};

export function buildPlanExport(
  adventure: Adventure,
  criteria: SearchCriteria,
  outcome: PlanOutcome,
): PlanExport {
  return {
    export_version: PLAN_EXPORT_VERSION,
    adventure_id: adventure.id,
    adventure_title: adventure.title,
    date: criteria.date,
    source: outcome.source,
    notice: outcome.notice,
    plan: outcome.plan,
  };
}

export function serializePlanExport(planExport: PlanExport): string {
  return `${JSON.stringify(planExport, null, 2)}\n`;
}

export class PlanExportFormatError extends Error {
  readonly code = "plan_export_invalid";

  constructor(message: string) {
    super(message);
    this.name = "PlanExportFormatError";
  }
}

const PLAN_SOURCES: readonly PlanSource[] = ["template", "generator", "safe_fallback"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, path: string): string[] {
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string")) {
    throw new PlanExportFormatError(`${path} must be a list of strings`);
  }
  return value.map((entry) => String(entry));
}

function readText(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== "string") {
    throw new PlanExportFormatError(`${key} must be a string`);
  }
  return value;
}

/** Reads back a file written by `serializePlanExport`. */
export function parsePlanExport(text: string): PlanExport {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new PlanExportFormatError("plan export is not valid JSON");
  }
  if (!isRecord(raw) || raw.export_version !== PLAN_EXPORT_VERSION) {
    throw new PlanExportFormatError(`plan export must have export_version ${PLAN_EXPORT_VERSION}`);
  }
  const record = raw;
  const source = PLAN_SOURCES.find((entry) => entry === record.source);
  if (!source) {
    throw new PlanExportFormatError("source must be template, generator or safe_fallback");
  }
  const plan = record.plan;
  if (!isRecord(plan)) {
    throw new PlanExportFormatError("plan must be an object");
  }

  const prompts = plan.parent_child_prompts;
  if (!Array.isArray(prompts)) {
    throw new PlanExportFormatError("plan.parent_child_prompts must be a list");
  }
  const supports = readStringList(plan.supports, "plan.supports");

  return {
    export_version: PLAN_EXPORT_VERSION,
    adventure_id: readText(record, "adventure_id"),
    adventure_title: readText(record, "adventure_title"),
    date: readText(record, "date"),
    source,
    notice: typeof record.notice === "string" ? record.notice : null,
    plan: {
      title: readText(plan, "title"),
      summary: readText(plan, "summary"),
      steps: readStringList(plan.steps, "plan.steps"),
      safety_notes: readStringList(plan.safety_notes, "plan.safety_notes"),
      parent_child_prompts: prompts.map((prompt, index) => {
        if (!isRecord(prompt) || typeof prompt.say !== "string" || typeof prompt.do !== "string") {
          throw new PlanExportFormatError(`plan.parent_child_prompts[${index}] must have say and do`);
        }
        return { say: prompt.say, do: prompt.do };
      }),
      variants: readStringList(plan.variants, "plan.variants"),
      supports: DEVELOPMENT_GOALS.filter((goal) => supports.includes(goal)),
    },
  };
}
