import type { Adventure } from "../catalog/adventure.ts";
import type { DevelopmentGoal } from "../catalog/themes.ts";
import type { SearchCriteria } from "../criteria/search-criteria.ts";

export type ParentChildPrompt = {
  readonly say: string;
  readonly do: string;
};

export type ActivityPlan = {
  readonly title: string;
  readonly summary: string;
  readonly steps: readonly string[];
  readonly safety_notes: readonly string[];
  readonly parent_child_prompts: readonly ParentChildPrompt[];
  readonly variants: readonly string[];
  readonly supports: readonly DevelopmentGoal[];
};

export type AgeUnit = "months" | "years";
export type IndoorOutdoor = "indoor" | "outdoor" | "mixed";

export type ActivityRequest = {
  readonly age_value: number;
  readonly age_unit: AgeUnit;
  readonly duration_minutes: number;
  readonly indoor_outdoor: IndoorOutdoor;
  readonly materials: readonly string[];
  readonly goals: readonly DevelopmentGoal[];
  readonly constraints: readonly string[];
};

export const PLAN_PROMPT_LIMITS = { min: 3, max: 6 } as const;

const MONTHS_PER_YEAR = 12;
const MONTHS_THRESHOLD_YEARS = 3;

export function requestAgeInMonths(request: Pick<ActivityRequest, "age_value" | "age_unit">): number {
  return request.age_unit === "months" ? request.age_value : request.age_value * MONTHS_PER_YEAR;
}

export function buildActivityRequest(adventure: Adventure, criteria: SearchCriteria): ActivityRequest {
  const ageYears = criteria.child_age_years ?? adventure.age_min;
  const inMonths = ageYears < MONTHS_THRESHOLD_YEARS;

  return Object.freeze({
    age_value: inMonths ? Math.round(ageYears * MONTHS_PER_YEAR) : ageYears,
    age_unit: inMonths ? "months" : "years",
    duration_minutes: Math.min(adventure.duration_minutes, criteria.available_minutes),
    indoor_outdoor: resolveIndoorOutdoor(adventure, criteria),
    materials: Object.freeze([...adventure.packing_list]),
    goals: Object.freeze([...criteria.goals]),
    constraints: Object.freeze([...criteria.constraints]),
  });
}

/** Every user-visible text field of a plan, in reading order. */
export function planTextFields(plan: ActivityPlan): string[] {
  return [
    plan.title,
    plan.summary,
    ...plan.steps,
    ...plan.safety_notes,
    ...plan.parent_child_prompts.flatMap((prompt) => [prompt.say, prompt.do]),
    ...plan.variants,
  ];
}

export function freezePlan(plan: ActivityPlan): ActivityPlan {
  return Object.freeze({
    ...plan,
    steps: Object.freeze([...plan.steps]),
    safety_notes: Object.freeze([...plan.safety_notes]),
    parent_child_prompts: Object.freeze(plan.parent_child_prompts.map((prompt) => Object.freeze({ ...prompt }))),
    variants: Object.freeze([...plan.variants]),
    supports: Object.freeze([...plan.supports]),
  });
}

function resolveIndoorOutdoor(adventure: Adventure, criteria: SearchCriteria): IndoorOutdoor {
  const indoor = adventure.tags.includes("indoor");
  const outdoor = adventure.tags.includes("outdoor");
  if (indoor && !outdoor) {
    return "indoor";
  }
  if (outdoor && !indoor) {
    return "outdoor";
  }
  return criteria.location_preference;
}
