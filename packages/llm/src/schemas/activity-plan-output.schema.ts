import type { ActivityPlan, ParentChildPrompt } from "../../../core/src/plans/activity-plan.ts";
import { PLAN_PROMPT_LIMITS } from "../../../core/src/plans/activity-plan.ts";
import { DEVELOPMENT_GOALS, type DevelopmentGoal } from "../../../core/src/catalog/themes.ts";

const TOP_LEVEL_KEYS = new Set([
  "title",
  "summary",
  "steps",
  "safety_notes",
  "parent_child_prompts",
  "variants",
  "supports",
]);
const PROMPT_KEYS = new Set(["say", "do"]);

export const ACTIVITY_PLAN_OUTPUT_LIMITS = {
  steps: { min: 3, max: 8 },
  safety_notes: { min: 1, max: 4 },
  variants: { min: 0, max: 6 },
  text_max_chars: 400,
} as const;

export class ActivityPlanOutputSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ActivityPlanOutputSchemaError";
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function assertPlainObject(value: unknown, path: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ActivityPlanOutputSchemaError(`${path} must be an object.`);
  }
  return value;
}

function assertNoUnknownKeys(
  value: Record<string, unknown>,
  allowedKeys: Set<string>,
  path: string,
): void {
  for (const key of Object.keys(value)) {
    if (!allowedKeys.has(key)) {
      throw new ActivityPlanOutputSchemaError(`${path}.${key} is not allowed.`);
    }
  }
}

function assertText(value: unknown, path: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ActivityPlanOutputSchemaError(`${path} must be a non-empty string.`);
  }
  const trimmed = value.trim();
  if (trimmed.length > ACTIVITY_PLAN_OUTPUT_LIMITS.text_max_chars) {
    throw new ActivityPlanOutputSchemaError(
      `${path} must be at most ${ACTIVITY_PLAN_OUTPUT_LIMITS.text_max_chars} characters.`,
    );
  }
  return trimmed;
}

function assertArray(
  value: unknown,
  path: string,
  bounds: { min: number; max: number },
): unknown[] {
  if (!Array.isArray(value)) {
    throw new ActivityPlanOutputSchemaError(`${path} must be an array.`);
  }
  if (value.length < bounds.min || value.length > bounds.max) {
    throw new ActivityPlanOutputSchemaError(
      `${path} must contain ${bounds.min}-${bounds.max} entries.`,
    );
  }
  return value;
}

function parseTextList(
  value: unknown,
  path: string,
  bounds: { min: number; max: number },
): string[] {
  return assertArray(value, path, bounds).map((entry, index) => assertText(entry, `${path}[${index}]`));
}

function parsePrompts(value: unknown): ParentChildPrompt[] {
  return assertArray(value, "parent_child_prompts", PLAN_PROMPT_LIMITS).map((entry, index) => {
    const path = `parent_child_prompts[${index}]`;
    const object = assertPlainObject(entry, path);
    assertNoUnknownKeys(object, PROMPT_KEYS, path);
    return {
      say: assertText(object.say, `${path}.say`),
      do: assertText(object.do, `${path}.do`),
    };
  });
}

function isDevelopmentGoal(value: unknown): value is DevelopmentGoal {
  return DEVELOPMENT_GOALS.some((goal) => goal === value);
}

function parseSupports(value: unknown): DevelopmentGoal[] {
  const entries = assertArray(value, "supports", { min: 0, max: DEVELOPMENT_GOALS.length });
  const supports: DevelopmentGoal[] = [];
  entries.forEach((entry, index) => {
    if (!isDevelopmentGoal(entry)) {
      throw new ActivityPlanOutputSchemaError(`supports[${index}] is not a known development goal.`);
    }
    if (!supports.includes(entry)) {
      supports.push(entry);
    }
  });
  return supports;
}

export function parseActivityPlanOutput(value: unknown): ActivityPlan {
  const object = assertPlainObject(value, "output");
  assertNoUnknownKeys(object, TOP_LEVEL_KEYS, "output");

  return {
    title: assertText(object.title, "title"),
    summary: assertText(object.summary, "summary"),
    steps: parseTextList(object.steps, "steps", ACTIVITY_PLAN_OUTPUT_LIMITS.steps),
    safety_notes: parseTextList(
      object.safety_notes,
      "safety_notes",
      ACTIVITY_PLAN_OUTPUT_LIMITS.safety_notes,
    ),
    parent_child_prompts: parsePrompts(object.parent_child_prompts),
    variants: object.variants == null
      ? []
      : parseTextList(object.variants, "variants", ACTIVITY_PLAN_OUTPUT_LIMITS.variants),
    supports: object.supports == null ? [] : parseSupports(object.supports),
  };
}
