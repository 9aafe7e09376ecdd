import type { Adventure } from "../catalog/adventure.ts";
import { GOAL_SIGNAL_TAGS, type DevelopmentGoal } from "../catalog/themes.ts";
import type { SearchCriteria } from "../criteria/search-criteria.ts";
import {
  buildActivityRequest,
  freezePlan,
  PLAN_PROMPT_LIMITS,
  type ActivityPlan,
  type ActivityRequest,
  type ParentChildPrompt,
} from "./activity-plan.ts";
import { GENERIC_PROMPTS, GOAL_PROMPTS } from "./parent-child-prompts.ts";
import { PLAN_B_CATEGORIES, PLAN_B_TEXTS } from "./plan-b-variants.ts";

export const SAFE_FALLBACK_TITLE = "Sicherer Ersatzplan / Safe fallback plan";

const DEFAULT_SAFETY_NOTE = "Bleib immer in Reichweite deines Kindes. / Always stay within reach of your child.";

export const PARENT_SCRIPT_BOUNDS = { min: 6, max: 20 } as const;

export function shortVersionVariant(durationMinutes: number): string {
  const minutes = Math.max(10, Math.floor(durationMinutes / 2));
  return `Kurzversion für ${minutes} Minuten / Short version for ${minutes} minutes`;
}

export function buildTemplatePlan(adventure: Adventure, criteria: SearchCriteria): ActivityPlan {
  const request = buildActivityRequest(adventure, criteria);
  return freezePlan({
    title: adventure.title,
    summary: adventure.short_description,
    steps: [...adventure.route_steps],
    safety_notes: adventure.mitigations.length > 0 ? [...adventure.mitigations] : [DEFAULT_SAFETY_NOTE],
    parent_child_prompts: synthesizePrompts(criteria.goals),
    variants: [...adventure.variations, shortVersionVariant(request.duration_minutes)],
    supports: supportedGoals(adventure, criteria.goals),
  });
}

/** Conservative plan shown whenever generation or validation fails. */
export function buildSafeFallbackPlan(request: ActivityRequest): ActivityPlan {
  return freezePlan({
    title: `${SAFE_FALLBACK_TITLE}: Entdeckerrunde / Explorer round`,
    summary:
      `Eine ruhige Entdeckerrunde ohne Material für etwa ${request.duration_minutes} Minuten. / ` +
      `A calm explorer round without materials for about ${request.duration_minutes} minutes.`,
    steps: [
      "Sucht euch einen ruhigen, sicheren Platz drinnen oder draußen. / Find a calm, safe spot inside or outside.",
      "Entdeckt gemeinsam drei Dinge und benennt ihre Farben. / Discover three things together and name their colours.",
      "Bewegt euch langsam wie verschiedene Tiere. / Move slowly like different animals.",
      "Beendet die Runde mit einer Umarmung und eurem Lieblingsmoment. / Finish with a hug and your favourite moment.",
    ],
    safety_notes: [
      DEFAULT_SAFETY_NOTE,
      "Nur große, unbedenkliche Gegenstände anfassen. / Only touch large, harmless objects.",
    ],
    parent_child_prompts: GENERIC_PROMPTS.slice(0, PLAN_PROMPT_LIMITS.min),
    variants: PLAN_B_CATEGORIES.map((category) => PLAN_B_TEXTS[category]),
    supports: [...request.goals],
  });
}

/**
 * Replaces the steps with a time-boxed script. The total is clamped to 6-20
 * minutes regardless of the available time.
 */
export function toParentScript(plan: ActivityPlan, request: ActivityRequest): ActivityPlan {
  const total = Math.min(PARENT_SCRIPT_BOUNDS.max, Math.max(PARENT_SCRIPT_BOUNDS.min, request.duration_minutes));
  const phase = Math.floor(total / 5);
  const remainder = total - 4 * phase;

  return freezePlan({
    ...plan,
    steps: [
      `Describe / Beschreiben (${phase} min): Sag laut, was dein Kind gerade tut. / Narrate what your child is doing.`,
      `Imitate / Nachmachen (${phase} min): Mach nach, was dein Kind macht. / Copy what your child does.`,
      `Praise / Loben (${phase} min): Lobe konkret, was gelungen ist. / Praise one specific thing that went well.`,
      `Active listening / Aktives Zuhören (${phase} min): Wiederhole, was dein Kind sagt, und ergänze ein Wort. / Repeat what your child says and add one word.`,
      `Child-led repeat / Kind führt (${remainder} min): Dein Kind wählt, was ihr wiederholt. / Your child chooses what to repeat.`,
    ],
  });
}

function synthesizePrompts(goals: readonly DevelopmentGoal[]): ParentChildPrompt[] {
  const prompts: ParentChildPrompt[] = goals.map((goal) => GOAL_PROMPTS[goal]);
  for (const prompt of GENERIC_PROMPTS) {
    if (prompts.length >= PLAN_PROMPT_LIMITS.max) {
      break;
    }
    prompts.push(prompt);
  }
  return prompts;
}

function supportedGoals(adventure: Adventure, goals: readonly DevelopmentGoal[]): DevelopmentGoal[] {
  const signals = new Set<string>([...adventure.toddler_benefits, ...adventure.tags, ...adventure.mood_tags]);
  const matched = goals.filter((goal) => GOAL_SIGNAL_TAGS[goal].some((tag) => signals.has(tag)));
  return matched.length > 0 ? matched : [...goals];
}
