import { freezePlan, type ActivityPlan } from "./activity-plan.ts";

export const PLAN_B_CATEGORIES = [
  "lower_energy",
  "higher_energy",
  "indoor_swap",
  "no_materials",
] as const;

export type PlanBCategory = (typeof PLAN_B_CATEGORIES)[number];

const CATEGORY_MARKERS: Record<PlanBCategory, readonly string[]> = {
  lower_energy: ["lower energy", "low energy", "weniger energie", "ruhiger", "ruhigere", "calmer"],
  higher_energy: ["higher energy", "high energy", "mehr energie", "mehr bewegung", "more movement", "aktiver"],
  indoor_swap: ["indoor swap", "indoor", "drinnen", "zu hause", "at home"],
  no_materials: ["no materials", "without materials", "ohne material", "no props"],
};

export const PLAN_B_TEXTS: Record<PlanBCategory, string> = {
  lower_energy:
    "Ruhigere Version: langsamer gehen und öfter pausieren. / Lower energy: move slowly and take more breaks.",
  higher_energy:
    "Aktivere Version: kleine Wettläufe oder Hüpfrunden einbauen. / Higher energy: add short races or hopping rounds.",
  indoor_swap:
    "Indoor-Tausch: dieselbe Idee drinnen mit Kissen und Kuscheltieren spielen. / Indoor swap: play the same idea inside with cushions and soft toys.",
  no_materials:
    "Ohne Material: nur mit Händen, Stimme und Dingen aus der Umgebung. / No materials: use only hands, voice and things around you.",
};

export function missingPlanBCategories(variants: readonly string[]): PlanBCategory[] {
  const text = variants.join(" ").toLowerCase();
  return PLAN_B_CATEGORIES.filter((category) =>
    !CATEGORY_MARKERS[category].some((marker) => text.includes(marker))
  );
}

/** Appends the canned text of every Plan B category the variants do not cover yet. */
export function completePlanBVariants(plan: ActivityPlan): ActivityPlan {
  const missing = missingPlanBCategories(plan.variants);
  if (missing.length === 0) {
    return plan;
  }
  return freezePlan({
    ...plan,
    variants: [...plan.variants, ...missing.map((category) => PLAN_B_TEXTS[category])],
  });
}
