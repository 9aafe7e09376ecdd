import type { SearchCriteria } from "../criteria/search-criteria.ts";
import { freezePlan, PLAN_PROMPT_LIMITS, type ActivityPlan, type ParentChildPrompt } from "../plans/activity-plan.ts";
import { GENERIC_PROMPTS } from "../plans/parent-child-prompts.ts";
import {
  COMMON_MATERIALS,
  MATERIAL_CATALOG,
  materialsMentioned,
  resolveMaterialKey,
  type CommonMaterial,
} from "./material-catalog.ts";

export const MATERIAL_ADJUSTED_SUMMARY =
  "Materialangepasste Version: Wir nutzen nur, was gerade da ist. / Material-adjusted version: we only use what is available right now.";

export const MATERIAL_FREE_STEP =
  "Nutzt Naturfundstücke oder Dinge, die gerade da sind. / Use natural finds or things you already have at hand.";

export type MaterialEnforcementResult = {
  plan: ActivityPlan;
  blocked: readonly CommonMaterial[];
  matched: readonly CommonMaterial[];
};

/**
 * Common materials the user does not have. An empty list means the user did
 * not say, so nothing is blocked.
 */
export function resolveBlockedMaterials(available: readonly string[]): CommonMaterial[] {
  const listed = available.map((item) => item.trim()).filter(Boolean);
  if (listed.length === 0) {
    return [];
  }
  const present = new Set(listed.map(resolveMaterialKey));
  return COMMON_MATERIALS.filter((key) => !present.has(key));
}

export function applyMaterialConstraints(
  plan: ActivityPlan,
  blocked: readonly CommonMaterial[],
): MaterialEnforcementResult {
  if (blocked.length === 0) {
    return { plan, blocked, matched: [] };
  }

  const matched = new Set<CommonMaterial>();
  const keep = (text: string): boolean => {
    const hits = materialsMentioned(text, blocked);
    hits.forEach((hit) => matched.add(hit));
    return hits.length === 0;
  };

  const steps = plan.steps.filter(keep);
  const variants = plan.variants.filter(keep);
  const prompts = plan.parent_child_prompts.filter((prompt) => keep(`${prompt.say} ${prompt.do}`));
  const summaryHits = materialsMentioned(plan.summary, blocked);
  summaryHits.forEach((hit) => matched.add(hit));

  if (matched.size === 0) {
    return { plan, blocked, matched: [] };
  }

  const orderedMatches = COMMON_MATERIALS.filter((key) => matched.has(key));
  const substitutions = orderedMatches
    .map((key) => MATERIAL_CATALOG[key].substitution)
    .filter((sentence) => !plan.safety_notes.includes(sentence));

  return {
    plan: freezePlan({
      ...plan,
      summary: summaryHits.length > 0 ? MATERIAL_ADJUSTED_SUMMARY : plan.summary,
      steps: steps.length > 0 ? steps : [MATERIAL_FREE_STEP],
      safety_notes: [...plan.safety_notes, ...substitutions],
      parent_child_prompts: topUpPrompts(prompts, blocked),
      variants,
    }),
    blocked,
    matched: orderedMatches,
  };
}

export function enforceMaterialConstraints(plan: ActivityPlan, criteria: SearchCriteria): ActivityPlan {
  return applyMaterialConstraints(plan, resolveBlockedMaterials(criteria.available_materials)).plan;
}

function topUpPrompts(
  prompts: readonly ParentChildPrompt[],
  blocked: readonly CommonMaterial[],
): ParentChildPrompt[] {
  const result = [...prompts];
  for (const prompt of GENERIC_PROMPTS) {
    if (result.length >= PLAN_PROMPT_LIMITS.min) {
      break;
    }
    const alreadyIncluded = result.some((existing) => existing.say === prompt.say);
    if (!alreadyIncluded && materialsMentioned(`${prompt.say} ${prompt.do}`, blocked).length === 0) {
      result.push(prompt);
    }
  }
  return result;
}
