import {
  planTextFields,
  requestAgeInMonths,
  type ActivityPlan,
  type ActivityRequest,
} from "../plans/activity-plan.ts";
import { PLAN_HAZARDS_V1, type PlanSafetyRules } from "./hazard-catalog.ts";

export type PlanSafetyRule =
  | "always_blocked"
  | "scissors_context"
  | "scissors_age"
  | "choking_age";

export type PlanSafetyViolation = {
  rule: PlanSafetyRule;
  term: string;
};

export type PlanSafetyResult = {
  safe: boolean;
  violations: readonly PlanSafetyViolation[];
  rules_version: string;
};

/** Case-folds, maps punctuation to spaces and pads with one space on each side. */
export function normalizePlanText(text: string): string {
  const collapsed = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
  return ` ${collapsed} `;
}

export function findTerms(normalizedText: string, terms: readonly string[]): string[] {
  return terms.filter((term) => normalizedText.includes(term));
}

/**
 * Gates a plan before it is shown. Any violation fails the whole plan; the
 * caller must discard it.
 */
export function validateActivityPlan(
  plan: ActivityPlan,
  request: Pick<ActivityRequest, "age_value" | "age_unit">,
  rules: PlanSafetyRules = PLAN_HAZARDS_V1,
): PlanSafetyResult {
  const text = normalizePlanText(planTextFields(plan).join(" "));
  const ageMonths = requestAgeInMonths(request);
  const violations: PlanSafetyViolation[] = [];

  for (const term of findTerms(text, rules.always_blocked)) {
    violations.push({ rule: "always_blocked", term: term.trim() });
  }

  const scissorsHits = findTerms(text, rules.scissors_terms);
  if (scissorsHits.length > 0) {
    const hasChildSafeMarker = findTerms(text, rules.child_safe_scissors_markers).length > 0;
    const hasSupervision = findTerms(text, rules.supervision_markers).length > 0;
    if (!hasChildSafeMarker || !hasSupervision) {
      violations.push({ rule: "scissors_context", term: scissorsHits[0] });
    } else {
      const minimumAge = onlyChildSafeScissors(text, rules)
        ? rules.child_safe_scissors_min_age_months
        : rules.scissors_min_age_months;
      if (ageMonths < minimumAge) {
        violations.push({ rule: "scissors_age", term: scissorsHits[0] });
      }
    }
  }

  if (ageMonths < rules.choking_min_age_months) {
    for (const term of findTerms(text, rules.choking_terms)) {
      violations.push({ rule: "choking_age", term });
    }
  }

  return {
    safe: violations.length === 0,
    violations,
    rules_version: rules.version,
  };
}

export function isPlanSafe(
  plan: ActivityPlan,
  request: Pick<ActivityRequest, "age_value" | "age_unit">,
  rules: PlanSafetyRules = PLAN_HAZARDS_V1,
): boolean {
  return validateActivityPlan(plan, request, rules).safe;
}

function onlyChildSafeScissors(text: string, rules: PlanSafetyRules): boolean {
  let remainder = text;
  for (const marker of rules.child_safe_scissors_markers) {
    remainder = remainder.split(marker).join(" ");
  }
  return findTerms(remainder, rules.scissors_terms).length === 0;
}
