import { describe, expect, it } from "vitest";

import { loadAdventureCatalog } from "../../packages/core/src/catalog/catalog-loader.ts";
import { buildActivityRequest } from "../../packages/core/src/plans/activity-plan.ts";
import { buildSafeFallbackPlan, buildTemplatePlan } from "../../packages/core/src/plans/plan-templates.ts";
import {
  isPlanSafe,
  normalizePlanText,
  validateActivityPlan,
} from "../../packages/core/src/safety/plan-validator.ts";
import { makeAdventure, makeCriteria, makePlan } from "../helpers/fixtures.ts";

const months = (value: number) => ({ age_value: value, age_unit: "months" as const });
const years = (value: number) => ({ age_value: value, age_unit: "years" as const });

describe("plan safety validator", () => {
  it("normalizes case and punctuation with padding", () => {
    expect(normalizePlanText("  Hallo,   WELT!  ")).toBe(" hallo welt ");
  });

  it("blocks fire and candles", () => {
    const result = validateActivityPlan(makePlan({ steps: ["Lagerfeuer und Kerze anzünden"] }), years(5));

    expect(result.safe).toBe(false);
    expect(result.violations).toEqual([
      { rule: "always_blocked", term: "lagerfeuer" },
      { rule: "always_blocked", term: "kerze" },
    ]);
    expect(result.rules_version).toBe("plan_hazards_v1");
  });

  it("blocks open fire, grills and chemicals named as whole words", () => {
    const plan = makePlan({
      summary: "Wir nutzen Feuer und Bleichmittel für Effekte.",
      variants: ["Mit Grill"],
    });

    expect(validateActivityPlan(plan, years(5)).violations).toEqual([
      { rule: "always_blocked", term: "feuer" },
      { rule: "always_blocked", term: "grill" },
      { rule: "always_blocked", term: "bleichmittel" },
    ]);
  });

  it("allows ordinary outings whose words contain a hazard term", () => {
    const plan = makePlan({
      steps: [
        "Die Feuerwehr anschauen",
        "Grillen zirpen hören",
        "Count the blades of grass",
        "An der Klingel läuten",
        "Den Durchmesser vom Baumstamm schätzen",
      ],
    });

    expect(validateActivityPlan(plan, years(3))).toEqual({
      safe: true,
      violations: [],
      rules_version: "plan_hazards_v1",
    });
  });

  it("blocks knives at every age", () => {
    const plan = makePlan({ variants: ["Mit dem Messer schnitzen"] });

    for (const age of [months(10), years(3), years(10), years(17)]) {
      expect(isPlanSafe(plan, age)).toBe(false);
    }
  });

  it("blocks small parts below three years only", () => {
    const plan = makePlan({ steps: ["Perlen sortieren", "Farben benennen", "Aufräumen"] });

    expect(validateActivityPlan(plan, months(30)).violations).toEqual([{ rule: "choking_age", term: "perle" }]);
    expect(isPlanSafe(plan, months(48))).toBe(true);
    expect(isPlanSafe(plan, years(4))).toBe(true);
  });

  it("allows child-safe scissors under supervision from 48 months", () => {
    const plan = makePlan({ steps: ["Mit der Kinderschere unter Aufsicht Blätter schneiden"] });

    expect(isPlanSafe(plan, months(48))).toBe(true);
    expect(validateActivityPlan(plan, months(42)).violations).toEqual([{ rule: "scissors_age", term: "schere" }]);
  });

  it("requires a child-safe marker and supervision for scissors", () => {
    const bare = makePlan({ steps: ["Mit der Schere unter Aufsicht schneiden"] });
    const unsupervised = makePlan({ steps: ["Mit der Kinderschere schneiden"] });

    expect(validateActivityPlan(bare, months(60)).violations).toEqual([{ rule: "scissors_context", term: "schere" }]);
    expect(validateActivityPlan(unsupervised, years(6)).violations).toEqual([
      { rule: "scissors_context", term: "schere" },
    ]);
  });

  it("applies the stricter age when ordinary scissors appear next to child-safe ones", () => {
    const plan = makePlan({ steps: ["Erst die Kinderschere, dann die Schere, immer unter Aufsicht"] });

    expect(validateActivityPlan(plan, months(60)).violations).toEqual([{ rule: "scissors_age", term: "schere" }]);
    expect(isPlanSafe(plan, months(72))).toBe(true);
  });

  it("accepts the template plan of every bundled adventure", () => {
    const criteria = makeCriteria();
    for (const adventure of loadAdventureCatalog()) {
      const plan = buildTemplatePlan(adventure, criteria);
      const result = validateActivityPlan(plan, buildActivityRequest(adventure, criteria));
      expect({ id: adventure.id, violations: result.violations }).toEqual({ id: adventure.id, violations: [] });
    }
  });

  it("accepts the safe fallback plan at any age", () => {
    for (const age of [2, 5, 8, 11]) {
      const request = buildActivityRequest(makeAdventure({ age_min: 0 }), makeCriteria({ child_age_years: age }));
      expect(isPlanSafe(buildSafeFallbackPlan(request), request)).toBe(true);
    }
    expect(isPlanSafe(buildSafeFallbackPlan(buildActivityRequest(makeAdventure(), makeCriteria())), months(6))).toBe(
      true,
    );
  });
});
