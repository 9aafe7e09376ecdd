import { describe, expect, it } from "vitest";

import {
  CriteriaValidationError,
  createSearchCriteria,
  normalizeEffort,
  parseSearchCriteria,
  sanitizeFreeTextEntry,
} from "../../packages/core/src/criteria/search-criteria.ts";

describe("search criteria", () => {
  it("fills defaults and derives the available minutes", () => {
    const criteria = createSearchCriteria({ date: "2026-05-02" });
    expect(criteria).toEqual({
      postal_code: "40215",
      radius_km: 5,
      date: "2026-05-02",
      time_window: { start: "09:00", end: "10:00" },
      available_minutes: 60,
      effort: "medium",
      budget_eur_max: 15,
      child_age_years: null,
      topics: [],
      location_preference: "mixed",
      goals: ["gross_motor"],
      constraints: [],
      available_materials: [],
      max_suggestions: 5,
    });
    expect(Object.isFrozen(criteria)).toBe(true);
  });

  it("accepts German effort words", () => {
    expect(normalizeEffort("Niedrig")).toBe("low");
    expect(normalizeEffort("mittel")).toBe("medium");
    expect(normalizeEffort("HOCH")).toBe("high");
    expect(normalizeEffort("extrem")).toBeNull();
  });

  it("reports every invalid field at once", () => {
    const result = parseSearchCriteria({
      date: "2026-02-30",
      postal_code: "4021",
      time_window: { start: "10:00", end: "09:30" },
      goals: [],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.issues).toEqual([
        { field: "postal_code", message: "postal_code must be exactly 5 digits" },
        { field: "date", message: "date must be a real calendar day" },
        { field: "time_window", message: "time_window.end must be after time_window.start" },
        { field: "goals", message: "goals requires 1-2 domains" },
      ]);
    }
  });

  it("rejects a missing date", () => {
    expect(() => createSearchCriteria({})).toThrowError(CriteriaValidationError);
  });

  it("limits topics to eight entries", () => {
    const result = parseSearchCriteria({
      date: "2026-05-02",
      topics: ["a", "b", "c", "d", "e", "f", "g", "h", "i"],
    });
    expect(result).toEqual({
      ok: false,
      issues: [{ field: "topics", message: "topics supports at most 8 entries" }],
    });
  });

  it("normalizes topics and deduplicates them", () => {
    const criteria = createSearchCriteria({ date: "2026-05-02", topics: [" Natur ", "natur", "Wasser"] });
    expect(criteria.topics).toEqual(["natur", "wasser"]);
  });

  it("sanitizes free-text constraints", () => {
    expect(sanitizeFreeTextEntry("No screens<script>")).toBe("No screensscript");
    const criteria = createSearchCriteria({
      date: "2026-05-02",
      constraints: ["  kein   Sand ", "Kein Sand", "<>"],
    });
    expect(criteria.constraints).toEqual(["kein Sand"]);
  });

  it("caps each free-text entry at 80 characters", () => {
    expect(sanitizeFreeTextEntry("x".repeat(120))).toBe("x".repeat(80));
  });

  it("checks numeric ranges", () => {
    const result = parseSearchCriteria({ date: "2026-05-02", radius_km: 0.1, budget_eur_max: 300 });
    expect(result).toEqual({
      ok: false,
      issues: [
        { field: "radius_km", message: "radius_km must be between 0.5 and 50" },
        { field: "budget_eur_max", message: "budget_eur_max must be between 0 and 250" },
      ],
    });
  });
});
