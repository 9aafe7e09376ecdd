import { describe, expect, it } from "vitest";

import { CatalogIntegrityError } from "../../packages/core/src/catalog/catalog-loader.ts";
import {
  loadActivityLibrary,
  NO_OFFLINE_MATCHES_WARNING,
  parseActivityLibrary,
  suggestOfflineActivities,
} from "../../packages/core/src/recommendations/offline-library.ts";
import { createRecordingLogger, eventNames, makeCriteria } from "../helpers/fixtures.ts";

const library = parseActivityLibrary({
  activities: [
    {
      id: "lib-a",
      title: "Kissenpfad / Cushion path",
      description: "Über Kissen balancieren. / Balance over cushions.",
      domain_tags: ["calm", "sensory"],
      age_min_years: 2,
      age_max_years: 6,
      indoor_outdoor: "indoor",
      duration_min: 30,
      materials: [],
      safety_notes: ["Weiche Unterlage / Soft floor"],
      effort: "low",
      estimated_cost_eur: 0,
    },
    {
      id: "lib-b",
      title: "Blätterbild / Leaf picture",
      description: "Blätter sammeln und malen. / Collect and draw leaves.",
      domain_tags: ["nature"],
      age_min_years: 3,
      age_max_years: 8,
      indoor_outdoor: "outdoor",
      duration_min: 45,
      materials: ["paper", "pens"],
      safety_notes: [],
      effort: "medium",
      estimated_cost_eur: 5,
    },
    {
      id: "lib-c",
      title: "Museumsbesuch / Museum visit",
      description: "Ein langer Vormittag. / A long morning.",
      domain_tags: ["learning"],
      age_min_years: 3,
      age_max_years: 10,
      indoor_outdoor: "indoor",
      duration_min: 90,
      materials: [],
      safety_notes: [],
      effort: "low",
      estimated_cost_eur: 12,
    },
  ],
});

const baseCriteria = {
  time_window: { start: "09:00", end: "10:00" },
  effort: "low",
  location_preference: "indoor",
  topics: ["calm"],
  child_age_years: 4,
};

describe("offline activity library", () => {
  it("ranks items that fit the time window", () => {
    const result = suggestOfflineActivities(library, makeCriteria(baseCriteria), {
      logger: createRecordingLogger(),
    });
    expect(result.warnings_de_en).toEqual([]);
    expect(result.suggestions.map((entry) => entry.id)).toEqual(["lib-a", "lib-b"]);
    expect(result.suggestions[0].score).toBeCloseTo(8.6, 10);
    expect(result.suggestions[1].score).toBe(6);
  });

  it("describes why an item matched", () => {
    const [first] = suggestOfflineActivities(library, makeCriteria(baseCriteria), {
      logger: createRecordingLogger(),
    }).suggestions;
    expect(first).toMatchObject({
      date: "2026-05-02",
      start_time: "09:00",
      end_time: "10:00",
      location: "Offline Activity Library",
      expected_cost_eur: 0,
      indoor_outdoor: "indoor",
    });
    expect(first.reason_de_en).toBe(
      'Offline-Bibliothek Treffer / Offline library match: {"age":"2-6","domain_tags":["calm","sensory"],"materials":[],"safety_notes":["Weiche Unterlage / Soft floor"]}',
    );
  });

  it("requires every material when a material list is given", () => {
    const result = suggestOfflineActivities(
      library,
      makeCriteria({ ...baseCriteria, available_materials: ["Papier"] }),
      { logger: createRecordingLogger() },
    );
    expect(result.suggestions.map((entry) => entry.id)).toEqual(["lib-a"]);

    const withPens = suggestOfflineActivities(
      library,
      makeCriteria({ ...baseCriteria, available_materials: ["Papier", "Stifte"] }),
      { logger: createRecordingLogger() },
    );
    expect(withPens.suggestions.map((entry) => entry.id)).toEqual(["lib-a", "lib-b"]);
  });

  it("returns a bilingual warning when nothing fits", () => {
    const logger = createRecordingLogger();
    const result = suggestOfflineActivities(
      library,
      makeCriteria({ ...baseCriteria, time_window: { start: "09:00", end: "09:15" } }),
      { logger },
    );
    expect(result).toEqual({ suggestions: [], warnings_de_en: [NO_OFFLINE_MATCHES_WARNING] });
    expect(eventNames(logger)).toEqual(["recommendation.offline_no_matches"]);
    expect(logger.events[0].payload).toEqual({ library_size: 3 });
  });

  it("caps the list at max_suggestions", () => {
    const result = suggestOfflineActivities(
      library,
      makeCriteria({ ...baseCriteria, max_suggestions: 1 }),
      { logger: createRecordingLogger() },
    );
    expect(result.suggestions.map((entry) => entry.id)).toEqual(["lib-a"]);
  });

  it("rejects malformed library entries", () => {
    expect(() =>
      parseActivityLibrary({ activities: [{ id: "x", indoor_outdoor: "space" }] })
    ).toThrowError(CatalogIntegrityError);
  });

  it("loads the bundled library", () => {
    const bundled = loadActivityLibrary();
    expect(bundled.length).toBe(12);
    expect(new Set(bundled.map((item) => item.id)).size).toBe(12);
  });
});
