import { describe, expect, it } from "vitest";

import {
  ActivityPlanOutputSchemaError,
  parseActivityPlanOutput,
} from "../../packages/llm/src/schemas/activity-plan-output.schema.ts";

const prompt = { say: "Was hörst du? / What do you hear?", do: "Lauscht zusammen. / Listen together." };

function validOutput(): Record<string, unknown> {
  return {
    title: "  Blätterjagd / Leaf hunt ",
    summary: "Bunte Blätter sammeln. / Collect colourful leaves.",
    steps: ["Blätter suchen", "Nach Farben sortieren", "Das schönste zeigen"],
    safety_notes: ["Nichts in den Mund nehmen. / Nothing in the mouth."],
    parent_child_prompts: [prompt, prompt, prompt],
    variants: ["Drinnen mit Bildern / Indoors with pictures"],
    supports: ["sensory", "cognitive", "sensory"],
  };
}

describe("parseActivityPlanOutput", () => {
  it("accepts a valid plan and trims text", () => {
    const plan = parseActivityPlanOutput(validOutput());

    expect(plan.title).toBe("Blätterjagd / Leaf hunt");
    expect(plan.steps).toHaveLength(3);
    expect(plan.supports).toEqual(["sensory", "cognitive"]);
  });

  it("defaults missing variants and supports to empty lists", () => {
    const plan = parseActivityPlanOutput({ ...validOutput(), variants: null, supports: undefined });

    expect(plan.variants).toEqual([]);
    expect(plan.supports).toEqual([]);
  });

  it("rejects unknown keys", () => {
    expect(() => parseActivityPlanOutput({ ...validOutput(), mood: "happy" })).toThrowError(
      "output.mood is not allowed.",
    );
    expect(() =>
      parseActivityPlanOutput({ ...validOutput(), parent_child_prompts: [{ ...prompt, tone: "soft" }, prompt, prompt] })
    ).toThrowError("parent_child_prompts[0].tone is not allowed.");
  });

  it("enforces list sizes", () => {
    expect(() => parseActivityPlanOutput({ ...validOutput(), steps: ["a", "b"] })).toThrowError(
      "steps must contain 3-8 entries.",
    );
    expect(() => parseActivityPlanOutput({ ...validOutput(), safety_notes: [] })).toThrowError(
      "safety_notes must contain 1-4 entries.",
    );
    expect(() => parseActivityPlanOutput({ ...validOutput(), parent_child_prompts: [prompt] })).toThrowError(
      "parent_child_prompts must contain 3-6 entries.",
    );
  });

  it("rejects blank or oversized text", () => {
    expect(() => parseActivityPlanOutput({ ...validOutput(), summary: "  " })).toThrowError(
      "summary must be a non-empty string.",
    );
    expect(() => parseActivityPlanOutput({ ...validOutput(), title: "x".repeat(401) })).toThrowError(
      "title must be at most 400 characters.",
    );
  });

  it("rejects unknown development goals", () => {
    expect(() => parseActivityPlanOutput({ ...validOutput(), supports: ["flying"] })).toThrowError(
      ActivityPlanOutputSchemaError,
    );
    expect(() => parseActivityPlanOutput({ ...validOutput(), supports: ["flying"] })).toThrowError(
      "supports[0] is not a known development goal.",
    );
  });

  it("requires an object", () => {
    expect(() => parseActivityPlanOutput(["title"])).toThrowError("output must be an object.");
  });
});
