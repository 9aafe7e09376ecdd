import { afterEach, describe, expect, it, vi } from "vitest";

import { registerSentryBridge, type SentryBridge } from "../../packages/core/src/observability/sentry.ts";
import { buildActivityRequest } from "../../packages/core/src/plans/activity-plan.ts";
import type { PlanGeneratorInput } from "../../packages/core/src/plans/plan-builder.ts";
import {
  ActivityPlanGeneratorError,
  buildActivityPlanUserPrompt,
  createActivityPlanGenerator,
  INPUT_TRUNCATED_NOTICE,
  truncatePromptInput,
} from "../../packages/llm/src/activity-plan-generator.ts";
import { ACTIVITY_PLAN_SYSTEM_PROMPT } from "../../packages/llm/src/prompts/activity-plan-system-prompt.ts";
import { LlmProviderError, type LlmProvider, type LlmProviderRequest } from "../../packages/llm/src/provider.ts";
import { createRecordingLogger, eventNames, makeAdventure, makeCriteria } from "../helpers/fixtures.ts";

function generatorInput(): PlanGeneratorInput {
  const adventure = makeAdventure();
  const criteria = makeCriteria({ constraints: ["Wir wohnen in Lindenstraße 12"] });
  return { adventure, criteria, weather: null, request: buildActivityRequest(adventure, criteria) };
}

const prompt = { say: "Was hörst du? / What do you hear?", do: "Lauscht zusammen. / Listen together." };
const planOutput = {
  title: "Entenrunde / Duck round",
  summary: "Enten beobachten. / Watch ducks.",
  steps: ["Zum Teich gehen", "Enten zählen", "Winken"],
  safety_notes: ["Abstand zum Ufer. / Keep away from the edge."],
  parent_child_prompts: [prompt, prompt, prompt],
  variants: [],
  supports: ["cognitive"],
};
const validPlanJson = JSON.stringify(planOutput);

function providerReturning(text: string): LlmProvider & { requests: LlmProviderRequest[] } {
  const requests: LlmProviderRequest[] = [];
  return {
    requests,
    async generateText(request) {
      requests.push(request);
      return { text, model: "test-model", provider: "anthropic", usage: { input_tokens: 10, output_tokens: 20 } };
    },
  };
}

async function captureGeneratorError(promise: Promise<unknown>): Promise<ActivityPlanGeneratorError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ActivityPlanGeneratorError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected generation to fail");
}

describe("activity plan prompt", () => {
  it("lists the request and redacts parent free text", () => {
    expect(buildActivityPlanUserPrompt(generatorInput())).toBe(
      [
        "PromptVersion: activity_plan_v1",
        "Adventure: Testrunde / Test round (Südpark)",
        "Description: Eine kurze Runde. / A short round.",
        "StartPoint: Haupteingang",
        "ChildAge: 12 months",
        "DurationMinutes: 30",
        "Setting: mixed",
        "Materials: (none)",
        "AvailableMaterials: (none)",
        "Goals: gross_motor",
        "Weather: (unknown)",
        "Topics: (none)",
        "ParentConstraints: Wir wohnen in [REDACTED_ADDRESS]",
        "RouteSteps:",
        "1. Zum Teich gehen",
        "2. Enten zählen",
        "3. Zurück zum Eingang",
      ].join("\n"),
    );
  });

  it("truncates long input and appends a notice", () => {
    const truncated = truncatePromptInput("x".repeat(100), 60);

    expect(truncated).toHaveLength(60);
    expect(truncated).toBe(`${"x".repeat(24)}\n${INPUT_TRUNCATED_NOTICE}`);
    expect(truncatePromptInput("short", 60)).toBe("short");
  });
});

describe("createActivityPlanGenerator", () => {
  afterEach(() => {
    registerSentryBridge(null);
  });

  it("returns the parsed plan", async () => {
    const provider = providerReturning(validPlanJson);
    const logger = createRecordingLogger();
    const generate = createActivityPlanGenerator({ provider, logger, correlationId: "corr-1" });

    const plan = await generate(generatorInput());

    expect(plan.title).toBe("Entenrunde / Duck round");
    expect(plan.supports).toEqual(["cognitive"]);
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0]).toMatchObject({
      systemPrompt: ACTIVITY_PLAN_SYSTEM_PROMPT,
      timeoutMs: 20000,
      maxOutputTokens: 1200,
    });
    expect(eventNames(logger)).toEqual(["llm.plan_call"]);
    expect(logger.events[0]).toMatchObject({ correlation_id: "corr-1" });
  });

  it("marks provider outages as transient", async () => {
    const logger = createRecordingLogger();
    const generate = createActivityPlanGenerator({
      provider: {
        async generateText() {
          throw new LlmProviderError("LLM provider returned non-OK status.", { transient: true, status: 503 });
        },
      },
      logger,
    });

    const error = await captureGeneratorError(generate(generatorInput()));

    expect(error.code).toBe("provider_transient");
    expect(error.transient).toBe(true);
    expect(error.message).toBe("Activity plan generation failed: LLM provider returned non-OK status.");
    expect(eventNames(logger)).toEqual(["llm.plan_call", "llm.plan_failure"]);
  });

  it("rejects fenced output as invalid JSON", async () => {
    const logger = createRecordingLogger();
    const generate = createActivityPlanGenerator({ provider: providerReturning(`\`\`\`json\n${validPlanJson}\n\`\`\``), logger });

    const error = await captureGeneratorError(generate(generatorInput()));

    expect(error.code).toBe("invalid_json");
    expect(error.transient).toBe(false);
    expect(eventNames(logger)).toEqual(["llm.plan_call", "llm.plan_output_rejected", "llm.plan_failure"]);
    expect(logger.events[1].payload).toEqual({
      prompt_version: "activity_plan_v1",
      violation_codes: ["output_wrapper_detected"],
    });
  });

  it("rejects prohibited content and reports it to Sentry", async () => {
    const captureException = vi.fn();
    const bridge: SentryBridge = {
      captureException,
      captureMessage: vi.fn(),
      startSpan: (_options, callback) => callback(),
      withScope: (_context, callback) => callback(),
      setContext: vi.fn(),
    };
    registerSentryBridge(bridge);
    const generate = createActivityPlanGenerator({
      provider: providerReturning(JSON.stringify({ ...planOutput, summary: "Garantiert ruhig. / Guaranteed calm." })),
      logger: createRecordingLogger(),
    });

    const error = await captureGeneratorError(generate(generatorInput()));

    expect(error.code).toBe("guardrail_violation");
    expect(captureException).toHaveBeenCalledTimes(1);
    expect(bridge.setContext).toHaveBeenCalledWith({
      category: "llm",
      correlation_id: null,
      adventure_id: "test-adventure",
      tags: { prompt_version: "activity_plan_v1" },
    });
  });

  it("reports schema problems as permanent", async () => {
    const generate = createActivityPlanGenerator({
      provider: providerReturning(JSON.stringify({ ...planOutput, steps: ["Nur ein Schritt"] })),
      logger: createRecordingLogger(),
    });

    const error = await captureGeneratorError(generate(generatorInput()));

    expect(error.code).toBe("schema_invalid");
    expect(error.transient).toBe(false);
    expect(error.message).toBe("Activity plan generation failed: steps must contain 3-8 entries.");
  });
});
