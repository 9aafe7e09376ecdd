export const OUTPUT_VALIDATOR_VERSION = "output_validator_v2";
export const PLAN_PROHIBITED_PATTERNS_VERSION = "plan_prohibited_patterns_v1";

export type OutputViolation = {
  code: string;
  message: string;
};

export type ValidateModelOutputArgs = {
  rawText: string;
  requireJson?: boolean;
};

type ProhibitedPattern = {
  code: string;
  message: string;
  pattern: RegExp;
};

export const PLAN_PROHIBITED_PATTERNS: readonly ProhibitedPattern[] = [
  {
    code: "no_medical_claims",
    message: "Medical or therapeutic claims are not allowed.",
    pattern:
      /\b(heilt|heilen|therapiert|diagnos\w*|cures?|medically proven|clinically proven|klinisch (?:bewiesen|erwiesen))\b/i,
  },
  {
    code: "no_guarantees",
    message: "Guarantees or certainty promises are not allowed.",
    pattern: /\b(garantiert|guarantee(?:d|s)?|klappt immer|always works|never fails)\b|\b100\s*%/i,
  },
  {
    code: "no_screen_time",
    message: "Screen-based activities are not allowed.",
    pattern:
      /\b(tablet|smartphone|youtube|fernseher|bildschirmzeit|screen time|video ?games?|videospiele?|tv show)\b/i,
  },
  {
    code: "no_feature_explaining",
    message: "Feature-explaining language is not allowed.",
    pattern: /\b(llm|language model|sprachmodell|as an ai|als ki)\b/i,
  },
] as const;

type ValidateModelOutputOk = {
  ok: true;
  sanitizedText: string;
};

type ValidateModelOutputFailed = {
  ok: false;
  sanitizedText?: string;
  violations: OutputViolation[];
};

export type ValidateModelOutputResult = ValidateModelOutputOk | ValidateModelOutputFailed;

function collectStringLeaves(value: unknown): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.flatMap((entry) => collectStringLeaves(entry));
  }
  if (value && typeof value === "object") {
    return Object.values(value).flatMap((entry) => collectStringLeaves(entry));
  }
  return [];
}

export function stripMarkdownFence(text: string): { text: string; wrapped: boolean } {
  const trimmed = text.trim();
  if (!trimmed.startsWith("```") || !trimmed.endsWith("```") || trimmed.length < 6) {
    return { text: trimmed, wrapped: false };
  }

  const inner = trimmed
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/i, "");
  return { text: inner.trim(), wrapped: true };
}

export function extractWrappedJson(text: string): { jsonText: string; parsed: unknown } | null {
  const firstObject = text.indexOf("{");
  const firstArray = text.indexOf("[");
  const firstIndex = [firstObject, firstArray]
    .filter((index) => index >= 0)
    .reduce((minimum, current) => (minimum < 0 ? current : Math.min(minimum, current)), -1);

  if (firstIndex < 0) {
    return null;
  }

  const endChar = text[firstIndex] === "{" ? "}" : "]";
  const lastIndex = text.lastIndexOf(endChar);
  if (lastIndex <= firstIndex) {
    return null;
  }

  const candidate = text.slice(firstIndex, lastIndex + 1).trim();
  try {
    const parsed: unknown = JSON.parse(candidate);
    return { jsonText: candidate, parsed };
  } catch {
    return null;
  }
}

function checkProhibitedPatterns(stringsToScan: readonly string[]): OutputViolation[] {
  const violations: OutputViolation[] = [];

  for (const pattern of PLAN_PROHIBITED_PATTERNS) {
    if (stringsToScan.some((value) => pattern.pattern.test(value))) {
      violations.push({ code: pattern.code, message: pattern.message });
    }
  }

  return violations;
}

export function validateModelOutput(args: ValidateModelOutputArgs): ValidateModelOutputResult {
  const trimmed = args.rawText.trim();
  const requireJson = args.requireJson ?? false;

  if (!trimmed) {
    return {
      ok: false,
      violations: [{ code: "empty_output", message: "Model output is empty." }],
    };
  }

  const violations: OutputViolation[] = [];
  const seen = new Set<string>();
  const pushViolation = (code: string, message: string): void => {
    if (seen.has(code)) {
      return;
    }
    seen.add(code);
    violations.push({ code, message });
  };

  let sanitizedText = trimmed;
  let parsedJson: unknown = null;

  if (requireJson) {
    const unwrapped = stripMarkdownFence(trimmed);
    sanitizedText = unwrapped.text;
    if (unwrapped.wrapped) {
      pushViolation(
        "output_wrapper_detected",
        "Model output must be raw JSON without markdown or prose wrappers.",
      );
    }

    try {
      parsedJson = JSON.parse(sanitizedText);
    } catch {
      const wrappedJson = extractWrappedJson(trimmed);
      if (!wrappedJson) {
        pushViolation("invalid_json", "Model output is not valid JSON.");
        return {
          ok: false,
          sanitizedText,
          violations,
        };
      }

      parsedJson = wrappedJson.parsed;
      sanitizedText = wrappedJson.jsonText;
      pushViolation(
        "output_wrapper_detected",
        "Model output must be raw JSON without markdown or prose wrappers.",
      );
    }
  }

  const stringsToScan = requireJson && parsedJson != null
    ? collectStringLeaves(parsedJson)
    : [sanitizedText];
  for (const violation of checkProhibitedPatterns(stringsToScan)) {
    pushViolation(violation.code, violation.message);
  }

  if (violations.length > 0) {
    return {
      ok: false,
      sanitizedText,
      violations,
    };
  }

  return {
    ok: true,
    sanitizedText,
  };
}
