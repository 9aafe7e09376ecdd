const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;
const ADDRESS_PATTERN =
  /(?<![\p{L}\p{N}])\p{Lu}[\p{Ll}ß]+(?:\s+\p{Lu}[\p{Ll}ß]+){0,3}\s+\d{1,4}[a-zA-Z]?(?![\p{L}\p{N}])/gu;
const NAME_INTRO_PATTERN =
  /([Mm]ein\s+[Nn]ame\s+ist|[Mm]y\s+[Nn]ame\s+is|[Ii]ch\s+hei(?:ß|ss)e)\s+(\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+){0,2})/gu;

const FORBIDDEN_PLAN_TEXT_KEY_PATTERN =
  /^(plan_text|rejected_plan|raw_plan|model_output|raw_output|user_prompt)$/i;
const FORBIDDEN_FREE_TEXT_KEY_PATTERN =
  /(^|[_-])(constraints|free_text|reason_text|notes_text)$/i;

export const REDACTED_PLAN_TEXT = "[REDACTED_PLAN_TEXT]";
export const REDACTED_FREE_TEXT = "[REDACTED_FREE_TEXT]";

export function redactPII<T>(input: T): T {
  const seen = new WeakSet<object>();
  return redactValue(input, "", seen) as T;
}

/**
 * Redacts identifiers a parent may type into free-text fields (email, phone,
 * street address, "my name is ...") before the text leaves the process.
 */
export function redactFreeText(text: string): string {
  let redacted = text.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redactPhoneNumbers(redacted);
  redacted = redacted.replace(ADDRESS_PATTERN, "[REDACTED_ADDRESS]");
  redacted = redacted.replace(
    NAME_INTRO_PATTERN,
    (_match, intro: string) => `${intro} [REDACTED_NAME]`,
  );
  return redacted;
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (FORBIDDEN_PLAN_TEXT_KEY_PATTERN.test(keyName)) {
    return REDACTED_PLAN_TEXT;
  }
  if (FORBIDDEN_FREE_TEXT_KEY_PATTERN.test(keyName)) {
    return REDACTED_FREE_TEXT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (input instanceof Error) {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  return redactPhoneNumbers(input.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]"));
}

function redactPhoneNumbers(input: string): string {
  return input.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
}
