import { describe, expect, it } from "vitest";
import { redactFreeText, redactPII } from "../../packages/core/src/observability/redaction.ts";

describe("redactFreeText", () => {
  it("redacts names and street addresses parents type into constraints", () => {
    expect(redactFreeText("Mein Name ist Anna Becker, wir wohnen in der Lindenstraße 12.")).toBe(
      "Mein Name ist [REDACTED_NAME], wir wohnen in der [REDACTED_ADDRESS].",
    );
  });

  it("redacts email addresses and phone numbers", () => {
    expect(redactFreeText("Schreib an eltern@example.com oder ruf +49 30 1234567 an")).toBe(
      "Schreib an [REDACTED_EMAIL] oder ruf [REDACTED_PHONE] an",
    );
  });

  it("keeps short numbers and ordinary sentences", () => {
    expect(redactFreeText("Wir haben 2 Kinder und 3 Bälle")).toBe("Wir haben 2 Kinder und 3 Bälle");
  });
});

describe("redactPII", () => {
  it("replaces free-text keys before descending into their values", () => {
    expect(redactPII({ notes_text: ["Lindenstraße 12"], items: ["call +49 170 1234567"] })).toEqual({
      notes_text: "[REDACTED_FREE_TEXT]",
      items: ["call [REDACTED_PHONE]"],
    });
  });

  it("marks circular references and leaves errors intact", () => {
    const error = new Error("boom");
    const payload: Record<string, unknown> = { label: "root", error };
    payload.self = payload;

    const redacted = redactPII(payload);

    expect(redacted.label).toBe("root");
    expect(redacted.error).toBe(error);
    expect(redacted.self).toBe("[Circular]");
  });
});
