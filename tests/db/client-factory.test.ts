import { describe, expect, it, vi } from "vitest";
import WebSocket from "ws";

import { createDbClient, type DbCreateClientImpl } from "../../packages/db/src/client.ts";
import { DbError } from "../../packages/db/src/errors.ts";

function captureDbError(action: () => unknown): DbError {
  try {
    action();
  } catch (error) {
    if (error instanceof DbError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a DbError");
}

const env = {
  SUPABASE_URL: "https://example.supabase.co",
  SUPABASE_SERVICE_ROLE_KEY: "test-secret",
};

describe("packages/db client factory", () => {
  it("fails fast when SUPABASE_URL is missing", () => {
    const error = captureDbError(() => createDbClient({ env: { SUPABASE_SERVICE_ROLE_KEY: "test-secret" } }));

    expect(error.code).toBe("DB_MISSING_ENV");
    expect(error.message).toBe("Missing required env var: SUPABASE_URL");
  });

  it("fails fast when SUPABASE_SERVICE_ROLE_KEY is missing", () => {
    expect(() => createDbClient({ env: { SUPABASE_URL: "https://example.supabase.co" } })).toThrowError(
      "Missing required env var: SUPABASE_SERVICE_ROLE_KEY",
    );
  });

  it("rejects a URL without an http scheme", () => {
    const error = captureDbError(() => createDbClient({ env: { ...env, SUPABASE_URL: "example.supabase.co" } }));

    expect(error.code).toBe("DB_INVALID_ENV");
    expect(error.message).toBe("SUPABASE_URL must be an http(s) URL");
  });

  it("builds a real client on Node.js without a global WebSocket", () => {
    const client = createDbClient({ env });

    expect(typeof client.from).toBe("function");
  });

  it("creates a client that never persists sessions and uses the ws transport", () => {
    const client = createDbClient({ env });
    const createClientImpl = vi.fn<DbCreateClientImpl>(() => client);

    expect(createDbClient({ env, createClientImpl, clientOptions: { db: { schema: "public" } } })).toBe(client);
    expect(createClientImpl).toHaveBeenCalledWith("https://example.supabase.co", "test-secret", {
      db: { schema: "public" },
      realtime: { transport: WebSocket },
      auth: { persistSession: false, autoRefreshToken: false },
    });
  });

  it("wraps client construction failures", () => {
    const error = captureDbError(() =>
      createDbClient({
        env,
        createClientImpl: () => {
          throw new Error("boom");
        },
      })
    );

    expect(error.code).toBe("DB_CLIENT_INIT_FAILED");
    expect(error.toJSON().context).toEqual({ supabase_url: "[REDACTED]" });
  });
});
