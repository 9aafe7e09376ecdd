import { describe, expect, it, vi } from "vitest";

import { createDbClient } from "../../packages/db/src/client.ts";
import { DbError } from "../../packages/db/src/errors.ts";
import {
  createSupabasePlanReportRepository,
  insertPlanReport,
  listLatestPlanReports,
} from "../../packages/db/src/queries/plan-reports.ts";

type FakeReply = { status: number; body: unknown };

function createFakeDb(reply: FakeReply) {
  const fetchImpl = vi.fn<typeof fetch>(async () =>
    new Response(reply.body === null ? null : JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "content-type": "application/json" },
    })
  );
  const db = createDbClient({
    env: { SUPABASE_URL: "https://example.supabase.co", SUPABASE_SERVICE_ROLE_KEY: "test-secret" },
    clientOptions: { global: { fetch: fetchImpl } },
  });
  const lastRequest = () => {
    const call = fetchImpl.mock.calls.at(-1);
    return { url: new URL(String(call?.[0])), method: call?.[1]?.method, body: call?.[1]?.body };
  };
  return { db, lastRequest };
}

async function captureDbError(promise: Promise<unknown>): Promise<DbError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DbError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a DbError");
}

const report = {
  timestamp_utc: "2026-05-02T07:00:00.000Z",
  plan_hash: "ab".repeat(32),
  reason: "Unsicher / Unsafe",
};

describe("plan report queries", () => {
  it("inserts a row into plan_reports", async () => {
    const { db, lastRequest } = createFakeDb({ status: 201, body: null });

    await insertPlanReport(db, report);

    const request = lastRequest();
    expect(request.method).toBe("POST");
    expect(request.url.pathname).toBe("/rest/v1/plan_reports");
    expect(JSON.parse(String(request.body))).toEqual({
      reported_at: "2026-05-02T07:00:00.000Z",
      plan_hash: "ab".repeat(32),
      reason: "Unsicher / Unsafe",
    });
  });

  it("wraps insert failures", async () => {
    const { db } = createFakeDb({ status: 400, body: { message: "violates check constraint", code: "23514" } });

    const error = await captureDbError(insertPlanReport(db, report));

    expect(error.code).toBe("DB_QUERY_FAILED");
    expect(error.message).toBe("Unable to insert plan report.");
    expect(error.context).toEqual({ plan_hash: "ab".repeat(32), table: "plan_reports" });
  });

  it("lists the newest reports first", async () => {
    const { db, lastRequest } = createFakeDb({
      status: 200,
      body: [
        { reported_at: "2026-05-02T07:00:00+00:00", plan_hash: "h2", reason: "second" },
        { reported_at: "2026-05-01T07:00:00+00:00", plan_hash: "h1", reason: "first" },
      ],
    });

    const reports = await listLatestPlanReports(db, 2);

    expect(reports).toEqual([
      { timestamp_utc: "2026-05-02T07:00:00.000Z", plan_hash: "h2", reason: "second" },
      { timestamp_utc: "2026-05-01T07:00:00.000Z", plan_hash: "h1", reason: "first" },
    ]);
    const { url } = lastRequest();
    expect(url.searchParams.get("select")).toBe("reported_at,plan_hash,reason");
    expect(url.searchParams.get("order")).toBe("reported_at.desc");
    expect(url.searchParams.get("limit")).toBe("2");
  });

  it("rejects rows with an unexpected shape", async () => {
    const { db } = createFakeDb({ status: 200, body: [{ plan_hash: "h1" }] });

    const error = await captureDbError(listLatestPlanReports(db, 5));

    expect(error.code).toBe("DB_UNEXPECTED_RESPONSE");
  });

  it("exposes the queries as a report repository", async () => {
    const { db, lastRequest } = createFakeDb({ status: 201, body: null });
    const repository = createSupabasePlanReportRepository(db);

    await repository.append(report);

    expect(lastRequest().url.pathname).toBe("/rest/v1/plan_reports");
  });

  it("treats server errors as transient", async () => {
    const { db } = createFakeDb({ status: 500, body: { message: "unavailable" } });

    const error = await captureDbError(listLatestPlanReports(db, 5));

    expect(error.message).toBe("Unable to list plan reports.");
    expect(error.transient).toBe(true);
  });
});
