import type {
  PlanReport,
  PlanReportRepository,
} from "../../../core/src/reports/plan-reports.ts";
import type { DbClient } from "../client.ts";
import { DB_ERROR_CODES, DbError } from "../errors.ts";

export const PLAN_REPORTS_TABLE = "plan_reports";

export type PlanReportRow = {
  reported_at: string;
  plan_hash: string;
  reason: string;
};

function toRow(report: PlanReport): PlanReportRow {
  return {
    reported_at: report.timestamp_utc,
    plan_hash: report.plan_hash,
    reason: report.reason,
  };
}

function fromRow(row: unknown): PlanReport {
  if (
    !row ||
    typeof row !== "object" ||
    !("reported_at" in row) ||
    !("plan_hash" in row) ||
    !("reason" in row) ||
    typeof row.reported_at !== "string" ||
    typeof row.plan_hash !== "string" ||
    typeof row.reason !== "string"
  ) {
    throw new DbError(DB_ERROR_CODES.UNEXPECTED_RESPONSE, "Plan report row has an unexpected shape.", {
      status: 500,
      context: { table: PLAN_REPORTS_TABLE },
    });
  }
  return {
    timestamp_utc: new Date(row.reported_at).toISOString(),
    plan_hash: row.plan_hash,
    reason: row.reason,
  };
}

/** Insert a plan report row. */
export async function insertPlanReport(db: DbClient, report: PlanReport): Promise<void> {
  const { error } = await db.from(PLAN_REPORTS_TABLE).insert(toRow(report));

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to insert plan report.", {
      status: 500,
      cause: error,
      context: { plan_hash: report.plan_hash, table: PLAN_REPORTS_TABLE },
    });
  }
}

/** Newest reports first. */
export async function listLatestPlanReports(db: DbClient, limit: number): Promise<PlanReport[]> {
  const { data, error } = await db
    .from(PLAN_REPORTS_TABLE)
    .select("reported_at, plan_hash, reason")
    .order("reported_at", { ascending: false })
    .limit(limit);

  if (error) {
    throw new DbError(DB_ERROR_CODES.QUERY_FAILED, "Unable to list plan reports.", {
      status: 500,
      cause: error,
      context: { limit, table: PLAN_REPORTS_TABLE },
    });
  }

  if (!Array.isArray(data)) {
    return [];
  }
  return data.map((row: unknown) => fromRow(row));
}

export function createSupabasePlanReportRepository(db: DbClient): PlanReportRepository {
  return {
    append: (report) => insertPlanReport(db, report),
    listLatest: (limit) => listLatestPlanReports(db, limit),
  };
}
