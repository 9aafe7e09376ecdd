export {
  DB_ERROR_CODES,
  DbError,
  assertRequiredEnv,
  sanitizeForError,
  type DbErrorCode,
} from "./errors.ts";
export { createDbClient, type DbClient, type CreateDbClientParams } from "./client.ts";
export {
  PLAN_REPORTS_TABLE,
  createSupabasePlanReportRepository,
  insertPlanReport,
  listLatestPlanReports,
  type PlanReportRow,
} from "./queries/plan-reports.ts";
