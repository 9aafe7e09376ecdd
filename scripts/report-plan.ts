import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";

import { flushSentry, installNodeSentryBridge } from "../app/lib/sentry.ts";
import { loadAppConfig, type AppConfig } from "../packages/core/src/config/app-config.ts";
import { parsePlanExport } from "../packages/core/src/exports/plan-export.ts";
import { EVENTS } from "../packages/core/src/observability/events.ts";
import { createLogger } from "../packages/core/src/observability/logger.ts";
import {
  createJsonlPlanReportRepository,
  REPORT_REASONS,
  savePlanReport,
  type PlanReportRepository,
} from "../packages/core/src/reports/plan-reports.ts";
import { createDbClient, createSupabasePlanReportRepository } from "../packages/db/src/index.ts";

const USAGE = `Usage: report-plan <plan-export.json> [reason]\nReasons: ${REPORT_REASONS.join(" | ")}\n`;

const correlationId = randomUUID();
const logger = createLogger({ correlation_id: correlationId });

function resolveRepository(config: AppConfig): PlanReportRepository {
  if (config.supabase_url && config.supabase_service_role_key) {
    return createSupabasePlanReportRepository(
      createDbClient({
        env: {
          SUPABASE_URL: config.supabase_url,
          SUPABASE_SERVICE_ROLE_KEY: config.supabase_service_role_key,
        },
      }),
    );
  }
  return createJsonlPlanReportRepository(config.plan_reports_path);
}

async function run(): Promise<void> {
  const [exportPath, ...reasonWords] = process.argv.slice(2);
  if (!exportPath) {
    process.stderr.write(USAGE);
    process.exitCode = 2;
    return;
  }

  const config = loadAppConfig();
  installNodeSentryBridge({
    dsn: config.sentry_dsn,
    environment: config.sentry_environment ?? config.app_env,
    release: config.sentry_release,
  });

  const planExport = parsePlanExport(await readFile(exportPath, "utf8"));
  const reason = reasonWords.join(" ").trim() || REPORT_REASONS[0];
  const report = await savePlanReport(
    resolveRepository(config),
    { plan: planExport.plan, reason },
    { logger, correlation_id: correlationId },
  );
  process.stdout.write(`${report.plan_hash}\n`);
}

run()
  .catch((error: unknown) => {
    process.exitCode = 1;
    logger({
      event: EVENTS.system.unhandledError,
      level: "error",
      payload: {
        phase: "report_plan",
        error_name: error instanceof Error ? error.name : "UnknownError",
        error_message: error instanceof Error ? error.message : String(error),
      },
    });
  })
  .finally(() => flushSentry());
