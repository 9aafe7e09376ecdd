import { createHash } from "node:crypto";
import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";

import { createLogger, type StructuredLogger } from "../observability/logger.ts";
import type { ActivityPlan } from "../plans/activity-plan.ts";

export const REPORT_REASONS = [
  "Unsicher / Unsafe",
  "Unpassend / Not relevant",
  "Faktisch falsch / Factually wrong",
  "Sonstiges / Other",
] as const;

export type PlanReport = {
  timestamp_utc: string;
  plan_hash: string;
  reason: string;
};

export interface PlanReportRepository {
  append(report: PlanReport): Promise<void>;
  /** Newest first. */
  listLatest(limit: number): Promise<PlanReport[]>;
}

export type PlanReportErrorCode = "invalid_reason" | "store_failed";

export class PlanReportError extends Error {
  readonly code: PlanReportErrorCode;

  constructor(code: PlanReportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "PlanReportError";
    this.code = code;
  }
}

/** JSON with keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function hashPlan(plan: ActivityPlan): string {
  return createHash("sha256").update(canonicalJson(plan), "utf8").digest("hex");
}

/** Stores only the plan hash and reason; plan text never leaves the process. */
export async function savePlanReport(
  repository: PlanReportRepository,
  input: { plan: ActivityPlan; reason: string; now?: Date },
  options: { logger?: StructuredLogger; correlation_id?: string | null } = {},
): Promise<PlanReport> {
  const reason = input.reason.trim();
  if (!reason) {
    throw new PlanReportError("invalid_reason", "Report reason must not be empty.");
  }

  const report: PlanReport = {
    timestamp_utc: (input.now ?? new Date()).toISOString(),
    plan_hash: hashPlan(input.plan),
    reason,
  };
  await repository.append(report);

  const logger = options.logger ?? createLogger();
  logger({
    event: "report.plan_reported",
    correlation_id: options.correlation_id ?? null,
    payload: { plan_hash: report.plan_hash, reason: report.reason },
  });
  return report;
}

export function createJsonlPlanReportRepository(path: string): PlanReportRepository {
  return {
    async append(report) {
      try {
        await mkdir(dirname(path), { recursive: true });
        await appendFile(path, `${JSON.stringify(report)}\n`, "utf8");
      } catch (error) {
        throw new PlanReportError("store_failed", "Failed to append plan report.", { cause: error });
      }
    },

    async listLatest(limit) {
      let content: string;
      try {
        content = await readFile(path, "utf8");
      } catch (error) {
        if (isMissingFileError(error)) {
          return [];
        }
        throw new PlanReportError("store_failed", "Failed to read plan reports.", { cause: error });
      }

      const reports = content
        .split("\n")
        .map((line) => line.trim())
        .filter(Boolean)
        .map(parseReportLine)
        .filter((report): report is PlanReport => report !== null);
      return newestFirst(reports, limit);
    },
  };
}

export function createInMemoryPlanReportRepository(initial: readonly PlanReport[] = []): PlanReportRepository & {
  readonly reports: PlanReport[];
} {
  const reports = [...initial];
  return {
    reports,
    async append(report) {
      reports.push(report);
    },
    async listLatest(limit) {
      return newestFirst(reports, limit);
    },
  };
}

function newestFirst(reports: readonly PlanReport[], limit: number): PlanReport[] {
  if (limit <= 0) {
    return [];
  }
  return reports.slice(Math.max(0, reports.length - limit)).reverse();
}

function parseReportLine(line: string): PlanReport | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  const timestamp = "timestamp_utc" in parsed ? parsed.timestamp_utc : null;
  const planHash = "plan_hash" in parsed ? parsed.plan_hash : null;
  const reason = "reason" in parsed ? parsed.reason : null;
  if (typeof timestamp !== "string" || typeof planHash !== "string" || typeof reason !== "string") {
    return null;
  }
  return { timestamp_utc: timestamp, plan_hash: planHash, reason };
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(Reflect.get(value, key))]),
    );
  }
  return value;
}
