import { randomUUID } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { flushSentry, installNodeSentryBridge } from "../app/lib/sentry.ts";
import { loadAdventureCatalog } from "../packages/core/src/catalog/catalog-loader.ts";
import { loadAppConfig, type AppConfig } from "../packages/core/src/config/app-config.ts";
import {
  dailyCriteriaFromConfig,
  localDateInTimezone,
  runDailyPick,
} from "../packages/core/src/daily/daily-pick.ts";
import { EVENTS } from "../packages/core/src/observability/events.ts";
import { createLogger } from "../packages/core/src/observability/logger.ts";
import { withSentryContext } from "../packages/core/src/observability/sentry.ts";
import type { PlanMode } from "../packages/core/src/plans/plan-builder.ts";
import { createOpenMeteoWeatherClient } from "../packages/core/src/weather/open-meteo-client.ts";
import { createActivityPlanGenerator, createAnthropicProvider } from "../packages/llm/src/index.ts";

const correlationId = randomUUID();
const logger = createLogger({ correlation_id: correlationId });

function readMode(argv: readonly string[]): PlanMode {
  return argv.includes("--parent-script") ? "parent_script" : "standard";
}

function buildGenerator(config: AppConfig) {
  if (!config.enable_llm) {
    return null;
  }
  return createActivityPlanGenerator({
    provider: createAnthropicProvider({
      apiKey: config.anthropic_api_key,
      model: config.llm_model,
      maxOutputTokens: config.llm_max_output_tokens,
    }),
    maxInputChars: config.llm_max_input_chars,
    maxOutputTokens: config.llm_max_output_tokens,
    timeoutMs: config.llm_timeout_ms,
    logger,
    correlationId,
  });
}

async function run(): Promise<void> {
  const config = loadAppConfig();
  installNodeSentryBridge({
    dsn: config.sentry_dsn,
    environment: config.sentry_environment ?? config.app_env,
    release: config.sentry_release,
  });

  const catalog = loadAdventureCatalog();
  logger({
    event: EVENTS.catalog.loaded,
    payload: { adventure_count: catalog.length },
  });

  const now = new Date();
  const date = localDateInTimezone(now, config.timezone);
  const result = await runDailyPick({
    catalog,
    criteria: dailyCriteriaFromConfig(config, date),
    weatherClient: config.enable_weather
      ? createOpenMeteoWeatherClient({ timezone: config.timezone })
      : null,
    generator: buildGenerator(config),
    mode: readMode(process.argv.slice(2)),
    timezone: config.timezone,
    now,
    logger,
    correlation_id: correlationId,
  });

  await mkdir(config.output_dir, { recursive: true });
  const baseName = `${date}-${result.adventure.id}`;
  const files = [
    { name: `${baseName}.md`, content: result.markdown },
    { name: `${baseName}.ics`, content: result.ics },
    { name: `${baseName}.json`, content: result.json },
  ];
  for (const file of files) {
    await writeFile(join(config.output_dir, file.name), file.content, "utf8");
  }

  logger({
    event: EVENTS.daily.exportsWritten,
    payload: {
      output_dir: config.output_dir,
      files: files.map((file) => file.name),
    },
  });
}

withSentryContext({ correlation_id: correlationId, category: "daily" }, run)
  .catch((error: unknown) => {
    process.exitCode = 1;
    logger({
      event: EVENTS.system.unhandledError,
      level: "error",
      payload: {
        phase: "daily_pick",
        error_name: error instanceof Error ? error.name : "UnknownError",
        error_message: error instanceof Error ? error.message : String(error),
      },
    });
  })
  .finally(() => flushSentry());
