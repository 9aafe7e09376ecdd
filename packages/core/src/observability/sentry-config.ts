import { normalizeRuntimeEnv, type RuntimeEnv } from "./runtime-env.ts";

export type ResolveSentryRuntimeConfigInput = {
  dsn?: string | null;
  environment?: string | null;
  release?: string | null;
};

export type SentryRuntimeConfig = {
  dsn: string | null;
  environment: RuntimeEnv;
  release: string | null;
  enabled: boolean;
  tracesSampleRate: number;
};

/** Sentry stays off locally even when a DSN is present. */
export function resolveSentryRuntimeConfig(
  input: ResolveSentryRuntimeConfigInput,
): SentryRuntimeConfig {
  const dsn = normalizeString(input.dsn);
  const environment = normalizeRuntimeEnv(input.environment);

  return {
    dsn,
    environment,
    release: normalizeString(input.release),
    enabled: dsn !== null && environment !== "local",
    tracesSampleRate: environment === "staging" ? 1.0 : 0.1,
  };
}

function normalizeString(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
