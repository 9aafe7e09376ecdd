export type RuntimeEnv = "local" | "staging" | "production";

export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return null;
}

export function normalizeRuntimeEnv(raw: string | null | undefined): RuntimeEnv {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "staging") {
    return "staging";
  }
  if (value === "production" || value === "prod") {
    return "production";
  }
  return "local";
}

export function detectRuntimeEnv(): RuntimeEnv {
  return normalizeRuntimeEnv(
    readEnv("APP_ENV") ?? readEnv("SENTRY_ENVIRONMENT") ?? readEnv("NODE_ENV"),
  );
}
