export const DB_ERROR_CODES = {
  MISSING_ENV: "DB_MISSING_ENV",
  INVALID_ENV: "DB_INVALID_ENV",
  CLIENT_INIT_FAILED: "DB_CLIENT_INIT_FAILED",
  QUERY_FAILED: "DB_QUERY_FAILED",
  UNEXPECTED_RESPONSE: "DB_UNEXPECTED_RESPONSE",
} as const;

export type DbErrorCode = (typeof DB_ERROR_CODES)[keyof typeof DB_ERROR_CODES];

const SENSITIVE_KEY_PATTERN = /(url|key|secret|token|authorization|password)/i;
export const REDACTED = "[REDACTED]";

export function sanitizeForError(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeForError(entry));
  }
  if (value && typeof value === "object") {
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeForError(entry);
    }
    return sanitized;
  }
  return value;
}

export class DbError extends Error {
  readonly code: DbErrorCode;
  readonly status: number;
  readonly context: unknown;
  readonly transient: boolean;

  constructor(
    code: DbErrorCode,
    message: string,
    options: {
      status?: number;
      context?: unknown;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DbError";
    this.code = code;
    this.status = options.status ?? 500;
    this.context = sanitizeForError(options.context ?? null);
    this.transient = code === DB_ERROR_CODES.QUERY_FAILED && this.status >= 500;
  }

  toJSON(): {
    name: string;
    code: DbErrorCode;
    message: string;
    status: number;
    context: unknown;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: DbErrorCode;
    message: string;
    error: unknown;
    status?: number;
    context?: unknown;
  }): DbError {
    if (params.error instanceof DbError) {
      return params.error;
    }
    return new DbError(params.code, params.message, {
      status: params.status,
      context: params.context,
      cause: params.error,
    });
  }
}

export function assertRequiredEnv(name: string, value: string | undefined | null): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new DbError(DB_ERROR_CODES.MISSING_ENV, `Missing required env var: ${name}`, {
      status: 500,
      context: { env_var: name },
    });
  }
  return value.trim();
}
