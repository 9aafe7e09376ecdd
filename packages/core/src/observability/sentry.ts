import type { LogLevel } from "./logger.ts";
import { redactPII } from "./redaction.ts";

export type SentryContext = {
  correlation_id?: string | null;
  adventure_id?: string | null;
  category?: string | null;
  tags?: Record<string, string | number | boolean | null | undefined>;
};

export type SentryCaptureInput = {
  level?: LogLevel;
  event?: string;
  context?: SentryContext;
  payload?: Record<string, unknown>;
};

export type SentrySpanOptions = {
  name: string;
  op?: string;
  attributes?: Record<string, unknown>;
};

/**
 * Runtime-agnostic surface over the Sentry SDK. The core only talks to this
 * bridge; `app/lib/sentry.ts` registers the `@sentry/node` implementation.
 */
export type SentryBridge = {
  captureException: (error: unknown, input?: SentryCaptureInput) => void;
  captureMessage: (message: string, input?: SentryCaptureInput) => void;
  startSpan: <T>(options: SentrySpanOptions, callback: () => T) => T;
  withScope: <T>(context: SentryContext, callback: () => T) => T;
  setContext: (context: SentryContext) => void;
};

let activeBridge: SentryBridge | null = null;

export function registerSentryBridge(bridge: SentryBridge | null): void {
  activeBridge = bridge;
}

export function setSentryContext(context: SentryContext): void {
  callBridge((bridge) => bridge.setContext(context));
}

export function captureSentryException(error: unknown, input?: SentryCaptureInput): void {
  callBridge((bridge) => bridge.captureException(error, input));
}

export function captureSentryMessage(message: string, input?: SentryCaptureInput): void {
  callBridge((bridge) => bridge.captureMessage(message, input));
}

export function withSentryContext<T>(context: SentryContext, callback: () => T): T {
  const bridge = activeBridge;
  if (!bridge) {
    return callback();
  }
  return bridge.withScope(context, callback);
}

export function startSentrySpan<T>(options: SentrySpanOptions, callback: () => T): T {
  const bridge = activeBridge;
  if (!bridge) {
    return callback();
  }
  return bridge.startSpan(options, callback);
}

export function createSentryBeforeSend() {
  return function beforeSend<T>(event: T): T {
    return redactPII(event);
  };
}

export function captureSentryFromStructuredLog(logEvent: {
  level: LogLevel;
  event: string;
  category: string;
  correlation_id: string | null;
  payload: Record<string, unknown>;
}): void {
  if (logEvent.level !== "error" && logEvent.level !== "fatal") {
    return;
  }

  const input: SentryCaptureInput = {
    level: logEvent.level,
    event: logEvent.event,
    context: {
      category: logEvent.category,
      correlation_id: logEvent.correlation_id,
      adventure_id: readString(logEvent.payload.adventure_id),
    },
    payload: logEvent.payload,
  };

  const payloadError = logEvent.payload.error;
  if (payloadError instanceof Error) {
    captureSentryException(payloadError, input);
    return;
  }

  const errorMessage = readString(logEvent.payload.error_message);
  if (errorMessage) {
    const syntheticError = new Error(errorMessage);
    syntheticError.name = readString(logEvent.payload.error_name) ?? "StructuredLogError";
    captureSentryException(syntheticError, input);
    return;
  }

  captureSentryMessage(`structured_log.${logEvent.event}`, input);
}

function callBridge(action: (bridge: SentryBridge) => void): void {
  const bridge = activeBridge;
  if (!bridge) {
    return;
  }
  try {
    action(bridge);
  } catch {
    // Sentry delivery is best-effort.
  }
}

function readString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
