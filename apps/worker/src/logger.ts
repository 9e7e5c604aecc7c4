import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// Each dispatch cycle runs inside withTraceAsync(), so the reserve, lease,
// send and commit logs of one recipient share a traceId.
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/** Short trace ID (12 chars, base64url) */
function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.email.info({ recipientId, to }, "sent")
//
// FAILURE (detailed, warn/error level):
//   log.email.warn({ recipientId, kind, reason, attempts }, "failed")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (config.NODE_ENV === "production" ? "info" : "debug"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Never let a provider credential reach the log stream
  redact: {
    paths: ["apiKey", "*.apiKey", "credential", "*.credential"],
    censor: "[redacted]",
  },

  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Dispatch units and the supervisor
  dispatch: logger.child({ component: "dispatch" }),

  // Quota reservations and denials
  quota: logger.child({ component: "quota" }),

  // Recipient leasing and commits
  queue: logger.child({ component: "queue" }),

  // Individual email operations
  email: logger.child({ component: "email" }),

  // Provider calls (Brevo, Resend, mock)
  provider: logger.child({ component: "provider" }),

  // Database operations
  db: logger.child({ component: "db" }),

  // Ops HTTP server
  api: logger.child({ component: "api" }),

  // System-level events
  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000;
}
