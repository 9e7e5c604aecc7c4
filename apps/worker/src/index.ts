import { sql } from "drizzle-orm";
import { config } from "./config.js";
import { db, closeDb } from "./db.js";
import { log } from "./logger.js";
import { buildOpsServer } from "./api.js";
import { SystemClock } from "./domain/utils/time.js";
import { createEmailProvider } from "./providers/index.js";
import {
  PgConfigurationProvider,
  PgQuotaRepository,
  PgRecipientRepository,
} from "./repositories/index.js";
import { DispatchUnit } from "./services/dispatch-unit.js";
import { Dispatcher } from "./services/dispatcher.js";
import { OutcomeRecorder } from "./services/outcome-sink.js";
import { QuotaTracker } from "./services/quota-tracker.js";
import { RecipientQueue } from "./services/recipient-queue.js";
import { SendExecutor } from "./services/send-executor.js";
import { FileTemplateSource } from "./services/template-source.js";

// =============================================================================
// Wiring
// =============================================================================

const clock = new SystemClock();

const configurations = new PgConfigurationProvider(db);
const quota = new QuotaTracker(new PgQuotaRepository(db), clock, {
  dayWindowMode: config.QUOTA_DAY_WINDOW,
});
const queue = new RecipientQueue(new PgRecipientRepository(db), clock);
const templates = new FileTemplateSource({
  directory: config.TEMPLATES_DIR,
  fallbackTemplate: config.DEFAULT_TEMPLATE,
});
const executor = new SendExecutor(createEmailProvider(config), {
  sendTimeoutMs: config.SEND_TIMEOUT_MS,
  titleCaseNames: config.TITLE_CASE_NAMES,
});
const recorder = new OutcomeRecorder();

const dispatcher = new Dispatcher(
  configurations,
  (userId) =>
    new DispatchUnit(
      userId,
      { configurations, templates, quota, queue, executor, sink: recorder, clock },
      {
        maxAttempts: config.MAX_ATTEMPTS,
        leaseTimeoutMs: config.LEASE_TIMEOUT_MS,
        pollIntervalMs: config.POLL_INTERVAL_MS,
        storageRetryBaseMs: config.STORAGE_RETRY_BASE_MS,
        storageRetryMaxMs: config.STORAGE_RETRY_MAX_MS,
      }
    ),
  { pollIntervalMs: config.POLL_INTERVAL_MS }
);

const app = buildOpsServer({
  dispatcher,
  queue,
  quota,
  configurations,
  recorder,
  checkDatabase: async () => {
    await db.execute(sql`select 1`);
    return true;
  },
  exposeErrorDetails: config.NODE_ENV !== "production",
});

// =============================================================================
// Startup
// =============================================================================

try {
  await app.listen({ port: config.PORT, host: "0.0.0.0" });
  await dispatcher.start();

  log.system.info({
    port: config.PORT,
    provider: config.EMAIL_PROVIDER,
    units: dispatcher.status().length,
    dayWindow: config.QUOTA_DAY_WINDOW,
    maxAttempts: config.MAX_ATTEMPTS,
  }, "worker started");
} catch (err) {
  log.system.error({ error: err instanceof Error ? err.message : String(err) }, "startup failed");
  process.exit(1);
}

// =============================================================================
// Graceful shutdown
// =============================================================================

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, name: string): Promise<T | void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<void>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } catch (error) {
    log.system.warn({ error: error instanceof Error ? error.message : String(error), component: name }, "shutdown timeout");
  } finally {
    clearTimeout(timer);
  }
}

async function shutdown(): Promise<void> {
  log.system.info({ timeoutMs: config.SHUTDOWN_TIMEOUT_MS }, "shutting down");

  const shutdownStart = Date.now();

  // Phase 1: Stop accepting requests
  log.system.debug({}, "Phase 1: Close ops server");
  await withTimeout(app.close(), 2000, "Fastify");

  // Phase 2: Stop leasing, let sends in progress commit
  log.system.debug({}, "Phase 2: Drain dispatch units");
  const { drained } = await dispatcher.shutdown(config.SEND_TIMEOUT_MS + 1000);
  if (!drained) {
    log.system.warn({}, "sends still in progress; their leases will be reclaimed on next start");
  }

  // Phase 3: Close connections
  log.system.debug({}, "Phase 3: Close connections");
  await withTimeout(closeDb(), 5000, "Postgres");

  log.system.info({ durationMs: Date.now() - shutdownStart }, "shutdown complete");
  process.exit(0);
}

// Force exit if graceful shutdown takes too long
let shutdownInProgress = false;
async function initiateShutdown(): Promise<void> {
  if (shutdownInProgress) {
    log.system.warn({}, "shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shutdownInProgress = true;

  const forceExitTimer = setTimeout(() => {
    log.system.error({}, "shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, config.SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref(); // Don't keep process alive

  await shutdown();
}

function onSignal(): void {
  initiateShutdown().catch((error) => {
    log.system.error({ error: error instanceof Error ? error.message : String(error) }, "shutdown failed");
    process.exit(1);
  });
}

process.on("SIGTERM", onSignal);
process.on("SIGINT", onSignal);
