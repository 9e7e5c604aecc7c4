import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { z } from "zod";
import { log } from "./logger.js";
import { getMetrics, getMetricsContentType } from "./metrics.js";
import { ConfigurationMissingError } from "./domain/errors.js";
import type { ConfigurationProvider } from "./repositories/types.js";
import type { Dispatcher } from "./services/dispatcher.js";
import type { OutcomeRecorder } from "./services/outcome-sink.js";
import type { QuotaSnapshot, QuotaTracker } from "./services/quota-tracker.js";
import type { RecipientQueue } from "./services/recipient-queue.js";

export interface OpsServerDeps {
  dispatcher: Dispatcher;
  queue: RecipientQueue;
  quota: QuotaTracker;
  configurations: ConfigurationProvider;
  recorder: OutcomeRecorder;
  /** Resolves true when the database answers */
  checkDatabase: () => Promise<boolean>;
  exposeErrorDetails?: boolean;
}

const userParamsSchema = z.object({
  userId: z.string().uuid(),
});

const recipientParamsSchema = userParamsSchema.extend({
  recipientId: z.string().uuid(),
});

const activityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

/**
 * Operations server: health, metrics and read-only views of the scheduler,
 * plus the two signals the import and settings layers send it.
 */
export function buildOpsServer(deps: OpsServerDeps): FastifyInstance {
  const app = Fastify({
    logger: false,  // We use our own structured logger
  });

  // Global error handler - prevent stack trace leakage in production
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    log.api.error({
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
      requestId: request.id,
    }, "unhandled error");

    return reply.status(statusCode).send({
      error: statusCode === 500 && !deps.exposeErrorDetails ? "Internal server error" : error.message,
      requestId: request.id,
    });
  });

  app.get("/health", async (_request, reply) => {
    const database = await deps.checkDatabase().catch((error: unknown) => {
      log.db.warn({ error: error instanceof Error ? error.message : String(error) }, "health check failed");
      return false;
    });

    const body = {
      status: database ? "ok" : "degraded",
      database,
      units: deps.dispatcher.status().length,
      timestamp: new Date().toISOString(),
    };
    return reply.status(database ? 200 : 503).send(body);
  });

  app.get("/metrics", async (_request, reply) => {
    const metricsOutput = await getMetrics();
    reply.type(getMetricsContentType());
    return reply.send(metricsOutput);
  });

  app.get("/units", async () => {
    return { units: deps.dispatcher.status() };
  });

  app.get("/users/:userId/stats", async (request, reply) => {
    const params = userParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: "Invalid user id" });
    }
    const { userId } = params.data;

    const recipients = await deps.queue.stats(userId);

    let quota: QuotaSnapshot | null = null;
    let configurationError: string | null = null;
    try {
      const configuration = await deps.configurations.getConfiguration(userId);
      quota = await deps.quota.snapshot(configuration.id, configuration);
    } catch (error) {
      if (!(error instanceof ConfigurationMissingError)) throw error;
      configurationError = error.reason;
    }

    const unit = deps.dispatcher.status().find((u) => u.userId === userId) ?? null;

    return reply.send({ userId, recipients, quota, configurationError, unit });
  });

  app.get("/users/:userId/activity", async (request, reply) => {
    const params = userParamsSchema.safeParse(request.params);
    const query = activityQuerySchema.safeParse(request.query);
    if (!params.success || !query.success) {
      return reply.status(400).send({ error: "Invalid request" });
    }

    const { userId } = params.data;
    const activity = await deps.queue.recentActivity(userId, query.data.limit);
    // Attempts and quota denials seen by this process, newest first
    const events = deps.recorder.recent(query.data.limit, userId);
    return reply.send({ userId, activity, events });
  });

  // New recipients were imported for this user
  app.post("/users/:userId/notify", async (request, reply) => {
    const params = userParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: "Invalid user id" });
    }

    const woken = deps.dispatcher.notify(params.data.userId);
    if (!woken) {
      // The unit may not exist yet; the next refresh picks the user up
      await deps.dispatcher.refreshUnits();
    }
    return reply.status(202).send({ woken });
  });

  app.post("/users/:userId/recipients/:recipientId/retry", async (request, reply) => {
    const params = recipientParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: "Invalid request" });
    }

    const { userId, recipientId } = params.data;
    const requeued = await deps.queue.retryFailed(userId, recipientId);
    if (!requeued) {
      return reply.status(409).send({
        error: "Recipient is not in a retryable failed state",
      });
    }

    deps.dispatcher.notify(userId);
    return reply.send({ requeued: true });
  });

  return app;
}
