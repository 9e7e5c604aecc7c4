import { log, logFailure, withTraceAsync } from "../logger.js";
import { quotaReleasesTotal, storageErrorsTotal } from "../metrics.js";
import { isOperatorError } from "../domain/errors.js";
import type { QuotaWindowKind, Reservation } from "../domain/quota/index.js";
import { calculateStorageBackoff } from "../domain/utils/backoff.js";
import { redactSecret, truncateReason } from "../providers/classification.js";
import type { Clock } from "../domain/utils/time.js";
import type {
  ConfigurationProvider,
  SendingConfiguration,
  TemplateSource,
} from "../repositories/types.js";
import type { DispatchOutcome, OutcomeSink } from "./outcome-sink.js";
import type { QuotaTracker } from "./quota-tracker.js";
import type { CommitOutcome, LeasedRecipient, RecipientQueue } from "./recipient-queue.js";
import type { SendExecutor, SendResult } from "./send-executor.js";

// =============================================================================
// Dispatch Unit
// =============================================================================
// One per sending configuration. Each cycle:
//
//   configuration + template → reclaim expired leases → reserve quota →
//   lease recipient → send → commit
//
// The reservation is taken before the lease so a denied unit never holds a
// recipient in flight. Cycles of one unit never overlap.
// =============================================================================

export interface DispatchUnitConfig {
  maxAttempts: number;
  leaseTimeoutMs: number;
  pollIntervalMs: number;
  storageRetryBaseMs: number;
  storageRetryMaxMs: number;
}

export interface DispatchUnitDeps {
  configurations: ConfigurationProvider;
  templates: TemplateSource;
  quota: QuotaTracker;
  queue: RecipientQueue;
  executor: SendExecutor;
  sink: OutcomeSink;
  clock: Clock;
}

export type CycleResult =
  | { kind: "dispatched"; recipientId: string; outcome: DispatchOutcome; committed: boolean }
  | { kind: "idle" }
  | { kind: "denied"; retryAfterMs: number; window: QuotaWindowKind }
  | { kind: "paused"; reason: string }
  | { kind: "stopped" };

export type UnitState = "created" | "running" | "sleeping" | "stopping" | "stopped";

export interface UnitStatus {
  userId: string;
  state: UnitState;
  lastCycle: CycleResult["kind"] | null;
  lastCycleAt: Date | null;
  nextWakeAt: Date | null;
  pausedReason: string | null;
  consecutiveStorageErrors: number;
  dispatched: number;
}

export class DispatchUnit {
  private state: UnitState = "created";
  private stopping = false;
  private loop: Promise<void> | null = null;
  private stopController = new AbortController();
  private wakeController: AbortController | null = null;
  private wakeRequested = false;

  private lastCycle: CycleResult | null = null;
  private lastCycleAt: Date | null = null;
  private nextWakeAt: Date | null = null;
  private consecutiveStorageErrors = 0;
  private dispatched = 0;

  constructor(
    readonly userId: string,
    private deps: DispatchUnitDeps,
    private config: DispatchUnitConfig
  ) {}

  /**
   * Run one cycle. Throws only for storage failures; everything else is a result.
   */
  async runCycle(): Promise<CycleResult> {
    if (this.stopping) {
      return { kind: "stopped" };
    }

    const { configurations, templates, quota, queue, executor } = this.deps;

    let configuration: SendingConfiguration;
    let template: string;
    try {
      configuration = await configurations.getConfiguration(this.userId);
      template = await templates.getTemplate(configuration.templateName);
    } catch (error) {
      if (isOperatorError(error)) {
        if (this.lastCycle?.kind !== "paused") {
          log.dispatch.warn({ userId: this.userId, reason: error.message }, "unit paused");
        }
        return { kind: "paused", reason: error.message };
      }
      throw error;
    }

    await queue.reclaimExpiredLeases(this.userId, this.config.leaseTimeoutMs);

    // No new leases once shutdown has begun
    if (this.stopping) {
      return { kind: "stopped" };
    }

    const reserved = await quota.tryReserve(configuration.id, configuration);
    if (!reserved.granted) {
      this.deps.sink.record({
        userId: this.userId,
        outcome: "denied",
        window: reserved.window,
        retryAfterMs: reserved.retryAfterMs,
        at: this.deps.clock.now(),
      });
      return { kind: "denied", retryAfterMs: reserved.retryAfterMs, window: reserved.window };
    }
    const { reservation } = reserved;

    let lease: LeasedRecipient | null;
    try {
      lease = await queue.lease(this.userId);
    } catch (error) {
      await this.releaseAfterError(reservation);
      throw error;
    }

    if (!lease) {
      await quota.release(reservation);
      quotaReleasesTotal.inc({ reason: "queue_empty" });
      return { kind: "idle" };
    }

    let result: SendResult;
    try {
      result = await executor.execute(lease, template, configuration);
    } catch (error) {
      // Nothing was sent; settle the recipient instead of leaving it leased
      logFailure("email", "send preparation failed", error, { recipientId: lease.id });
      const message = error instanceof Error ? error.message : String(error);
      result = {
        status: "failed",
        kind: "render",
        reason: truncateReason(redactSecret(message, configuration.credential)),
        reachedProvider: false,
      };
    }

    if (result.status === "failed" && result.kind === "render") {
      await quota.release(reservation);
      quotaReleasesTotal.inc({ reason: "render_failure" });
    }

    const [outcome, commitOutcome] = this.decide(lease, result);
    const committed = (await queue.commit(lease, commitOutcome)) === "committed";

    if (committed) {
      const reachedProvider = result.status === "sent" || result.reachedProvider;
      this.dispatched++;
      this.deps.sink.record({
        userId: this.userId,
        recipientId: lease.id,
        outcome,
        attempts: reachedProvider ? lease.attempts + 1 : lease.attempts,
        ...(result.status === "sent"
          ? { providerMessageId: result.providerMessageId }
          : { reason: result.reason }),
        at: this.deps.clock.now(),
      });
    }

    return { kind: "dispatched", recipientId: lease.id, outcome, committed };
  }

  /**
   * Map a send result onto the recipient's next state.
   */
  private decide(lease: LeasedRecipient, result: SendResult): [DispatchOutcome, CommitOutcome] {
    if (result.status === "sent") {
      return ["sent", { status: "sent", providerMessageId: result.providerMessageId }];
    }

    switch (result.kind) {
      case "render":
        return [
          "failed_render",
          { status: "failed", kind: "render", reason: result.reason, reachedProvider: false },
        ];

      case "permanent":
        return [
          "failed_permanent",
          { status: "failed", kind: "permanent", reason: result.reason, reachedProvider: true },
        ];

      case "transient":
        if (lease.attempts + 1 < this.config.maxAttempts) {
          return ["requeued", { status: "requeued", reason: result.reason }];
        }
        return [
          "failed_transient",
          { status: "failed", kind: "transient", reason: result.reason, reachedProvider: true },
        ];
    }
  }

  private async releaseAfterError(reservation: Reservation): Promise<void> {
    try {
      await this.deps.quota.release(reservation);
      quotaReleasesTotal.inc({ reason: "aborted" });
    } catch (error) {
      logFailure("quota", "release after failed lease", error, {
        sendConfigId: reservation.sendConfigId,
      });
    }
  }

  /**
   * Repeat cycles until stopped. Sleeps on denial, idleness, pauses and
   * storage errors; every sleep ends early on wake() or stop.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const onAbort = () => this.requestStop();
    if (signal?.aborted) {
      this.requestStop();
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      while (!this.stopping) {
        this.state = "running";

        let result: CycleResult;
        try {
          result = await withTraceAsync(() => this.runCycle());
          this.consecutiveStorageErrors = 0;
        } catch (error) {
          this.consecutiveStorageErrors++;
          storageErrorsTotal.inc();
          const delayMs = calculateStorageBackoff(this.consecutiveStorageErrors, {
            baseDelayMs: this.config.storageRetryBaseMs,
            maxDelayMs: this.config.storageRetryMaxMs,
          });
          logFailure("dispatch", "cycle failed", error, {
            userId: this.userId,
            consecutiveFailures: this.consecutiveStorageErrors,
            retryInMs: delayMs,
          });
          await this.sleep(delayMs);
          continue;
        }

        this.lastCycle = result;
        this.lastCycleAt = this.deps.clock.now();

        switch (result.kind) {
          case "dispatched":
            break;
          case "denied":
            await this.sleep(result.retryAfterMs);
            break;
          case "idle":
          case "paused":
            await this.sleep(this.config.pollIntervalMs);
            break;
          case "stopped":
            return;
        }
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.state = "stopped";
      this.nextWakeAt = null;
    }
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run(this.stopController.signal).catch((error) => {
      logFailure("dispatch", "unit crashed", error, { userId: this.userId });
    });
  }

  /**
   * Stop issuing leases and resolve once the current cycle, including any
   * send in progress, has finished.
   */
  async stop(): Promise<void> {
    this.stopController.abort();
    this.requestStop();
    if (!this.loop) {
      this.state = "stopped";
      return;
    }
    await this.loop;
  }

  /** Cut the current sleep short, or skip the next one */
  wake(): void {
    this.wakeRequested = true;
    this.wakeController?.abort();
  }

  status(): UnitStatus {
    return {
      userId: this.userId,
      state: this.state,
      lastCycle: this.lastCycle?.kind ?? null,
      lastCycleAt: this.lastCycleAt,
      nextWakeAt: this.nextWakeAt,
      pausedReason: this.lastCycle?.kind === "paused" ? this.lastCycle.reason : null,
      consecutiveStorageErrors: this.consecutiveStorageErrors,
      dispatched: this.dispatched,
    };
  }

  private requestStop(): void {
    if (this.stopping) return;
    this.stopping = true;
    if (this.state !== "stopped") {
      this.state = "stopping";
    }
    this.wakeController?.abort();
  }

  private async sleep(ms: number): Promise<void> {
    if (this.stopping) return;
    if (this.wakeRequested) {
      this.wakeRequested = false;
      return;
    }

    const wake = new AbortController();
    this.wakeController = wake;
    this.state = "sleeping";
    this.nextWakeAt = new Date(this.deps.clock.now().getTime() + ms);

    try {
      await this.deps.clock.sleep(ms, wake.signal);
    } finally {
      this.wakeController = null;
      this.wakeRequested = false;
      this.nextWakeAt = null;
    }
  }
}
