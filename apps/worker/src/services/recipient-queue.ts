import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { FailureKind, Recipient } from "@pacemail/db";
import { log } from "../logger.js";
import { leasesReclaimedTotal } from "../metrics.js";
import type { Clock } from "../domain/utils/time.js";
import type {
  RecipientPatch,
  RecipientRepository,
  StatusCounts,
} from "../repositories/types.js";

// =============================================================================
// Recipient Queue
// =============================================================================
// FIFO of pending recipients per user, with leases instead of locks:
//
//   lease   pending → in_flight   CAS on (id, status)
//   commit  in_flight → sent | failed | pending   CAS on (id, status, leaseToken)
//   reclaim in_flight → pending   for leases older than the timeout
//
// Losing a CAS means another writer owns the row; the loser moves on.
// =============================================================================

/** How many pending rows one lease call reads before trying them in order */
const LEASE_CANDIDATE_BATCH = 10;

export const LEASE_EXPIRED_REASON = "lease expired before the attempt was committed";

export interface LeasedRecipient {
  id: string;
  userId: string;
  email: string;
  name: string | null;
  /** Template context; only scalar values survive, as strings */
  variables: Record<string, string>;
  /** Provider attempts made before this lease */
  attempts: number;
  leaseToken: string;
  leasedAt: Date;
}

export type CommitOutcome =
  | { status: "sent"; providerMessageId: string | null }
  | {
      status: "failed";
      kind: Exclude<FailureKind, "lease_expired">;
      reason: string;
      /** Whether the provider was called, which counts as an attempt */
      reachedProvider: boolean;
    }
  | { status: "requeued"; reason: string };

export type CommitResult = "committed" | "stale";

export interface ActivityEntry {
  id: string;
  email: string;
  name: string | null;
  status: Recipient["status"];
  attempts: number;
  failureKind: FailureKind | null;
  lastError: string | null;
  providerMessageId: string | null;
  sentAt: Date | null;
  updatedAt: Date;
}

export class RecipientQueue {
  constructor(
    private repository: RecipientRepository,
    private clock: Clock
  ) {}

  /**
   * Lease the oldest pending recipient of `userId`, or null when none is left.
   */
  async lease(userId: string): Promise<LeasedRecipient | null> {
    for (;;) {
      const candidates = await this.repository.findPendingCandidates(userId, LEASE_CANDIDATE_BATCH);
      if (candidates.length === 0) {
        return null;
      }

      for (const candidate of candidates) {
        const leasedAt = this.clock.now();
        const leaseToken = randomUUID();

        const row = await this.repository.compareAndSet(
          { id: candidate.id, status: "pending" },
          { status: "in_flight", leaseToken, leasedAt, updatedAt: leasedAt }
        );

        if (row) {
          log.queue.debug({ recipientId: row.id, userId }, "leased");
          return toLeased(row, leaseToken, leasedAt);
        }
      }

      // Every candidate went to another worker; read the next batch
    }
  }

  /**
   * Record the outcome of a leased attempt. A commit whose lease was
   * reclaimed, or that already committed, returns "stale" and writes nothing.
   */
  async commit(lease: LeasedRecipient, outcome: CommitOutcome): Promise<CommitResult> {
    const now = this.clock.now();
    const match = { id: lease.id, status: "in_flight" as const, leaseToken: lease.leaseToken };

    const { patch, requeue } = commitPatch(lease, outcome, now);

    const row = await this.repository.compareAndSet(match, patch, { requeue });
    if (!row) {
      log.queue.warn({ recipientId: lease.id, outcome: outcome.status }, "stale commit ignored");
      return "stale";
    }

    log.queue.debug({ recipientId: lease.id, status: patch.status }, "committed");
    return "committed";
  }

  /**
   * Revert in-flight recipients whose lease is older than `leaseTimeoutMs`.
   * Attempts are left unchanged. Returns how many were reclaimed.
   */
  async reclaimExpiredLeases(userId: string, leaseTimeoutMs: number): Promise<number> {
    const now = this.clock.now();
    const cutoff = new Date(now.getTime() - leaseTimeoutMs);
    const expired = await this.repository.findExpiredLeases(userId, cutoff);

    let reclaimed = 0;
    for (const row of expired) {
      const updated = await this.repository.compareAndSet(
        {
          id: row.id,
          status: "in_flight",
          ...(row.leaseToken ? { leaseToken: row.leaseToken } : {}),
        },
        {
          status: "pending",
          leaseToken: null,
          leasedAt: null,
          failureKind: "lease_expired",
          lastError: LEASE_EXPIRED_REASON,
          updatedAt: now,
        }
      );
      if (updated) reclaimed++;
    }

    if (reclaimed > 0) {
      leasesReclaimedTotal.inc(reclaimed);
      log.queue.warn({ userId, reclaimed }, "expired leases reclaimed");
    }

    return reclaimed;
  }

  /**
   * Put a recipient that failed transiently back in the queue with a fresh
   * attempt budget. Permanent and render failures stay failed.
   */
  async retryFailed(userId: string, recipientId: string): Promise<boolean> {
    const now = this.clock.now();

    const row = await this.repository.compareAndSet(
      { id: recipientId, userId, status: "failed", failureKind: "transient" },
      { status: "pending", attempts: 0, updatedAt: now },
      { requeue: true }
    );

    if (row) {
      log.queue.info({ recipientId, userId }, "failed recipient requeued");
    }
    return row !== null;
  }

  async stats(userId: string): Promise<StatusCounts> {
    return this.repository.countByStatus(userId);
  }

  async recentActivity(userId: string, limit = 10): Promise<ActivityEntry[]> {
    const rows = await this.repository.listRecent(userId, limit);
    return rows.map((row) => ({
      id: row.id,
      email: row.email,
      name: row.name,
      status: row.status,
      attempts: row.attempts,
      failureKind: row.failureKind,
      lastError: row.lastError,
      providerMessageId: row.providerMessageId,
      sentAt: row.sentAt,
      updatedAt: row.updatedAt,
    }));
  }
}

function commitPatch(
  lease: LeasedRecipient,
  outcome: CommitOutcome,
  now: Date
): { patch: RecipientPatch; requeue: boolean } {
  const released = { leaseToken: null, leasedAt: null, updatedAt: now };

  switch (outcome.status) {
    case "sent":
      return {
        patch: {
          ...released,
          status: "sent",
          attempts: lease.attempts + 1,
          providerMessageId: outcome.providerMessageId,
          failureKind: null,
          lastError: null,
          sentAt: now,
        },
        requeue: false,
      };

    case "failed":
      return {
        patch: {
          ...released,
          status: "failed",
          attempts: outcome.reachedProvider ? lease.attempts + 1 : lease.attempts,
          failureKind: outcome.kind,
          lastError: outcome.reason,
        },
        requeue: false,
      };

    case "requeued":
      // Behind every recipient queued so far
      return {
        patch: {
          ...released,
          status: "pending",
          attempts: lease.attempts + 1,
          failureKind: "transient",
          lastError: outcome.reason,
        },
        requeue: true,
      };
  }
}

function toLeased(row: Recipient, leaseToken: string, leasedAt: Date): LeasedRecipient {
  return {
    id: row.id,
    userId: row.userId,
    email: row.email,
    name: row.name,
    variables: toTemplateContext(row.variables),
    attempts: row.attempts,
    leaseToken,
    leasedAt,
  };
}

const contextSchema = z.record(z.unknown());
const contextValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/**
 * Imported spreadsheets carry numbers and booleans as well as strings.
 * Null and nested values are left out, so a template that uses them fails
 * to render instead of printing "null" or "[object Object]".
 */
function toTemplateContext(raw: unknown): Record<string, string> {
  const parsed = contextSchema.safeParse(raw);
  if (!parsed.success) {
    return {};
  }

  const context: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    const scalar = contextValueSchema.safeParse(value);
    if (scalar.success) {
      context[key] = scalar.data;
    }
  }
  return context;
}
