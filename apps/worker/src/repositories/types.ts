/**
 * Persistence ports for the dispatch scheduler.
 * Postgres implementations live beside this file; tests use in-memory ones.
 */

import type { FailureKind, Recipient, RecipientStatus } from "@pacemail/db";
import type { QuotaCounters } from "../domain/quota/index.js";

// =============================================================================
// Recipients
// =============================================================================

/** Row guard for a conditional write: the update applies only if all fields match */
export interface RecipientMatch {
  id: string;
  status: RecipientStatus;
  /** When set, the stored lease token must equal it */
  leaseToken?: string;
  /** Scope the write to one user's recipients */
  userId?: string;
  failureKind?: FailureKind;
}

export interface RecipientPatch {
  status: RecipientStatus;
  updatedAt: Date;
  attempts?: number;
  leaseToken?: string | null;
  leasedAt?: Date | null;
  providerMessageId?: string | null;
  failureKind?: FailureKind | null;
  lastError?: string | null;
  sentAt?: Date | null;
}

export interface CompareAndSetOptions {
  /** Move the row to the back of the FIFO order */
  requeue?: boolean;
}

export type StatusCounts = Record<RecipientStatus, number>;

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, in_flight: 0, sent: 0, failed: 0 };
}

export interface RecipientRepository {
  /** Oldest pending recipients of a user, by queue position */
  findPendingCandidates(userId: string, limit: number): Promise<Recipient[]>;

  /**
   * Apply `patch` if the row still matches `match`.
   * Returns the updated row, or null when another writer got there first.
   *
   * @throws InvalidTransitionError when `match.status → patch.status` is not
   * an edge of the delivery state machine; nothing is written
   */
  compareAndSet(
    match: RecipientMatch,
    patch: RecipientPatch,
    options?: CompareAndSetOptions
  ): Promise<Recipient | null>;

  /** In-flight recipients leased before `leasedBefore` */
  findExpiredLeases(userId: string, leasedBefore: Date): Promise<Recipient[]>;

  countByStatus(userId: string): Promise<StatusCounts>;

  /** Most recently updated recipients, newest first */
  listRecent(userId: string, limit: number): Promise<Recipient[]>;
}

// =============================================================================
// Quota windows
// =============================================================================

export interface StoredQuotaWindow extends QuotaCounters {
  sendConfigId: string;
  version: number;
}

export interface QuotaRepository {
  find(sendConfigId: string): Promise<StoredQuotaWindow | null>;

  /** Create the row at version 0. Returns false if it already exists. */
  insert(sendConfigId: string, counters: QuotaCounters, now: Date): Promise<boolean>;

  /**
   * Write counters and bump the version, only if the stored version is still
   * `expectedVersion`.
   */
  compareAndSet(
    sendConfigId: string,
    expectedVersion: number,
    counters: QuotaCounters,
    now: Date
  ): Promise<boolean>;
}

// =============================================================================
// Sending configuration & templates
// =============================================================================

export interface SendingConfiguration {
  /** send_configs.id, also the quota row key */
  id: string;
  userId: string;
  /** Provider API key. Never logged, never stored in failure reasons. */
  credential: string;
  senderEmail: string;
  senderName: string | null;
  subject: string;
  templateName: string;
  /** Greeting used when a recipient has no usable name */
  defaultDisplayName: string;
  hourlyLimit: number;
  dailyLimit: number;
}

export interface ConfigurationProvider {
  /** @throws ConfigurationMissingError when absent, inactive or incomplete */
  getConfiguration(userId: string): Promise<SendingConfiguration>;

  /** Users with an active, complete configuration */
  listConfiguredUsers(): Promise<string[]>;
}

export interface TemplateSource {
  /** @throws TemplateNotFoundError */
  getTemplate(name: string): Promise<string>;
}
