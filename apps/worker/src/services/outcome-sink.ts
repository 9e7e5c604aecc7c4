import { dispatchAttemptsTotal } from "../metrics.js";
import type { QuotaWindowKind } from "../domain/quota/index.js";

/**
 * What happened to one dispatch attempt.
 */
export type DispatchOutcome =
  | "sent"
  | "requeued"
  | "failed_render"
  | "failed_permanent"
  | "failed_transient";

export interface AttemptEvent {
  userId: string;
  recipientId: string;
  outcome: DispatchOutcome;
  /** Provider attempts after this one */
  attempts: number;
  reason?: string;
  providerMessageId?: string | null;
  at: Date;
}

/** The quota had no room; nothing was leased */
export interface DenialEvent {
  userId: string;
  outcome: "denied";
  window: QuotaWindowKind;
  retryAfterMs: number;
  at: Date;
}

export type DispatchEvent = AttemptEvent | DenialEvent;

/**
 * Receives every committed attempt and every quota denial. Must not throw.
 */
export interface OutcomeSink {
  record(event: DispatchEvent): void;
}

const DEFAULT_BUFFER_SIZE = 200;

/**
 * Default sink: counts outcomes in prom-client and keeps the latest events
 * in a ring buffer for the ops server.
 */
export class OutcomeRecorder implements OutcomeSink {
  private events: DispatchEvent[] = [];

  constructor(private capacity = DEFAULT_BUFFER_SIZE) {}

  record(event: DispatchEvent): void {
    // Denials are counted by the quota tracker
    if (event.outcome !== "denied") {
      dispatchAttemptsTotal.inc({ outcome: event.outcome });
    }

    this.events.push(event);
    if (this.events.length > this.capacity) {
      this.events.splice(0, this.events.length - this.capacity);
    }
  }

  /** Newest first, optionally for one user */
  recent(limit = 10, userId?: string): DispatchEvent[] {
    const matching = userId ? this.events.filter((e) => e.userId === userId) : this.events;
    return matching.slice(-limit).reverse();
  }
}
