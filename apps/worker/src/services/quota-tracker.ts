import { log } from "../logger.js";
import { quotaDenialsTotal } from "../metrics.js";
import { QuotaContentionError } from "../domain/errors.js";
import {
  createInitialCounters,
  evaluateReservation,
  normalizeCounters,
  releaseCounters,
  countersEqual,
  type DayWindowMode,
  type QuotaCounters,
  type QuotaLimits,
  type QuotaWindowKind,
  type Reservation,
} from "../domain/quota/index.js";
import type { Clock } from "../domain/utils/time.js";
import type { QuotaRepository } from "../repositories/types.js";

// =============================================================================
// Quota Tracker
// =============================================================================
// Durable hourly + daily send counters per sending configuration.
//
// Every write is a compare-and-set on the row version: read, decide with the
// pure functions in domain/quota, write back only if nobody else wrote in
// between. A lost race re-reads and decides again, so concurrent callers can
// never push a count past its limit.
// =============================================================================

export interface QuotaTrackerConfig {
  dayWindowMode: DayWindowMode;
  /** CAS attempts before giving up with QuotaContentionError */
  maxCasAttempts: number;
}

const DEFAULT_CONFIG: QuotaTrackerConfig = {
  dayWindowMode: "rolling",
  maxCasAttempts: 16,
};

export type ReserveResult =
  | { granted: true; reservation: Reservation }
  | { granted: false; retryAfterMs: number; window: QuotaWindowKind };

export interface QuotaSnapshot extends QuotaLimits {
  hourCount: number;
  dayCount: number;
  hourWindowStart: Date | null;
  dayWindowStart: Date | null;
}

export class QuotaTracker {
  private config: QuotaTrackerConfig;

  constructor(
    private repository: QuotaRepository,
    private clock: Clock,
    config: Partial<QuotaTrackerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Reserve one send against both windows.
   * A denial is backpressure: the caller waits `retryAfterMs` and tries again.
   */
  async tryReserve(sendConfigId: string, limits: QuotaLimits): Promise<ReserveResult> {
    const mode = this.config.dayWindowMode;

    for (let attempt = 1; attempt <= this.config.maxCasAttempts; attempt++) {
      const now = this.clock.now();
      const stored = await this.repository.find(sendConfigId);

      if (!stored) {
        const decision = evaluateReservation(createInitialCounters(now, mode), limits, now, mode);
        if (!decision.granted) {
          // Only reachable with a zero limit, which configuration validation rejects
          return this.deny(sendConfigId, decision.retryAfterMs, decision.window);
        }
        if (await this.repository.insert(sendConfigId, decision.counters, now)) {
          return { granted: true, reservation: toReservation(sendConfigId, decision.counters) };
        }
        continue;
      }

      const decision = evaluateReservation(stored, limits, now, mode);

      if (!decision.granted) {
        // Persist a window reset even when denied, so snapshots stay truthful
        if (!countersEqual(stored, decision.counters)) {
          await this.repository.compareAndSet(sendConfigId, stored.version, decision.counters, now);
        }
        return this.deny(sendConfigId, decision.retryAfterMs, decision.window);
      }

      if (await this.repository.compareAndSet(sendConfigId, stored.version, decision.counters, now)) {
        return { granted: true, reservation: toReservation(sendConfigId, decision.counters) };
      }

      log.quota.debug({ sendConfigId, attempt }, "reserve lost CAS race, retrying");
    }

    throw new QuotaContentionError(sendConfigId, this.config.maxCasAttempts);
  }

  /**
   * Return a reserved slot that was never used. Windows that have reset since
   * the reservation are left alone. Idempotence is the caller's job: release a
   * reservation at most once.
   */
  async release(reservation: Reservation): Promise<void> {
    for (let attempt = 1; attempt <= this.config.maxCasAttempts; attempt++) {
      const stored = await this.repository.find(reservation.sendConfigId);
      if (!stored) return;

      const next = releaseCounters(stored, reservation);
      if (countersEqual(stored, next)) return;

      const ok = await this.repository.compareAndSet(
        reservation.sendConfigId,
        stored.version,
        next,
        this.clock.now()
      );
      if (ok) {
        log.quota.debug({ sendConfigId: reservation.sendConfigId }, "reservation released");
        return;
      }
    }

    throw new QuotaContentionError(reservation.sendConfigId, this.config.maxCasAttempts);
  }

  /**
   * Current usage as of now. Read-only: windows due for a reset report zero.
   */
  async snapshot(sendConfigId: string, limits: QuotaLimits): Promise<QuotaSnapshot> {
    const { hourlyLimit, dailyLimit } = limits;
    const stored = await this.repository.find(sendConfigId);
    if (!stored) {
      return { hourlyLimit, dailyLimit, hourCount: 0, dayCount: 0, hourWindowStart: null, dayWindowStart: null };
    }

    const current: QuotaCounters = normalizeCounters(
      stored,
      this.clock.now(),
      this.config.dayWindowMode
    );
    return {
      hourlyLimit,
      dailyLimit,
      hourCount: current.hourCount,
      dayCount: current.dayCount,
      hourWindowStart: current.hourWindowStart,
      dayWindowStart: current.dayWindowStart,
    };
  }

  private deny(sendConfigId: string, retryAfterMs: number, window: QuotaWindowKind): ReserveResult {
    quotaDenialsTotal.inc({ window });
    log.quota.debug({ sendConfigId, window, retryAfterMs }, "quota exhausted");
    return { granted: false, retryAfterMs, window };
  }
}

function toReservation(sendConfigId: string, counters: QuotaCounters): Reservation {
  return {
    sendConfigId,
    hourWindowStart: counters.hourWindowStart,
    dayWindowStart: counters.dayWindowStart,
  };
}
