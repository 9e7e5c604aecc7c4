/**
 * Quota window pure functions.
 * All state transitions are pure - the caller persists the result.
 */

import {
  DAY_MS,
  HOUR_MS,
  type DayWindowMode,
  type QuotaCounters,
  type QuotaDecision,
  type QuotaLimits,
  type QuotaWindowKind,
  type Reservation,
} from "./types.js";

export function startOfUtcDay(at: Date): Date {
  return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));
}

/**
 * Start of a fresh day window opened at `now`.
 */
export function dayWindowStartFor(now: Date, mode: DayWindowMode): Date {
  return mode === "calendar" ? startOfUtcDay(now) : new Date(now.getTime());
}

export function hourWindowEndsAt(start: Date): Date {
  return new Date(start.getTime() + HOUR_MS);
}

export function dayWindowEndsAt(start: Date, mode: DayWindowMode): Date {
  const base = mode === "calendar" ? startOfUtcDay(start) : start;
  return new Date(base.getTime() + DAY_MS);
}

export function createInitialCounters(now: Date, mode: DayWindowMode): QuotaCounters {
  return {
    hourWindowStart: new Date(now.getTime()),
    hourCount: 0,
    dayWindowStart: dayWindowStartFor(now, mode),
    dayCount: 0,
  };
}

/**
 * Reset every window whose boundary `now` has crossed.
 *
 * However many windows were missed while idle, a crossed window restarts at
 * `now` with a zero count.
 */
export function normalizeCounters(
  counters: QuotaCounters,
  now: Date,
  mode: DayWindowMode
): QuotaCounters {
  const next: QuotaCounters = { ...counters };

  if (now.getTime() >= hourWindowEndsAt(counters.hourWindowStart).getTime()) {
    next.hourWindowStart = new Date(now.getTime());
    next.hourCount = 0;
  }

  if (now.getTime() >= dayWindowEndsAt(counters.dayWindowStart, mode).getTime()) {
    next.dayWindowStart = dayWindowStartFor(now, mode);
    next.dayCount = 0;
  }

  return next;
}

/**
 * Decide whether one more send fits.
 *
 * A grant returns the counters with both counts incremented. A denial
 * reports the wait until every exhausted window has reset, since a send
 * needs room in both.
 */
export function evaluateReservation(
  counters: QuotaCounters,
  limits: QuotaLimits,
  now: Date,
  mode: DayWindowMode
): QuotaDecision {
  const current = normalizeCounters(counters, now, mode);

  const blocked: Array<{ window: QuotaWindowKind; waitMs: number }> = [];

  if (current.hourCount >= limits.hourlyLimit) {
    blocked.push({
      window: "hour",
      waitMs: hourWindowEndsAt(current.hourWindowStart).getTime() - now.getTime(),
    });
  }

  if (current.dayCount >= limits.dailyLimit) {
    blocked.push({
      window: "day",
      waitMs: dayWindowEndsAt(current.dayWindowStart, mode).getTime() - now.getTime(),
    });
  }

  if (blocked.length === 0) {
    return {
      granted: true,
      counters: {
        ...current,
        hourCount: current.hourCount + 1,
        dayCount: current.dayCount + 1,
      },
    };
  }

  const longest = blocked.reduce((a, b) => (b.waitMs > a.waitMs ? b : a));

  return {
    granted: false,
    counters: current,
    // The clock may sit before a window start after a skew; never report zero
    retryAfterMs: Math.max(1, longest.waitMs),
    window: longest.window,
  };
}

/**
 * Hand back a slot that was reserved but never used.
 * Only windows still matching the reservation are decremented.
 */
export function releaseCounters(counters: QuotaCounters, reservation: Reservation): QuotaCounters {
  const next: QuotaCounters = { ...counters };

  if (counters.hourWindowStart.getTime() === reservation.hourWindowStart.getTime()) {
    next.hourCount = Math.max(0, counters.hourCount - 1);
  }

  if (counters.dayWindowStart.getTime() === reservation.dayWindowStart.getTime()) {
    next.dayCount = Math.max(0, counters.dayCount - 1);
  }

  return next;
}

export function countersEqual(a: QuotaCounters, b: QuotaCounters): boolean {
  return (
    a.hourWindowStart.getTime() === b.hourWindowStart.getTime() &&
    a.hourCount === b.hourCount &&
    a.dayWindowStart.getTime() === b.dayWindowStart.getTime() &&
    a.dayCount === b.dayCount
  );
}
