/**
 * Quota window types.
 */

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

/** rolling: 24h from the window start. calendar: the UTC day containing it. */
export type DayWindowMode = "rolling" | "calendar";

export type QuotaWindowKind = "hour" | "day";

export interface QuotaLimits {
  hourlyLimit: number;
  dailyLimit: number;
}

export interface QuotaCounters {
  hourWindowStart: Date;
  hourCount: number;
  dayWindowStart: Date;
  dayCount: number;
}

/**
 * Proof of a granted slot. Carries the window starts it was counted against so
 * a release never credits a window that has since been reset.
 */
export interface Reservation {
  sendConfigId: string;
  hourWindowStart: Date;
  dayWindowStart: Date;
}

export type QuotaDecision =
  | { granted: true; counters: QuotaCounters }
  | {
      granted: false;
      /** Normalised counters, to be persisted if the normalisation reset a window */
      counters: QuotaCounters;
      retryAfterMs: number;
      window: QuotaWindowKind;
    };
