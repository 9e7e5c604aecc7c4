/**
 * Clock abstraction for testable time-dependent code.
 * Dispatch units read time and sleep only through a Clock, so tests can
 * drive hour and day boundaries without waiting for them.
 */

export interface Clock {
  /** Current wall-clock time */
  now(): Date;

  /**
   * Resolve after `ms`, or as soon as `signal` aborts. Never rejects.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Default clock using the system time and setTimeout.
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }

      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        resolve();
      };

      const timer = setTimeout(done, Math.max(0, ms));
      signal?.addEventListener("abort", done, { once: true });
    });
  }
}

interface PendingSleep {
  wakeAt: number;
  resolve: () => void;
}

/**
 * Manual clock for tests.
 * Time only moves through advanceBy/setTime, which also wake due sleepers.
 */
export class MockClock implements Clock {
  private currentTime: number;
  private sleepers: PendingSleep[] = [];

  constructor(initialTime: Date | number = 0) {
    this.currentTime = typeof initialTime === "number" ? initialTime : initialTime.getTime();
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted || ms <= 0) {
        resolve();
        return;
      }

      const entry: PendingSleep = {
        wakeAt: this.currentTime + ms,
        resolve: () => {
          signal?.removeEventListener("abort", entry.resolve);
          this.sleepers = this.sleepers.filter((s) => s !== entry);
          resolve();
        },
      };

      this.sleepers.push(entry);
      signal?.addEventListener("abort", entry.resolve, { once: true });
    });
  }

  /** Advance time by specified milliseconds */
  advanceBy(ms: number): void {
    this.setTime(this.currentTime + ms);
  }

  /** Set time to specific value, waking every sleeper that is now due */
  setTime(time: Date | number): void {
    this.currentTime = typeof time === "number" ? time : time.getTime();
    for (const sleeper of [...this.sleepers]) {
      if (sleeper.wakeAt <= this.currentTime) {
        sleeper.resolve();
      }
    }
  }

  /** Number of sleeps still waiting */
  get pendingSleeps(): number {
    return this.sleepers.length;
  }

  /** Times at which the waiting sleeps end */
  get pendingWakeTimes(): number[] {
    return this.sleepers.map((s) => s.wakeAt);
  }
}
