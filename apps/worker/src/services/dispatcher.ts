import { log, logFailure } from "../logger.js";
import { dispatchUnitsActive } from "../metrics.js";
import type { ConfigurationProvider } from "../repositories/types.js";
import type { DispatchUnit, UnitStatus } from "./dispatch-unit.js";

// =============================================================================
// Dispatcher
// =============================================================================
// Supervises one DispatchUnit per configured user. Every poll tick it
// compares the running units with the users that currently have an active
// configuration, starting and stopping units to match.
// =============================================================================

export interface DispatcherConfig {
  pollIntervalMs: number;
}

export type DispatchUnitFactory = (userId: string) => DispatchUnit;

export interface ShutdownResult {
  /** False when units were still finishing a send at the deadline */
  drained: boolean;
  units: number;
}

export class Dispatcher {
  private units = new Map<string, DispatchUnit>();
  private intervalId?: ReturnType<typeof setInterval>;
  private refreshing: Promise<void> | null = null;
  private shuttingDown = false;

  constructor(
    private configurations: ConfigurationProvider,
    private createUnit: DispatchUnitFactory,
    private config: DispatcherConfig
  ) {}

  async start(): Promise<void> {
    if (this.intervalId) return;

    await this.refreshUnits();

    this.intervalId = setInterval(() => {
      this.refreshUnits().catch((error) => {
        logFailure("dispatch", "unit refresh failed", error, {});
      });
    }, this.config.pollIntervalMs);

    log.dispatch.info(
      { units: this.units.size, pollIntervalMs: this.config.pollIntervalMs },
      "dispatcher started"
    );
  }

  /**
   * Reconcile running units with the configured users. Concurrent calls
   * share one refresh.
   */
  refreshUnits(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.reconcile().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async reconcile(): Promise<void> {
    if (this.shuttingDown) return;

    const configured = new Set(await this.configurations.listConfiguredUsers());
    if (this.shuttingDown) return;

    for (const userId of configured) {
      if (!this.units.has(userId)) {
        const unit = this.createUnit(userId);
        this.units.set(userId, unit);
        unit.start();
        log.dispatch.info({ userId }, "unit started");
      }
    }

    const removed: Promise<void>[] = [];
    for (const [userId, unit] of this.units) {
      if (!configured.has(userId)) {
        this.units.delete(userId);
        removed.push(unit.stop());
        log.dispatch.info({ userId }, "unit stopped, configuration removed");
      }
    }

    dispatchUnitsActive.set(this.units.size);
    await Promise.all(removed);
  }

  /**
   * Wake a user's unit, e.g. after new recipients were imported.
   * Returns false when no unit runs for the user.
   */
  notify(userId: string): boolean {
    const unit = this.units.get(userId);
    if (!unit) return false;
    unit.wake();
    return true;
  }

  status(): UnitStatus[] {
    return [...this.units.values()].map((unit) => unit.status());
  }

  /**
   * Stop every unit. Units stop leasing at once; sends already in progress
   * get until `timeoutMs` to finish and commit.
   */
  async shutdown(timeoutMs: number): Promise<ShutdownResult> {
    this.shuttingDown = true;
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    const units = [...this.units.values()];
    const stopped = Promise.all(units.map((unit) => unit.stop())).then(() => true);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    const drained = await Promise.race([stopped, deadline]);
    clearTimeout(timer);

    this.units.clear();
    dispatchUnitsActive.set(0);

    if (drained) {
      log.dispatch.info({ units: units.length }, "dispatcher stopped");
    } else {
      log.dispatch.warn({ units: units.length, timeoutMs }, "dispatcher stop timed out with sends in progress");
    }

    return { drained, units: units.length };
  }
}
