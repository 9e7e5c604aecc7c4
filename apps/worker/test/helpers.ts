/**
 * Unit test helpers: a full dispatch stack over in-memory repositories,
 * a manual clock and the mock provider.
 */

import { MockClock } from "../src/domain/utils/time.js";
import { MockEmailProvider } from "../src/providers/mock-provider.js";
import { DispatchUnit, type DispatchUnitConfig } from "../src/services/dispatch-unit.js";
import { OutcomeRecorder } from "../src/services/outcome-sink.js";
import { QuotaTracker } from "../src/services/quota-tracker.js";
import { RecipientQueue } from "../src/services/recipient-queue.js";
import { SendExecutor } from "../src/services/send-executor.js";
import type { DayWindowMode } from "../src/domain/quota/index.js";
import {
  InMemoryConfigurationProvider,
  InMemoryQuotaRepository,
  InMemoryRecipientRepository,
  InMemoryTemplateSource,
  StorageOutage,
} from "./in-memory-store.js";

/** 2025-03-10T09:00:00Z, a Monday morning */
export const START_TIME = Date.UTC(2025, 2, 10, 9, 0, 0);

export const USER_ID = "5b0f4a7e-3c2d-4e1f-9a8b-7c6d5e4f3a2b";

export const DEFAULT_UNIT_CONFIG: DispatchUnitConfig = {
  maxAttempts: 3,
  leaseTimeoutMs: 5 * 60 * 1000,
  pollIntervalMs: 2000,
  storageRetryBaseMs: 1000,
  storageRetryMaxMs: 60_000,
};

export interface HarnessOptions {
  dayWindowMode?: DayWindowMode;
  unit?: Partial<DispatchUnitConfig>;
  sendTimeoutMs?: number;
  titleCaseNames?: boolean;
  startTime?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = new MockClock(options.startTime ?? START_TIME);
  const outage = new StorageOutage();

  const recipientRepository = new InMemoryRecipientRepository(outage, () => clock.now());
  const quotaRepository = new InMemoryQuotaRepository(outage);
  const configurations = new InMemoryConfigurationProvider(outage);
  const templates = new InMemoryTemplateSource({ "mail.html": "<p>Hi {{ name }}</p>" });

  const provider = new MockEmailProvider({ mode: "success", latencyMs: 0 });
  const quota = new QuotaTracker(quotaRepository, clock, {
    dayWindowMode: options.dayWindowMode ?? "rolling",
  });
  const queue = new RecipientQueue(recipientRepository, clock);
  const executor = new SendExecutor(provider, {
    sendTimeoutMs: options.sendTimeoutMs ?? 30_000,
    titleCaseNames: options.titleCaseNames ?? true,
  });
  const recorder = new OutcomeRecorder();

  const unitConfig: DispatchUnitConfig = { ...DEFAULT_UNIT_CONFIG, ...options.unit };

  const createUnit = (userId: string) =>
    new DispatchUnit(
      userId,
      { configurations, templates, quota, queue, executor, sink: recorder, clock },
      unitConfig
    );

  return {
    clock,
    outage,
    recipientRepository,
    quotaRepository,
    configurations,
    templates,
    provider,
    quota,
    queue,
    executor,
    recorder,
    unitConfig,
    createUnit,
  };
}

export type Harness = ReturnType<typeof createHarness>;

/**
 * Let pending promise chains and setImmediate callbacks run.
 */
export async function flush(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

/**
 * Turn the event loop until `condition` holds. Time on the MockClock does
 * not move, so a unit waiting on it stays asleep.
 */
export async function waitUntil(condition: () => boolean, maxRounds = 2000): Promise<void> {
  for (let i = 0; i < maxRounds; i++) {
    if (condition()) return;
    await new Promise((resolve) => setImmediate(resolve));
  }
  throw new Error("condition not met");
}
