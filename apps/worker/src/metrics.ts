import promClient from "prom-client";

declare global {
  var __pacemailDefaultMetricsInitialized: boolean | undefined;
}

// Guard against multiple registrations (e.g., in test environments)
if (!globalThis.__pacemailDefaultMetricsInitialized) {
  promClient.collectDefaultMetrics({
    prefix: "worker_",
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
  globalThis.__pacemailDefaultMetricsInitialized = true;
}

export const register = promClient.register;

// ============================================
// Dispatch Metrics
// ============================================

/**
 * Counter: Dispatch attempts by outcome
 * Labels: outcome (sent/requeued/failed_render/failed_permanent/failed_transient)
 */
export const dispatchAttemptsTotal = new promClient.Counter({
  name: "dispatch_attempts_total",
  help: "Total recipient dispatch attempts by outcome",
  labelNames: ["outcome"],
});

/**
 * Counter: Quota denials
 * Labels: window (hour/day)
 */
export const quotaDenialsTotal = new promClient.Counter({
  name: "quota_denials_total",
  help: "Total reservations denied by the quota tracker",
  labelNames: ["window"],
});

/**
 * Counter: Reservations handed back without a send
 * Labels: reason (queue_empty/render_failure/aborted)
 */
export const quotaReleasesTotal = new promClient.Counter({
  name: "quota_releases_total",
  help: "Total quota reservations released without a send",
  labelNames: ["reason"],
});

/**
 * Counter: Expired in-flight leases reverted to pending
 */
export const leasesReclaimedTotal = new promClient.Counter({
  name: "leases_reclaimed_total",
  help: "Total expired recipient leases reclaimed",
});

/**
 * Histogram: Time spent in a single provider call
 * Labels: provider, status (sent/permanent/transient)
 */
export const emailSendDuration = new promClient.Histogram({
  name: "email_send_duration_seconds",
  help: "Duration of provider send calls",
  labelNames: ["provider", "status"],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
});

/**
 * Gauge: Dispatch units currently running
 */
export const dispatchUnitsActive = new promClient.Gauge({
  name: "dispatch_units_active",
  help: "Number of running dispatch units",
});

/**
 * Counter: Cycles aborted because persistence was unavailable
 */
export const storageErrorsTotal = new promClient.Counter({
  name: "storage_errors_total",
  help: "Total dispatch cycles aborted by storage errors",
});

// ============================================
// Metrics Endpoint Helper
// ============================================

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}
