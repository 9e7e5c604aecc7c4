/**
 * Maps raw provider failures onto the recipient failure kinds.
 *
 *   408, 429, 5xx, timeout, no response  → transient (retried)
 *   any other non-2xx                    → permanent
 */

import type { ProviderResponse } from "./types.js";

export type ProviderFailure = Extract<ProviderResponse, { ok: false }>;

export type ProviderFailureKind = "permanent" | "transient";

export const MAX_REASON_LENGTH = 500;

const TRANSIENT_STATUSES = new Set([408, 429]);

export function classifyProviderFailure(failure: ProviderFailure): ProviderFailureKind {
  if (failure.timedOut || failure.status === undefined) {
    return "transient";
  }
  if (TRANSIENT_STATUSES.has(failure.status) || failure.status >= 500) {
    return "transient";
  }
  return "permanent";
}

/**
 * Human-readable failure reason for the recipient row.
 * Every occurrence of the credential is masked before truncation.
 */
export function describeProviderFailure(failure: ProviderFailure, credential?: string): string {
  const parts: string[] = [];

  if (failure.timedOut) {
    parts.push("timeout");
  } else if (failure.status !== undefined) {
    parts.push(`HTTP ${failure.status}`);
  } else {
    parts.push("network error");
  }

  if (failure.code) {
    parts.push(`[${failure.code}]`);
  }

  const head = parts.join(" ");
  const reason = failure.message ? `${head}: ${failure.message}` : head;

  return truncateReason(redactSecret(reason, credential));
}

export function redactSecret(text: string, secret?: string): string {
  if (!secret) return text;
  return text.split(secret).join("[redacted]");
}

export function truncateReason(reason: string, maxLength = MAX_REASON_LENGTH): string {
  if (reason.length <= maxLength) return reason;
  return `${reason.slice(0, maxLength - 3)}...`;
}
