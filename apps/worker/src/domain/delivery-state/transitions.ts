/**
 * Delivery state machine.
 *
 *   pending ──lease──▶ in_flight ──commit──▶ sent
 *      ▲                  │  │
 *      └──reclaim/requeue─┘  └──commit──▶ failed ──retry──▶ pending
 */

import type { RecipientStatus } from "@pacemail/db";
import { InvalidTransitionError } from "../errors.js";

export const DELIVERY_TRANSITIONS: Readonly<Record<RecipientStatus, readonly RecipientStatus[]>> = {
  pending: ["in_flight"],
  in_flight: ["sent", "failed", "pending"],
  failed: ["pending"],
  sent: [],
};

export function canTransition(from: RecipientStatus, to: RecipientStatus): boolean {
  return DELIVERY_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: RecipientStatus, to: RecipientStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}
