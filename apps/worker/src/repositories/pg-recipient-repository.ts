import { and, asc, desc, eq, lt, sql } from "drizzle-orm";
import {
  recipients,
  RECIPIENT_QUEUE_SEQUENCE,
  type Database,
  type Recipient,
} from "@pacemail/db";
import { assertTransition } from "../domain/delivery-state/index.js";
import {
  emptyStatusCounts,
  type CompareAndSetOptions,
  type RecipientMatch,
  type RecipientPatch,
  type RecipientRepository,
  type StatusCounts,
} from "./types.js";

export class PgRecipientRepository implements RecipientRepository {
  constructor(private db: Database) {}

  async findPendingCandidates(userId: string, limit: number): Promise<Recipient[]> {
    return this.db
      .select()
      .from(recipients)
      .where(and(eq(recipients.userId, userId), eq(recipients.status, "pending")))
      .orderBy(asc(recipients.queueSeq))
      .limit(limit);
  }

  async compareAndSet(
    match: RecipientMatch,
    patch: RecipientPatch,
    options: CompareAndSetOptions = {}
  ): Promise<Recipient | null> {
    assertTransition(match.status, patch.status);

    const conditions = [eq(recipients.id, match.id), eq(recipients.status, match.status)];
    if (match.leaseToken !== undefined) {
      conditions.push(eq(recipients.leaseToken, match.leaseToken));
    }
    if (match.userId !== undefined) {
      conditions.push(eq(recipients.userId, match.userId));
    }
    if (match.failureKind !== undefined) {
      conditions.push(eq(recipients.failureKind, match.failureKind));
    }

    const [row] = await this.db
      .update(recipients)
      .set({
        ...patch,
        ...(options.requeue
          ? { queueSeq: sql`nextval(${RECIPIENT_QUEUE_SEQUENCE}::regclass)` }
          : {}),
      })
      .where(and(...conditions))
      .returning();

    return row ?? null;
  }

  async findExpiredLeases(userId: string, leasedBefore: Date): Promise<Recipient[]> {
    return this.db
      .select()
      .from(recipients)
      .where(
        and(
          eq(recipients.userId, userId),
          eq(recipients.status, "in_flight"),
          lt(recipients.leasedAt, leasedBefore)
        )
      );
  }

  async countByStatus(userId: string): Promise<StatusCounts> {
    const rows = await this.db
      .select({
        status: recipients.status,
        count: sql<number>`count(*)::int`,
      })
      .from(recipients)
      .where(eq(recipients.userId, userId))
      .groupBy(recipients.status);

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  async listRecent(userId: string, limit: number): Promise<Recipient[]> {
    return this.db
      .select()
      .from(recipients)
      .where(eq(recipients.userId, userId))
      .orderBy(desc(recipients.updatedAt), desc(recipients.queueSeq))
      .limit(limit);
  }
}
