import { and, eq } from "drizzle-orm";
import { quotaWindows, type Database } from "@pacemail/db";
import type { QuotaCounters } from "../domain/quota/index.js";
import type { QuotaRepository, StoredQuotaWindow } from "./types.js";

export class PgQuotaRepository implements QuotaRepository {
  constructor(private db: Database) {}

  async find(sendConfigId: string): Promise<StoredQuotaWindow | null> {
    const row = await this.db.query.quotaWindows.findFirst({
      where: eq(quotaWindows.sendConfigId, sendConfigId),
    });
    if (!row) return null;

    return {
      sendConfigId: row.sendConfigId,
      hourWindowStart: row.hourWindowStart,
      hourCount: row.hourCount,
      dayWindowStart: row.dayWindowStart,
      dayCount: row.dayCount,
      version: row.version,
    };
  }

  async insert(sendConfigId: string, counters: QuotaCounters, now: Date): Promise<boolean> {
    const inserted = await this.db
      .insert(quotaWindows)
      .values({ sendConfigId, ...counters, version: 0, updatedAt: now })
      .onConflictDoNothing()
      .returning({ sendConfigId: quotaWindows.sendConfigId });

    return inserted.length > 0;
  }

  async compareAndSet(
    sendConfigId: string,
    expectedVersion: number,
    counters: QuotaCounters,
    now: Date
  ): Promise<boolean> {
    const updated = await this.db
      .update(quotaWindows)
      .set({ ...counters, version: expectedVersion + 1, updatedAt: now })
      .where(
        and(
          eq(quotaWindows.sendConfigId, sendConfigId),
          eq(quotaWindows.version, expectedVersion)
        )
      )
      .returning({ sendConfigId: quotaWindows.sendConfigId });

    return updated.length > 0;
  }
}
