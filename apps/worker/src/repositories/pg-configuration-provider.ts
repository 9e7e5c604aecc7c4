import { and, eq, isNotNull } from "drizzle-orm";
import { sendConfigs, type Database } from "@pacemail/db";
import { toSendingConfiguration } from "./sending-configuration.js";
import type { ConfigurationProvider, SendingConfiguration } from "./types.js";

/**
 * Reads send_configs on every call. The settings layer may edit a row at any
 * time and the next cycle must see it.
 */
export class PgConfigurationProvider implements ConfigurationProvider {
  constructor(private db: Database) {}

  async getConfiguration(userId: string): Promise<SendingConfiguration> {
    const row = await this.db.query.sendConfigs.findFirst({
      where: eq(sendConfigs.userId, userId),
    });
    return toSendingConfiguration(userId, row);
  }

  async listConfiguredUsers(): Promise<string[]> {
    const rows = await this.db
      .select({ userId: sendConfigs.userId })
      .from(sendConfigs)
      .where(
        and(
          eq(sendConfigs.isActive, true),
          isNotNull(sendConfigs.apiKey),
          isNotNull(sendConfigs.senderEmail)
        )
      );

    return rows.map((row) => row.userId);
  }
}
