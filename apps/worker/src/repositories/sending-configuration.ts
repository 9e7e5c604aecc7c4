import type { SendConfig } from "@pacemail/db";
import { ConfigurationMissingError } from "../domain/errors.js";
import type { SendingConfiguration } from "./types.js";

/**
 * Validate a stored send_configs row for dispatch.
 */
export function toSendingConfiguration(
  userId: string,
  row: SendConfig | null | undefined
): SendingConfiguration {
  if (!row) {
    throw new ConfigurationMissingError(userId, "no sending configuration");
  }
  if (!row.isActive) {
    throw new ConfigurationMissingError(userId, "sending configuration is inactive");
  }
  if (!row.apiKey) {
    throw new ConfigurationMissingError(userId, "no API key configured");
  }
  if (!row.senderEmail) {
    throw new ConfigurationMissingError(userId, "no sender email configured");
  }
  if (row.hourlyLimit < 1 || row.dailyLimit < 1) {
    throw new ConfigurationMissingError(userId, "hourly and daily limits must be positive");
  }

  return {
    id: row.id,
    userId: row.userId,
    credential: row.apiKey,
    senderEmail: row.senderEmail,
    senderName: row.senderName,
    subject: row.subject,
    templateName: row.templateName,
    defaultDisplayName: row.defaultDisplayName,
    hourlyLimit: row.hourlyLimit,
    dailyLimit: row.dailyLimit,
  };
}
