import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  integer,
  bigserial,
  boolean,
  jsonb,
  index,
  pgEnum,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

// Enums
export const recipientStatusEnum = pgEnum("recipient_status", [
  "pending",
  "in_flight",
  "sent",
  "failed",
]);

export const failureKindEnum = pgEnum("failure_kind", [
  "render",
  "permanent",
  "transient",
  "lease_expired",
]);

// Users table (owned by the account layer, read here for scoping only)
export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// Sending configuration: one per user, edited by the settings layer
export const sendConfigs = pgTable(
  "send_configs",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .unique()
      .references(() => users.id, { onDelete: "cascade" }),
    apiKey: varchar("api_key", { length: 255 }),
    senderEmail: varchar("sender_email", { length: 255 }),
    senderName: varchar("sender_name", { length: 255 }),
    subject: varchar("subject", { length: 500 }).default("Campaign Update").notNull(),
    templateName: varchar("template_name", { length: 255 }).default("mail.html").notNull(),
    defaultDisplayName: varchar("default_display_name", { length: 255 }).default("there").notNull(),
    hourlyLimit: integer("hourly_limit").default(20).notNull(),
    dailyLimit: integer("daily_limit").default(300).notNull(),
    isActive: boolean("is_active").default(true).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    activeIdx: index("send_configs_active_idx").on(table.isActive),
  })
);

// Recipients table
export const recipients = pgTable(
  "recipients",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    email: varchar("email", { length: 255 }).notNull(),
    name: varchar("name", { length: 255 }),
    // Stored as imported; values are checked when the recipient is leased
    variables: jsonb("variables").$type<Record<string, unknown>>(),
    status: recipientStatusEnum("status").default("pending").notNull(),
    attempts: integer("attempts").default(0).notNull(),
    // FIFO position; re-drawn from the sequence when a retry is requeued
    queueSeq: bigserial("queue_seq", { mode: "number" }).notNull(),
    leaseToken: uuid("lease_token"),
    leasedAt: timestamp("leased_at"),
    providerMessageId: varchar("provider_message_id", { length: 255 }),
    failureKind: failureKindEnum("failure_kind"),
    lastError: text("last_error"),
    sentAt: timestamp("sent_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    userStatusSeqIdx: index("recipients_user_status_seq_idx").on(
      table.userId,
      table.status,
      table.queueSeq
    ),
    leaseIdx: index("recipients_status_leased_at_idx").on(table.status, table.leasedAt),
    updatedIdx: index("recipients_user_updated_idx").on(table.userId, table.updatedAt),
  })
);

// Durable quota counters, one row per sending configuration
export const quotaWindows = pgTable("quota_windows", {
  sendConfigId: uuid("send_config_id")
    .primaryKey()
    .references(() => sendConfigs.id, { onDelete: "cascade" }),
  hourWindowStart: timestamp("hour_window_start").notNull(),
  hourCount: integer("hour_count").default(0).notNull(),
  dayWindowStart: timestamp("day_window_start").notNull(),
  dayCount: integer("day_count").default(0).notNull(),
  version: integer("version").default(0).notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// Relations
export const usersRelations = relations(users, ({ one, many }) => ({
  sendConfig: one(sendConfigs),
  recipients: many(recipients),
}));

export const sendConfigsRelations = relations(sendConfigs, ({ one }) => ({
  user: one(users, {
    fields: [sendConfigs.userId],
    references: [users.id],
  }),
  quotaWindow: one(quotaWindows),
}));

export const recipientsRelations = relations(recipients, ({ one }) => ({
  user: one(users, {
    fields: [recipients.userId],
    references: [users.id],
  }),
}));

export const quotaWindowsRelations = relations(quotaWindows, ({ one }) => ({
  sendConfig: one(sendConfigs, {
    fields: [quotaWindows.sendConfigId],
    references: [sendConfigs.id],
  }),
}));

// Name of the sequence backing recipients.queue_seq
export const RECIPIENT_QUEUE_SEQUENCE = "recipients_queue_seq_seq";

// Types
export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type SendConfig = typeof sendConfigs.$inferSelect;
export type NewSendConfig = typeof sendConfigs.$inferInsert;
export type Recipient = typeof recipients.$inferSelect;
export type NewRecipient = typeof recipients.$inferInsert;
export type QuotaWindow = typeof quotaWindows.$inferSelect;
export type NewQuotaWindow = typeof quotaWindows.$inferInsert;

export type RecipientStatus = (typeof recipientStatusEnum.enumValues)[number];
export type FailureKind = (typeof failureKindEnum.enumValues)[number];
