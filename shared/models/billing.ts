import {
  index,
  jsonb,
  pgTable,
  timestamp,
  varchar,
  integer,
  text,
  serial,
} from "drizzle-orm/pg-core";

export const subscriptionStatuses = ['none', 'trialing', 'active', 'past_due', 'canceled'] as const;
export type SubscriptionStatus = (typeof subscriptionStatuses)[number];

// Local customer records; the subscription state lives on the same row
export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  firstName: varchar("first_name", { length: 100 }),
  lastName: varchar("last_name", { length: 100 }),
  stripeCustomerId: varchar("stripe_customer_id", { length: 255 }).unique(),
  subscriptionStatus: varchar("subscription_status", { length: 20, enum: subscriptionStatuses }).notNull().default('none'),
  periodEnd: timestamp("period_end", { withTimezone: true }),
  trialEnd: timestamp("trial_end", { withTimezone: true }),
  canceledAt: timestamp("canceled_at", { withTimezone: true }),
  cancellationReason: varchar("cancellation_reason", { length: 255 }),
  cancellationComment: text("cancellation_comment"),
  confirmedAt: timestamp("confirmed_at", { withTimezone: true }),
  paymentMethodId: varchar("payment_method_id", { length: 255 }),
  currency: varchar("currency", { length: 10 }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export type UserRow = typeof users.$inferSelect;

// Append-only audit trail, also read by the extension debounce
export const billingEvents = pgTable("billing_events", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id),
  eventType: varchar("event_type", { length: 100 }).notNull(),
  eventTimestamp: timestamp("event_timestamp", { withTimezone: true }).defaultNow().notNull(),
  details: jsonb("details").$type<Record<string, unknown>>().notNull(),
}, (table) => ({
  recentIdx: index("billing_events_user_type_ts_idx").on(table.userId, table.eventType, table.eventTimestamp),
}));

export type BillingEventRow = typeof billingEvents.$inferSelect;

export const webhookProcessedEvents = pgTable("webhook_processed_events", {
  id: serial("id").primaryKey(),
  eventId: varchar("event_id", { length: 255 }).notNull().unique(),
  eventType: varchar("event_type", { length: 100 }),
  processedAt: timestamp("processed_at", { withTimezone: true }).defaultNow().notNull(),
}, (table) => ({
  processedAtIdx: index("webhook_processed_events_processed_at_idx").on(table.processedAt),
}));

export type WebhookProcessedEvent = typeof webhookProcessedEvents.$inferSelect;

export const checkoutSessions = pgTable("checkout_sessions", {
  id: serial("id").primaryKey(),
  sessionId: varchar("session_id", { length: 255 }).notNull().unique(),
  userId: integer("user_id").notNull().references(() => users.id),
  setupToken: varchar("setup_token", { length: 128 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export type CheckoutSessionRow = typeof checkoutSessions.$inferSelect;
