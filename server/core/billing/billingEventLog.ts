import { and, asc, eq, gte } from 'drizzle-orm';
import type { Database } from '../../db';
import { billingEvents } from '../../../shared/models/billing';
import { logger } from '../logger';

export type BillingEventType =
  | 'trial_period_updated'
  | 'payment_succeeded'
  | 'subscription_extended'
  | 'payment_failed'
  | 'setup_intent_requires_action'
  | 'payment_method_setup_failed'
  | 'charge_dispute_created'
  | 'charge_failed'
  | 'subscription_created'
  | 'subscription_canceled'
  | 'subscription_deleted'
  | 'trial_will_end'
  | 'invoice_created'
  | 'invoice_updated'
  | 'payment_intent_created'
  | 'payment_intent_failed'
  | 'payment_method_expiring';

export type BillingEventDetails = Record<string, unknown>;

export interface BillingEventRecord {
  userId: number;
  eventType: string;
  timestamp: Date;
  details: BillingEventDetails;
}

/**
 * Append-only audit trail. The extension debounce reads it back, so entries
 * are authoritative state, not just diagnostics.
 */
export interface BillingEventLog {
  append(userId: number, eventType: BillingEventType, details: BillingEventDetails, at?: Date): Promise<void>;
  queryRecent(userId: number, eventType: BillingEventType, since: Date): Promise<BillingEventRecord[]>;
}

export function assertUserId(userId: number): void {
  if (!Number.isInteger(userId) || userId <= 0) {
    throw new Error(`Billing event requires a user id, got ${String(userId)}`);
  }
}

export class PgBillingEventLog implements BillingEventLog {
  constructor(private readonly db: Database) {}

  async append(userId: number, eventType: BillingEventType, details: BillingEventDetails, at: Date = new Date()): Promise<void> {
    assertUserId(userId);
    await this.db.insert(billingEvents).values({
      userId,
      eventType,
      eventTimestamp: at,
      details,
    });
    logger.info(`[Billing Log] Logged ${eventType}`, { userId, eventType });
  }

  async queryRecent(userId: number, eventType: BillingEventType, since: Date): Promise<BillingEventRecord[]> {
    const rows = await this.db
      .select()
      .from(billingEvents)
      .where(and(
        eq(billingEvents.userId, userId),
        eq(billingEvents.eventType, eventType),
        gte(billingEvents.eventTimestamp, since),
      ))
      .orderBy(asc(billingEvents.eventTimestamp));

    return rows.map(row => ({
      userId: row.userId,
      eventType: row.eventType,
      timestamp: row.eventTimestamp,
      details: row.details,
    }));
  }
}
