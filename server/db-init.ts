import { sql } from 'drizzle-orm';
import type { Database } from './db';
import { getErrorMessage } from './utils/errorUtils';
import { logger } from './core/logger';

// Mirrors shared/models/billing.ts; safe to run on every start-up
export async function ensureBillingTables(db: Database): Promise<void> {
  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        email VARCHAR(255) NOT NULL UNIQUE,
        first_name VARCHAR(100),
        last_name VARCHAR(100),
        stripe_customer_id VARCHAR(255) UNIQUE,
        subscription_status VARCHAR(20) NOT NULL DEFAULT 'none',
        period_end TIMESTAMP WITH TIME ZONE,
        trial_end TIMESTAMP WITH TIME ZONE,
        canceled_at TIMESTAMP WITH TIME ZONE,
        cancellation_reason VARCHAR(255),
        cancellation_comment TEXT,
        confirmed_at TIMESTAMP WITH TIME ZONE,
        payment_method_id VARCHAR(255),
        currency VARCHAR(10),
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );

      CREATE TABLE IF NOT EXISTS billing_events (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id),
        event_type VARCHAR(100) NOT NULL,
        event_timestamp TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW(),
        details JSONB NOT NULL
      );
      CREATE INDEX IF NOT EXISTS billing_events_user_type_ts_idx
        ON billing_events(user_id, event_type, event_timestamp);

      CREATE TABLE IF NOT EXISTS webhook_processed_events (
        id SERIAL PRIMARY KEY,
        event_id VARCHAR(255) NOT NULL UNIQUE,
        event_type VARCHAR(100),
        processed_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );
      CREATE INDEX IF NOT EXISTS webhook_processed_events_processed_at_idx
        ON webhook_processed_events(processed_at);

      CREATE TABLE IF NOT EXISTS checkout_sessions (
        id SERIAL PRIMARY KEY,
        session_id VARCHAR(255) NOT NULL UNIQUE,
        user_id INTEGER NOT NULL REFERENCES users(id),
        setup_token VARCHAR(128) NOT NULL,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );
    `);
    logger.info('[DB Init] Billing tables ready');
  } catch (error: unknown) {
    logger.error('[DB Init] Failed to create billing tables:', { extra: { errorMessage: getErrorMessage(error) } });
    throw error;
  }
}
