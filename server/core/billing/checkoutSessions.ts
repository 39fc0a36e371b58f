import crypto from 'crypto';
import { eq } from 'drizzle-orm';
import type { Database } from '../../db';
import { checkoutSessions } from '../../../shared/models/billing';

export interface CheckoutSessionStore {
  exists(sessionId: string): Promise<boolean>;
  record(sessionId: string, userId: number, setupToken: string): Promise<boolean>;
}

// Single-use token the customer exchanges for setting their initial password
export function generateSetupToken(): string {
  return crypto.randomBytes(32).toString('hex');
}

export class PgCheckoutSessionStore implements CheckoutSessionStore {
  constructor(private readonly db: Database) {}

  async exists(sessionId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: checkoutSessions.id })
      .from(checkoutSessions)
      .where(eq(checkoutSessions.sessionId, sessionId))
      .limit(1);
    return rows.length > 0;
  }

  async record(sessionId: string, userId: number, setupToken: string): Promise<boolean> {
    const inserted = await this.db
      .insert(checkoutSessions)
      .values({ sessionId, userId, setupToken })
      .onConflictDoNothing({ target: checkoutSessions.sessionId })
      .returning({ id: checkoutSessions.id });
    return inserted.length > 0;
  }
}
