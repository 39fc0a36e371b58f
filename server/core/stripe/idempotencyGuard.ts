import type { Database } from '../../db';
import { webhookProcessedEvents } from '../../../shared/models/billing';

/**
 * Turns "insert the event id" into the cross-process gate for webhook
 * handling. Admission is recorded before the handler runs and is never rolled
 * back, so a handler that fails after admission is not retried.
 */
export interface IdempotencyGuard {
  tryAdmit(eventId: string, eventType: string): Promise<boolean>;
}

export class PgIdempotencyGuard implements IdempotencyGuard {
  constructor(private readonly db: Database) {}

  async tryAdmit(eventId: string, eventType: string): Promise<boolean> {
    const claimed = await this.db
      .insert(webhookProcessedEvents)
      .values({ eventId, eventType })
      .onConflictDoNothing({ target: webhookProcessedEvents.eventId })
      .returning({ eventId: webhookProcessedEvents.eventId });

    return claimed.length > 0;
  }
}
