import type { Customer } from '../../customerDirectory';
import { nextStatus } from '../../billing/subscriptionStateMachine';
import { HandlerOutcome, type EventHandler, type WebhookContext } from '../webhookContext';
import { logger } from '../../logger';

// For event types that are acknowledged and logged but change nothing locally
export function logOnly(summarize: (payload: Record<string, unknown>) => string): EventHandler {
  return async (event, ctx) => {
    logger.info(`[Stripe Webhook] ${event.type}: ${summarize(event.payload)}`, {
      eventId: event.id,
      eventType: event.type,
    });
    return new HandlerOutcome(ctx).done();
  };
}

export function describeObject(payload: Record<string, unknown>): string {
  const id = typeof payload.id === 'string' ? payload.id : 'unknown';
  const customer = typeof payload.customer === 'string' ? ` customer=${payload.customer}` : '';
  return `${id}${customer}`;
}

/**
 * A failed charge after the paid period has run out removes the entitlement:
 * the subscription drops to past_due and any trial is cleared. The period end
 * itself is left alone.
 */
export async function downgradeIfLapsed(
  ctx: WebhookContext,
  outcome: HandlerOutcome,
  customer: Customer
): Promise<Customer> {
  const now = ctx.clock();
  if (!customer.periodEnd || customer.periodEnd.getTime() > now.getTime()) {
    return customer;
  }

  const status = nextStatus(customer.status, { kind: 'entitlement_lapsed' });
  const updated = await ctx.customers.update(customer.id, { status, trialEnd: null });
  outcome.note('subscription:entitlement_lapsed');
  logger.info(`[Stripe Webhook] Entitlement lapsed for user ${customer.id}, status ${customer.status} -> ${status}`, {
    userId: customer.id,
  });
  return updated;
}
