import { displayName } from '../../customerDirectory';
import { parsePayload, paymentIntentSchema, type WebhookEvent } from '../payloads';
import {
  HandlerOutcome,
  findCustomer,
  type HandlerDefinition,
  type HandlerResult,
  type WebhookContext,
} from '../webhookContext';
import { describeObject, downgradeIfLapsed, logOnly } from './common';

async function handlePaymentIntentCreated(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(paymentIntentSchema, event);
  if (!parsed.ok) return parsed;
  const intent = parsed.value;

  const customer = await findCustomer(ctx, event, intent.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  await outcome.logBillingEvent(customer, 'payment_intent_created', {
    payment_intent_id: intent.id,
    amount: intent.amount,
    currency: intent.currency,
    status: intent.status,
  });
  return outcome.done();
}

async function handlePaymentIntentFailed(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(paymentIntentSchema, event);
  if (!parsed.ok) return parsed;
  const intent = parsed.value;

  const customer = await findCustomer(ctx, event, intent.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const failureMessage = intent.last_payment_error?.message ?? null;
  await outcome.logBillingEvent(customer, 'payment_intent_failed', {
    payment_intent_id: intent.id,
    amount: intent.amount,
    currency: intent.currency,
    failure_message: failureMessage,
  });
  await downgradeIfLapsed(ctx, outcome, customer);

  outcome.notifyAdmin('💳 Payment Intent Failed', 'email/admin_payment_notification', {
    event_type: 'payment_intent_failed',
    payment_intent_id: intent.id,
    amount: intent.amount,
    currency: intent.currency,
    failure_message: failureMessage,
    user_email: customer.email,
    user_name: displayName(customer),
  });
  return outcome.done();
}

export const paymentIntentHandlers: HandlerDefinition[] = [
  { types: ['payment_intent.created'], handle: handlePaymentIntentCreated },
  { types: ['payment_intent.payment_failed'], handle: handlePaymentIntentFailed },
  { types: ['payment_intent.succeeded'], handle: logOnly(describeObject) },
];
