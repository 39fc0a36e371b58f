import { displayName } from '../../customerDirectory';
import { parsePayload, setupIntentSchema, type WebhookEvent } from '../payloads';
import {
  HandlerOutcome,
  findCustomer,
  type HandlerDefinition,
  type HandlerResult,
  type WebhookContext,
} from '../webhookContext';
import { describeObject, logOnly } from './common';

async function handleRequiresAction(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(setupIntentSchema, event);
  if (!parsed.ok) return parsed;
  const intent = parsed.value;

  const customer = await findCustomer(ctx, event, intent.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const nextActionType = intent.next_action?.type ?? null;
  await outcome.logBillingEvent(customer, 'setup_intent_requires_action', {
    setup_intent_id: intent.id,
    payment_method_id: intent.payment_method,
    next_action_type: nextActionType,
    requires_3d_secure: true,
  });

  outcome.notifyCustomer(customer, 'Action Required: Complete Your Payment Setup', 'email/3d_secure_notification', {
    user_name: displayName(customer),
    setup_intent_id: intent.id,
  });
  outcome.notifyAdmin('🚨 Setup Intent Requires Action', 'email/admin_setup_intent_notification', {
    event_type: 'setup_intent_requires_action',
    setup_intent_id: intent.id,
    user_email: customer.email,
    user_name: displayName(customer),
    next_action_type: nextActionType,
  });
  return outcome.done();
}

async function handleSetupFailed(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(setupIntentSchema, event);
  if (!parsed.ok) return parsed;
  const intent = parsed.value;

  const customer = await findCustomer(ctx, event, intent.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const failureReason = intent.last_setup_error?.message ?? null;
  const result = event.type === 'setup_intent.canceled' ? 'canceled' : 'failed';
  await outcome.logBillingEvent(customer, 'payment_method_setup_failed', {
    setup_intent_id: intent.id,
    outcome: result,
    failure_reason: failureReason,
    payment_method_types: intent.payment_method_types ?? [],
  });

  outcome.notifyAdmin('❌ Setup Intent Failed', 'email/admin_setup_intent_notification', {
    event_type: `setup_intent_${result}`,
    setup_intent_id: intent.id,
    user_email: customer.email,
    user_name: displayName(customer),
    failure_reason: failureReason,
  });
  return outcome.done();
}

async function handleSetupSucceeded(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(setupIntentSchema, event);
  if (!parsed.ok) return parsed;
  const intent = parsed.value;

  const customer = await findCustomer(ctx, event, intent.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer || !intent.payment_method) return outcome.done();

  if (customer.paymentMethodId !== intent.payment_method) {
    await ctx.customers.update(customer.id, { paymentMethodId: intent.payment_method });
    outcome.note('customer:payment_method_stored');
  }
  return outcome.done();
}

export const setupIntentHandlers: HandlerDefinition[] = [
  { types: ['setup_intent.requires_action'], handle: handleRequiresAction },
  { types: ['setup_intent.setup_failed', 'setup_intent.canceled'], handle: handleSetupFailed },
  { types: ['setup_intent.succeeded'], handle: handleSetupSucceeded },
  { types: ['setup_intent.created'], handle: logOnly(describeObject) },
];
