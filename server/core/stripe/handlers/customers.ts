import { displayName, normalizeEmail, type CustomerPatch } from '../../customerDirectory';
import { cardSourceSchema, customerSchema, parsePayload, type WebhookEvent } from '../payloads';
import {
  HandlerOutcome,
  findCustomer,
  type HandlerDefinition,
  type HandlerResult,
  type WebhookContext,
} from '../webhookContext';
import { describeObject, logOnly } from './common';

async function handleCustomerUpdated(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(customerSchema, event);
  if (!parsed.ok) return parsed;
  const stripeCustomer = parsed.value;

  const customer = await findCustomer(ctx, event, stripeCustomer.id);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const patch: CustomerPatch = {};
  if (stripeCustomer.email) {
    const email = normalizeEmail(stripeCustomer.email);
    if (email !== customer.email) patch.email = email;
  }
  if (stripeCustomer.currency && stripeCustomer.currency !== customer.currency) {
    patch.currency = stripeCustomer.currency;
  }

  if (Object.keys(patch).length > 0) {
    await ctx.customers.update(customer.id, patch);
    outcome.note('customer:profile_synced');
  }
  return outcome.done();
}

async function handleSourceExpiring(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(cardSourceSchema, event);
  if (!parsed.ok) return parsed;
  const source = parsed.value;

  const customer = await findCustomer(ctx, event, source.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  await outcome.logBillingEvent(customer, 'payment_method_expiring', {
    source_id: source.id,
    brand: source.brand,
    exp_month: source.exp_month,
    exp_year: source.exp_year,
  });

  outcome.notifyAdmin('⚠️ Payment Method Expiring Soon', 'email/admin_payment_method_notification', {
    event_type: 'payment_method_expiring',
    source_id: source.id,
    brand: source.brand,
    exp_month: source.exp_month,
    exp_year: source.exp_year,
    user_email: customer.email,
    user_name: displayName(customer),
  });
  return outcome.done();
}

export const customerHandlers: HandlerDefinition[] = [
  { types: ['customer.updated'], handle: handleCustomerUpdated },
  { types: ['customer.source.expiring'], handle: handleSourceExpiring },
  { types: ['customer.created', 'customer.source.updated'], handle: logOnly(describeObject) },
];
