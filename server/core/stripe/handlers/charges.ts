import { displayName } from '../../customerDirectory';
import { chargeSchema, disputeSchema, parsePayload, type DisputePayload, type WebhookEvent } from '../payloads';
import {
  HandlerOutcome,
  findCustomer,
  type HandlerDefinition,
  type HandlerResult,
  type WebhookContext,
} from '../webhookContext';
import { describeObject, downgradeIfLapsed, logOnly } from './common';

function disputedChargeId(dispute: DisputePayload): string {
  return typeof dispute.charge === 'string' ? dispute.charge : dispute.charge.id;
}

async function resolveDisputeCustomer(ctx: WebhookContext, dispute: DisputePayload): Promise<string | null> {
  if (dispute.customer) return dispute.customer;
  if (typeof dispute.charge !== 'string' && dispute.charge.customer) {
    return dispute.charge.customer;
  }
  return ctx.chargeLookup.customerForCharge(disputedChargeId(dispute));
}

async function handleDisputeCreated(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(disputeSchema, event);
  if (!parsed.ok) return parsed;
  const dispute = parsed.value;

  const customer = await findCustomer(ctx, event, await resolveDisputeCustomer(ctx, dispute));
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const chargeId = disputedChargeId(dispute);
  await outcome.logBillingEvent(customer, 'charge_dispute_created', {
    dispute_id: dispute.id,
    charge_id: chargeId,
    amount: dispute.amount,
    currency: dispute.currency,
    reason: dispute.reason,
    status: dispute.status,
  });

  outcome.notifyAdmin('🚨 CHARGEBACK ALERT - Immediate Action Required', 'email/admin_dispute_notification', {
    priority: 'high',
    dispute_id: dispute.id,
    charge_id: chargeId,
    amount: dispute.amount,
    currency: dispute.currency,
    reason: dispute.reason,
    user_email: customer.email,
    user_name: displayName(customer),
  });
  return outcome.done();
}

async function handleChargeFailed(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(chargeSchema, event);
  if (!parsed.ok) return parsed;
  const charge = parsed.value;

  const customer = await findCustomer(ctx, event, charge.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  await outcome.logBillingEvent(customer, 'charge_failed', {
    charge_id: charge.id,
    amount: charge.amount,
    currency: charge.currency,
    failure_code: charge.failure_code,
    failure_message: charge.failure_message,
  });
  await downgradeIfLapsed(ctx, outcome, customer);
  return outcome.done();
}

export const chargeHandlers: HandlerDefinition[] = [
  { types: ['charge.dispute.created'], handle: handleDisputeCreated },
  { types: ['charge.failed'], handle: handleChargeFailed },
  { types: ['charge.succeeded', 'charge.refunded'], handle: logOnly(describeObject) },
];
