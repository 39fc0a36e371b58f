import { displayName, type Customer } from '../../customerDirectory';
import { extendSubscriptionPeriod } from '../../billing/subscriptionPeriods';
import { nextStatus } from '../../billing/subscriptionStateMachine';
import { fromUnixSeconds } from '../../../utils/dateUtils';
import { invoiceSchema, parsePayload, type InvoicePayload, type WebhookEvent } from '../payloads';
import { err, webhookError } from '../webhookErrors';
import {
  HandlerOutcome,
  findCustomer,
  type HandlerDefinition,
  type HandlerResult,
  type WebhookContext,
} from '../webhookContext';
import { describeObject, logOnly } from './common';
import { logger } from '../../logger';

export const TRIAL_LINE_MARKER = 'Trial period';

type InvoiceLine = NonNullable<InvoicePayload['lines']>['data'][number];

export function findTrialLine(invoice: InvoicePayload): InvoiceLine | null {
  return invoice.lines?.data.find(line => line.description?.includes(TRIAL_LINE_MARKER)) ?? null;
}

async function applyTrialInvoice(
  event: WebhookEvent,
  ctx: WebhookContext,
  invoice: InvoicePayload,
  line: InvoiceLine,
  customer: Customer
): Promise<HandlerResult> {
  const outcome = new HandlerOutcome(ctx);
  const trialEndSeconds = line.period?.end ?? invoice.period_end;
  if (trialEndSeconds === null) {
    return err(webhookError('MalformedPayload', `Trial invoice ${invoice.id} has no period end`));
  }

  if (customer.status !== 'none' && customer.status !== 'trialing') {
    logger.info(`[Stripe Webhook] Ignoring trial invoice ${invoice.id} for user ${customer.id} in status ${customer.status}`, {
      eventId: event.id,
      userId: customer.id,
    });
    return outcome.done();
  }

  const trialEnd = fromUnixSeconds(trialEndSeconds);
  await ctx.customers.update(customer.id, {
    trialEnd,
    status: nextStatus(customer.status, { kind: 'trial_started' }),
  });
  outcome.note('subscription:trial_recorded');
  await outcome.logBillingEvent(customer, 'trial_period_updated', {
    invoice_id: invoice.id,
    trial_end: trialEnd.toISOString(),
  });
  return outcome.done();
}

async function handleInvoicePaymentSucceeded(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(invoiceSchema, event);
  if (!parsed.ok) return parsed;
  const invoice = parsed.value;

  const customer = await findCustomer(ctx, event, invoice.customer);
  if (!customer) return new HandlerOutcome(ctx).done();

  const trialLine = findTrialLine(invoice);
  if (trialLine) {
    return applyTrialInvoice(event, ctx, invoice, trialLine, customer);
  }

  const outcome = new HandlerOutcome(ctx);
  const now = ctx.clock();
  await outcome.logBillingEvent(customer, 'payment_succeeded', {
    invoice_id: invoice.id,
    amount_paid: invoice.amount_paid,
    currency: invoice.currency,
    billing_reason: invoice.billing_reason,
  });

  const extension = await extendSubscriptionPeriod(ctx, customer, now);
  if (extension.applied) {
    outcome.note('subscription:period_extended').note('billing_event:subscription_extended');
  } else {
    outcome.note('subscription:extension_debounced');
  }

  const current = extension.customer;
  const status = nextStatus(current.status, { kind: 'payment_succeeded' });
  if (status !== current.status) {
    await ctx.customers.update(current.id, { status });
    outcome.note(`status:${status}`);
  }
  return outcome.done();
}

async function handleInvoicePaymentFailed(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(invoiceSchema, event);
  if (!parsed.ok) return parsed;
  const invoice = parsed.value;

  const customer = await findCustomer(ctx, event, invoice.customer);
  if (!customer) return new HandlerOutcome(ctx).done();

  const outcome = new HandlerOutcome(ctx);
  await outcome.logBillingEvent(customer, 'payment_failed', {
    invoice_id: invoice.id,
    amount_due: invoice.amount_due,
    currency: invoice.currency,
    attempt_count: invoice.attempt_count,
    next_payment_attempt: invoice.next_payment_attempt,
  });

  const status = nextStatus(customer.status, { kind: 'payment_failed' });
  if (status !== customer.status) {
    await ctx.customers.update(customer.id, { status });
    outcome.note(`status:${status}`);
  }

  outcome.notifyAdmin('📄 Invoice Payment Failed', 'email/admin_invoice_notification', {
    event_type: 'invoice_payment_failed',
    invoice_id: invoice.id,
    user_email: customer.email,
    user_name: displayName(customer),
    amount_due: invoice.amount_due,
    currency: invoice.currency,
    attempt_count: invoice.attempt_count,
    next_payment_attempt: invoice.next_payment_attempt,
  });
  return outcome.done();
}

async function handleInvoiceChanged(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(invoiceSchema, event);
  if (!parsed.ok) return parsed;
  const invoice = parsed.value;

  const customer = await findCustomer(ctx, event, invoice.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  await outcome.logBillingEvent(customer, event.type === 'invoice.created' ? 'invoice_created' : 'invoice_updated', {
    invoice_id: invoice.id,
    status: invoice.status,
    amount_due: invoice.amount_due,
    currency: invoice.currency,
  });
  return outcome.done();
}

export const invoiceHandlers: HandlerDefinition[] = [
  { types: ['invoice.payment_succeeded'], handle: handleInvoicePaymentSucceeded },
  { types: ['invoice.payment_failed'], handle: handleInvoicePaymentFailed },
  { types: ['invoice.created', 'invoice.updated'], handle: handleInvoiceChanged },
  { types: ['invoice.finalized', 'invoice.paid'], handle: logOnly(describeObject) },
];
