import { generateSetupToken } from '../../billing/checkoutSessions';
import { nextStatus } from '../../billing/subscriptionStateMachine';
import { displayName, normalizeEmail, type Customer } from '../../customerDirectory';
import { addDays, toIsoOrNull } from '../../../utils/dateUtils';
import { checkoutSessionSchema, parsePayload, type WebhookEvent } from '../payloads';
import { HandlerOutcome, type HandlerDefinition, type HandlerResult, type WebhookContext } from '../webhookContext';
import { logger } from '../../logger';

export function splitName(name: string | null): { firstName: string | null; lastName: string | null } {
  const parts = (name ?? '').trim().split(/\s+/).filter(Boolean);
  return {
    firstName: parts.length > 0 ? parts[0] : null,
    lastName: parts.length > 1 ? parts[parts.length - 1] : null,
  };
}

export function accountSetupLink(baseUrl: string, token: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('token', token);
  return url.toString();
}

async function createTrialCustomer(
  ctx: WebhookContext,
  stripeCustomerId: string,
  email: string,
  name: { firstName: string | null; lastName: string | null }
): Promise<Customer> {
  const now = ctx.clock();
  const hasTrial = ctx.billing.trialDays > 0;
  const trialEnd = hasTrial ? addDays(now, ctx.billing.trialDays) : null;

  logger.info(`[Stripe Webhook] Creating new user for customer ${stripeCustomerId}`, { customerId: stripeCustomerId });

  return ctx.customers.create({
    stripeCustomerId,
    email,
    firstName: name.firstName,
    lastName: name.lastName,
    status: hasTrial ? nextStatus('none', { kind: 'trial_started' }) : 'none',
    periodEnd: trialEnd,
    trialEnd,
    confirmedAt: now,
  });
}

async function handleCheckoutSessionCompleted(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(checkoutSessionSchema, event);
  if (!parsed.ok) return parsed;
  const session = parsed.value;
  const outcome = new HandlerOutcome(ctx);

  if (await ctx.checkoutSessions.exists(session.id)) {
    logger.info(`[Stripe Webhook] Checkout session ${session.id} already processed`, { eventId: event.id });
    return outcome.done();
  }

  const email = normalizeEmail(session.customer_details.email);
  const name = splitName(session.customer_details.name);
  let created = false;

  let customer = await ctx.customers.findByCustomerId(session.customer);
  if (!customer) {
    customer = await ctx.customers.findByEmail(email);
    if (customer) {
      logger.info(`[Stripe Webhook] Found existing user ${customer.id} by checkout email`, { userId: customer.id });
      if (!customer.stripeCustomerId) {
        customer = await ctx.customers.update(customer.id, { stripeCustomerId: session.customer });
        outcome.note('customer:attached');
      }
    } else {
      customer = await createTrialCustomer(ctx, session.customer, email, name);
      created = true;
      outcome.note('customer:created');
    }
  }

  if (name.firstName && name.lastName &&
      (name.firstName !== customer.firstName || name.lastName !== customer.lastName)) {
    customer = await ctx.customers.update(customer.id, { firstName: name.firstName, lastName: name.lastName });
  }

  const setupToken = generateSetupToken();
  const recorded = await ctx.checkoutSessions.record(session.id, customer.id, setupToken);
  if (recorded) {
    outcome.note('checkout_session:recorded');
    logger.info(`[Stripe Webhook] Issued setup token for user ${customer.id}`, { userId: customer.id });
  }

  if (created) {
    outcome.notifyCustomer(customer, 'Welcome! Finish setting up your account', 'email/welcome', {
      user_name: displayName(customer),
      trial_end: toIsoOrNull(customer.trialEnd),
      setup_link: recorded ? accountSetupLink(ctx.billing.accountSetupUrl, setupToken) : null,
    });
  }

  return outcome.done();
}

export const checkoutHandlers: HandlerDefinition[] = [
  { types: ['checkout.session.completed'], handle: handleCheckoutSessionCompleted },
];
