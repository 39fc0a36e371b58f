import { displayName, type CustomerPatch } from '../../customerDirectory';
import { mapProviderStatus, nextStatus } from '../../billing/subscriptionStateMachine';
import { fromUnixSeconds, toIsoOrNull } from '../../../utils/dateUtils';
import { parsePayload, subscriptionSchema, type WebhookEvent } from '../payloads';
import { err, webhookError } from '../webhookErrors';
import {
  HandlerOutcome,
  findCustomer,
  type HandlerDefinition,
  type HandlerResult,
  type WebhookContext,
} from '../webhookContext';
import { logger } from '../../logger';

async function handleSubscriptionUpdated(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(subscriptionSchema, event);
  if (!parsed.ok) return parsed;
  const subscription = parsed.value;

  const customer = await findCustomer(ctx, event, subscription.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const reported = mapProviderStatus(subscription.status);
  if (!reported) {
    logger.info(`[Stripe Webhook] Subscription ${subscription.id} reported status ${subscription.status}, no local change`, {
      eventId: event.id,
      userId: customer.id,
    });
    return outcome.done();
  }

  const patch: CustomerPatch = {};
  switch (reported) {
    case 'trialing':
      if (subscription.trial_end === null) {
        return err(webhookError('MalformedPayload', `Trialing subscription ${subscription.id} has no trial_end`));
      }
      patch.trialEnd = fromUnixSeconds(subscription.trial_end);
      break;
    case 'active':
      patch.trialEnd = null;
      break;
    case 'canceled':
      patch.canceledAt = subscription.canceled_at !== null ? fromUnixSeconds(subscription.canceled_at) : ctx.clock();
      break;
    default:
      break;
  }

  // Present on active subscriptions too, once a cancellation at period end is requested
  if (subscription.cancellation_details) {
    patch.cancellationReason = subscription.cancellation_details.reason ?? null;
    patch.cancellationComment = subscription.cancellation_details.comment ?? null;
  }

  const status = nextStatus(customer.status, { kind: 'provider_reported', status: reported });
  if (status !== customer.status) {
    patch.status = status;
  }

  await ctx.customers.update(customer.id, patch);
  outcome.note('customer:subscription_synced');
  if (patch.status) {
    outcome.note(`status:${patch.status}`);
  }

  if (reported === 'canceled') {
    await outcome.logBillingEvent(customer, 'subscription_canceled', {
      subscription_id: subscription.id,
      canceled_at: toIsoOrNull(patch.canceledAt ?? null),
      reason: patch.cancellationReason ?? null,
      comment: patch.cancellationComment ?? null,
    });
  }
  return outcome.done();
}

async function handleSubscriptionCreated(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(subscriptionSchema, event);
  if (!parsed.ok) return parsed;
  const subscription = parsed.value;

  const customer = await findCustomer(ctx, event, subscription.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  await outcome.logBillingEvent(customer, 'subscription_created', {
    subscription_id: subscription.id,
    status: subscription.status,
    trial_end: subscription.trial_end !== null ? fromUnixSeconds(subscription.trial_end).toISOString() : null,
  });
  return outcome.done();
}

async function handleSubscriptionDeleted(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(subscriptionSchema, event);
  if (!parsed.ok) return parsed;
  const subscription = parsed.value;

  const customer = await findCustomer(ctx, event, subscription.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  const endedSeconds = subscription.canceled_at ?? subscription.ended_at;
  const canceledAt = endedSeconds !== null ? fromUnixSeconds(endedSeconds) : ctx.clock();
  const status = nextStatus(customer.status, { kind: 'provider_reported', status: 'canceled' });

  await ctx.customers.update(customer.id, { status, canceledAt });
  outcome.note(`status:${status}`);
  await outcome.logBillingEvent(customer, 'subscription_deleted', {
    subscription_id: subscription.id,
    canceled_at: canceledAt.toISOString(),
  });

  outcome.notifyAdmin('🚫 Subscription Cancelled', 'email/admin_subscription_notification', {
    event_type: 'subscription_deleted',
    subscription_id: subscription.id,
    user_email: customer.email,
    user_name: displayName(customer),
    canceled_at: canceledAt.toISOString(),
  });
  return outcome.done();
}

async function handleTrialWillEnd(event: WebhookEvent, ctx: WebhookContext): Promise<HandlerResult> {
  const parsed = parsePayload(subscriptionSchema, event);
  if (!parsed.ok) return parsed;
  const subscription = parsed.value;

  const customer = await findCustomer(ctx, event, subscription.customer);
  const outcome = new HandlerOutcome(ctx);
  if (!customer) return outcome.done();

  await outcome.logBillingEvent(customer, 'trial_will_end', {
    subscription_id: subscription.id,
    trial_end: subscription.trial_end !== null ? fromUnixSeconds(subscription.trial_end).toISOString() : null,
  });
  return outcome.done();
}

export const subscriptionHandlers: HandlerDefinition[] = [
  { types: ['customer.subscription.updated'], handle: handleSubscriptionUpdated },
  { types: ['customer.subscription.created'], handle: handleSubscriptionCreated },
  { types: ['customer.subscription.deleted'], handle: handleSubscriptionDeleted },
  { types: ['customer.subscription.trial_will_end'], handle: handleTrialWillEnd },
];
