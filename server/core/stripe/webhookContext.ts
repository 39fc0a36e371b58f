import type { BillingConfig } from '../config';
import type { BillingEventDetails, BillingEventLog, BillingEventType } from '../billing/billingEventLog';
import type { CheckoutSessionStore } from '../billing/checkoutSessions';
import type { Customer, CustomerDirectory } from '../customerDirectory';
import type { NotificationTrigger } from '../notificationService';
import type { ChargeCustomerLookup } from './client';
import type { WebhookEvent } from './payloads';
import { ok, type Result } from './webhookErrors';
import { logger } from '../logger';

export type DeferredAction = () => Promise<void>;

export interface HandlerEffects {
  effects: string[];
  deferred: DeferredAction[];
}

export type HandlerResult = Result<HandlerEffects>;

export interface WebhookContext {
  customers: CustomerDirectory;
  billingLog: BillingEventLog;
  checkoutSessions: CheckoutSessionStore;
  notifications: NotificationTrigger;
  chargeLookup: ChargeCustomerLookup;
  billing: BillingConfig;
  clock: () => Date;
}

export type EventHandler = (event: WebhookEvent, ctx: WebhookContext) => Promise<HandlerResult>;

export interface HandlerDefinition {
  types: readonly string[];
  handle: EventHandler;
}

/**
 * Collects what a handler did. Notifications go into `deferred` so they run
 * after the webhook has been acknowledged.
 */
export class HandlerOutcome {
  readonly effects: string[] = [];
  readonly deferred: DeferredAction[] = [];

  constructor(private readonly ctx: WebhookContext) {}

  note(effect: string): this {
    this.effects.push(effect);
    return this;
  }

  defer(action: DeferredAction): this {
    this.deferred.push(action);
    return this;
  }

  async logBillingEvent(customer: Customer, eventType: BillingEventType, details: BillingEventDetails): Promise<void> {
    await this.ctx.billingLog.append(customer.id, eventType, details, this.ctx.clock());
    this.effects.push(`billing_event:${eventType}`);
  }

  notifyAdmin(subject: string, templateKey: string, context: Record<string, unknown>): this {
    return this.defer(async () => {
      await this.ctx.notifications.notifyAdmin(subject, templateKey, context);
    });
  }

  notifyCustomer(customer: Customer, subject: string, templateKey: string, context: Record<string, unknown>): this {
    return this.defer(async () => {
      await this.ctx.notifications.notify(subject, templateKey, customer.email, context);
    });
  }

  done(): HandlerResult {
    return ok({ effects: this.effects, deferred: this.deferred });
  }
}

export async function findCustomer(
  ctx: WebhookContext,
  event: WebhookEvent,
  stripeCustomerId: string | null
): Promise<Customer | null> {
  if (!stripeCustomerId) {
    logger.info(`[Stripe Webhook] ${event.type} ${event.id} has no customer, skipping`, {
      eventId: event.id,
      eventType: event.type,
    });
    return null;
  }

  const customer = await ctx.customers.findByCustomerId(stripeCustomerId);
  if (!customer) {
    logger.warn(`[Stripe Webhook] No user found for customer ${stripeCustomerId}`, {
      eventId: event.id,
      eventType: event.type,
      customerId: stripeCustomerId,
    });
  }
  return customer;
}
