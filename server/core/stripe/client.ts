import Stripe from 'stripe';
import type { StripeWebhookConfig } from '../config';

export function createStripeClient(config: StripeWebhookConfig): Stripe {
  return new Stripe(config.secretKey);
}

/**
 * Dispute payloads reference the charge by id; the customer lives on the
 * charge. Only consulted when the payload does not carry it.
 */
export interface ChargeCustomerLookup {
  customerForCharge(chargeId: string): Promise<string | null>;
}

export class StripeChargeLookup implements ChargeCustomerLookup {
  constructor(private readonly stripe: Stripe) {}

  async customerForCharge(chargeId: string): Promise<string | null> {
    const charge = await this.stripe.charges.retrieve(chargeId);
    if (!charge.customer) return null;
    return typeof charge.customer === 'string' ? charge.customer : charge.customer.id;
  }
}
