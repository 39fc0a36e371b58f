import type { SubscriptionStatus } from '../../../shared/models/billing';

export type { SubscriptionStatus };

export type SubscriptionSignal =
  | { kind: 'trial_started' }
  | { kind: 'payment_succeeded' }
  | { kind: 'payment_failed' }
  | { kind: 'entitlement_lapsed' }
  | { kind: 'provider_reported'; status: SubscriptionStatus };

const ALLOWED_TRANSITIONS: Record<SubscriptionStatus, readonly SubscriptionStatus[]> = {
  none: ['trialing', 'active'],
  trialing: ['active', 'past_due', 'canceled'],
  active: ['past_due', 'trialing', 'canceled'],
  past_due: ['active', 'canceled'],
  // Leaving canceled only happens when the provider reports a reactivation
  canceled: ['active', 'trialing', 'past_due'],
};

export function isTransitionAllowed(from: SubscriptionStatus, to: SubscriptionStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Pure transition function for the local subscription status. Unknown or
 * disallowed moves leave the status unchanged.
 */
export function nextStatus(current: SubscriptionStatus, signal: SubscriptionSignal): SubscriptionStatus {
  switch (signal.kind) {
    case 'trial_started':
      return current === 'none' ? 'trialing' : current;
    case 'payment_succeeded':
      return current === 'canceled' ? current : 'active';
    case 'payment_failed':
      return current === 'active' ? 'past_due' : current;
    case 'entitlement_lapsed':
      return current === 'active' || current === 'trialing' ? 'past_due' : current;
    case 'provider_reported':
      return isTransitionAllowed(current, signal.status) ? signal.status : current;
  }
}

const PROVIDER_STATUSES: Record<string, SubscriptionStatus> = {
  trialing: 'trialing',
  active: 'active',
  past_due: 'past_due',
  canceled: 'canceled',
};

export function mapProviderStatus(status: string): SubscriptionStatus | null {
  return PROVIDER_STATUSES[status] ?? null;
}
