import type { BillingEventLog } from './billingEventLog';
import type { Customer, CustomerDirectory } from '../customerDirectory';
import { addMonthsClamped, laterOf, toIsoOrNull } from '../../utils/dateUtils';
import { logger } from '../logger';

export const EXTENSION_DEBOUNCE_MS = 5 * 60 * 1000;

export type ExtensionResult =
  | { applied: true; customer: Customer; oldPeriodEnd: Date | null; newPeriodEnd: Date }
  | { applied: false; customer: Customer; reason: 'recently_extended' };

interface ExtensionDeps {
  customers: CustomerDirectory;
  billingLog: BillingEventLog;
}

/**
 * Extends the paid period by one calendar month from the later of the current
 * period end and now. A `subscription_extended` entry for the same user inside
 * the debounce window suppresses the extension, which is what absorbs the
 * provider sending more than one success invoice for a single renewal.
 */
export async function extendSubscriptionPeriod(
  deps: ExtensionDeps,
  customer: Customer,
  now: Date
): Promise<ExtensionResult> {
  const since = new Date(now.getTime() - EXTENSION_DEBOUNCE_MS);
  const recent = await deps.billingLog.queryRecent(customer.id, 'subscription_extended', since);

  if (recent.length > 0) {
    logger.warn(`[Subscriptions] Skipping extension for user ${customer.id}, already extended within the debounce window`, {
      userId: customer.id,
      extra: { lastExtension: recent[recent.length - 1].timestamp.toISOString() },
    });
    return { applied: false, customer, reason: 'recently_extended' };
  }

  const oldPeriodEnd = customer.periodEnd;
  const newPeriodEnd = addMonthsClamped(laterOf(oldPeriodEnd, now), 1);

  const updated = await deps.customers.update(customer.id, {
    periodEnd: newPeriodEnd,
    ...(customer.confirmedAt ? {} : { confirmedAt: now }),
  });

  await deps.billingLog.append(customer.id, 'subscription_extended', {
    old_period_end: toIsoOrNull(oldPeriodEnd),
    new_period_end: newPeriodEnd.toISOString(),
    extension_date: now.toISOString(),
  }, now);

  logger.info(`[Subscriptions] Extended subscription for user ${customer.id}: ${toIsoOrNull(oldPeriodEnd)} -> ${newPeriodEnd.toISOString()}`, {
    userId: customer.id,
  });

  return { applied: true, customer: updated, oldPeriodEnd, newPeriodEnd };
}
