import { describe, it, expect, vi } from 'vitest';
import { accountSetupLink, splitName } from '../../server/core/stripe/handlers/checkout';
import { findTrialLine } from '../../server/core/stripe/handlers/invoices';
import { ADMIN_EMAIL, T0, createHarness, deliver, unixSeconds } from '../helpers/inMemoryStores';

vi.mock('../../server/core/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

describe('checkout.session.completed', () => {
  it('splits display names into first and last', () => {
    expect(splitName('Grace Brewster Hopper')).toEqual({ firstName: 'Grace', lastName: 'Hopper' });
    expect(splitName('Cher')).toEqual({ firstName: 'Cher', lastName: null });
    expect(splitName(null)).toEqual({ firstName: null, lastName: null });
  });

  it('attaches the customer id to an existing user found by email', async () => {
    const harness = createHarness();
    const existing = harness.customers.seed({ email: 'grace@example.com', firstName: 'G', lastName: 'H', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'checkout.session.completed', {
      id: 'cs_existing',
      customer: 'cus_existing',
      customer_details: { email: 'GRACE@example.com', name: 'Grace Hopper' },
    });

    expect(outcome.effects).toEqual(['customer:attached', 'checkout_session:recorded']);
    expect(harness.customers.get(existing.id)).toMatchObject({
      stripeCustomerId: 'cus_existing',
      firstName: 'Grace',
      lastName: 'Hopper',
      status: 'active',
    });
    expect(harness.customers.rows.size).toBe(1);
    expect(harness.deferred).toEqual([]);
  });

  it('issues a setup token with the recorded session', async () => {
    const harness = createHarness();

    await deliver(harness, 'evt_1', 'checkout.session.completed', {
      id: 'cs_token',
      customer: 'cus_token',
      customer_details: { email: 'token@example.com' },
    });

    const session = harness.checkoutSessions.sessions.get('cs_token');
    expect(session?.userId).toBe(1);
    expect(session?.setupToken).toMatch(/^[0-9a-f]{64}$/);
  });

  it('sends new users a setup link carrying the issued token', async () => {
    const harness = createHarness();

    await deliver(harness, 'evt_1', 'checkout.session.completed', {
      id: 'cs_welcome',
      customer: 'cus_welcome',
      customer_details: { email: 'welcome@example.com', name: 'Wren Lee' },
    });
    await harness.flushDeferred();

    const token = harness.checkoutSessions.sessions.get('cs_welcome')?.setupToken;
    expect(harness.sender.sent).toEqual([{
      subject: 'Welcome! Finish setting up your account',
      templateKey: 'email/welcome',
      recipient: 'welcome@example.com',
      context: {
        user_name: 'Wren',
        trial_end: '2025-03-17T12:00:00.000Z',
        setup_link: `https://billing.example.com/account/setup?token=${token}`,
      },
    }]);
  });

  it('appends the token to an existing query string', () => {
    expect(accountSetupLink('https://example.com/setup?ref=checkout', 'abc123'))
      .toBe('https://example.com/setup?ref=checkout&token=abc123');
  });

  it('skips a session that was already processed under another event id', async () => {
    const harness = createHarness();
    const session = {
      id: 'cs_repeat',
      customer: 'cus_repeat',
      customer_details: { email: 'repeat@example.com', name: 'Rae Peat' },
    };

    await deliver(harness, 'evt_1', 'checkout.session.completed', session);
    const again = await deliver(harness, 'evt_2', 'checkout.session.completed', session);

    expect(again.status).toBe('processed');
    expect(again.effects).toEqual([]);
    expect(harness.customers.rows.size).toBe(1);
  });

  it('creates users without a trial when trials are disabled', async () => {
    const harness = createHarness({ billing: { trialDays: 0 } });

    await deliver(harness, 'evt_1', 'checkout.session.completed', {
      id: 'cs_no_trial',
      customer: 'cus_no_trial',
      customer_details: { email: 'notrial@example.com' },
    });

    expect(harness.customers.get(1)).toMatchObject({ status: 'none', trialEnd: null, periodEnd: null, confirmedAt: T0 });
  });
});

describe('invoice events', () => {
  it('finds trial lines by description', () => {
    expect(findTrialLine({
      id: 'in_1',
      customer: null,
      amount_paid: null,
      amount_due: null,
      currency: null,
      status: null,
      billing_reason: null,
      attempt_count: null,
      next_payment_attempt: null,
      period_end: null,
      subscription: null,
      lines: { data: [{ description: 'Pro', period: null }, { description: 'Trial period for Pro', period: null }] },
    })).toEqual({ description: 'Trial period for Pro', period: null });
  });

  it('falls back to the invoice period end for the trial end', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'trial@example.com', stripeCustomerId: 'cus_trial' });

    await deliver(harness, 'evt_1', 'invoice.payment_succeeded', {
      id: 'in_trial',
      customer: 'cus_trial',
      period_end: unixSeconds(new Date('2025-03-31T00:00:00.000Z')),
      lines: { data: [{ description: 'Trial period for Pro' }] },
    });

    expect(harness.customers.get(member.id)).toMatchObject({
      status: 'trialing',
      trialEnd: new Date('2025-03-31T00:00:00.000Z'),
    });
  });

  it('fails a trial invoice with no period end at all', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'trial@example.com', stripeCustomerId: 'cus_trial' });

    const outcome = await deliver(harness, 'evt_1', 'invoice.payment_succeeded', {
      id: 'in_trial',
      customer: 'cus_trial',
      lines: { data: [{ description: 'Trial period for Pro' }] },
    });

    expect(outcome.status).toBe('handler_failed');
    expect(outcome.error).toEqual({ kind: 'MalformedPayload', message: 'Trial invoice in_trial has no period end' });
  });

  it('ignores a trial invoice for an active subscription', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'active@example.com', stripeCustomerId: 'cus_active', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'invoice.payment_succeeded', {
      id: 'in_trial',
      customer: 'cus_active',
      period_end: 1743379200,
      lines: { data: [{ description: 'Trial period for Pro' }] },
    });

    expect(outcome.effects).toEqual([]);
    expect(harness.customers.get(member.id).trialEnd).toBeNull();
    expect(harness.billingLog.records).toEqual([]);
  });

  it('reactivates a past_due subscription on payment', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({
      email: 'late@example.com',
      stripeCustomerId: 'cus_late',
      status: 'past_due',
      periodEnd: new Date('2025-03-01T00:00:00.000Z'),
    });

    const outcome = await deliver(harness, 'evt_1', 'invoice.payment_succeeded', {
      id: 'in_late',
      customer: 'cus_late',
      amount_paid: 2000,
      currency: 'usd',
    });

    expect(outcome.effects).toEqual([
      'billing_event:payment_succeeded',
      'subscription:period_extended',
      'billing_event:subscription_extended',
      'status:active',
    ]);
    expect(harness.customers.get(member.id)).toMatchObject({
      status: 'active',
      periodEnd: new Date('2025-04-10T12:00:00.000Z'),
      confirmedAt: T0,
    });
    expect(harness.billingLog.ofType('payment_succeeded')[0].details).toEqual({
      invoice_id: 'in_late',
      amount_paid: 2000,
      currency: 'usd',
      billing_reason: null,
    });
  });

  it('extends a canceled subscription without reactivating it', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({
      email: 'gone@example.com',
      stripeCustomerId: 'cus_gone',
      status: 'canceled',
      periodEnd: new Date('2025-03-20T00:00:00.000Z'),
    });

    await deliver(harness, 'evt_1', 'invoice.payment_succeeded', { id: 'in_gone', customer: 'cus_gone' });

    expect(harness.customers.get(member.id)).toMatchObject({
      status: 'canceled',
      periodEnd: new Date('2025-04-20T00:00:00.000Z'),
    });
  });

  it('moves active to past_due on a failed invoice and alerts the admin', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({
      email: 'failing@example.com',
      firstName: 'Finn',
      stripeCustomerId: 'cus_failing',
      status: 'active',
    });

    const outcome = await deliver(harness, 'evt_1', 'invoice.payment_failed', {
      id: 'in_failed',
      customer: 'cus_failing',
      amount_due: 2000,
      currency: 'usd',
      attempt_count: 2,
      next_payment_attempt: 1741694400,
    });
    await harness.flushDeferred();

    expect(outcome.effects).toEqual(['billing_event:payment_failed', 'status:past_due']);
    expect(harness.customers.get(member.id).status).toBe('past_due');
    expect(harness.billingLog.ofType('payment_failed')[0].details).toEqual({
      invoice_id: 'in_failed',
      amount_due: 2000,
      currency: 'usd',
      attempt_count: 2,
      next_payment_attempt: 1741694400,
    });
    expect(harness.sender.sent.map(sent => [sent.subject, sent.templateKey, sent.recipient])).toEqual([
      ['📄 Invoice Payment Failed', 'email/admin_invoice_notification', ADMIN_EMAIL],
    ]);
  });

  it('logs created and updated invoices and only acknowledges finalized ones', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'billing@example.com', stripeCustomerId: 'cus_inv' });

    await deliver(harness, 'evt_1', 'invoice.created', { id: 'in_1', customer: 'cus_inv', status: 'draft', amount_due: 2000, currency: 'usd' });
    await deliver(harness, 'evt_2', 'invoice.updated', { id: 'in_1', customer: 'cus_inv', status: 'open', amount_due: 2000, currency: 'usd' });
    const finalized = await deliver(harness, 'evt_3', 'invoice.finalized', { id: 'in_1', customer: 'cus_inv' });

    expect(harness.billingLog.records.map(record => [record.eventType, record.details.status])).toEqual([
      ['invoice_created', 'draft'],
      ['invoice_updated', 'open'],
    ]);
    expect(finalized).toMatchObject({ status: 'processed', effects: [] });
  });

  it('does nothing for an unknown customer', async () => {
    const harness = createHarness();

    const outcome = await deliver(harness, 'evt_1', 'invoice.payment_failed', { id: 'in_1', customer: 'cus_missing' });

    expect(outcome).toMatchObject({ status: 'processed', effects: [] });
    expect(harness.billingLog.records).toEqual([]);
    expect(harness.deferred).toEqual([]);
  });
});

describe('customer.subscription events', () => {
  it('records the trial end for a trialing subscription', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'new@example.com', stripeCustomerId: 'cus_new' });

    const outcome = await deliver(harness, 'evt_1', 'customer.subscription.updated', {
      id: 'sub_1',
      customer: 'cus_new',
      status: 'trialing',
      trial_end: unixSeconds(new Date('2025-03-20T00:00:00.000Z')),
    });

    expect(outcome.effects).toEqual(['customer:subscription_synced', 'status:trialing']);
    expect(harness.customers.get(member.id)).toMatchObject({
      status: 'trialing',
      trialEnd: new Date('2025-03-20T00:00:00.000Z'),
    });
  });

  it('treats a trialing subscription without a trial end as malformed', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'new@example.com', stripeCustomerId: 'cus_new' });

    const outcome = await deliver(harness, 'evt_1', 'customer.subscription.updated', {
      id: 'sub_1',
      customer: 'cus_new',
      status: 'trialing',
    });

    expect(outcome.status).toBe('handler_failed');
    expect(outcome.error?.kind).toBe('MalformedPayload');
  });

  it('follows a provider-reported past_due status', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'm@example.com', stripeCustomerId: 'cus_m', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'customer.subscription.updated', {
      id: 'sub_1',
      customer: 'cus_m',
      status: 'past_due',
    });

    expect(outcome.effects).toEqual(['customer:subscription_synced', 'status:past_due']);
    expect(harness.customers.get(member.id).status).toBe('past_due');
  });

  it('stores the cancellation reason while the subscription runs to period end', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'm@example.com', stripeCustomerId: 'cus_m', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'customer.subscription.updated', {
      id: 'sub_1',
      customer: 'cus_m',
      status: 'active',
      cancel_at_period_end: true,
      cancellation_details: { reason: 'cancellation_requested', comment: 'Moving away' },
    });

    expect(outcome.effects).toEqual(['customer:subscription_synced']);
    expect(harness.customers.get(member.id)).toMatchObject({
      status: 'active',
      canceledAt: null,
      cancellationReason: 'cancellation_requested',
      cancellationComment: 'Moving away',
    });
    expect(harness.billingLog.ofType('subscription_canceled')).toEqual([]);
  });

  it('leaves statuses it does not track alone', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'm@example.com', stripeCustomerId: 'cus_m', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'customer.subscription.updated', {
      id: 'sub_1',
      customer: 'cus_m',
      status: 'incomplete',
    });

    expect(outcome.effects).toEqual([]);
    expect(harness.customers.get(member.id).status).toBe('active');
  });

  it('cancels on deletion and alerts the admin', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'bye@example.com', stripeCustomerId: 'cus_bye', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'customer.subscription.deleted', {
      id: 'sub_bye',
      customer: 'cus_bye',
      status: 'canceled',
      canceled_at: unixSeconds(new Date('2025-03-09T00:00:00.000Z')),
    });
    await harness.flushDeferred();

    expect(outcome.effects).toEqual(['status:canceled', 'billing_event:subscription_deleted']);
    expect(harness.customers.get(member.id)).toMatchObject({
      status: 'canceled',
      canceledAt: new Date('2025-03-09T00:00:00.000Z'),
    });
    expect(harness.sender.sent).toEqual([{
      subject: '🚫 Subscription Cancelled',
      templateKey: 'email/admin_subscription_notification',
      recipient: ADMIN_EMAIL,
      context: {
        event_type: 'subscription_deleted',
        subscription_id: 'sub_bye',
        user_email: 'bye@example.com',
        user_name: 'bye@example.com',
        canceled_at: '2025-03-09T00:00:00.000Z',
      },
    }]);
  });

  it('logs creation and upcoming trial ends', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'm@example.com', stripeCustomerId: 'cus_m', status: 'trialing' });
    const trialEnd = unixSeconds(new Date('2025-03-13T12:00:00.000Z'));

    await deliver(harness, 'evt_1', 'customer.subscription.created', { id: 'sub_1', customer: 'cus_m', status: 'trialing', trial_end: trialEnd });
    await deliver(harness, 'evt_2', 'customer.subscription.trial_will_end', { id: 'sub_1', customer: 'cus_m', status: 'trialing', trial_end: trialEnd });

    expect(harness.billingLog.records.map(record => [record.eventType, record.details])).toEqual([
      ['subscription_created', { subscription_id: 'sub_1', status: 'trialing', trial_end: '2025-03-13T12:00:00.000Z' }],
      ['trial_will_end', { subscription_id: 'sub_1', trial_end: '2025-03-13T12:00:00.000Z' }],
    ]);
  });
});

describe('setup_intent events', () => {
  function harnessWithCardholder() {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'sca@example.com', firstName: 'Sam', stripeCustomerId: 'cus_sca' });
    return { harness, member };
  }

  it('asks the customer to complete 3-D Secure and tells the admin', async () => {
    const { harness, member } = harnessWithCardholder();

    await deliver(harness, 'evt_1', 'setup_intent.requires_action', {
      id: 'seti_1',
      customer: 'cus_sca',
      payment_method: 'pm_1',
      next_action: { type: 'use_stripe_sdk' },
    });
    await harness.flushDeferred();

    expect(harness.billingLog.ofType('setup_intent_requires_action')).toEqual([{
      userId: member.id,
      eventType: 'setup_intent_requires_action',
      timestamp: T0,
      details: {
        setup_intent_id: 'seti_1',
        payment_method_id: 'pm_1',
        next_action_type: 'use_stripe_sdk',
        requires_3d_secure: true,
      },
    }]);
    expect(harness.sender.sent).toEqual([
      {
        subject: 'Action Required: Complete Your Payment Setup',
        templateKey: 'email/3d_secure_notification',
        recipient: 'sca@example.com',
        context: { user_name: 'Sam', setup_intent_id: 'seti_1' },
      },
      {
        subject: '🚨 Setup Intent Requires Action',
        templateKey: 'email/admin_setup_intent_notification',
        recipient: ADMIN_EMAIL,
        context: {
          event_type: 'setup_intent_requires_action',
          setup_intent_id: 'seti_1',
          user_email: 'sca@example.com',
          user_name: 'Sam',
          next_action_type: 'use_stripe_sdk',
        },
      },
    ]);
  });

  it('logs failed and canceled setups', async () => {
    const { harness } = harnessWithCardholder();

    await deliver(harness, 'evt_1', 'setup_intent.setup_failed', {
      id: 'seti_2',
      customer: 'cus_sca',
      last_setup_error: { message: 'Your card was declined.' },
      payment_method_types: ['card'],
    });
    await deliver(harness, 'evt_2', 'setup_intent.canceled', { id: 'seti_3', customer: 'cus_sca' });
    await harness.flushDeferred();

    expect(harness.billingLog.ofType('payment_method_setup_failed').map(record => record.details)).toEqual([
      { setup_intent_id: 'seti_2', outcome: 'failed', failure_reason: 'Your card was declined.', payment_method_types: ['card'] },
      { setup_intent_id: 'seti_3', outcome: 'canceled', failure_reason: null, payment_method_types: [] },
    ]);
    expect(harness.sender.sent.map(sent => [sent.subject, sent.context.event_type])).toEqual([
      ['❌ Setup Intent Failed', 'setup_intent_failed'],
      ['❌ Setup Intent Failed', 'setup_intent_canceled'],
    ]);
  });

  it('stores the payment method of a successful setup', async () => {
    const { harness, member } = harnessWithCardholder();

    const outcome = await deliver(harness, 'evt_1', 'setup_intent.succeeded', {
      id: 'seti_4',
      customer: 'cus_sca',
      payment_method: { id: 'pm_new', object: 'payment_method' },
    });

    expect(outcome.effects).toEqual(['customer:payment_method_stored']);
    expect(harness.customers.get(member.id).paymentMethodId).toBe('pm_new');
  });
});

describe('charge and payment intent events', () => {
  it('downgrades a lapsed subscription when a charge fails', async () => {
    const harness = createHarness();
    const lapsedAt = new Date('2025-03-01T00:00:00.000Z');
    const member = harness.customers.seed({
      email: 'lapsed@example.com',
      stripeCustomerId: 'cus_lapsed',
      status: 'trialing',
      periodEnd: lapsedAt,
      trialEnd: lapsedAt,
    });

    const outcome = await deliver(harness, 'evt_1', 'charge.failed', {
      id: 'ch_failed',
      customer: 'cus_lapsed',
      amount: 2000,
      currency: 'usd',
      failure_code: 'card_declined',
      failure_message: 'Your card was declined.',
    });

    expect(outcome.effects).toEqual(['billing_event:charge_failed', 'subscription:entitlement_lapsed']);
    expect(harness.customers.get(member.id)).toMatchObject({ status: 'past_due', trialEnd: null, periodEnd: lapsedAt });
  });

  it('keeps a paid-up subscription when a charge fails', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({
      email: 'paid@example.com',
      stripeCustomerId: 'cus_paid',
      status: 'active',
      periodEnd: new Date('2025-04-01T00:00:00.000Z'),
    });

    const outcome = await deliver(harness, 'evt_1', 'charge.failed', {
      id: 'ch_failed',
      customer: 'cus_paid',
      amount: 2000,
      currency: 'usd',
    });

    expect(outcome.effects).toEqual(['billing_event:charge_failed']);
    expect(harness.customers.get(member.id).status).toBe('active');
  });

  it('uses the customer on an expanded disputed charge', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'd@example.com', stripeCustomerId: 'cus_d', status: 'active' });

    const outcome = await deliver(harness, 'evt_1', 'charge.dispute.created', {
      id: 'dp_2',
      amount: 1500,
      currency: 'usd',
      charge: { id: 'ch_2', object: 'charge', customer: 'cus_d' },
    });

    expect(outcome.effects).toEqual(['billing_event:charge_dispute_created']);
    expect(harness.chargeLookup.calls).toEqual([]);
  });

  it('logs failed payment intents, applies the lapse check and alerts the admin', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({
      email: 'pi@example.com',
      stripeCustomerId: 'cus_pi',
      status: 'active',
      periodEnd: new Date('2025-03-01T00:00:00.000Z'),
    });

    const outcome = await deliver(harness, 'evt_1', 'payment_intent.payment_failed', {
      id: 'pi_1',
      customer: 'cus_pi',
      amount: 2000,
      currency: 'usd',
      last_payment_error: { message: 'Insufficient funds' },
    });
    await harness.flushDeferred();

    expect(outcome.effects).toEqual(['billing_event:payment_intent_failed', 'subscription:entitlement_lapsed']);
    expect(harness.customers.get(member.id).status).toBe('past_due');
    expect(harness.sender.sent.map(sent => [sent.subject, sent.templateKey])).toEqual([
      ['💳 Payment Intent Failed', 'email/admin_payment_notification'],
    ]);
  });

  it('logs created payment intents', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'pi@example.com', stripeCustomerId: 'cus_pi' });

    await deliver(harness, 'evt_1', 'payment_intent.created', {
      id: 'pi_2',
      customer: 'cus_pi',
      amount: 2000,
      currency: 'usd',
      status: 'requires_payment_method',
    });

    expect(harness.billingLog.ofType('payment_intent_created')[0].details).toEqual({
      payment_intent_id: 'pi_2',
      amount: 2000,
      currency: 'usd',
      status: 'requires_payment_method',
    });
  });
});

describe('customer events', () => {
  it('syncs email and currency from the provider', async () => {
    const harness = createHarness();
    const member = harness.customers.seed({ email: 'old@example.com', stripeCustomerId: 'cus_u' });

    const outcome = await deliver(harness, 'evt_1', 'customer.updated', { id: 'cus_u', email: 'New@Example.com', currency: 'eur' });

    expect(outcome.effects).toEqual(['customer:profile_synced']);
    expect(harness.customers.get(member.id)).toMatchObject({ email: 'new@example.com', currency: 'eur' });
  });

  it('warns the admin about expiring cards', async () => {
    const harness = createHarness();
    harness.customers.seed({ email: 'card@example.com', stripeCustomerId: 'cus_card' });

    await deliver(harness, 'evt_1', 'customer.source.expiring', {
      id: 'card_1',
      customer: 'cus_card',
      brand: 'Visa',
      exp_month: 4,
      exp_year: 2025,
    });
    await harness.flushDeferred();

    expect(harness.billingLog.ofType('payment_method_expiring')[0].details).toEqual({
      source_id: 'card_1',
      brand: 'Visa',
      exp_month: 4,
      exp_year: 2025,
    });
    expect(harness.sender.sent.map(sent => sent.subject)).toEqual(['⚠️ Payment Method Expiring Soon']);
  });
});
