import { describe, it, expect, vi } from 'vitest';
import Stripe from 'stripe';
import {
  StripeSignatureVerifier,
  UnverifiedDevelopmentVerifier,
  WebhookReceiver,
  createSignatureVerifier,
} from '../../server/core/stripe/webhookReceiver';
import type { StripeWebhookConfig } from '../../server/core/config';

vi.mock('../../server/core/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

const WEBHOOK_SECRET = 'whsec_test_secret';
const stripe = new Stripe('sk_test_placeholder');
const receivedAt = new Date('2025-03-10T12:00:00.000Z');

const payload = JSON.stringify({
  id: 'evt_receiver_1',
  object: 'event',
  type: 'invoice.payment_succeeded',
  created: 1741608000,
  data: { object: { id: 'in_1', customer: 'cus_1' } },
});

function signedReceiver(): WebhookReceiver {
  return new WebhookReceiver(new StripeSignatureVerifier(stripe, WEBHOOK_SECRET, 300), () => receivedAt);
}

describe('WebhookReceiver with signature verification', () => {
  it('accepts a correctly signed body', () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });

    const result = signedReceiver().receive(Buffer.from(payload), signature);

    expect(result).toEqual({
      ok: true,
      value: {
        id: 'evt_receiver_1',
        type: 'invoice.payment_succeeded',
        payload: { id: 'in_1', customer: 'cus_1' },
        previousAttributes: null,
        created: 1741608000,
        receivedAt,
      },
    });
  });

  it('rejects a tampered body signed for the original', () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });
    const tampered = payload.replace('cus_1', 'cus_2');

    const result = signedReceiver().receive(Buffer.from(tampered), signature);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('AuthenticationError');
  });

  it('rejects a body signed with another secret', () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: 'whsec_other_secret' });

    const result = signedReceiver().receive(Buffer.from(payload), signature);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('AuthenticationError');
  });

  it('rejects a missing signature header', () => {
    const result = signedReceiver().receive(Buffer.from(payload), undefined);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'AuthenticationError', message: 'Missing stripe-signature header' },
    });
  });

  it('rejects signatures outside the timestamp tolerance', () => {
    const timestamp = Math.floor(Date.now() / 1000) - 3600;
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET, timestamp });

    const result = signedReceiver().receive(Buffer.from(payload), signature);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('AuthenticationError');
  });
});

describe('WebhookReceiver in development mode', () => {
  const receiver = new WebhookReceiver(new UnverifiedDevelopmentVerifier(), () => receivedAt);

  it('accepts unsigned bodies', () => {
    const result = receiver.receive(Buffer.from(payload), undefined);
    expect(result.ok).toBe(true);
  });

  it('reports invalid JSON as malformed', () => {
    const result = receiver.receive(Buffer.from('{"id": '), undefined);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('MalformedPayload');
  });

  it('reports envelopes without an id or data object as malformed', () => {
    const result = receiver.receive(Buffer.from(JSON.stringify({ type: 'invoice.paid', data: {} })), undefined);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'MalformedPayload',
        message: 'Webhook envelope is missing or has invalid fields: id, data.object',
      },
    });
  });
});

describe('createSignatureVerifier', () => {
  const base: StripeWebhookConfig = {
    secretKey: 'sk_test_placeholder',
    webhookSecret: WEBHOOK_SECRET,
    toleranceSeconds: 300,
    signatureMode: 'verify',
    handlerTimeoutMs: 1000,
  };

  it('builds a verifying verifier by default', () => {
    expect(createSignatureVerifier(base, stripe).mode).toBe('verify');
  });

  it('builds the development verifier in skip mode', () => {
    expect(createSignatureVerifier({ ...base, signatureMode: 'skip', webhookSecret: null }, stripe).mode).toBe('skip');
  });

  it('refuses to verify without a secret', () => {
    expect(() => createSignatureVerifier({ ...base, webhookSecret: null }, stripe))
      .toThrow('STRIPE_WEBHOOK_SECRET is required to verify webhook signatures');
  });
});
