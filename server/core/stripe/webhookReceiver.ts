import type Stripe from 'stripe';
import type { SignatureMode, StripeWebhookConfig } from '../config';
import { getErrorMessage, isStripeError } from '../../utils/errorUtils';
import { eventEnvelopeSchema, type WebhookEvent } from './payloads';
import { err, ok, webhookError, type Result, type WebhookError } from './webhookErrors';
import { logger } from '../logger';

export type ReceiveError = WebhookError<'AuthenticationError' | 'MalformedPayload'>;

/**
 * Turns the raw body into a JSON document, checking authenticity first when
 * the verifier requires it.
 */
export interface SignatureVerifier {
  readonly mode: SignatureMode;
  verify(rawBody: Buffer, signature: string | undefined): Result<unknown, ReceiveError>;
}

export class StripeSignatureVerifier implements SignatureVerifier {
  readonly mode = 'verify' as const;

  constructor(
    private readonly stripe: Stripe,
    private readonly webhookSecret: string,
    private readonly toleranceSeconds: number,
  ) {}

  verify(rawBody: Buffer, signature: string | undefined): Result<unknown, ReceiveError> {
    if (!signature) {
      return err(webhookError('AuthenticationError', 'Missing stripe-signature header'));
    }

    try {
      // constructEvent compares signatures in constant time and enforces the timestamp tolerance
      return ok(this.stripe.webhooks.constructEvent(rawBody, signature, this.webhookSecret, this.toleranceSeconds));
    } catch (error: unknown) {
      if (isStripeError(error) && error.type === 'StripeSignatureVerificationError') {
        return err(webhookError('AuthenticationError', 'Webhook signature verification failed', error));
      }
      return err(webhookError('MalformedPayload', `Webhook body is not valid JSON: ${getErrorMessage(error)}`, error));
    }
  }
}

/**
 * Development-only verifier that accepts unsigned bodies. Configuration
 * refuses this mode in production.
 */
export class UnverifiedDevelopmentVerifier implements SignatureVerifier {
  readonly mode = 'skip' as const;

  verify(rawBody: Buffer): Result<unknown, ReceiveError> {
    try {
      return ok(JSON.parse(rawBody.toString('utf8')));
    } catch (error: unknown) {
      return err(webhookError('MalformedPayload', `Webhook body is not valid JSON: ${getErrorMessage(error)}`, error));
    }
  }
}

export function createSignatureVerifier(config: StripeWebhookConfig, stripe: Stripe): SignatureVerifier {
  if (config.signatureMode === 'skip') {
    logger.warn('[Stripe Webhook] Signature verification is DISABLED (development mode)');
    return new UnverifiedDevelopmentVerifier();
  }
  if (!config.webhookSecret) {
    throw new Error('STRIPE_WEBHOOK_SECRET is required to verify webhook signatures');
  }
  return new StripeSignatureVerifier(stripe, config.webhookSecret, config.toleranceSeconds);
}

export class WebhookReceiver {
  constructor(
    private readonly verifier: SignatureVerifier,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  receive(rawBody: Buffer, signature: string | undefined): Result<WebhookEvent, ReceiveError> {
    const verified = this.verifier.verify(rawBody, signature);
    if (!verified.ok) {
      logger.warn(`[Stripe Webhook] Rejected delivery: ${verified.error.message}`, {
        extra: { kind: verified.error.kind, mode: this.verifier.mode },
      });
      return verified;
    }

    const envelope = eventEnvelopeSchema.safeParse(verified.value);
    if (!envelope.success) {
      const fields = envelope.error.issues.map(issue => issue.path.join('.') || '(root)').join(', ');
      logger.warn('[Stripe Webhook] Rejected delivery with malformed envelope', { extra: { fields } });
      return err(webhookError('MalformedPayload', `Webhook envelope is missing or has invalid fields: ${fields}`));
    }

    const { id, type, created, data } = envelope.data;
    return ok({
      id,
      type,
      payload: data.object,
      previousAttributes: data.previous_attributes ?? null,
      created: created ?? null,
      receivedAt: this.clock(),
    });
  }
}
