export { createStripeClient, StripeChargeLookup, type ChargeCustomerLookup } from './client';
export { EventRouter } from './eventRouter';
export { PgIdempotencyGuard, type IdempotencyGuard } from './idempotencyGuard';
export { webhookHandlers } from './handlers';
export { WebhookReceiver, createSignatureVerifier, type SignatureVerifier } from './webhookReceiver';
export type { WebhookContext, DeferredAction } from './webhookContext';
export type { WebhookError, RejectionKind, Result } from './webhookErrors';
export {
  processStripeWebhook,
  executeDeferredActions,
  scheduleDeferredActions,
  type WebhookOutcome,
  type WebhookOutcomeStatus,
  type WebhookPipelineDeps,
  type WebhookRejection,
} from './webhooks';
