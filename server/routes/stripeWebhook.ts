import express, { Router, type Request, type Response } from 'express';
import { processStripeWebhook, type WebhookPipelineDeps, type WebhookRejection } from '../core/stripe/webhooks';
import { createErrorResponse, logger } from '../core/logger';

export const STRIPE_WEBHOOK_PATH = '/api/stripe/webhook';

// Handler failures are acknowledged as `handler_failed` and never reach this mapping
export function httpStatusFor(error: WebhookRejection): number {
  switch (error.kind) {
    case 'AuthenticationError':
    case 'MalformedPayload':
      return 400;
    case 'StorageUnavailable':
      return 503;
  }
}

function signatureHeader(req: Request): string | undefined {
  const signature = req.headers['stripe-signature'];
  return Array.isArray(signature) ? signature[0] : signature;
}

/**
 * The webhook route must see the unparsed body, so it carries its own
 * express.raw parser and is mounted before any JSON body parser.
 */
export function createStripeWebhookRouter(deps: WebhookPipelineDeps): Router {
  const router = Router();

  router.post(
    STRIPE_WEBHOOK_PATH,
    express.raw({ type: 'application/json' }),
    async (req: Request, res: Response) => {
      // express.raw leaves an empty object when the content type did not match
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

      try {
        const result = await processStripeWebhook(deps, rawBody, signatureHeader(req));
        if (!result.ok) {
          return res.status(httpStatusFor(result.error)).json(createErrorResponse(req, result.error.message, result.error.kind));
        }
        return res.status(200).json({ received: true, status: result.value.status });
      } catch (error: unknown) {
        logger.error('[Stripe Webhook] Unexpected pipeline error', { requestId: req.requestId, error });
        return res.status(500).json(createErrorResponse(req, 'Server processing error'));
      }
    }
  );

  return router;
}
