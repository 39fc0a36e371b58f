import express, { type Express } from 'express';
import { createStripeWebhookRouter } from './routes/stripeWebhook';
import type { WebhookPipelineDeps } from './core/stripe/webhooks';
import { logRequest, requestIdMiddleware } from './core/logger';

export function createApp(deps: WebhookPipelineDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use((req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    next();
  });
  app.use(requestIdMiddleware);
  app.use(logRequest);

  app.get('/healthz', (req, res) => {
    res.type('text/plain').send('OK');
  });

  app.use(createStripeWebhookRouter(deps));

  return app;
}
