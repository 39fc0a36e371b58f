import http from 'http';
import type { Server } from 'http';
import type { Pool } from 'pg';
import { loadConfig } from './core/config';
import { createPool } from './core/db';
import { createDb } from './db';
import { ensureBillingTables } from './db-init';
import { createApp } from './app';
import { PgBillingEventLog } from './core/billing/billingEventLog';
import { PgCheckoutSessionStore } from './core/billing/checkoutSessions';
import { PgCustomerDirectory } from './core/customerDirectory';
import { NotificationTrigger, createNotificationSender } from './core/notificationService';
import {
  EventRouter,
  PgIdempotencyGuard,
  StripeChargeLookup,
  WebhookReceiver,
  createSignatureVerifier,
  createStripeClient,
  webhookHandlers,
} from './core/stripe';
import { getErrorMessage } from './utils/errorUtils';
import { logger } from './core/logger';

let isShuttingDown = false;
let httpServer: Server | null = null;
let pool: Pool | null = null;

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection', { error: getErrorMessage(reason) });
});

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        setTimeout(resolve, 5000);
      });
    }
    if (pool) {
      await pool.end();
    }

    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error', { error });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

async function start(): Promise<void> {
  const config = loadConfig(process.env);
  pool = createPool(config);
  const db = createDb(pool);
  await ensureBillingTables(db);

  const stripe = createStripeClient(config.stripe);
  const router = new EventRouter(webhookHandlers);
  logger.info(`[Startup] Registered ${router.registeredTypes().length} webhook event types`);

  const app = createApp({
    receiver: new WebhookReceiver(createSignatureVerifier(config.stripe, stripe)),
    guard: new PgIdempotencyGuard(db),
    router,
    handlerTimeoutMs: config.stripe.handlerTimeoutMs,
    context: {
      customers: new PgCustomerDirectory(db),
      billingLog: new PgBillingEventLog(db),
      checkoutSessions: new PgCheckoutSessionStore(db),
      notifications: new NotificationTrigger(
        createNotificationSender(config.notifications),
        config.billing.adminEmail,
        config.notifications.retries
      ),
      chargeLookup: new StripeChargeLookup(stripe),
      billing: config.billing,
      clock: () => new Date(),
    },
  });

  httpServer = http.createServer(app);
  httpServer.listen(config.port, '0.0.0.0', () => {
    logger.info(`[Startup] HTTP server listening on port ${config.port}`);
  });
}

process.on('SIGTERM', () => {
  gracefulShutdown('SIGTERM').catch(() => process.exit(1));
});
process.on('SIGINT', () => {
  gracefulShutdown('SIGINT').catch(() => process.exit(1));
});

start().catch((error: unknown) => {
  logger.error('[Startup] Failed to start', { error });
  process.exit(1);
});
