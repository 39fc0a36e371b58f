import type { EventRouter } from './eventRouter';
import type { IdempotencyGuard } from './idempotencyGuard';
import type { WebhookEvent } from './payloads';
import type { DeferredAction, EventHandler, HandlerResult, WebhookContext } from './webhookContext';
import type { WebhookReceiver } from './webhookReceiver';
import { err, ok, webhookError, type RejectionKind, type Result, type WebhookError } from './webhookErrors';
import { getErrorMessage } from '../../utils/errorUtils';
import { logger } from '../logger';

export type WebhookOutcomeStatus = 'processed' | 'duplicate' | 'unhandled' | 'handler_failed';

export interface WebhookOutcome {
  status: WebhookOutcomeStatus;
  eventId: string;
  eventType: string;
  effects: string[];
  error?: WebhookError;
}

export type WebhookRejection = WebhookError<RejectionKind>;

export interface WebhookPipelineDeps {
  receiver: WebhookReceiver;
  guard: IdempotencyGuard;
  router: EventRouter;
  context: WebhookContext;
  handlerTimeoutMs: number;
  // Runs notifications after the response; defaults to the next macrotask
  runDeferred?: (actions: DeferredAction[]) => void;
}

export async function executeDeferredActions(actions: DeferredAction[]): Promise<void> {
  for (const action of actions) {
    try {
      await action();
    } catch (error: unknown) {
      logger.error('[Stripe Webhook] Deferred action failed (non-critical)', { error: getErrorMessage(error) });
    }
  }
}

export function scheduleDeferredActions(actions: DeferredAction[]): void {
  if (actions.length === 0) return;
  setImmediate(() => {
    executeDeferredActions(actions).catch((error: unknown) =>
      logger.error('[Stripe Webhook] Deferred actions aborted', { error: getErrorMessage(error) })
    );
  });
}

/**
 * Runs a handler with a time limit. Thrown errors become `HandlerFailure`;
 * a handler still running at the deadline yields `HandlerTimeout`. Its writes
 * still land, so when it finishes late its notifications are handed to
 * `runDeferred` and a failure is logged.
 */
export async function runHandler(
  handler: EventHandler,
  event: WebhookEvent,
  ctx: WebhookContext,
  timeoutMs: number,
  runDeferred: (actions: DeferredAction[]) => void = scheduleDeferredActions
): Promise<HandlerResult> {
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;

  const execution = Promise.resolve()
    .then(() => handler(event, ctx))
    .catch((error: unknown): HandlerResult =>
      err(webhookError('HandlerFailure', getErrorMessage(error), error))
    )
    .then(result => {
      if (!timedOut) return result;
      if (result.ok) {
        logger.warn(`[Stripe Webhook] Handler for ${event.id} finished after timing out`, {
          eventId: event.id,
          eventType: event.type,
          extra: { effects: result.value.effects },
        });
        runDeferred(result.value.deferred);
      } else {
        logger.error(`[Stripe Webhook] Handler for ${event.id} failed after timing out: ${result.error.message}`, {
          eventId: event.id,
          eventType: event.type,
        });
      }
      return result;
    });

  const deadline = new Promise<HandlerResult>(resolve => {
    timer = setTimeout(() => {
      timedOut = true;
      resolve(err(webhookError('HandlerTimeout', `Handler for ${event.type} exceeded ${timeoutMs}ms`)));
    }, timeoutMs);
  });

  try {
    return await Promise.race([execution, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export async function processStripeWebhook(
  deps: WebhookPipelineDeps,
  rawBody: Buffer,
  signature: string | undefined
): Promise<Result<WebhookOutcome, WebhookRejection>> {
  if (!Buffer.isBuffer(rawBody)) {
    return err(webhookError(
      'MalformedPayload',
      'Webhook payload must be the raw request body; it was parsed before reaching the webhook route'
    ));
  }

  const received = deps.receiver.receive(rawBody, signature);
  if (!received.ok) return received;
  const event = received.value;
  const base = { eventId: event.id, eventType: event.type };

  let admitted: boolean;
  try {
    admitted = await deps.guard.tryAdmit(event.id, event.type);
  } catch (error: unknown) {
    logger.error(`[Stripe Webhook] Could not record event ${event.id}`, {
      ...base,
      error: getErrorMessage(error),
    });
    return err(webhookError('StorageUnavailable', 'Processed-event ledger is unavailable', error));
  }

  if (!admitted) {
    logger.info(`[Stripe Webhook] Skipping duplicate event: ${event.id} (${event.type})`, base);
    return ok({ ...base, status: 'duplicate', effects: [] });
  }

  const registered = deps.router.isRegistered(event.type);
  logger.info(`[Stripe Webhook] Processing event: ${event.id} (${event.type})`, base);

  const runDeferred = deps.runDeferred ?? scheduleDeferredActions;
  const result = await runHandler(
    deps.router.resolve(event.type),
    event,
    deps.context,
    deps.handlerTimeoutMs,
    runDeferred
  );
  if (!result.ok) {
    // Admission is already recorded, so the sender is told this succeeded and will not retry
    logger.error(`[Stripe Webhook] Handler failed for ${event.id} (${event.type}): ${result.error.message}`, {
      ...base,
      extra: { kind: result.error.kind },
    });
    return ok({ ...base, status: 'handler_failed', effects: [], error: result.error });
  }

  const { effects, deferred } = result.value;
  runDeferred(deferred);

  logger.info(`[Stripe Webhook] Event ${event.id} handled`, { ...base, extra: { effects } });
  return ok({ ...base, status: registered ? 'processed' : 'unhandled', effects });
}
