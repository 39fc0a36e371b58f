import type { EventHandler, HandlerDefinition } from './webhookContext';
import { ok } from './webhookErrors';
import { logger } from '../logger';

const unhandledEvent: EventHandler = async (event) => {
  logger.info(`[Stripe Webhook] Unhandled event type: ${event.type}`, {
    eventId: event.id,
    eventType: event.type,
  });
  return ok({ effects: [], deferred: [] });
};

/**
 * Event-type to handler registry, built once at start-up. Types without a
 * handler resolve to a no-op so they are acknowledged without retries.
 */
export class EventRouter {
  private readonly handlers = new Map<string, EventHandler>();

  constructor(definitions: readonly HandlerDefinition[]) {
    for (const definition of definitions) {
      for (const type of definition.types) {
        if (this.handlers.has(type)) {
          throw new Error(`Duplicate webhook handler registered for ${type}`);
        }
        this.handlers.set(type, definition.handle);
      }
    }
  }

  isRegistered(eventType: string): boolean {
    return this.handlers.has(eventType);
  }

  resolve(eventType: string): EventHandler {
    return this.handlers.get(eventType) ?? unhandledEvent;
  }

  registeredTypes(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
