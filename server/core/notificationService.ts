import pRetry from 'p-retry';
import { Resend } from 'resend';
import type { NotificationConfig } from './config';
import { getErrorMessage, safeErrorDetail } from '../utils/errorUtils';
import { logger } from './logger';

export type NotificationContext = Record<string, unknown>;

/**
 * Outbound notification transport. How a template key turns into a message
 * is the transport's business; this subsystem only picks the key and the data.
 */
export interface NotificationSender {
  send(subject: string, templateKey: string, recipient: string, context: NotificationContext): Promise<boolean>;
}

function formatContextValue(value: unknown): string {
  if (value === null || value === undefined) return '-';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

export function renderPlainText(templateKey: string, context: NotificationContext): string {
  const lines = Object.entries(context).map(([key, value]) => `${key}: ${formatContextValue(value)}`);
  return [`[${templateKey}]`, '', ...lines].join('\n');
}

// Resend tag values only accept ASCII letters, digits, underscores and dashes
function toTagValue(templateKey: string): string {
  return templateKey.replace(/[^A-Za-z0-9_-]/g, '_');
}

export class ResendNotificationSender implements NotificationSender {
  private readonly client: Resend;

  constructor(apiKey: string, private readonly fromEmail: string) {
    this.client = new Resend(apiKey);
  }

  async send(subject: string, templateKey: string, recipient: string, context: NotificationContext): Promise<boolean> {
    const { data, error } = await this.client.emails.send({
      from: this.fromEmail,
      to: recipient,
      subject,
      text: renderPlainText(templateKey, context),
      tags: [{ name: 'template', value: toTagValue(templateKey) }],
    });

    if (error) {
      logger.warn(`[Notification] Resend rejected "${subject}"`, {
        extra: { templateKey, recipient, detail: error.message },
      });
      return false;
    }

    logger.info(`[Notification] Sent "${subject}"`, { extra: { templateKey, recipient, emailId: data?.id } });
    return true;
  }
}

export class LogNotificationSender implements NotificationSender {
  async send(subject: string, templateKey: string, recipient: string, context: NotificationContext): Promise<boolean> {
    logger.info(`[Notification] (log only) ${subject}`, { extra: { templateKey, recipient, context } });
    return true;
  }
}

export function createNotificationSender(config: NotificationConfig): NotificationSender {
  if (!config.resendApiKey) {
    logger.warn('[Notification] RESEND_API_KEY not set, notifications will only be logged');
    return new LogNotificationSender();
  }
  return new ResendNotificationSender(config.resendApiKey, config.fromEmail);
}

/**
 * Best-effort trigger used by the webhook handlers. Delivery failures are
 * retried, then logged and reported as `false`; they never propagate.
 */
export class NotificationTrigger {
  constructor(
    private readonly sender: NotificationSender,
    private readonly adminEmail: string,
    private readonly retries: number = 2,
  ) {}

  async notify(subject: string, templateKey: string, recipient: string, context: NotificationContext): Promise<boolean> {
    try {
      return await pRetry(async () => {
        const delivered = await this.sender.send(subject, templateKey, recipient, context);
        if (!delivered) {
          throw new Error(`Notification sender reported failure for ${templateKey}`);
        }
        return delivered;
      }, {
        retries: this.retries,
        minTimeout: 250,
        onFailedAttempt: (error) => {
          logger.warn(`[Notification] Attempt ${error.attemptNumber} failed for "${subject}"`, {
            extra: { templateKey, recipient, retriesLeft: error.retriesLeft, detail: safeErrorDetail(error) },
          });
        },
      });
    } catch (error: unknown) {
      logger.error(`[Notification] Failed to send "${subject}" to ${recipient}`, {
        error: getErrorMessage(error),
        extra: { templateKey },
      });
      return false;
    }
  }

  notifyAdmin(subject: string, templateKey: string, context: NotificationContext): Promise<boolean> {
    return this.notify(subject, templateKey, this.adminEmail, context);
  }
}
