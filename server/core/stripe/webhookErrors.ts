export type WebhookErrorKind =
  | 'AuthenticationError'
  | 'MalformedPayload'
  | 'HandlerFailure'
  | 'HandlerTimeout'
  | 'StorageUnavailable';

export interface WebhookError<K extends WebhookErrorKind = WebhookErrorKind> {
  kind: K;
  message: string;
  cause?: unknown;
}

// Raised before an event is admitted; the sender may redeliver
export type RejectionKind = 'AuthenticationError' | 'MalformedPayload' | 'StorageUnavailable';

export type Result<T, E = WebhookError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = WebhookError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function webhookError<K extends WebhookErrorKind>(kind: K, message: string, cause?: unknown): WebhookError<K> {
  return cause === undefined ? { kind, message } : { kind, message, cause };
}
