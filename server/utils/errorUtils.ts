function isNonNullObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return isNonNullObject(value) && key in value;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  return hasProperty(error, 'code') ? String(error.code) : undefined;
}

export function getErrorDetail(error: unknown): string | undefined {
  return hasProperty(error, 'detail') ? String(error.detail) : undefined;
}

export function isStripeError(error: unknown): error is { type: string; message: string; code?: string; statusCode?: number } {
  return hasProperty(error, 'type') &&
    typeof error.type === 'string' &&
    error.type.startsWith('Stripe');
}

const SENSITIVE_PATTERNS = [
  /postgres(?:ql)?:\/\/[^\s]+/gi,
  /sk_(?:live|test)_[A-Za-z0-9]+/g,
  /rk_(?:live|test)_[A-Za-z0-9]+/g,
  /whsec_[A-Za-z0-9]+/g,
  /re_[A-Za-z0-9]{16,}/g,
  /Bearer\s+[A-Za-z0-9._-]+/gi,
  /secret[=:]\s*\S+/gi,
  /token[=:]\s*\S+/gi,
];

export function safeErrorDetail(error: unknown): string {
  const raw = getErrorMessage(error);
  let sanitized = raw;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }
  const firstLine = sanitized.split('\n')[0];
  if (firstLine.length > 200) {
    return firstLine.slice(0, 200) + '…';
  }
  return firstLine;
}
