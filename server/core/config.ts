import { z } from 'zod';

const signatureModes = ['verify', 'skip'] as const;
export type SignatureMode = (typeof signatureModes)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  STRIPE_SECRET_KEY: z.string().min(1, 'STRIPE_SECRET_KEY is required'),
  STRIPE_WEBHOOK_SECRET: z.string().optional(),
  STRIPE_WEBHOOK_TOLERANCE_SECONDS: z.coerce.number().int().positive().default(300),
  WEBHOOK_SIGNATURE_MODE: z.enum(signatureModes).default('verify'),
  WEBHOOK_HANDLER_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  ADMIN_EMAIL: z.string().email(),
  TRIAL_DAYS: z.coerce.number().int().nonnegative().default(7),
  ACCOUNT_SETUP_URL: z.string().url().default('http://localhost:3001/account/setup'),
  RESEND_API_KEY: z.string().optional(),
  EMAIL_FROM: z.string().default('billing@localhost'),
  NOTIFICATION_RETRIES: z.coerce.number().int().nonnegative().default(2),
})
  .refine(env => env.WEBHOOK_SIGNATURE_MODE === 'verify' || env.NODE_ENV !== 'production', {
    message: 'WEBHOOK_SIGNATURE_MODE=skip is not allowed in production',
    path: ['WEBHOOK_SIGNATURE_MODE'],
  })
  .refine(env => env.WEBHOOK_SIGNATURE_MODE === 'skip' || !!env.STRIPE_WEBHOOK_SECRET, {
    message: 'STRIPE_WEBHOOK_SECRET is required when signatures are verified',
    path: ['STRIPE_WEBHOOK_SECRET'],
  });

export interface StripeWebhookConfig {
  secretKey: string;
  webhookSecret: string | null;
  toleranceSeconds: number;
  signatureMode: SignatureMode;
  handlerTimeoutMs: number;
}

export interface BillingConfig {
  adminEmail: string;
  trialDays: number;
  // Page where new members choose a password; the setup token is appended as `token`
  accountSetupUrl: string;
}

export interface NotificationConfig {
  resendApiKey: string | null;
  fromEmail: string;
  retries: number;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  database: { url: string; poolMax: number };
  stripe: StripeWebhookConfig;
  billing: BillingConfig;
  notifications: NotificationConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    database: { url: e.DATABASE_URL, poolMax: e.DB_POOL_MAX },
    stripe: {
      secretKey: e.STRIPE_SECRET_KEY,
      webhookSecret: e.STRIPE_WEBHOOK_SECRET ?? null,
      toleranceSeconds: e.STRIPE_WEBHOOK_TOLERANCE_SECONDS,
      signatureMode: e.WEBHOOK_SIGNATURE_MODE,
      handlerTimeoutMs: e.WEBHOOK_HANDLER_TIMEOUT_MS,
    },
    billing: {
      adminEmail: e.ADMIN_EMAIL.toLowerCase(),
      trialDays: e.TRIAL_DAYS,
      accountSetupUrl: e.ACCOUNT_SETUP_URL,
    },
    notifications: {
      resendApiKey: e.RESEND_API_KEY ?? null,
      fromEmail: e.EMAIL_FROM,
      retries: e.NOTIFICATION_RETRIES,
    },
  };
}
