import { z } from 'zod';
import { err, ok, webhookError, type Result } from './webhookErrors';

// Stripe sends references either as an id or as the expanded object.
const stripeRef = z.union([
  z.string().min(1),
  z.object({ id: z.string().min(1) }).passthrough(),
]).transform(ref => (typeof ref === 'string' ? ref : ref.id));

const optionalRef = stripeRef.nullable().optional().transform(ref => ref ?? null);
const optionalString = z.string().nullable().optional().transform(value => value ?? null);
const optionalNumber = z.number().nullable().optional().transform(value => value ?? null);

export const eventEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  created: z.number().int().optional(),
  data: z.object({
    object: z.record(z.unknown()),
    previous_attributes: z.record(z.unknown()).optional(),
  }),
});

export type EventEnvelope = z.infer<typeof eventEnvelopeSchema>;

export interface WebhookEvent {
  id: string;
  type: string;
  payload: Record<string, unknown>;
  previousAttributes: Record<string, unknown> | null;
  created: number | null;
  receivedAt: Date;
}

export const checkoutSessionSchema = z.object({
  id: z.string().min(1),
  customer: stripeRef,
  customer_details: z.object({
    email: z.string().email(),
    name: optionalString,
  }),
});

export const invoiceLineSchema = z.object({
  description: optionalString,
  period: z.object({ start: z.number(), end: z.number() }).nullable().optional(),
});

export const invoiceSchema = z.object({
  id: z.string().min(1),
  customer: optionalRef,
  amount_paid: optionalNumber,
  amount_due: optionalNumber,
  currency: optionalString,
  status: optionalString,
  billing_reason: optionalString,
  attempt_count: optionalNumber,
  next_payment_attempt: optionalNumber,
  period_end: optionalNumber,
  subscription: optionalRef,
  lines: z.object({ data: z.array(invoiceLineSchema) }).optional(),
});

export const subscriptionSchema = z.object({
  id: z.string().min(1),
  customer: stripeRef,
  status: z.string().min(1),
  trial_end: optionalNumber,
  canceled_at: optionalNumber,
  ended_at: optionalNumber,
  current_period_end: optionalNumber,
  cancellation_details: z.object({
    reason: optionalString,
    comment: optionalString,
  }).nullable().optional(),
});

export const setupIntentSchema = z.object({
  id: z.string().min(1),
  customer: optionalRef,
  payment_method: optionalRef,
  next_action: z.object({ type: optionalString }).passthrough().nullable().optional(),
  last_setup_error: z.object({ message: optionalString }).passthrough().nullable().optional(),
  payment_method_types: z.array(z.string()).optional(),
});

export const disputeSchema = z.object({
  id: z.string().min(1),
  amount: z.number(),
  currency: z.string(),
  reason: optionalString,
  status: optionalString,
  // Expanded charges carry the customer; plain ids are resolved through the provider
  charge: z.union([
    z.string().min(1),
    z.object({ id: z.string().min(1), customer: optionalRef }).passthrough(),
  ]),
  customer: optionalRef,
});

export const chargeSchema = z.object({
  id: z.string().min(1),
  customer: optionalRef,
  amount: z.number(),
  currency: z.string(),
  amount_refunded: optionalNumber,
  failure_message: optionalString,
  failure_code: optionalString,
});

export const paymentIntentSchema = z.object({
  id: z.string().min(1),
  customer: optionalRef,
  amount: z.number(),
  currency: z.string(),
  status: optionalString,
  last_payment_error: z.object({ message: optionalString }).passthrough().nullable().optional(),
});

export const customerSchema = z.object({
  id: z.string().min(1),
  email: optionalString,
  currency: optionalString,
});

export const cardSourceSchema = z.object({
  id: z.string().min(1),
  customer: optionalRef,
  exp_month: optionalNumber,
  exp_year: optionalNumber,
  brand: optionalString,
});

export type CheckoutSessionPayload = z.infer<typeof checkoutSessionSchema>;
export type InvoicePayload = z.infer<typeof invoiceSchema>;
export type SubscriptionPayload = z.infer<typeof subscriptionSchema>;
export type SetupIntentPayload = z.infer<typeof setupIntentSchema>;
export type DisputePayload = z.infer<typeof disputeSchema>;
export type ChargePayload = z.infer<typeof chargeSchema>;
export type PaymentIntentPayload = z.infer<typeof paymentIntentSchema>;
export type CustomerPayload = z.infer<typeof customerSchema>;
export type CardSourcePayload = z.infer<typeof cardSourceSchema>;

export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  event: WebhookEvent
): Result<z.output<S>> {
  const parsed = schema.safeParse(event.payload);
  if (parsed.success) {
    return ok(parsed.data);
  }
  const fields = parsed.error.issues
    .map(issue => issue.path.join('.') || '(root)')
    .join(', ');
  return err(webhookError('MalformedPayload', `${event.type} payload is missing or has invalid fields: ${fields}`));
}
