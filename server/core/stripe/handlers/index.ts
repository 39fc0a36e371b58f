import type { HandlerDefinition } from '../webhookContext';
import { chargeHandlers } from './charges';
import { checkoutHandlers } from './checkout';
import { customerHandlers } from './customers';
import { invoiceHandlers } from './invoices';
import { paymentIntentHandlers } from './paymentIntents';
import { setupIntentHandlers } from './setupIntents';
import { subscriptionHandlers } from './subscriptions';

export const webhookHandlers: readonly HandlerDefinition[] = [
  ...checkoutHandlers,
  ...invoiceHandlers,
  ...subscriptionHandlers,
  ...setupIntentHandlers,
  ...chargeHandlers,
  ...paymentIntentHandlers,
  ...customerHandlers,
];
