import { eq, sql } from 'drizzle-orm';
import type { Database } from '../db';
import { users, type SubscriptionStatus, type UserRow } from '../../shared/models/billing';
import { isConstraintError } from './db';
import { logger } from './logger';

export interface Customer {
  id: number;
  email: string;
  firstName: string | null;
  lastName: string | null;
  stripeCustomerId: string | null;
  status: SubscriptionStatus;
  periodEnd: Date | null;
  trialEnd: Date | null;
  canceledAt: Date | null;
  cancellationReason: string | null;
  cancellationComment: string | null;
  confirmedAt: Date | null;
  paymentMethodId: string | null;
  currency: string | null;
}

export type CustomerPatch = Partial<Omit<Customer, 'id'>>;

export interface NewCustomer {
  stripeCustomerId: string;
  email: string;
  firstName: string | null;
  lastName: string | null;
  status: SubscriptionStatus;
  periodEnd: Date | null;
  trialEnd: Date | null;
  confirmedAt: Date | null;
}

/**
 * The user/customer store this subsystem reads and mutates. Each call is a
 * single atomic write; nothing spans calls.
 */
export interface CustomerDirectory {
  findByCustomerId(stripeCustomerId: string): Promise<Customer | null>;
  findByEmail(email: string): Promise<Customer | null>;
  create(input: NewCustomer): Promise<Customer>;
  update(id: number, patch: CustomerPatch): Promise<Customer>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function displayName(customer: Customer): string {
  return customer.firstName || customer.email;
}

function toCustomer(row: UserRow): Customer {
  return {
    id: row.id,
    email: row.email,
    firstName: row.firstName,
    lastName: row.lastName,
    stripeCustomerId: row.stripeCustomerId,
    status: row.subscriptionStatus,
    periodEnd: row.periodEnd,
    trialEnd: row.trialEnd,
    canceledAt: row.canceledAt,
    cancellationReason: row.cancellationReason,
    cancellationComment: row.cancellationComment,
    confirmedAt: row.confirmedAt,
    paymentMethodId: row.paymentMethodId,
    currency: row.currency,
  };
}

export class PgCustomerDirectory implements CustomerDirectory {
  constructor(private readonly db: Database) {}

  async findByCustomerId(stripeCustomerId: string): Promise<Customer | null> {
    const [row] = await this.db.select().from(users).where(eq(users.stripeCustomerId, stripeCustomerId)).limit(1);
    return row ? toCustomer(row) : null;
  }

  async findByEmail(email: string): Promise<Customer | null> {
    const [row] = await this.db.select().from(users).where(eq(users.email, normalizeEmail(email))).limit(1);
    return row ? toCustomer(row) : null;
  }

  async create(input: NewCustomer): Promise<Customer> {
    const email = normalizeEmail(input.email);
    try {
      const [row] = await this.db.insert(users).values({
        email,
        firstName: input.firstName,
        lastName: input.lastName,
        stripeCustomerId: input.stripeCustomerId,
        subscriptionStatus: input.status,
        periodEnd: input.periodEnd,
        trialEnd: input.trialEnd,
        confirmedAt: input.confirmedAt,
      }).returning();
      return toCustomer(row);
    } catch (error: unknown) {
      // A concurrent delivery for the same customer may have inserted first
      if (isConstraintError(error).type === 'unique') {
        const existing = await this.findByCustomerId(input.stripeCustomerId) ?? await this.findByEmail(email);
        if (existing) {
          logger.warn('[Customers] Create raced with another writer, using existing row', {
            userId: existing.id,
            customerId: input.stripeCustomerId,
          });
          return existing;
        }
      }
      throw error;
    }
  }

  async update(id: number, patch: CustomerPatch): Promise<Customer> {
    const { status, ...columns } = patch;
    const [row] = await this.db.update(users)
      .set({
        ...columns,
        ...(status !== undefined ? { subscriptionStatus: status } : {}),
        updatedAt: sql`NOW()`,
      })
      .where(eq(users.id, id))
      .returning();

    if (!row) {
      throw new Error(`Customer ${id} not found`);
    }
    return toCustomer(row);
  }
}
