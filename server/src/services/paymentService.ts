import { eq, desc, sql } from 'drizzle-orm';
import type { Decimal } from 'decimal.js';
import { invoices, payments } from '../db/schema.js';
import type { DbType, ReadOnlyDb } from '../db/types.js';
import { writeTransaction } from '../db/transaction.js';
import type {
  Payment,
  CreatePaymentRequest,
  PaymentListQuery,
  PaginationMeta,
} from '@studio-ledger/shared';
import { NotFoundError } from '../errors/AppError.js';
import { assertPaymentAcceptable, assertPositivePayment } from './ledgerRules.js';
import { formatCents, fromCents, parseMoney, toCents } from './money.js';
import { normalizeTimestamp, resolvePagination } from './validation.js';

function toPayment(row: typeof payments.$inferSelect): Payment {
  return {
    id: row.id,
    invoiceId: row.invoiceId,
    amount: formatCents(row.amountCents),
    method: row.method,
    paidAt: row.paidAt,
  };
}

/**
 * Sum of all payments applied to an invoice (zero when there are none).
 * Summed in integer cents by the store, so no floating point is involved.
 */
export function getPaidTotal(db: ReadOnlyDb, invoiceId: number): Decimal {
  const result = db
    .select({ totalCents: sql<number>`COALESCE(SUM(${payments.amountCents}), 0)` })
    .from(payments)
    .where(eq(payments.invoiceId, invoiceId))
    .get();
  return fromCents(result?.totalCents ?? 0);
}

/**
 * List payments, most recent first (ties: newest id first).
 */
export function listPayments(
  db: ReadOnlyDb,
  query: PaymentListQuery,
): { payments: Payment[]; pagination: PaginationMeta } {
  const { skip, limit } = resolvePagination(query);

  const countResult = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(payments)
    .get();

  const rows = db
    .select()
    .from(payments)
    .orderBy(desc(payments.paidAt), desc(payments.id))
    .limit(limit)
    .offset(skip)
    .all();

  return {
    payments: rows.map(toPayment),
    pagination: { skip, limit, totalItems: countResult?.count ?? 0 },
  };
}

/**
 * @throws NotFoundError if payment does not exist
 */
export function getPaymentById(db: ReadOnlyDb, id: number): Payment {
  const row = db.select().from(payments).where(eq(payments.id, id)).get();
  if (!row) {
    throw NotFoundError.forEntity('payment', id);
  }
  return toPayment(row);
}

/**
 * Record a payment against an invoice.
 *
 * The paid total is read and the payment inserted inside one IMMEDIATE
 * transaction, so two submissions racing for the same remaining balance are
 * serialized and at most one of them fits.
 *
 * @throws InvalidAmountError if the amount is zero or negative
 * @throws NotFoundError if the invoice does not exist
 * @throws OverpaymentError if the payment would push the paid total past the invoice amount
 */
export function createPayment(db: DbType, data: CreatePaymentRequest): Payment {
  const amount = parseMoney(data.amount, 'amount');
  assertPositivePayment(amount);
  const paidAt =
    data.paidAt !== undefined
      ? normalizeTimestamp(data.paidAt, 'paidAt')
      : new Date().toISOString();

  return writeTransaction(db, (tx) => {
    const invoice = tx
      .select({ id: invoices.id, amountCents: invoices.amountCents })
      .from(invoices)
      .where(eq(invoices.id, data.invoiceId))
      .get();
    if (!invoice) {
      throw NotFoundError.forEntity('invoice', data.invoiceId);
    }

    assertPaymentAcceptable({
      invoiceId: invoice.id,
      invoiceAmount: fromCents(invoice.amountCents),
      totalPaid: getPaidTotal(tx, invoice.id),
      amount,
    });

    const row = tx
      .insert(payments)
      .values({
        invoiceId: invoice.id,
        amountCents: toCents(amount),
        method: data.method ?? null,
        paidAt,
      })
      .returning()
      .get();
    return toPayment(row);
  });
}

/**
 * Delete a payment.
 * @throws NotFoundError if payment does not exist
 */
export function deletePayment(db: DbType, id: number): void {
  writeTransaction(db, (tx) => {
    const existing = tx
      .select({ id: payments.id })
      .from(payments)
      .where(eq(payments.id, id))
      .get();
    if (!existing) {
      throw NotFoundError.forEntity('payment', id);
    }
    tx.delete(payments).where(eq(payments.id, id)).run();
  });
}
