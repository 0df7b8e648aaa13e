import { eq, desc, and, gte, lte, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { invoices } from '../db/schema.js';
import type { DbType, ReadOnlyDb } from '../db/types.js';
import { writeTransaction } from '../db/transaction.js';
import type {
  Invoice,
  CreateInvoiceRequest,
  UpdateInvoiceRequest,
  InvoiceListQuery,
  InvoiceSummary,
  IssuedDateRangeQuery,
  PaginationMeta,
} from '@studio-ledger/shared';
import { NotFoundError, OverpaymentError, ValidationError } from '../errors/AppError.js';
import { amountCoversPayments, deriveBalance } from './ledgerRules.js';
import { ZERO, formatCents, formatMoney, fromCents, parseMoney, toCents } from './money.js';
import { getPaidTotal } from './paymentService.js';
import { assertOptionalReferenceExists, assertReferenceExists } from './references.js';
import { assertIsoDate, requireText, resolvePagination } from './validation.js';

const DEFAULT_INVOICE_STATUS = 'draft';

/**
 * Convert a database invoice row to Invoice API shape.
 */
function toInvoice(row: typeof invoices.$inferSelect): Invoice {
  return {
    id: row.id,
    clientId: row.clientId,
    shootId: row.shootId,
    packageId: row.packageId,
    amount: formatCents(row.amountCents),
    status: row.status,
    issuedDate: row.issuedDate,
    dueDate: row.dueDate,
  };
}

function parseAmountCents(value: string): number {
  const amount = parseMoney(value, 'amount');
  if (amount.lessThan(ZERO)) {
    throw new ValidationError('amount must not be negative', { field: 'amount', value });
  }
  return toCents(amount);
}

function assertDueDateNotBeforeIssued(dueDate: string, issuedDate: string): void {
  if (dueDate < issuedDate) {
    throw new ValidationError('Due date must be on or after the issued date', {
      issuedDate,
      dueDate,
    });
  }
}

/**
 * Build the inclusive issued-date filter for a `date_from`/`date_to` window.
 * Either side may be omitted. Returns undefined when neither is given.
 * @throws ValidationError if a bound is not a valid YYYY-MM-DD date
 */
export function issuedDateRange(query: IssuedDateRangeQuery): SQL | undefined {
  const conditions: SQL[] = [];
  if (query.date_from !== undefined) {
    assertIsoDate(query.date_from, 'date_from');
    conditions.push(gte(invoices.issuedDate, query.date_from));
  }
  if (query.date_to !== undefined) {
    assertIsoDate(query.date_to, 'date_to');
    conditions.push(lte(invoices.issuedDate, query.date_to));
  }
  return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * List invoices, most recently issued first (ties: newest id first),
 * optionally restricted to an issued-date window.
 */
export function listInvoices(
  db: ReadOnlyDb,
  query: InvoiceListQuery,
): { invoices: Invoice[]; pagination: PaginationMeta } {
  const { skip, limit } = resolvePagination(query);
  const whereClause = issuedDateRange(query);

  const countResult = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(invoices)
    .where(whereClause)
    .get();

  const rows = db
    .select()
    .from(invoices)
    .where(whereClause)
    .orderBy(desc(invoices.issuedDate), desc(invoices.id))
    .limit(limit)
    .offset(skip)
    .all();

  return {
    invoices: rows.map(toInvoice),
    pagination: { skip, limit, totalItems: countResult?.count ?? 0 },
  };
}

/**
 * @throws NotFoundError if invoice does not exist
 */
export function getInvoiceById(db: ReadOnlyDb, id: number): Invoice {
  const row = db.select().from(invoices).where(eq(invoices.id, id)).get();
  if (!row) {
    throw NotFoundError.forEntity('invoice', id);
  }
  return toInvoice(row);
}

/**
 * Create an invoice for an existing client, optionally linked to a shoot and/or package.
 * @throws ReferenceNotFoundError if the client, shoot or package does not exist
 * @throws ValidationError if any field is invalid
 */
export function createInvoice(db: DbType, data: CreateInvoiceRequest): Invoice {
  const amountCents = parseAmountCents(data.amount);
  assertIsoDate(data.issuedDate, 'issuedDate');
  if (data.dueDate !== undefined && data.dueDate !== null) {
    assertIsoDate(data.dueDate, 'dueDate');
    assertDueDateNotBeforeIssued(data.dueDate, data.issuedDate);
  }
  const status =
    data.status !== undefined ? requireText(data.status, 'status', 20) : DEFAULT_INVOICE_STATUS;

  return writeTransaction(db, (tx) => {
    assertReferenceExists(tx, 'client', data.clientId);
    assertOptionalReferenceExists(tx, 'shoot', data.shootId);
    assertOptionalReferenceExists(tx, 'package', data.packageId);

    const row = tx
      .insert(invoices)
      .values({
        clientId: data.clientId,
        shootId: data.shootId ?? null,
        packageId: data.packageId ?? null,
        amountCents,
        status,
        issuedDate: data.issuedDate,
        dueDate: data.dueDate ?? null,
      })
      .returning()
      .get();
    return toInvoice(row);
  });
}

/**
 * Partial update of an invoice. Only keys present in `data` are applied;
 * an explicit null on shootId, packageId or dueDate clears that field.
 * @throws NotFoundError if invoice does not exist
 * @throws ReferenceNotFoundError if a newly linked shoot or package does not exist
 * @throws OverpaymentError if the new amount is below what has already been paid
 * @throws ValidationError if any provided field is invalid
 */
export function updateInvoice(db: DbType, id: number, data: UpdateInvoiceRequest): Invoice {
  if (
    data.shootId === undefined &&
    data.packageId === undefined &&
    data.amount === undefined &&
    data.status === undefined &&
    data.issuedDate === undefined &&
    data.dueDate === undefined
  ) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof invoices.$inferInsert> = {};

  if (data.amount !== undefined) {
    updates.amountCents = parseAmountCents(data.amount);
  }

  if (data.status !== undefined) {
    updates.status = requireText(data.status, 'status', 20);
  }

  if (data.issuedDate !== undefined) {
    assertIsoDate(data.issuedDate, 'issuedDate');
    updates.issuedDate = data.issuedDate;
  }

  if (data.dueDate !== undefined) {
    if (data.dueDate !== null) {
      assertIsoDate(data.dueDate, 'dueDate');
    }
    updates.dueDate = data.dueDate;
  }

  if (data.shootId !== undefined) {
    updates.shootId = data.shootId;
  }

  if (data.packageId !== undefined) {
    updates.packageId = data.packageId;
  }

  return writeTransaction(db, (tx) => {
    const existing = tx.select().from(invoices).where(eq(invoices.id, id)).get();
    if (!existing) {
      throw NotFoundError.forEntity('invoice', id);
    }

    // Compare against the resulting dates (updated or existing)
    const effectiveDueDate = updates.dueDate !== undefined ? updates.dueDate : existing.dueDate;
    if (effectiveDueDate !== null) {
      assertDueDateNotBeforeIssued(effectiveDueDate, updates.issuedDate ?? existing.issuedDate);
    }

    assertOptionalReferenceExists(tx, 'shoot', updates.shootId);
    assertOptionalReferenceExists(tx, 'package', updates.packageId);

    if (updates.amountCents !== undefined) {
      const amount = fromCents(updates.amountCents);
      const totalPaid = getPaidTotal(tx, id);
      if (!amountCoversPayments(amount, totalPaid)) {
        throw new OverpaymentError(
          `Invoice amount ${formatMoney(amount)} is below the ${formatMoney(totalPaid)} already paid`,
          {
            invoiceId: id,
            amount: formatCents(existing.amountCents),
            totalPaid: formatMoney(totalPaid),
            attempted: formatMoney(amount),
          },
        );
      }
    }

    const row = tx.update(invoices).set(updates).where(eq(invoices.id, id)).returning().get();
    return toInvoice(row);
  });
}

/**
 * Delete an invoice together with its payments.
 * @throws NotFoundError if invoice does not exist
 */
export function deleteInvoice(db: DbType, id: number): void {
  writeTransaction(db, (tx) => {
    const existing = tx
      .select({ id: invoices.id })
      .from(invoices)
      .where(eq(invoices.id, id))
      .get();
    if (!existing) {
      throw NotFoundError.forEntity('invoice', id);
    }
    tx.delete(invoices).where(eq(invoices.id, id)).run();
  });
}

/**
 * Money totals for one invoice: amount, paid total, balance and payment status.
 * @throws NotFoundError if invoice does not exist
 */
export function getInvoiceSummary(db: ReadOnlyDb, id: number): InvoiceSummary {
  const row = db
    .select({ id: invoices.id, amountCents: invoices.amountCents })
    .from(invoices)
    .where(eq(invoices.id, id))
    .get();
  if (!row) {
    throw NotFoundError.forEntity('invoice', id);
  }

  const amount = fromCents(row.amountCents);
  const totalPaid = getPaidTotal(db, row.id);
  const { balance, status } = deriveBalance(amount, totalPaid);

  return {
    invoiceId: row.id,
    amount: formatMoney(amount),
    totalPaid: formatMoney(totalPaid),
    balance: formatMoney(balance),
    status,
  };
}
