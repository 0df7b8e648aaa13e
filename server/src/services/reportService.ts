import { eq, desc, sql } from 'drizzle-orm';
import { clients, invoices, packages, payments, shoots } from '../db/schema.js';
import type { ReadOnlyDb } from '../db/types.js';
import type { InvoiceReportQuery, InvoiceReportRow } from '@studio-ledger/shared';
import { DataIntegrityError } from '../errors/AppError.js';
import { deriveBalance } from './ledgerRules.js';
import { formatMoney, fromCents } from './money.js';
import { issuedDateRange } from './invoiceService.js';

/**
 * Invoice report: one row per invoice issued within the optional inclusive
 * `date_from`/`date_to` window, ordered by issued date then id, newest first.
 *
 * Payments are summed per invoice in a grouped subquery before the join, and
 * each row's status comes from the same deriveBalance() used by the invoice
 * summary. Package and shoot are optional matches; the client is required, and
 * an invoice whose client cannot be resolved fails the whole report.
 *
 * Takes a ReadOnlyDb, so the report cannot write.
 *
 * @throws ValidationError if a date bound is malformed
 * @throws DataIntegrityError if an invoice references a missing client
 */
export function getInvoiceReport(db: ReadOnlyDb, query: InvoiceReportQuery): InvoiceReportRow[] {
  const whereClause = issuedDateRange(query);

  const paidTotals = db
    .select({
      invoiceId: payments.invoiceId,
      paidCents: sql<number>`SUM(${payments.amountCents})`.as('paid_cents'),
    })
    .from(payments)
    .groupBy(payments.invoiceId)
    .as('paid_totals');

  const rows = db
    .select({
      invoiceId: invoices.id,
      issuedDate: invoices.issuedDate,
      dueDate: invoices.dueDate,
      amountCents: invoices.amountCents,
      clientName: clients.name,
      packageName: packages.name,
      shootLocation: shoots.location,
      paidCents: paidTotals.paidCents,
    })
    .from(invoices)
    .leftJoin(clients, eq(clients.id, invoices.clientId))
    .leftJoin(packages, eq(packages.id, invoices.packageId))
    .leftJoin(shoots, eq(shoots.id, invoices.shootId))
    .leftJoin(paidTotals, eq(paidTotals.invoiceId, invoices.id))
    .where(whereClause)
    .orderBy(desc(invoices.issuedDate), desc(invoices.id))
    .all();

  return rows.map((row) => {
    if (row.clientName === null) {
      throw new DataIntegrityError(`Invoice ${row.invoiceId} references a missing client`, {
        invoiceId: row.invoiceId,
      });
    }

    const amount = fromCents(row.amountCents);
    const totalPaid = fromCents(row.paidCents ?? 0);
    const { balance, status } = deriveBalance(amount, totalPaid);

    return {
      invoiceId: row.invoiceId,
      issuedDate: row.issuedDate,
      dueDate: row.dueDate,
      clientName: row.clientName,
      packageName: row.packageName,
      shootLocation: row.shootLocation,
      amount: formatMoney(amount),
      totalPaid: formatMoney(totalPaid),
      balance: formatMoney(balance),
      paymentStatus: status,
    };
  });
}
