/**
 * Invoice report types.
 * One row per invoice with client, package and shoot context plus derived totals.
 */

import type { Money, PaymentStatus } from './money.js';
import type { IssuedDateRangeQuery } from './pagination.js';

export interface InvoiceReportRow {
  invoiceId: number;
  issuedDate: string;
  dueDate: string | null;
  clientName: string;
  packageName: string | null;
  shootLocation: string | null;
  amount: Money;
  totalPaid: Money;
  balance: Money;
  paymentStatus: PaymentStatus;
}

export type InvoiceReportQuery = IssuedDateRangeQuery;

export interface InvoiceReportResponse {
  rows: InvoiceReportRow[];
}
