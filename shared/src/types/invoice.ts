/**
 * Invoice types and interfaces.
 * An invoice bills a client a fixed amount, optionally tied to a shoot and/or package.
 */

import type { Money, PaymentStatus } from './money.js';
import type { IssuedDateRangeQuery, PaginationMeta, PaginationQuery } from './pagination.js';

/**
 * Invoice entity as returned by the API.
 */
export interface Invoice {
  id: number;
  clientId: number;
  shootId: number | null;
  packageId: number | null;
  /** Total owed. */
  amount: Money;
  /** Free-text workflow label (e.g. draft, sent, void). Not derived from payments. */
  status: string;
  issuedDate: string;
  dueDate: string | null;
}

/**
 * Request body for creating a new invoice.
 */
export interface CreateInvoiceRequest {
  clientId: number;
  shootId?: number | null;
  packageId?: number | null;
  amount: Money;
  status?: string;
  issuedDate: string;
  dueDate?: string | null;
}

/**
 * Request body for updating an invoice.
 * All fields are optional; at least one must be provided.
 * An explicit null on shootId, packageId or dueDate clears the field.
 */
export interface UpdateInvoiceRequest {
  shootId?: number | null;
  packageId?: number | null;
  amount?: Money;
  status?: string;
  issuedDate?: string;
  dueDate?: string | null;
}

export type InvoiceListQuery = PaginationQuery & IssuedDateRangeQuery;

export interface InvoiceListResponse {
  invoices: Invoice[];
  pagination: PaginationMeta;
}

export interface InvoiceResponse {
  invoice: Invoice;
}

/**
 * Money totals for a single invoice.
 */
export interface InvoiceSummary {
  invoiceId: number;
  amount: Money;
  totalPaid: Money;
  balance: Money;
  status: PaymentStatus;
}

export interface InvoiceSummaryResponse {
  summary: InvoiceSummary;
}
