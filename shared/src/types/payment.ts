/**
 * Payment types and interfaces.
 * A payment is a credit applied against one invoice.
 */

import type { Money } from './money.js';
import type { PaginationMeta, PaginationQuery } from './pagination.js';

export interface Payment {
  id: number;
  invoiceId: number;
  amount: Money;
  /** e.g. card, bank, cash */
  method: string | null;
  /** ISO 8601 timestamp. */
  paidAt: string;
}

/**
 * Request body for recording a payment. `paidAt` defaults to the time of creation.
 */
export interface CreatePaymentRequest {
  invoiceId: number;
  amount: Money;
  method?: string | null;
  paidAt?: string;
}

export type PaymentListQuery = PaginationQuery;

export interface PaymentListResponse {
  payments: Payment[];
  pagination: PaginationMeta;
}

export interface PaymentResponse {
  payment: Payment;
}
