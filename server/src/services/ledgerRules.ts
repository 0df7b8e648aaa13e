/**
 * Ledger rules: balance/status derivation and payment acceptance.
 *
 * Pure functions over exact decimals. No database access occurs here; callers
 * supply the invoice amount and the paid total read inside their transaction.
 */

import type { Decimal } from 'decimal.js';
import type { PaymentStatus } from '@studio-ledger/shared';
import { InvalidAmountError, OverpaymentError } from '../errors/AppError.js';
import { ZERO, formatMoney } from './money.js';

export interface BalanceDerivation {
  balance: Decimal;
  status: PaymentStatus;
}

/**
 * Derive an invoice's balance and payment status.
 *
 *   balance = amount - totalPaid
 *   paid    when balance == 0 (so a zero-amount invoice with no payments is paid)
 *   partial when 0 < totalPaid < amount
 *   unpaid  otherwise
 */
export function deriveBalance(amount: Decimal, totalPaid: Decimal = ZERO): BalanceDerivation {
  const balance = amount.minus(totalPaid);
  let status: PaymentStatus;
  if (balance.isZero()) {
    status = 'paid';
  } else if (totalPaid.greaterThan(ZERO) && totalPaid.lessThan(amount)) {
    status = 'partial';
  } else {
    status = 'unpaid';
  }
  return { balance, status };
}

/**
 * @throws InvalidAmountError if the payment amount is zero or negative
 */
export function assertPositivePayment(amount: Decimal): void {
  if (amount.lessThanOrEqualTo(ZERO)) {
    throw new InvalidAmountError('Payment amount must be greater than zero', {
      amount: formatMoney(amount),
    });
  }
}

export interface PaymentCandidate {
  invoiceId: number;
  invoiceAmount: Decimal;
  totalPaid: Decimal;
  amount: Decimal;
}

/**
 * Accept or reject a payment against an invoice's current paid total.
 * @throws InvalidAmountError if the amount is not positive
 * @throws OverpaymentError if totalPaid + amount would exceed the invoice amount
 */
export function assertPaymentAcceptable(candidate: PaymentCandidate): void {
  assertPositivePayment(candidate.amount);

  if (candidate.totalPaid.plus(candidate.amount).greaterThan(candidate.invoiceAmount)) {
    const remaining = candidate.invoiceAmount.minus(candidate.totalPaid);
    throw new OverpaymentError(
      `Payment of ${formatMoney(candidate.amount)} exceeds the remaining balance of ${formatMoney(remaining)}`,
      {
        invoiceId: candidate.invoiceId,
        amount: formatMoney(candidate.invoiceAmount),
        totalPaid: formatMoney(candidate.totalPaid),
        attempted: formatMoney(candidate.amount),
      },
    );
  }
}

/**
 * Whether an invoice amount still covers the payments already applied to it.
 */
export function amountCoversPayments(amount: Decimal, totalPaid: Decimal): boolean {
  return amount.greaterThanOrEqualTo(totalPaid);
}
