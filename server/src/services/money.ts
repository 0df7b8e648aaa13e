import { Decimal } from 'decimal.js';
import type { Money } from '@studio-ledger/shared';
import { ValidationError } from '../errors/AppError.js';

/** Up to ten integer digits and at most two fraction digits, optionally signed. */
export const MONEY_PATTERN = /^-?\d{1,10}(\.\d{1,2})?$/;

export const ZERO = new Decimal(0);

/**
 * Parse a wire money string into an exact Decimal.
 * Sign is preserved so callers can apply their own rule (non-negative price,
 * strictly positive payment).
 * @throws ValidationError if the value is not a decimal with at most two fraction digits
 */
export function parseMoney(value: string, field = 'amount'): Decimal {
  const trimmed = value.trim();
  if (!MONEY_PATTERN.test(trimmed)) {
    throw new ValidationError(
      `${field} must be a decimal string with at most two fraction digits`,
      { field, value },
    );
  }
  return new Decimal(trimmed);
}

export function toCents(value: Decimal): number {
  return value.times(100).toNumber();
}

export function fromCents(cents: number): Decimal {
  return new Decimal(cents).dividedBy(100);
}

/**
 * Format as a two-fraction-digit string ("40.00"). Zero is always unsigned.
 */
export function formatMoney(value: Decimal): Money {
  return value.isZero() ? '0.00' : value.toFixed(2);
}

export function formatCents(cents: number): Money {
  return formatMoney(fromCents(cents));
}
