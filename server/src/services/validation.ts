import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from '@studio-ledger/shared';
import type { PaginationQuery } from '@studio-ledger/shared';
import { ValidationError } from '../errors/AppError.js';

/**
 * ISO 8601 date pattern: YYYY-MM-DD
 */
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Validate an ISO calendar date string (YYYY-MM-DD).
 * Rejects well-formed strings naming days that do not exist, such as 2026-02-30.
 */
export function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/**
 * @throws ValidationError naming `field` if the value is not a valid YYYY-MM-DD date
 */
export function assertIsoDate(value: string, field: string): void {
  if (!isValidIsoDate(value)) {
    throw new ValidationError(`${field} must be a valid ISO date (YYYY-MM-DD)`, { field, value });
  }
}

/**
 * ISO 8601 timestamp with seconds and a zone: date, time, optional fraction, Z or offset.
 */
const ISO_TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):?(\d{2}))$/;

/**
 * Normalize an ISO 8601 timestamp to UTC `toISOString()` form so stored
 * timestamps sort lexicographically. Impossible dates and times are rejected
 * rather than rolled over, as is anything landing outside years 0000-9999.
 * @throws ValidationError if the value is not a valid ISO 8601 timestamp
 */
export function normalizeTimestamp(value: string, field: string): string {
  const invalid = () =>
    new ValidationError(`${field} must be a valid ISO 8601 timestamp`, { field, value });

  const match = ISO_TIMESTAMP_PATTERN.exec(value);
  if (!match) throw invalid();
  const [, date, hh, mm, ss, fraction, zulu, sign, offH, offM] = match;
  if (!isValidIsoDate(date)) throw invalid();

  const hours = Number(hh);
  const minutes = Number(mm);
  const seconds = Number(ss);
  if (hours > 23 || minutes > 59 || seconds > 59) throw invalid();

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(offH);
    const offsetMins = Number(offM);
    if (offsetHours > 23 || offsetMins > 59) throw invalid();
    offsetMinutes = (sign === '-' ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const local = new Date(`${date}T${hh}:${mm}:${ss}Z`).getTime() + millis;
  const normalized = new Date(local - offsetMinutes * 60000).toISOString();
  if (!/^\d{4}-/.test(normalized)) throw invalid();
  return normalized;
}

/**
 * Trim a required text field and enforce its length bounds.
 */
export function requireText(value: string, field: string, maxLength: number): string {
  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.length > maxLength) {
    throw new ValidationError(`${field} must be between 1 and ${maxLength} characters`, { field });
  }
  return trimmed;
}

/**
 * Resolve `skip`/`limit` against the documented defaults.
 * @throws ValidationError if either bound is out of range
 */
export function resolvePagination(query: PaginationQuery): { skip: number; limit: number } {
  const skip = query.skip ?? 0;
  const limit = query.limit ?? DEFAULT_PAGE_LIMIT;
  if (!Number.isInteger(skip) || skip < 0) {
    throw new ValidationError('skip must be a non-negative integer', { skip });
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_PAGE_LIMIT}`, {
      limit,
    });
  }
  return { skip, limit };
}
