import { describe, it, expect } from '@jest/globals';
import {
  assertIsoDate,
  isValidIsoDate,
  normalizeTimestamp,
  requireText,
  resolvePagination,
} from './validation.js';
import { ValidationError } from '../errors/AppError.js';

describe('isValidIsoDate()', () => {
  it('accepts real calendar dates', () => {
    expect(isValidIsoDate('2026-02-28')).toBe(true);
    expect(isValidIsoDate('2024-02-29')).toBe(true);
  });

  it('rejects days that do not exist', () => {
    expect(isValidIsoDate('2026-02-30')).toBe(false);
    expect(isValidIsoDate('2026-13-01')).toBe(false);
  });

  it('rejects other formats', () => {
    expect(isValidIsoDate('2026-2-3')).toBe(false);
    expect(isValidIsoDate('03/01/2026')).toBe(false);
  });
});

describe('assertIsoDate()', () => {
  it('names the field', () => {
    expect(() => assertIsoDate('nope', 'shootDate')).toThrow(
      'shootDate must be a valid ISO date (YYYY-MM-DD)',
    );
  });
});

describe('normalizeTimestamp()', () => {
  it('converts offsets to UTC', () => {
    expect(normalizeTimestamp('2026-03-01T10:00:00+02:00', 'paidAt')).toBe(
      '2026-03-01T08:00:00.000Z',
    );
  });

  it('rejects unparseable values', () => {
    expect(() => normalizeTimestamp('yesterday', 'paidAt')).toThrow(ValidationError);
  });

  it('accepts compact offsets and fractional seconds', () => {
    expect(normalizeTimestamp('2026-03-01T10:00:00+0200', 'paidAt')).toBe(
      '2026-03-01T08:00:00.000Z',
    );
    expect(normalizeTimestamp('2026-03-01T10:00:00.5Z', 'paidAt')).toBe(
      '2026-03-01T10:00:00.500Z',
    );
    expect(normalizeTimestamp('2026-03-01T10:00:00.123456Z', 'paidAt')).toBe(
      '2026-03-01T10:00:00.123Z',
    );
  });

  it('rejects impossible dates instead of rolling them over', () => {
    expect(() => normalizeTimestamp('2026-02-30T00:00:00Z', 'paidAt')).toThrow(
      'paidAt must be a valid ISO 8601 timestamp',
    );
    expect(() => normalizeTimestamp('2026-03-01T24:00:00Z', 'paidAt')).toThrow(ValidationError);
    expect(() => normalizeTimestamp('2026-03-01T10:00:00+25:00', 'paidAt')).toThrow(
      ValidationError,
    );
  });

  it('rejects values that are not ISO 8601 timestamps', () => {
    expect(() => normalizeTimestamp('March 3', 'paidAt')).toThrow(ValidationError);
    expect(() => normalizeTimestamp('2026-03-01', 'paidAt')).toThrow(ValidationError);
    expect(() => normalizeTimestamp('2026-03-01T10:00Z', 'paidAt')).toThrow(ValidationError);
    expect(() => normalizeTimestamp('+020000-01-01T00:00:00Z', 'paidAt')).toThrow(
      ValidationError,
    );
  });

  it('rejects timestamps that shift outside four-digit years', () => {
    expect(() => normalizeTimestamp('9999-12-31T23:00:00-02:00', 'paidAt')).toThrow(
      ValidationError,
    );
  });
});

describe('requireText()', () => {
  it('returns the trimmed value', () => {
    expect(requireText('  Ana Silva  ', 'name', 120)).toBe('Ana Silva');
  });

  it('rejects blank values', () => {
    expect(() => requireText('   ', 'name', 120)).toThrow(
      'name must be between 1 and 120 characters',
    );
  });

  it('rejects values over the limit', () => {
    expect(() => requireText('x'.repeat(121), 'name', 120)).toThrow(ValidationError);
    expect(requireText('x'.repeat(120), 'name', 120)).toHaveLength(120);
  });
});

describe('resolvePagination()', () => {
  it('applies defaults', () => {
    expect(resolvePagination({})).toEqual({ skip: 0, limit: 50 });
  });

  it('passes valid bounds through', () => {
    expect(resolvePagination({ skip: 10, limit: 200 })).toEqual({ skip: 10, limit: 200 });
  });

  it('rejects a negative skip', () => {
    expect(() => resolvePagination({ skip: -1 })).toThrow('skip must be a non-negative integer');
  });

  it('rejects a limit outside 1-200', () => {
    expect(() => resolvePagination({ limit: 0 })).toThrow(ValidationError);
    expect(() => resolvePagination({ limit: 201 })).toThrow(
      'limit must be an integer between 1 and 200',
    );
  });
});
