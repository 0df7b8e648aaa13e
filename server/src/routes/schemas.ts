import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from '@studio-ledger/shared';

// Reusable JSON-schema fragments for request validation

export const ISO_DATE = { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' } as const;

/** RFC 3339 timestamp with a zone, e.g. "2026-01-15T09:30:00Z". */
export const ISO_TIMESTAMP = { type: 'string', format: 'date-time', maxLength: 40 } as const;

/** Non-negative money: "100", "100.5", "100.50". */
export const MONEY = { type: 'string', pattern: '^\\d{1,10}(\\.\\d{1,2})?$' } as const;

/** Signed money; the sign is checked by the ledger rules so it can be reported as INVALID_AMOUNT. */
export const SIGNED_MONEY = { type: 'string', pattern: '^-?\\d{1,10}(\\.\\d{1,2})?$' } as const;

export const ENTITY_ID = { type: 'integer', minimum: 1 } as const;

export const paginationProperties = {
  skip: { type: 'integer', minimum: 0, default: 0 },
  limit: { type: 'integer', minimum: 1, maximum: MAX_PAGE_LIMIT, default: DEFAULT_PAGE_LIMIT },
} as const;

export const issuedDateRangeProperties = {
  date_from: ISO_DATE,
  date_to: ISO_DATE,
} as const;

// JSON schema for GET list endpoints without filters
export const listQuerySchema = {
  querystring: {
    type: 'object',
    properties: paginationProperties,
    additionalProperties: false,
  },
};

// JSON schema for path parameter validation (GET by ID / DELETE)
export const idParamsSchema = {
  params: {
    type: 'object',
    required: ['id'],
    properties: {
      id: ENTITY_ID,
    },
  },
};
