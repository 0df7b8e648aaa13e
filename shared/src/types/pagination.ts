/** Page size applied when a list request omits `limit`. */
export const DEFAULT_PAGE_LIMIT = 50;

/** Largest `limit` a list request may ask for. */
export const MAX_PAGE_LIMIT = 200;

/**
 * Offset-based pagination accepted by every list endpoint.
 */
export interface PaginationQuery {
  skip?: number;
  limit?: number;
}

/**
 * Pagination metadata returned alongside every list.
 */
export interface PaginationMeta {
  skip: number;
  limit: number;
  totalItems: number;
}

/**
 * Inclusive calendar-date window (YYYY-MM-DD) on an invoice's issued date.
 */
export interface IssuedDateRangeQuery {
  date_from?: string;
  date_to?: string;
}
