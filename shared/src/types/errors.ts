/**
 * Machine-readable error codes used across all API error responses.
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'ROUTE_NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'REFERENCE_NOT_FOUND'
  | 'DUPLICATE_EMAIL'
  | 'INVALID_AMOUNT'
  | 'OVERPAYMENT'
  | 'CONFLICT'
  | 'DATA_INTEGRITY_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Entities addressable through the API, used in NOT_FOUND and
 * REFERENCE_NOT_FOUND error details.
 */
export type EntityName = 'client' | 'shoot' | 'package' | 'invoice' | 'payment';
