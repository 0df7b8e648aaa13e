import type { ErrorCode } from './errors.js';

/**
 * Standard API error shape used across all endpoints.
 */
export interface ApiError {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable error description */
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Standard API error response wrapper.
 * All error responses from the API follow this shape.
 */
export interface ApiErrorResponse {
  error: ApiError;
}

/**
 * One entry of `details.fields` on a VALIDATION_ERROR produced by request
 * schema validation.
 */
export interface ValidationFieldError {
  path: string;
  message: string | undefined;
  params?: Record<string, unknown>;
}

/**
 * Liveness and readiness probe response.
 */
export interface HealthResponse {
  status: 'ok' | 'ready';
  timestamp: string;
}
