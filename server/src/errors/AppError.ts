import type { EntityName, ErrorCode } from '@studio-ledger/shared';

const ENTITY_LABELS: Record<EntityName, string> = {
  client: 'Client',
  shoot: 'Shoot',
  package: 'Package',
  invoice: 'Invoice',
  payment: 'Payment',
};

/**
 * Base application error with a typed error code and HTTP status.
 * All known application errors should extend this class.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    statusCode: number,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', 404, message, details);
    this.name = 'NotFoundError';
  }

  /**
   * NotFoundError for a specific entity, e.g. "Invoice 7 not found".
   */
  static forEntity(entity: EntityName, id: number): NotFoundError {
    return new NotFoundError(`${ENTITY_LABELS[entity]} ${id} not found`, { entity, id });
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', 400, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * A foreign key in a request payload names a row that does not exist.
 */
export class ReferenceNotFoundError extends AppError {
  constructor(entity: EntityName, id: number) {
    super('REFERENCE_NOT_FOUND', 422, `Referenced ${entity} ${id} does not exist`, {
      entity,
      id,
    });
    this.name = 'ReferenceNotFoundError';
  }
}

export class DuplicateEmailError extends AppError {
  constructor(email: string) {
    super('DUPLICATE_EMAIL', 409, 'A client with this email already exists', { email });
    this.name = 'DuplicateEmailError';
  }
}

export class InvalidAmountError extends AppError {
  constructor(message = 'Payment amount must be greater than zero', details?: Record<string, unknown>) {
    super('INVALID_AMOUNT', 400, message, details);
    this.name = 'InvalidAmountError';
  }
}

export class OverpaymentError extends AppError {
  constructor(
    message = 'Payment exceeds the remaining invoice balance',
    details?: { invoiceId: number; amount: string; totalPaid: string; attempted: string },
  ) {
    super('OVERPAYMENT', 409, message, details);
    this.name = 'OverpaymentError';
  }
}

/**
 * A store-level constraint (uniqueness, foreign key, check, trigger) rejected a write.
 */
export class ConflictError extends AppError {
  constructor(message = 'Resource conflict', details?: Record<string, unknown>) {
    super('CONFLICT', 409, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * Stored data breaks an invariant the schema should have guaranteed.
 */
export class DataIntegrityError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DATA_INTEGRITY_ERROR', 500, message, details);
    this.name = 'DataIntegrityError';
  }
}
