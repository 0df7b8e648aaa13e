import type { DbExecutor, DbType } from './types.js';
import { AppError, ConflictError } from '../errors/AppError.js';

interface ConstraintViolation {
  code: string;
  message: string;
}

/**
 * Find a better-sqlite3 SQLITE_CONSTRAINT_* error in `err` or its cause chain
 * (Drizzle may wrap driver errors).
 */
export function findConstraintViolation(err: unknown): ConstraintViolation | null {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if (
      'code' in current &&
      typeof current.code === 'string' &&
      current.code.startsWith('SQLITE_CONSTRAINT')
    ) {
      return { code: current.code, message: current.message };
    }
    current = current.cause;
  }
  return null;
}

/**
 * Map a store failure to the error reported to callers: constraint violations
 * become ConflictError, everything else passes through unchanged.
 */
export function translateStoreError(err: unknown): unknown {
  if (err instanceof AppError) return err;
  const violation = findConstraintViolation(err);
  if (!violation) return err;
  return new ConflictError(`Constraint violation: ${violation.message}`, {
    constraint: violation.code,
  });
}

/**
 * Run `work` in a single IMMEDIATE transaction. The write lock is taken before
 * the first read, so checks made inside `work` still hold when its writes commit.
 * Any throw rolls the whole transaction back.
 */
export function writeTransaction<T>(db: DbType, work: (tx: DbExecutor) => T): T {
  try {
    return db.transaction((tx) => work(tx), { behavior: 'immediate' });
  } catch (err) {
    throw translateStoreError(err);
  }
}
