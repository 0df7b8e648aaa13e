import { eq, desc, sql } from 'drizzle-orm';
import { shoots } from '../db/schema.js';
import type { DbType, ReadOnlyDb } from '../db/types.js';
import { writeTransaction } from '../db/transaction.js';
import type {
  Shoot,
  CreateShootRequest,
  UpdateShootRequest,
  ShootListQuery,
  PaginationMeta,
} from '@studio-ledger/shared';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import { assertReferenceExists } from './references.js';
import { assertIsoDate, resolvePagination } from './validation.js';

function toShoot(row: typeof shoots.$inferSelect): Shoot {
  return {
    id: row.id,
    clientId: row.clientId,
    shootDate: row.shootDate,
    location: row.location,
  };
}

/**
 * List shoots, most recent shoot date first (ties: newest id first).
 */
export function listShoots(
  db: ReadOnlyDb,
  query: ShootListQuery,
): { shoots: Shoot[]; pagination: PaginationMeta } {
  const { skip, limit } = resolvePagination(query);

  const countResult = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(shoots)
    .get();

  const rows = db
    .select()
    .from(shoots)
    .orderBy(desc(shoots.shootDate), desc(shoots.id))
    .limit(limit)
    .offset(skip)
    .all();

  return {
    shoots: rows.map(toShoot),
    pagination: { skip, limit, totalItems: countResult?.count ?? 0 },
  };
}

/**
 * @throws NotFoundError if shoot does not exist
 */
export function getShootById(db: ReadOnlyDb, id: number): Shoot {
  const row = db.select().from(shoots).where(eq(shoots.id, id)).get();
  if (!row) {
    throw NotFoundError.forEntity('shoot', id);
  }
  return toShoot(row);
}

/**
 * Book a shoot for an existing client.
 * @throws ReferenceNotFoundError if the client does not exist
 * @throws ValidationError if the shoot date is invalid
 */
export function createShoot(db: DbType, data: CreateShootRequest): Shoot {
  assertIsoDate(data.shootDate, 'shootDate');

  return writeTransaction(db, (tx) => {
    assertReferenceExists(tx, 'client', data.clientId);
    const row = tx
      .insert(shoots)
      .values({
        clientId: data.clientId,
        shootDate: data.shootDate,
        location: data.location ?? null,
      })
      .returning()
      .get();
    return toShoot(row);
  });
}

/**
 * Partial update of a shoot's date and/or location.
 * @throws NotFoundError if shoot does not exist
 */
export function updateShoot(db: DbType, id: number, data: UpdateShootRequest): Shoot {
  if (data.shootDate === undefined && data.location === undefined) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof shoots.$inferInsert> = {};

  if (data.shootDate !== undefined) {
    assertIsoDate(data.shootDate, 'shootDate');
    updates.shootDate = data.shootDate;
  }

  if (data.location !== undefined) {
    updates.location = data.location;
  }

  return writeTransaction(db, (tx) => {
    const existing = tx.select({ id: shoots.id }).from(shoots).where(eq(shoots.id, id)).get();
    if (!existing) {
      throw NotFoundError.forEntity('shoot', id);
    }
    const row = tx.update(shoots).set(updates).where(eq(shoots.id, id)).returning().get();
    return toShoot(row);
  });
}

/**
 * Delete a shoot. Invoices referencing it keep existing with their shoot link cleared.
 * @throws NotFoundError if shoot does not exist
 */
export function deleteShoot(db: DbType, id: number): void {
  writeTransaction(db, (tx) => {
    const existing = tx.select({ id: shoots.id }).from(shoots).where(eq(shoots.id, id)).get();
    if (!existing) {
      throw NotFoundError.forEntity('shoot', id);
    }
    tx.delete(shoots).where(eq(shoots.id, id)).run();
  });
}
