import { eq, desc, sql } from 'drizzle-orm';
import { packages } from '../db/schema.js';
import type { DbType, ReadOnlyDb } from '../db/types.js';
import { writeTransaction } from '../db/transaction.js';
import type {
  Package,
  CreatePackageRequest,
  UpdatePackageRequest,
  PackageListQuery,
  PaginationMeta,
} from '@studio-ledger/shared';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import { ZERO, formatCents, parseMoney, toCents } from './money.js';
import { requireText, resolvePagination } from './validation.js';

function toPackage(row: typeof packages.$inferSelect): Package {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: formatCents(row.priceCents),
    isActive: row.isActive,
  };
}

function parsePriceCents(value: string): number {
  const price = parseMoney(value, 'price');
  if (price.lessThan(ZERO)) {
    throw new ValidationError('price must not be negative', { field: 'price', value });
  }
  return toCents(price);
}

/**
 * List packages, newest first (id descending).
 */
export function listPackages(
  db: ReadOnlyDb,
  query: PackageListQuery,
): { packages: Package[]; pagination: PaginationMeta } {
  const { skip, limit } = resolvePagination(query);

  const countResult = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(packages)
    .get();

  const rows = db
    .select()
    .from(packages)
    .orderBy(desc(packages.id))
    .limit(limit)
    .offset(skip)
    .all();

  return {
    packages: rows.map(toPackage),
    pagination: { skip, limit, totalItems: countResult?.count ?? 0 },
  };
}

/**
 * @throws NotFoundError if package does not exist
 */
export function getPackageById(db: ReadOnlyDb, id: number): Package {
  const row = db.select().from(packages).where(eq(packages.id, id)).get();
  if (!row) {
    throw NotFoundError.forEntity('package', id);
  }
  return toPackage(row);
}

/**
 * Create a package. Name uniqueness is left to the store's unique constraint,
 * which surfaces as a ConflictError.
 * @throws ValidationError if name or price is invalid
 * @throws ConflictError if another package already has this name
 */
export function createPackage(db: DbType, data: CreatePackageRequest): Package {
  const name = requireText(data.name, 'name', 100);
  const priceCents = parsePriceCents(data.price);

  return writeTransaction(db, (tx) => {
    const row = tx
      .insert(packages)
      .values({
        name,
        description: data.description ?? null,
        priceCents,
        isActive: data.isActive ?? true,
      })
      .returning()
      .get();
    return toPackage(row);
  });
}

/**
 * Partial update of a package.
 * @throws NotFoundError if package does not exist
 * @throws ConflictError if the new name is taken
 */
export function updatePackage(db: DbType, id: number, data: UpdatePackageRequest): Package {
  if (
    data.name === undefined &&
    data.description === undefined &&
    data.price === undefined &&
    data.isActive === undefined
  ) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof packages.$inferInsert> = {};

  if (data.name !== undefined) {
    updates.name = requireText(data.name, 'name', 100);
  }

  if (data.description !== undefined) {
    updates.description = data.description;
  }

  if (data.price !== undefined) {
    updates.priceCents = parsePriceCents(data.price);
  }

  if (data.isActive !== undefined) {
    updates.isActive = data.isActive;
  }

  return writeTransaction(db, (tx) => {
    const existing = tx
      .select({ id: packages.id })
      .from(packages)
      .where(eq(packages.id, id))
      .get();
    if (!existing) {
      throw NotFoundError.forEntity('package', id);
    }
    const row = tx.update(packages).set(updates).where(eq(packages.id, id)).returning().get();
    return toPackage(row);
  });
}

/**
 * Delete a package. Invoices referencing it keep existing with their package link cleared.
 * @throws NotFoundError if package does not exist
 */
export function deletePackage(db: DbType, id: number): void {
  writeTransaction(db, (tx) => {
    const existing = tx
      .select({ id: packages.id })
      .from(packages)
      .where(eq(packages.id, id))
      .get();
    if (!existing) {
      throw NotFoundError.forEntity('package', id);
    }
    tx.delete(packages).where(eq(packages.id, id)).run();
  });
}
