import { eq } from 'drizzle-orm';
import type { EntityName } from '@studio-ledger/shared';
import { clients, shoots, packages, invoices } from '../db/schema.js';
import type { ReadOnlyDb } from '../db/types.js';
import { ReferenceNotFoundError } from '../errors/AppError.js';

type ReferencedEntity = Extract<EntityName, 'client' | 'shoot' | 'package' | 'invoice'>;

function referenceExists(db: ReadOnlyDb, entity: ReferencedEntity, id: number): boolean {
  switch (entity) {
    case 'client':
      return !!db.select({ id: clients.id }).from(clients).where(eq(clients.id, id)).get();
    case 'shoot':
      return !!db.select({ id: shoots.id }).from(shoots).where(eq(shoots.id, id)).get();
    case 'package':
      return !!db.select({ id: packages.id }).from(packages).where(eq(packages.id, id)).get();
    case 'invoice':
      return !!db.select({ id: invoices.id }).from(invoices).where(eq(invoices.id, id)).get();
  }
}

/**
 * Assert that a foreign key supplied in a payload resolves to an existing row.
 * @throws ReferenceNotFoundError naming the missing entity
 */
export function assertReferenceExists(db: ReadOnlyDb, entity: ReferencedEntity, id: number): void {
  if (!referenceExists(db, entity, id)) {
    throw new ReferenceNotFoundError(entity, id);
  }
}

/**
 * Like assertReferenceExists, but null/undefined (no reference) always passes.
 */
export function assertOptionalReferenceExists(
  db: ReadOnlyDb,
  entity: ReferencedEntity,
  id: number | null | undefined,
): void {
  if (id !== null && id !== undefined) {
    assertReferenceExists(db, entity, id);
  }
}
