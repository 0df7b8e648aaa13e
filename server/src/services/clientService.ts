import { eq, asc, and, ne, sql } from 'drizzle-orm';
import { clients } from '../db/schema.js';
import type { DbType, ReadOnlyDb } from '../db/types.js';
import { writeTransaction } from '../db/transaction.js';
import type {
  Client,
  CreateClientRequest,
  UpdateClientRequest,
  ClientListQuery,
  PaginationMeta,
} from '@studio-ledger/shared';
import { DuplicateEmailError, NotFoundError, ValidationError } from '../errors/AppError.js';
import { requireText, resolvePagination } from './validation.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

/**
 * Canonical form used for storage and uniqueness checks: trimmed, lower-cased.
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function validateEmail(email: string): string {
  const normalized = normalizeEmail(email);
  if (normalized.length > 255 || !EMAIL_PATTERN.test(normalized)) {
    throw new ValidationError('Email must be a valid email address', { field: 'email' });
  }
  return normalized;
}

/**
 * Convert database client row to Client shape.
 */
function toClient(row: typeof clients.$inferSelect): Client {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
  };
}

/**
 * @throws DuplicateEmailError if another client (other than `excludeId`) uses the email
 */
function assertEmailAvailable(db: ReadOnlyDb, email: string, excludeId?: number): void {
  const condition =
    excludeId === undefined
      ? eq(clients.email, email)
      : and(eq(clients.email, email), ne(clients.id, excludeId));
  const clash = db.select({ id: clients.id }).from(clients).where(condition).get();
  if (clash) {
    throw new DuplicateEmailError(email);
  }
}

/**
 * List clients ordered by id ascending.
 */
export function listClients(
  db: ReadOnlyDb,
  query: ClientListQuery,
): { clients: Client[]; pagination: PaginationMeta } {
  const { skip, limit } = resolvePagination(query);

  const countResult = db
    .select({ count: sql<number>`COUNT(*)` })
    .from(clients)
    .get();

  const rows = db.select().from(clients).orderBy(asc(clients.id)).limit(limit).offset(skip).all();

  return {
    clients: rows.map(toClient),
    pagination: { skip, limit, totalItems: countResult?.count ?? 0 },
  };
}

/**
 * @throws NotFoundError if client does not exist
 */
export function getClientById(db: ReadOnlyDb, id: number): Client {
  const row = db.select().from(clients).where(eq(clients.id, id)).get();
  if (!row) {
    throw NotFoundError.forEntity('client', id);
  }
  return toClient(row);
}

/**
 * Create a new client.
 * @throws ValidationError if name or email is invalid
 * @throws DuplicateEmailError if the email is already in use
 */
export function createClient(db: DbType, data: CreateClientRequest): Client {
  const name = requireText(data.name, 'name', 120);
  const email = validateEmail(data.email);

  return writeTransaction(db, (tx) => {
    assertEmailAvailable(tx, email);
    const row = tx
      .insert(clients)
      .values({ name, email, phone: data.phone ?? null })
      .returning()
      .get();
    return toClient(row);
  });
}

/**
 * Partial update of a client. Only keys present in `data` are applied.
 * @throws NotFoundError if client does not exist
 * @throws DuplicateEmailError if the new email belongs to another client
 */
export function updateClient(db: DbType, id: number, data: UpdateClientRequest): Client {
  if (data.name === undefined && data.email === undefined && data.phone === undefined) {
    throw new ValidationError('At least one field must be provided');
  }

  const updates: Partial<typeof clients.$inferInsert> = {};

  if (data.name !== undefined) {
    updates.name = requireText(data.name, 'name', 120);
  }

  if (data.email !== undefined) {
    updates.email = validateEmail(data.email);
  }

  if (data.phone !== undefined) {
    updates.phone = data.phone;
  }

  return writeTransaction(db, (tx) => {
    const existing = tx.select({ id: clients.id }).from(clients).where(eq(clients.id, id)).get();
    if (!existing) {
      throw NotFoundError.forEntity('client', id);
    }

    if (updates.email !== undefined) {
      assertEmailAvailable(tx, updates.email, id);
    }

    const row = tx.update(clients).set(updates).where(eq(clients.id, id)).returning().get();
    return toClient(row);
  });
}

/**
 * Delete a client. The store cascades the deletion to the client's shoots,
 * invoices, and those invoices' payments.
 * @throws NotFoundError if client does not exist
 */
export function deleteClient(db: DbType, id: number): void {
  writeTransaction(db, (tx) => {
    const existing = tx.select({ id: clients.id }).from(clients).where(eq(clients.id, id)).get();
    if (!existing) {
      throw NotFoundError.forEntity('client', id);
    }
    tx.delete(clients).where(eq(clients.id, id)).run();
  });
}
