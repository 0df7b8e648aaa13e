/**
 * Drizzle ORM schema definitions.
 *
 * Mirrors the SQL in ./migrations, which is the source of truth for the
 * persisted layout (constraints, triggers and ON DELETE policies included).
 * Money is stored as integer cents.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Clients table - people or businesses that book shoots and receive invoices.
 * Emails are stored trimmed and lower-cased so the unique constraint compares
 * them case-insensitively.
 */
export const clients = sqliteTable('clients', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  email: text('email').unique().notNull(),
  phone: text('phone'),
});

/**
 * Shoots table - booked sessions. Deleted together with their client.
 */
export const shoots = sqliteTable(
  'shoots',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    clientId: integer('client_id')
      .notNull()
      .references(() => clients.id, { onDelete: 'cascade' }),
    shootDate: text('shoot_date').notNull(),
    location: text('location'),
  },
  (table) => ({
    clientIdIdx: index('idx_shoots_client_id').on(table.clientId),
    shootDateIdx: index('idx_shoots_shoot_date').on(table.shootDate),
  }),
);

/**
 * Packages table - priced offerings referenced (optionally) by invoices.
 */
export const packages = sqliteTable('packages', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').unique().notNull(),
  description: text('description'),
  priceCents: integer('price_cents').notNull(),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
});

/**
 * Invoices table. Cascade-deleted with the client; shoot and package links are
 * cleared (SET NULL) when the referenced row is deleted.
 */
export const invoices = sqliteTable(
  'invoices',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    clientId: integer('client_id')
      .notNull()
      .references(() => clients.id, { onDelete: 'cascade' }),
    shootId: integer('shoot_id').references(() => shoots.id, { onDelete: 'set null' }),
    packageId: integer('package_id').references(() => packages.id, { onDelete: 'set null' }),
    amountCents: integer('amount_cents').notNull(),
    status: text('status').notNull().default('draft'),
    issuedDate: text('issued_date').notNull(),
    dueDate: text('due_date'),
  },
  (table) => ({
    clientIdIdx: index('idx_invoices_client_id').on(table.clientId),
    shootIdIdx: index('idx_invoices_shoot_id').on(table.shootId),
    packageIdIdx: index('idx_invoices_package_id').on(table.packageId),
    issuedDateIdx: index('idx_invoices_issued_date').on(table.issuedDate),
  }),
);

/**
 * Payments table - credits applied against an invoice. Cascade-deleted with the invoice.
 */
export const payments = sqliteTable(
  'payments',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    invoiceId: integer('invoice_id')
      .notNull()
      .references(() => invoices.id, { onDelete: 'cascade' }),
    amountCents: integer('amount_cents').notNull(),
    method: text('method'),
    paidAt: text('paid_at').notNull(),
  },
  (table) => ({
    invoiceIdIdx: index('idx_payments_invoice_id').on(table.invoiceId),
    paidAtIdx: index('idx_payments_paid_at').on(table.paidAt),
  }),
);
