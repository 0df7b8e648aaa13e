import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import type { RunResult } from 'better-sqlite3';
import type * as schema from './schema.js';

/** The Drizzle database handle decorated onto Fastify as `fastify.db`. */
export type DbType = BetterSQLite3Database<typeof schema>;

/**
 * Anything queries can run against: the database itself or an open transaction.
 */
export type DbExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

/**
 * A select-only view of the database. Code typed against it cannot insert,
 * update, delete, run raw statements or open transactions.
 */
export type ReadOnlyDb = Pick<DbExecutor, 'select'>;
