import fp from 'fastify-plugin';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import type { DbType } from '../db/types.js';

// Type augmentation: makes fastify.db available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    db: DbType & { $client: Database.Database };
  }
}

/**
 * Open a better-sqlite3 connection configured for this application:
 * WAL journaling, enforced foreign keys (the ON DELETE policies depend on it)
 * and a busy timeout so IMMEDIATE transactions from other connections wait
 * for the write lock instead of failing at once.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  return sqlite;
}

export default fp(
  async function dbPlugin(fastify) {
    const dbPath = fastify.config.databaseUrl;

    fastify.log.info({ dbPath }, 'Opening SQLite database');
    const sqlite = openDatabase(dbPath);

    // Run pending migrations (throws on failure, preventing startup)
    const applied = runMigrations(sqlite);
    for (const file of applied) {
      fastify.log.info({ migration: file }, 'Applied migration');
    }
    fastify.log.info('Database migrations completed');

    const db = drizzle(sqlite, { schema });

    fastify.decorate('db', db);

    // Close the connection on server shutdown
    fastify.addHook('onClose', () => {
      fastify.log.info('Closing SQLite database connection');
      sqlite.close();
    });
  },
  {
    name: 'db',
    dependencies: ['config'],
  },
);
