import type Database from 'better-sqlite3';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export const MIGRATIONS_DIR = join(__dirname, 'migrations');

/**
 * Apply every pending `.sql` file in the migrations directory, in file-name order.
 * Each file runs in its own transaction together with its `_migrations` bookkeeping row.
 *
 * @returns the names of the files applied by this call
 */
export function runMigrations(db: Database.Database, customMigrationsDir?: string): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const migrationsDir = customMigrationsDir ?? MIGRATIONS_DIR;

  if (!existsSync(migrationsDir)) {
    return [];
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const applied = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((row) => row.name),
  );

  const newlyApplied: string[] = [];
  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(file);
    })();
    newlyApplied.push(file);
  }
  return newlyApplied;
}
