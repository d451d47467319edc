import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function listMigrationFiles(migrationsDir: string): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new DbError(`Migrations directory not found: ${migrationsDir}`);
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();
}

/**
 * Apply every `.sql` file in the migrations directory that is not yet recorded in
 * `_migrations`, each inside its own transaction, in lexical order.
 */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = defaultMigrationsDir(),
): MigrationResult {
  ensureMigrationsTable(db);

  const rows = db.prepare('SELECT name FROM _migrations').all() as Array<{ name: string }>;
  const alreadyApplied = new Set(rows.map((r) => r.name));
  const pending = listMigrationFiles(migrationsDir).filter((f) => !alreadyApplied.has(f));

  const applied: string[] = [];
  const record = db.prepare('INSERT INTO _migrations (name) VALUES (?)');

  for (const migration of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, migration), 'utf-8');
    const apply = db.transaction(() => {
      db.exec(sql);
      record.run(migration);
    });

    try {
      apply();
      applied.push(migration);
      logger.debug({ migration }, 'Migration applied');
    } catch (err) {
      throw new DbError(`Migration failed: ${migration}`, {
        migration,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { applied, skipped: [...alreadyApplied] };
}
