import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { DbError, errorMessage } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { getPackageRoot, nowISO, sha256 } from '../shared/utils.js';

const log = componentLogger('db');

export interface MigrationResult {
  applied: string[];
  skipped: string[];
}

interface MigrationFile {
  name: string;
  sql: string;
  checksum: string;
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

function readMigrations(dir: string): MigrationFile[] {
  if (!fs.existsSync(dir)) {
    throw new DbError(`Migrations directory not found: ${dir}`, { dir });
  }
  return fs
    .readdirSync(dir)
    .filter((name) => name.endsWith('.sql'))
    .sort()
    .map((name) => {
      const sql = fs.readFileSync(path.join(dir, name), 'utf-8');
      return { name, sql, checksum: sha256(sql) };
    });
}

/**
 * Apply pending `*.sql` files in name order, each in its own transaction, and
 * record them in `_migrations` with their checksum. An applied file whose
 * content has since changed is an error: migrations are append-only.
 */
export function runMigrations(db: Database.Database, dir: string = defaultMigrationsDir()): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      checksum   TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );
  `);

  const rows = db.prepare('SELECT name, checksum FROM _migrations').all() as Array<{ name: string; checksum: string }>;
  const recorded = new Map(rows.map((r) => [r.name, r.checksum]));
  const result: MigrationResult = { applied: [], skipped: [] };

  for (const migration of readMigrations(dir)) {
    const checksum = recorded.get(migration.name);
    if (checksum !== undefined) {
      if (checksum !== migration.checksum) {
        throw new DbError(`Applied migration was modified: ${migration.name}`, { migration: migration.name });
      }
      result.skipped.push(migration.name);
      continue;
    }

    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO _migrations (name, checksum, applied_at) VALUES (?, ?, ?)').run(
        migration.name,
        migration.checksum,
        nowISO(),
      );
    });
    try {
      apply();
    } catch (err) {
      throw new DbError(`Migration failed: ${migration.name}`, { migration: migration.name, cause: errorMessage(err) });
    }
    result.applied.push(migration.name);
    log.info({ migration: migration.name }, 'Migration applied');
  }

  return result;
}
