import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { DbError, errorMessage } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';

const log = componentLogger('db');

const IN_MEMORY = ':memory:';

// The scheduler, the callback handler and the log sink share one connection;
// busy_timeout covers a second process (the CLI) touching the same file.
const PRAGMAS = ['journal_mode = WAL', 'synchronous = NORMAL', 'busy_timeout = 5000'];

let shared: Database.Database | null = null;

/** Open a database file, creating its directory. `:memory:` opens a private in-memory database. */
export function openDb(dbPath: string): Database.Database {
  const target = dbPath === IN_MEMORY ? IN_MEMORY : resolvePath(dbPath);
  if (target !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(target), { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(target);
    for (const pragma of PRAGMAS) db.pragma(pragma);
  } catch (err) {
    throw new DbError(`Cannot open database at ${target}`, { path: target, cause: errorMessage(err) });
  }
  log.debug({ path: target }, 'Database opened');
  return db;
}

/** The process-wide connection, opened on first use. */
export function initDb(dbPath: string): Database.Database {
  if (!shared) shared = openDb(dbPath);
  return shared;
}

export function closeDb(): void {
  shared?.close();
  shared = null;
}
