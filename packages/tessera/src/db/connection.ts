import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { runMigrations } from './migrations.js';
import { CONFIG_DIR } from '../config.js';
import { TesseraError } from '../errors.js';

let _db: Database.Database | null = null;

/**
 * Walk up from startDir looking for a directory containing `.tessera/`.
 */
export function findProjectRoot(startDir?: string): string | null {
  let dir = startDir ?? process.cwd();
  const root = path.parse(dir).root;

  while (true) {
    if (fs.existsSync(path.join(dir, CONFIG_DIR))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir || parent === root) {
      return null;
    }
    dir = parent;
  }
}

/** Project root or a usage error. */
export function requireProjectRoot(): string {
  const root = findProjectRoot();
  if (!root) throw new TesseraError('Not in a tessera project. Run `tessera init` first.');
  return root;
}

/**
 * Get the singleton database connection.
 * Opens .tessera/tessera.db with WAL mode and foreign keys.
 * Auto-runs migrations on first connection.
 *
 * Pass ':memory:' as projectRoot for testing.
 */
export function getDb(projectRoot?: string): Database.Database {
  if (_db) return _db;

  let dbPath: string;

  if (projectRoot === ':memory:') {
    dbPath = ':memory:';
  } else {
    const root = projectRoot ?? findProjectRoot();
    if (!root) {
      throw new TesseraError(
        'Not in a tessera project. Run `tessera init` first, or run from a directory with .tessera/'
      );
    }
    const dir = path.join(root, CONFIG_DIR);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    dbPath = path.join(dir, 'tessera.db');
  }

  _db = openAt(dbPath);
  return _db;
}

/**
 * Open a separate connection to a project's database (no singleton).
 * Used by writers that must observe each other's commits.
 */
export function openDbAt(projectRoot: string): Database.Database {
  return openAt(path.join(projectRoot, CONFIG_DIR, 'tessera.db'));
}

function openAt(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');
  runMigrations(db);
  return db;
}

/**
 * Close the singleton DB connection. Used in tests.
 */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/**
 * Open a fresh in-memory database for testing. Does NOT set the singleton.
 */
export function openTestDb(): Database.Database {
  return openAt(':memory:');
}
