/**
 * SQLite database connection and migrations.
 *
 * Supports optional encryption using better-sqlite3-multiple-ciphers: when
 * DOCWEAVE_DB_KEY is set the connection is keyed before first use.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { randomUUID } from 'crypto';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { resolvePath } from '../config/engine-config.js';
import { loadConfig } from '../config/loader.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { loadSchemaStatements } from './schema-loader.js';

const log = createLogger('db');

/** Current schema version written by schema.sql */
export const SCHEMA_VERSION = 1;

/** Cipher used when an encryption key is configured */
const DB_CIPHER = 'chacha20';

let db: Database.Database | null = null;
let customDb: Database.Database | null = null;

/**
 * Set a custom database instance (for testing).
 *
 * When set, `getDb()` will return this instance instead of creating a new one.
 * Use `resetDb()` to clear the custom instance.
 *
 * @example
 * ```typescript
 * import { setDb, resetDb, runMigrations } from './db.js';
 *
 * beforeEach(() => {
 *   const testDb = new Database(':memory:');
 *   runMigrations(testDb);
 *   setDb(testDb);
 * });
 *
 * afterEach(() => {
 *   resetDb();
 * });
 * ```
 */
export function setDb(database: Database.Database): void {
  customDb = database;
}

/**
 * Reset the database to default behavior.
 *
 * Clears any custom database set via `setDb()` and closes the current
 * singleton connection.
 */
export function resetDb(): void {
  customDb = null;
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Apply encryption to a database connection.
 */
function applyEncryption(database: Database.Database, key: string): void {
  // Pragmas can't take bound parameters
  const escaped = key.replace(/'/g, "''");
  database.pragma(`cipher = '${DB_CIPHER}'`);
  database.pragma(`key = '${escaped}'`);
}

/**
 * Initialize and return the database connection.
 *
 * Returns (in priority order):
 * 1. Custom database set via `setDb()` (for testing)
 * 2. Existing singleton connection
 * 3. New connection to the configured path
 */
export function getDb(dbPath?: string): Database.Database {
  if (customDb) {
    return customDb;
  }

  if (db) {
    return db;
  }

  const resolvedPath = resolvePath(dbPath ?? loadConfig().storage.dbPath);

  const dir = dirname(resolvedPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  let connection: Database.Database;
  try {
    connection = new Database(resolvedPath);
  } catch (error) {
    throw new StorageError(`Failed to open database at ${resolvedPath}`, 'DB_OPEN_FAILED', error);
  }

  const key = process.env.DOCWEAVE_DB_KEY;
  if (key) {
    applyEncryption(connection, key);
    log.debug(`Database opened with ${DB_CIPHER} encryption`);
  }

  connection.pragma('foreign_keys = ON');
  connection.pragma('journal_mode = WAL');

  runMigrations(connection);

  db = connection;
  return db;
}

/**
 * Close the database connection.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Create the schema on a fresh database, or bring an older one up to date.
 */
export function runMigrations(database: Database.Database): void {
  const statements = loadSchemaStatements();

  for (const statement of statements) {
    try {
      database.exec(statement);
    } catch (error) {
      const message = errorMessage(error);
      if (!message.includes('already exists')) {
        throw new StorageError(`Schema migration failed: ${message}`, 'DB_MIGRATION_FAILED', error);
      }
    }
  }

  const version = getSchemaVersion(database);
  if (version < SCHEMA_VERSION) {
    log.warn(`Schema version ${version} is older than ${SCHEMA_VERSION}`);
  }
}

/**
 * Get current schema version.
 */
export function getSchemaVersion(database?: Database.Database): number {
  const d = database ?? getDb();
  const row = d.prepare('SELECT MAX(version) as version FROM schema_version').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Clear all data (for testing).
 */
export function clearAllData(database?: Database.Database): void {
  const d = database ?? getDb();
  d.exec('DELETE FROM supersessions');
  d.exec('DELETE FROM document_vectors');
  d.exec('DELETE FROM documents');
}

/**
 * Get database statistics.
 */
export function getDbStats(
  database?: Database.Database,
): { documents: number; vectors: number; supersessions: number } {
  const d = database ?? getDb();

  const count = (table: string): number =>
    (d.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number }).count;

  return {
    documents: count('documents'),
    vectors: count('document_vectors'),
    supersessions: count('supersessions'),
  };
}

/**
 * Generate a unique ID.
 */
export function generateId(): string {
  return randomUUID();
}
