/**
 * SQLite database connection and schema setup.
 *
 * Supports optional encryption using better-sqlite3-multiple-ciphers.
 * The key is read from `RECIPE_FINDER_DB_KEY`.
 */

import Database from 'better-sqlite3-multiple-ciphers';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { resolvePath } from '../config/recipe-config.js';
import { loadConfig, type Cipher } from '../config/loader.js';
import { StorageError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { loadSchemaStatements } from './schema-loader.js';

const log = createLogger('db');

/** Environment variable holding the database encryption key */
export const DB_KEY_ENV = 'RECIPE_FINDER_DB_KEY';

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
 * import { setDb, resetDb, initSchema } from './db.js';
 *
 * beforeEach(() => {
 *   const testDb = new Database(':memory:');
 *   initSchema(testDb);
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
  closeDb();
}

/**
 * Apply encryption to a database connection. Cipher must be set before key.
 */
function applyEncryption(database: Database.Database, cipher: Cipher, key: string): void {
  database.pragma(`cipher = '${cipher}'`);
  database.pragma(`key = '${key.replace(/'/g, "''")}'`);
  log.debug(`Database opened with ${cipher} encryption`);
}

/**
 * Create tables and indexes if they do not exist.
 */
export function initSchema(database: Database.Database): void {
  for (const statement of loadSchemaStatements()) {
    database.exec(statement);
  }
}

/**
 * Current schema version, 0 for an uninitialized database.
 */
export function getSchemaVersion(database: Database.Database = getDb()): number {
  const table = database
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get();
  if (!table) return 0;
  const row: unknown = database.prepare('SELECT MAX(version) AS version FROM schema_version').get();
  if (typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'number') {
    return row.version;
  }
  return 0;
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

  const config = loadConfig();
  const resolvedPath = resolvePath(dbPath ?? config.storage.dbPath ?? '~/.recipe-finder/recipes.db');

  const dir = dirname(resolvedPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  let connection: Database.Database;
  try {
    connection = new Database(resolvedPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Cannot open database ${resolvedPath}: ${message}`, 'DB_OPEN_FAILED', error);
  }

  if (config.encryption.enabled) {
    const key = process.env[DB_KEY_ENV];
    if (!key) {
      connection.close();
      throw new StorageError(
        `Database encryption is enabled but no key is available. Set ${DB_KEY_ENV}.`,
        'DB_KEY_MISSING',
      );
    }
    applyEncryption(connection, config.encryption.cipher ?? 'chacha20', key);
  }

  // WAL mode for concurrent readers (HTTP server + CLI)
  connection.pragma('journal_mode = WAL');

  initSchema(connection);
  log.debug('Database ready', { path: resolvedPath });

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
