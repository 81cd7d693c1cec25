/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { getConfig } from '@/core/config';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

let db: Database.Database | null = null;
let dbPath: string | null = null;

export function initializeDatabase(path: string = getConfig().sqlitePath): Database.Database {
  const target = resolve(path);
  if (db && dbPath === target) {
    return db;
  }
  closeDatabase();

  const dir = dirname(target);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const isNew = !existsSync(target);
  logger.info({ dbPath: target, isNew }, 'Initializing database');

  const database = new Database(target);

  // WAL plus a busy timeout lets concurrent runs share the store
  database.pragma('journal_mode = WAL');
  database.pragma('busy_timeout = 5000');
  database.pragma('foreign_keys = ON');

  runMigrations(database);

  db = database;
  dbPath = target;
  return database;
}

function runMigrations(database: Database.Database): void {
  const files = existsSync(MIGRATIONS_DIR)
    ? readdirSync(MIGRATIONS_DIR)
        .filter((f) => f.endsWith('.sql'))
        .sort()
    : [];
  if (files.length === 0) {
    throw new Error(`No schema migrations found in ${MIGRATIONS_DIR}`);
  }

  logger.debug({ files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf-8');
    database.exec(sql);
  }
}

export function getDatabase(): Database.Database {
  if (!db) {
    return initializeDatabase();
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    dbPath = null;
    logger.debug('Database connection closed');
  }
}
