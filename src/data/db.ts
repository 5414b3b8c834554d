/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { loadEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

/**
 * Opens a database at `dbPath` (or in memory) and brings its schema up to
 * date. Every migration is idempotent, so reopening an existing file is safe.
 */
export function openDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === IN_MEMORY;

  if (!inMemory) {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  logger.info({ dbPath, isNew: inMemory || !existsSync(dbPath) }, 'Opening database');

  const database = new Database(dbPath);

  if (!inMemory) {
    database.pragma('journal_mode = WAL');
  }

  runMigrations(database);
  return database;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return;
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }
}

export function getDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(loadEnvConfig().auditDbPath);
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
