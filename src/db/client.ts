import * as fs from 'node:fs';
import { dirname } from 'node:path';
import Database, { type Database as SQLiteDatabase } from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { createLogger } from '../lib/logging/logger.js';
import type { Database as OrchestratorDatabase } from '../types/database.js';
import { MIGRATION_SQL } from './migration.js';
import * as schema from './schema/index.js';

export type { SQLiteDatabase };

const log = createLogger('Database');

const runMigration = (sqlite: SQLiteDatabase): void => {
  try {
    sqlite.exec(MIGRATION_SQL);
    log.debug('Schema migration completed');
  } catch (error) {
    log.error('Schema migration failed', { error });
    throw error;
  }
};

export type DatabaseHandle = {
  db: OrchestratorDatabase;
  sqlite: SQLiteDatabase;
  close: () => void;
};

/**
 * Opens (or creates) the SQLite file and applies the schema.
 * `:memory:` gives a private in-process database.
 */
export const createDatabase = (path: string): DatabaseHandle => {
  const inMemory = path === ':memory:';

  if (!inMemory) {
    const dataDir = dirname(path);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqlite = new Database(path);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  runMigration(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
};
