// src/db/index.ts
// Adapter factory: opens the SQLite database (file or in-memory) and applies
// pending migrations.

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { config } from '../config.js';
import { SqliteAdapter } from './sqlite.js';
import { createMigrationRunner } from '../migrations/runner.js';

export type { DbAdapter, RunResult } from './types.js';
export { SqliteAdapter } from './sqlite.js';

/**
 * Open a SQLite database and bring its schema up to date.
 *
 * - ':memory:' opens a private in-memory database (tests).
 * - Any other value is a file path; parent directories are created and
 *   WAL journaling is enabled.
 */
export async function openDatabase(
  dbPath: string = config.database.path
): Promise<SqliteAdapter> {
  let rawDb: Database.Database;
  if (dbPath === ':memory:') {
    rawDb = new Database(':memory:');
  } else {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    rawDb = new Database(dbPath);
    rawDb.pragma('journal_mode = WAL');
  }
  rawDb.pragma('foreign_keys = ON');

  const adapter = new SqliteAdapter(rawDb);
  const { failed } = await createMigrationRunner(adapter).runAll();
  if (failed) {
    await adapter.close();
    throw new Error(`Migration ${failed} failed; see log for details`);
  }
  return adapter;
}
