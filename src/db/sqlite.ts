// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// Methods resolve synchronously (better-sqlite3 is sync).

import Database from 'better-sqlite3';
import type { DbAdapter, RunResult } from './types.js';

export class SqliteAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;
  private _db: Database.Database;
  private _txDepth = 0;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /**
   * The underlying better-sqlite3 handle. Used by the migration runner and
   * tests only; stores go through the adapter methods.
   */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row: T | undefined = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // better-sqlite3's db.transaction() takes sync callbacks only, so
    // BEGIN/COMMIT/ROLLBACK are issued by hand. Inner calls use savepoints.
    //
    // The awaits inside fn() yield to other callers on the same connection;
    // writers that must not interleave are serialized by the KeyedMutex
    // locks in the ledger and run controller.
    const depth = this._txDepth;
    const savepoint = `sp_${depth}`;
    this._db.exec(depth === 0 ? 'BEGIN' : `SAVEPOINT ${savepoint}`);
    this._txDepth = depth + 1;
    try {
      const result = await fn(this);
      this._db.exec(depth === 0 ? 'COMMIT' : `RELEASE ${savepoint}`);
      return result;
    } catch (e) {
      if (depth === 0) {
        if (this._db.inTransaction) this._db.exec('ROLLBACK');
      } else {
        this._db.exec(`ROLLBACK TO ${savepoint}`);
        this._db.exec(`RELEASE ${savepoint}`);
      }
      throw e;
    } finally {
      this._txDepth = depth;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
