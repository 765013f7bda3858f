// src/db/types.ts
// Database adapter interface: a unified async API over the SQL driver.

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Unified async database interface.
 * Store modules receive a DbAdapter through their `createXStore(db)` factory.
 * SQL strings use '?' placeholders.
 */
export interface DbAdapter {
  readonly dbType: 'sqlite';

  /**
   * First matching row, or undefined.
   * @param sql    SQL string with '?' parameter placeholders
   * @param params Ordered parameter values matching the placeholders
   */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /** INSERT, UPDATE or DELETE. */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /** Raw multi-statement SQL without parameters (DDL). */
  exec(sql: string): Promise<void>;

  /**
   * Run `fn` atomically. Nested calls join the outer transaction.
   * On error, ROLLBACK is issued and the error rethrown.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
