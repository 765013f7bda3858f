// src/migrations/runner.ts
// Versioned SQL migrations over the DbAdapter.
//
// Migration files live in <repo>/migrations as NNN_name.sql. Each file holds
// the up SQL, optionally followed by a "-- DOWN" marker and the rollback SQL.
// Applied migrations are tracked in schema_migrations.

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createLogger } from '../observability/index.js';
import type { DbAdapter } from '../db/types.js';

const log = createLogger('migrations');

/* ---------- Types ---------- */
export interface Migration {
  version: string;
  name: string;
  up: string;
  down: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  applied: boolean;
  appliedAt: number | null;
}

/* ---------- Constants ---------- */
const MIGRATION_TABLE = 'schema_migrations';
const DOWN_MARKER = '-- DOWN';

/** <repo>/migrations, from both src/migrations and dist/migrations. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'migrations'
);

/* ---------- File Parsing ---------- */

export function parseMigrationSource(content: string): { up: string; down: string } {
  const markerIndex = content.indexOf(DOWN_MARKER);
  if (markerIndex === -1) {
    return { up: content.trim(), down: '' };
  }
  return {
    up: content.slice(0, markerIndex).trim(),
    down: content.slice(markerIndex + DOWN_MARKER.length).trim(),
  };
}

/** "001_core_schema.sql" → { version: "001", name: "core_schema" } */
export function parseMigrationFilename(
  filename: string
): { version: string; name: string } | null {
  const match = /^(\d+)_(.+)\.sql$/.exec(filename);
  if (!match || match[1] === undefined || match[2] === undefined) return null;
  return { version: match[1], name: match[2] };
}

const fullName = (m: Migration) => `${m.version}_${m.name}`;

/* ---------- Runner ---------- */
export class MigrationRunner {
  constructor(
    private readonly db: DbAdapter,
    private readonly migrationsDir: string = DEFAULT_MIGRATIONS_DIR
  ) {}

  async ensureMigrationTable(): Promise<void> {
    await this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        applied_at INTEGER NOT NULL
      );
    `);
  }

  getAllMigrations(): Migration[] {
    if (!fs.existsSync(this.migrationsDir)) return [];

    const files = fs
      .readdirSync(this.migrationsDir)
      .filter((f) => f.endsWith('.sql'))
      .sort();

    const migrations: Migration[] = [];
    for (const file of files) {
      const parsed = parseMigrationFilename(file);
      if (!parsed) continue;
      const content = fs.readFileSync(path.join(this.migrationsDir, file), 'utf-8');
      migrations.push({ ...parsed, ...parseMigrationSource(content) });
    }
    return migrations;
  }

  private async getApplied(): Promise<Map<string, number>> {
    await this.ensureMigrationTable();
    const rows = await this.db.queryAll<{ name: string; applied_at: number }>(
      `SELECT name, applied_at FROM ${MIGRATION_TABLE} ORDER BY id ASC`
    );
    return new Map(rows.map((r) => [r.name, r.applied_at]));
  }

  async getStatus(): Promise<MigrationStatus[]> {
    const applied = await this.getApplied();
    return this.getAllMigrations().map((m) => {
      const appliedAt = applied.get(fullName(m));
      return {
        version: m.version,
        name: m.name,
        applied: appliedAt !== undefined,
        appliedAt: appliedAt ?? null,
      };
    });
  }

  /** Apply pending migrations in order, stopping at the first failure. */
  async runAll(): Promise<{ applied: string[]; failed: string | null }> {
    const appliedNames = await this.getApplied();
    const pending = this.getAllMigrations().filter((m) => !appliedNames.has(fullName(m)));

    const applied: string[] = [];
    for (const migration of pending) {
      const name = fullName(migration);
      try {
        await this.db.transaction(async (tx) => {
          await tx.exec(migration.up);
          await tx.run(`INSERT INTO ${MIGRATION_TABLE} (name, applied_at) VALUES (?, ?)`, [
            name,
            Date.now(),
          ]);
        });
        applied.push(name);
        log.debug({ migration: name }, 'Applied migration');
      } catch (err) {
        log.error({ err, migration: name }, 'Failed to apply migration');
        return { applied, failed: name };
      }
    }
    return { applied, failed: null };
  }

  /** Roll back the most recently applied migration; returns its name. */
  async rollbackLast(): Promise<string | null> {
    const applied = [...(await this.getApplied()).keys()];
    const last = applied[applied.length - 1];
    if (last === undefined) return null;

    const migration = this.getAllMigrations().find((m) => fullName(m) === last);
    if (!migration) throw new Error(`Migration file for ${last} not found`);
    if (!migration.down) throw new Error(`Migration ${last} has no down migration defined`);

    await this.db.transaction(async (tx) => {
      await tx.exec(migration.down);
      await tx.run(`DELETE FROM ${MIGRATION_TABLE} WHERE name = ?`, [last]);
    });
    return last;
  }
}

/* ---------- Factory ---------- */
export function createMigrationRunner(db: DbAdapter, migrationsDir?: string): MigrationRunner {
  return new MigrationRunner(db, migrationsDir);
}
