/**
 * Migration runner for the SQLite persistence layer.
 *
 * Responsibilities:
 *  - Ensure the `schema_migrations` table exists
 *  - Track which migrations have already been applied
 *  - Apply pending migrations in version order, each in its own transaction
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { qualityGatesSchemaMigration } from './001-quality-gates-schema.js'
import { executionIndexesMigration } from './002-execution-indexes.js'

const logger = createLogger('persistence:migrations')

// ---------------------------------------------------------------------------
// Migration interface
// ---------------------------------------------------------------------------

export interface Migration {
  /** Unique version number (integer) */
  version: number
  name: string
  /** Execute the migration: must be idempotent */
  up(db: BetterSqlite3Database): void
}

// ---------------------------------------------------------------------------
// Registered migrations: add new migrations here in version order
// ---------------------------------------------------------------------------

export const MIGRATIONS: Migration[] = [qualityGatesSchemaMigration, executionIndexesMigration]

// ---------------------------------------------------------------------------
// Migration runner
// ---------------------------------------------------------------------------

/**
 * Ensure `schema_migrations` exists and run any pending migrations.
 * Safe to call multiple times; applied migrations are skipped.
 *
 * @returns the versions applied by this call
 */
export function runMigrations(
  db: BetterSqlite3Database,
  migrations: readonly Migration[] = MIGRATIONS
): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version)
  )

  const pending = migrations
    .filter((m) => !appliedVersions.has(m.version))
    .sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return []
  }

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  )

  for (const migration of pending) {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration')
    db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })()
  }

  logger.info({ count: pending.length }, 'All pending migrations applied')
  return pending.map((m) => m.version)
}
