/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, foreign keys)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Path that opens a private in-memory database */
export const IN_MEMORY = ':memory:'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database, creating its directory if needed, and apply the PRAGMAs.
   * Calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.info({ path: this._path }, 'Opening SQLite database')
    if (this._path !== IN_MEMORY) {
      mkdirSync(dirname(this._path), { recursive: true })
    }
    this._db = new BetterSqlite3(this._path)

    const journalMode: unknown = this._db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      // In-memory databases report "memory"
      logger.debug({ journalMode }, 'WAL journal mode not available')
    }
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')
  }

  /** Close the database. Calling close() when already closed is a no-op. */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.info({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

// ---------------------------------------------------------------------------
// DatabaseService interface
// ---------------------------------------------------------------------------

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance: use for prepared statements */
  readonly db: BetterSqlite3Database
}

// ---------------------------------------------------------------------------
// DatabaseServiceImpl
// ---------------------------------------------------------------------------

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  async initialize(): Promise<void> {
    this._wrapper.open()
    try {
      runMigrations(this._wrapper.db)
    } catch (err) {
      this._wrapper.close()
      throw err
    }
    logger.info('DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
