/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 */

import { mkdirSync } from 'fs'
import { dirname } from 'path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const IN_MEMORY_DATABASE = ':memory:'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

/**
 * Thin wrapper that opens a SQLite database, applies required PRAGMAs,
 * and exposes the raw BetterSqlite3 instance.
 */
export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database at the configured path and apply all required PRAGMAs.
   * Creates the parent directory of a file database.
   * Calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    const inMemory = this._path === IN_MEMORY_DATABASE
    if (!inMemory) {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    this._db = new BetterSqlite3(this._path)

    // In-memory databases report "memory" here
    const journalMode: unknown = this._db.pragma('journal_mode = WAL', { simple: true })
    if (!inMemory && journalMode !== 'wal') {
      logger.warn({ result: journalMode }, 'WAL pragma did not return expected "wal"')
    }
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')

    logger.debug({ path: this._path, journalMode }, 'SQLite database opened')
  }

  /**
   * Close the database. A no-op when already closed.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * Return the raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  /** Whether the database is currently open */
  get isOpen(): boolean {
    return this._db !== null
  }
}

// ---------------------------------------------------------------------------
// DatabaseService interface
// ---------------------------------------------------------------------------

/**
 * DatabaseService lifecycle plus access to the raw BetterSqlite3 instance
 * for query modules.
 */
export interface DatabaseService extends BaseService {
  /** Whether the database connection is open and ready */
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance for prepared statements */
  readonly db: BetterSqlite3Database
}

// ---------------------------------------------------------------------------
// DatabaseServiceImpl
// ---------------------------------------------------------------------------

/**
 * DatabaseService that opens the database and applies pending migrations
 * on initialize().
 */
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
    runMigrations(this._wrapper.db)
    logger.debug('DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
    logger.debug('DatabaseService shut down')
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
