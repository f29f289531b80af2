/**
 * Tests for the migration runner.
 *
 * Validates:
 *  - schema_migrations table is created on first run
 *  - the jobs table and its indexes are created
 *  - Running migrations twice is idempotent (no errors)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { runMigrations, MIGRATIONS } from '../../../src/persistence/migrations/index.js'
import type { Migration } from '../../../src/persistence/migrations/index.js'

function openMemoryDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  return db
}

function schemaObject(db: BetterSqlite3Database, type: string, name: string): unknown {
  return db.prepare('SELECT name FROM sqlite_master WHERE type = ? AND name = ?').get(type, name)
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = openMemoryDb()
  })

  afterEach(() => {
    db.close()
  })

  it('creates the schema_migrations table', () => {
    runMigrations(db)
    expect(schemaObject(db, 'table', 'schema_migrations')).toEqual({ name: 'schema_migrations' })
  })

  it('records migration version 1 after first run', () => {
    runMigrations(db)
    const rows: unknown[] = db.prepare('SELECT version, name FROM schema_migrations').all()
    expect(rows).toEqual([{ version: 1, name: '001-jobs-schema' }])
  })

  it('creates the jobs table and indexes', () => {
    runMigrations(db)
    expect(schemaObject(db, 'table', 'jobs')).toEqual({ name: 'jobs' })
    expect(schemaObject(db, 'index', 'idx_jobs_status')).toEqual({ name: 'idx_jobs_status' })
    expect(schemaObject(db, 'index', 'idx_jobs_created_at')).toEqual({ name: 'idx_jobs_created_at' })
  })

  it('is idempotent', () => {
    runMigrations(db)
    expect(() => runMigrations(db)).not.toThrow()
    const rows: unknown[] = db.prepare('SELECT version FROM schema_migrations').all()
    expect(rows).toHaveLength(MIGRATIONS.length)
  })

  it('rejects an unknown job status', () => {
    runMigrations(db)
    const insert = db.prepare(
      "INSERT INTO jobs (id, status, thesis, backends_json, created_at) VALUES ('x', 'paused', 't', '[]', 'now')"
    )
    expect(() => insert.run()).toThrow(/CHECK constraint failed/)
  })

  it('applies pending migrations in version order', () => {
    const applied: number[] = []
    const migrations: Migration[] = [
      { version: 3, name: 'third', up: () => { applied.push(3) } },
      { version: 2, name: 'second', up: () => { applied.push(2) } },
    ]
    runMigrations(db, migrations)
    expect(applied).toEqual([2, 3])
  })

  it('rolls back a failing migration', () => {
    const failing: Migration = {
      version: 4,
      name: 'broken',
      up: (d) => {
        d.exec('CREATE TABLE half_done (id INTEGER)')
        throw new Error('migration failed')
      },
    }
    expect(() => runMigrations(db, [failing])).toThrow('migration failed')
    expect(schemaObject(db, 'table', 'half_done')).toBeUndefined()
    expect(db.prepare('SELECT version FROM schema_migrations').all()).toEqual([])
  })
})
