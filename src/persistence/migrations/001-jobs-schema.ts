/**
 * Migration 001: jobs table.
 *
 * One row per submitted deliberation. Backends and the final result are
 * stored as JSON text.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const jobsSchemaMigration: Migration = {
  version: 1,
  name: '001-jobs-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id            TEXT PRIMARY KEY,
        status        TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending','running','completed','failed')),
        thesis        TEXT NOT NULL,
        context       TEXT,
        backends_json TEXT NOT NULL,
        current_round INTEGER CHECK(current_round IS NULL OR current_round BETWEEN 1 AND 3),
        result_json   TEXT,
        error         TEXT,
        tokens_used   INTEGER NOT NULL DEFAULT 0,
        created_at    TEXT NOT NULL,
        completed_at  TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at);
    `)
  },
}
