/**
 * Creates the cache store: one row per computed artifact
 */

import type { Database } from "better-sqlite3";
import type { Migration } from "./types.ts";

export const migration: Migration = {
  version: "20231101000000",
  description: "create cached_responses",
  up: (db: Database) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS cached_responses (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        kind TEXT NOT NULL,
        dataset TEXT NOT NULL,
        config TEXT NOT NULL DEFAULT '',
        split TEXT NOT NULL DEFAULT '',
        http_status INTEGER NOT NULL,
        error_code TEXT,
        content TEXT NOT NULL,
        dataset_git_revision TEXT,
        progress REAL,
        job_runner_version INTEGER,
        updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        UNIQUE (kind, dataset, config, split)
      );

      CREATE INDEX IF NOT EXISTS idx_cached_responses_dataset ON cached_responses(dataset, kind);
      CREATE INDEX IF NOT EXISTS idx_cached_responses_kind_status ON cached_responses(kind, http_status, error_code);
    `);
  },
  down: (db: Database) => {
    db.exec("DROP TABLE IF EXISTS cached_responses");
  },
};
