/**
 * Creates the metrics store filled by the cache maintenance job
 */

import type { Database } from "better-sqlite3";
import type { Migration } from "./types.ts";

export const migration: Migration = {
  version: "20231110000000",
  description: "create cache_total_metric",
  up: (db: Database) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS cache_total_metric (
        kind TEXT NOT NULL,
        http_status INTEGER NOT NULL,
        error_code TEXT NOT NULL DEFAULT '',
        total INTEGER NOT NULL,
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        PRIMARY KEY (kind, http_status, error_code)
      );
    `);
  },
  down: (db: Database) => {
    db.exec("DROP TABLE IF EXISTS cache_total_metric");
  },
};
