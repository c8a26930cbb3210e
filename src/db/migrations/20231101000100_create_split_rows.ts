/**
 * Creates the row store that backs /rows, /search, /filter and /statistics
 */

import type { Database } from "better-sqlite3";
import type { Migration } from "./types.ts";

export const migration: Migration = {
  version: "20231101000100",
  description: "create split_rows",
  up: (db: Database) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS split_rows (
        dataset TEXT NOT NULL,
        config TEXT NOT NULL,
        split TEXT NOT NULL,
        row_idx INTEGER NOT NULL,
        row_json TEXT NOT NULL,
        PRIMARY KEY (dataset, config, split, row_idx)
      );
    `);
  },
  down: (db: Database) => {
    db.exec("DROP TABLE IF EXISTS split_rows");
  },
};
