/**
 * Adds failed_runs to cached_responses, counting consecutive failed computations
 */

import type { Database } from "better-sqlite3";
import type { Migration } from "./types.ts";

export const migration: Migration = {
  version: "20231201000000",
  description: "add failed_runs to cached_responses",
  up: (db: Database) => {
    db.exec("ALTER TABLE cached_responses ADD COLUMN failed_runs INTEGER NOT NULL DEFAULT 0");
  },
  down: (db: Database) => {
    db.exec("ALTER TABLE cached_responses DROP COLUMN failed_runs");
  },
};
