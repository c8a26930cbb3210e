/**
 * Migration type definitions
 */

import type { Database } from "better-sqlite3";

export interface Migration {
  /** UTC timestamp, YYYYMMDDhhmmss; sorts in application order */
  version: string;
  description: string;
  up: (db: Database) => void;
  down?: (db: Database) => void;
}

export interface MigrationRecord {
  version: string;
  description: string;
  applied_at: string;
}

export interface MigrationStatus {
  version: string;
  description: string;
  applied: boolean;
  appliedAt: string | null;
  reversible: boolean;
}
