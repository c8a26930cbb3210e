/**
 * Migration tracking functions
 */

import type { Database } from "better-sqlite3";
import type { MigrationRecord } from "./types.ts";

export const MIGRATIONS_TABLE = "database_migrations";

/**
 * Ensures the database_migrations table exists for tracking applied migrations
 */
export function ensureMigrationTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      version TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);
}

/**
 * Returns all applied migrations, oldest version first
 */
export function getAppliedMigrations(db: Database): MigrationRecord[] {
  return db
    .prepare<[], MigrationRecord>(
      `SELECT version, description, applied_at FROM ${MIGRATIONS_TABLE} ORDER BY version ASC`
    )
    .all();
}

/**
 * Returns the most recent applied migration, by version
 */
export function getLatestAppliedMigration(db: Database): MigrationRecord | undefined {
  return db
    .prepare<[], MigrationRecord>(
      `SELECT version, description, applied_at FROM ${MIGRATIONS_TABLE} ORDER BY version DESC LIMIT 1`
    )
    .get();
}

/**
 * Records a migration as applied
 */
export function recordMigration(db: Database, version: string, description: string): void {
  db.prepare(`INSERT INTO ${MIGRATIONS_TABLE} (version, description) VALUES (?, ?)`).run(version, description);
}

/**
 * Removes the record of a migration that has been rolled back
 */
export function removeMigrationRecord(db: Database, version: string): void {
  db.prepare(`DELETE FROM ${MIGRATIONS_TABLE} WHERE version = ?`).run(version);
}

/**
 * Checks if a specific migration version has been applied
 */
export function isMigrationApplied(db: Database, version: string): boolean {
  const result = db.prepare(`SELECT 1 FROM ${MIGRATIONS_TABLE} WHERE version = ?`).get(version);
  return result !== undefined;
}
