/**
 * Database connection and migration runner
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { env } from "../config/env.ts";
import { createLogger } from "../core/logger.ts";
import {
  ensureMigrationTable,
  getAppliedMigrations,
  getLatestAppliedMigration,
  recordMigration,
  removeMigrationRecord,
} from "./migrations/tracker.ts";
import { ALL_MIGRATIONS, collectMigrations } from "./migrations/index.ts";
import type { Migration, MigrationStatus } from "./migrations/types.ts";

const log = createLogger("migrations");

export class MigrationError extends Error {
  readonly version: string;

  constructor(version: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Migration ${version} failed: ${reason}`, { cause });
    this.name = "MigrationError";
    this.version = version;
  }
}

export class IrreversibleMigrationError extends Error {
  readonly version: string;

  constructor(version: string) {
    super(`Migration ${version} cannot be rolled back: it has no down step`);
    this.name = "IrreversibleMigrationError";
    this.version = version;
  }
}

let db: Database.Database | null = null;

/**
 * Opens (once) the SQLite database configured by DATABASE_PATH.
 * Throws when the file cannot be opened.
 */
export function getDatabase(): Database.Database {
  if (!db) {
    const path = env.databasePath;
    if (path !== ":memory:") {
      const dataDir = dirname(path);
      if (!existsSync(dataDir)) {
        mkdirSync(dataDir, { recursive: true });
      }
    }

    const database = new Database(path);
    database.pragma("journal_mode = WAL");
    database.pragma("foreign_keys = ON");
    db = database;
  }
  return db;
}

/**
 * Registered migrations that have not been applied yet, oldest first.
 * Throws on a malformed or duplicated version in the registry.
 */
export function getPendingMigrations(
  database: Database.Database,
  migrations: readonly Migration[] = ALL_MIGRATIONS
): Migration[] {
  const appliedVersions = new Set(getAppliedMigrations(database).map((m) => m.version));
  return collectMigrations(migrations).filter((m) => !appliedVersions.has(m.version));
}

/**
 * Runs all pending migrations in version order and returns the versions applied.
 * Stops at the first failure: migrations before it stay applied, the failing
 * one is not recorded and nothing is rolled back.
 */
export function runPendingMigrations(
  database: Database.Database,
  migrations: readonly Migration[] = ALL_MIGRATIONS
): string[] {
  ensureMigrationTable(database);

  const latest = getLatestAppliedMigration(database);
  const pendingMigrations = getPendingMigrations(database, migrations);

  const applied: string[] = [];

  for (const migration of pendingMigrations) {
    if (latest && migration.version < latest.version) {
      log.warn(`Migration ${migration.version} is older than the latest applied one (${latest.version})`);
    }

    log.info(`Running migration ${migration.version}: ${migration.description}`);
    try {
      migration.up(database);
    } catch (error) {
      log.error(`Migration ${migration.version} failed`, error);
      throw new MigrationError(migration.version, error);
    }
    recordMigration(database, migration.version, migration.description);
    log.info(`Migration ${migration.version} completed`);
    applied.push(migration.version);
  }

  return applied;
}

/**
 * Rolls back the most recently applied migration.
 * Returns its version, or null when nothing has been applied.
 */
export function rollbackLastMigration(
  database: Database.Database,
  migrations: readonly Migration[] = ALL_MIGRATIONS
): string | null {
  ensureMigrationTable(database);

  const latest = getLatestAppliedMigration(database);
  if (!latest) {
    return null;
  }

  const migration = migrations.find((m) => m.version === latest.version);
  if (!migration) {
    throw new Error(`Applied migration ${latest.version} is not registered`);
  }
  if (!migration.down) {
    throw new IrreversibleMigrationError(migration.version);
  }

  log.info(`Rolling back migration ${migration.version}: ${migration.description}`);
  try {
    migration.down(database);
  } catch (error) {
    throw new MigrationError(migration.version, error);
  }
  removeMigrationRecord(database, migration.version);
  log.info(`Migration ${migration.version} rolled back`);
  return migration.version;
}

/**
 * Applied and pending state of every registered migration
 */
export function getMigrationStatus(
  database: Database.Database,
  migrations: readonly Migration[] = ALL_MIGRATIONS
): MigrationStatus[] {
  ensureMigrationTable(database);
  const appliedByVersion = new Map(getAppliedMigrations(database).map((m) => [m.version, m]));

  return migrations.map((migration) => {
    const applied = appliedByVersion.get(migration.version);
    return {
      version: migration.version,
      description: migration.description,
      applied: applied !== undefined,
      appliedAt: applied?.applied_at ?? null,
      reversible: migration.down !== undefined,
    };
  });
}

export function initDatabase(): void {
  const database = getDatabase();

  const applied = runPendingMigrations(database);

  if (applied.length > 0) {
    log.info(`Applied ${applied.length} migration(s)`);
  }

  log.debug(`Database initialized at: ${env.databasePath}`);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
