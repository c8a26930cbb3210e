/**
 * Migration system tests
 */

import { describe, expect, test, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import {
  ensureMigrationTable,
  getAppliedMigrations,
  getLatestAppliedMigration,
  isMigrationApplied,
  recordMigration,
  removeMigrationRecord,
} from "../../../src/db/migrations/tracker.ts";
import { ALL_MIGRATIONS, collectMigrations, compareVersions } from "../../../src/db/migrations/index.ts";
import {
  getMigrationStatus,
  getPendingMigrations,
  IrreversibleMigrationError,
  MigrationError,
  rollbackLastMigration,
  runPendingMigrations,
} from "../../../src/db/migrations.ts";
import type { Migration } from "../../../src/db/migrations/types.ts";

function tableNames(db: Database.Database): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
    .all()
    .map((row) => row.name);
}

function columnNames(db: Database.Database, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
    .map((row) => row.name);
}

/**
 * A migration creating (and dropping) its own table
 */
function tableMigration(version: string, table: string, reversible = true): Migration {
  return {
    version,
    description: `create ${table}`,
    up: (db) => db.exec(`CREATE TABLE ${table} (id INTEGER PRIMARY KEY)`),
    down: reversible ? (db) => db.exec(`DROP TABLE ${table}`) : undefined,
  };
}

describe("Migration Tracker", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  test("ensureMigrationTable creates the tracking table", () => {
    ensureMigrationTable(db);

    expect(tableNames(db)).toContain("database_migrations");
  });

  test("ensureMigrationTable is idempotent", () => {
    ensureMigrationTable(db);
    ensureMigrationTable(db);

    expect(tableNames(db).filter((name) => name === "database_migrations")).toHaveLength(1);
  });

  test("getAppliedMigrations returns empty array for new database", () => {
    ensureMigrationTable(db);

    expect(getAppliedMigrations(db)).toEqual([]);
  });

  test("recordMigration inserts a record with a timestamp", () => {
    ensureMigrationTable(db);

    recordMigration(db, "20240101000000", "first");

    const [record] = getAppliedMigrations(db);
    expect(record.version).toBe("20240101000000");
    expect(record.description).toBe("first");
    expect(record.applied_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(isMigrationApplied(db, "20240101000000")).toBe(true);
    expect(isMigrationApplied(db, "20240102000000")).toBe(false);
  });

  test("getLatestAppliedMigration orders by version, not insertion", () => {
    ensureMigrationTable(db);
    recordMigration(db, "20240105000000", "later");
    recordMigration(db, "20240101000000", "earlier");

    expect(getLatestAppliedMigration(db)?.version).toBe("20240105000000");
    expect(getAppliedMigrations(db).map((m) => m.version)).toEqual(["20240101000000", "20240105000000"]);
  });

  test("removeMigrationRecord forgets the migration", () => {
    ensureMigrationTable(db);
    recordMigration(db, "20240101000000", "first");

    removeMigrationRecord(db, "20240101000000");

    expect(isMigrationApplied(db, "20240101000000")).toBe(false);
    expect(getLatestAppliedMigration(db)).toBeUndefined();
  });
});

describe("Migration Registry", () => {
  test("collectMigrations sorts by version", () => {
    const sorted = collectMigrations([
      tableMigration("20240301000000", "c"),
      tableMigration("20240101000000", "a"),
      tableMigration("20240201000000", "b"),
    ]);

    expect(sorted.map((m) => m.version)).toEqual(["20240101000000", "20240201000000", "20240301000000"]);
  });

  test("compareVersions orders by code unit", () => {
    expect(compareVersions("20240101000000", "20240201000000")).toBe(-1);
    expect(compareVersions("20240201000000", "20240101000000")).toBe(1);
    expect(compareVersions("20240101000000", "20240101000000")).toBe(0);
  });

  test("collectMigrations rejects malformed versions", () => {
    expect(() => collectMigrations([tableMigration("2024-01-01", "a")])).toThrow(
      'Invalid migration version "2024-01-01": expected YYYYMMDDhhmmss'
    );
  });

  test("collectMigrations rejects duplicate versions", () => {
    expect(() =>
      collectMigrations([tableMigration("20240101000000", "a"), tableMigration("20240101000000", "b")])
    ).toThrow("Duplicate migration version 20240101000000");
  });

  test("ALL_MIGRATIONS are sorted with unique versions", () => {
    const versions = ALL_MIGRATIONS.map((m) => m.version);

    expect(versions).toEqual([...versions].sort());
    expect(new Set(versions).size).toBe(versions.length);
    expect(versions[0]).toBe("20231101000000");
  });
});

describe("Migration Runner", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  test("runPendingMigrations creates the schema on a new database", () => {
    const applied = runPendingMigrations(db);

    expect(applied).toEqual(ALL_MIGRATIONS.map((m) => m.version));
    expect(tableNames(db)).toEqual(
      expect.arrayContaining(["cache_total_metric", "cached_responses", "database_migrations", "split_rows"])
    );
    expect(columnNames(db, "cached_responses")).toContain("failed_runs");
  });

  test("runPendingMigrations is idempotent", () => {
    runPendingMigrations(db);

    expect(runPendingMigrations(db)).toEqual([]);
    expect(getAppliedMigrations(db)).toHaveLength(ALL_MIGRATIONS.length);
  });

  test("applies migrations in version order whatever the registry order", () => {
    const order: string[] = [];
    const tracked = (version: string): Migration => ({
      version,
      description: version,
      up: () => {
        order.push(version);
      },
    });

    runPendingMigrations(db, [tracked("20240201000000"), tracked("20240101000000")]);

    expect(order).toEqual(["20240101000000", "20240201000000"]);
  });

  test("refuses a registry with a malformed version before running anything", () => {
    const migrations = [tableMigration("20240101000000", "a"), tableMigration("2024-02-01", "b")];

    expect(() => runPendingMigrations(db, migrations)).toThrow(
      'Invalid migration version "2024-02-01": expected YYYYMMDDhhmmss'
    );
    expect(tableNames(db)).toEqual(["database_migrations"]);
  });

  test("only runs migrations that are not applied yet", () => {
    const migrations = [tableMigration("20240101000000", "a"), tableMigration("20240201000000", "b")];
    runPendingMigrations(db, migrations.slice(0, 1));

    expect(getPendingMigrations(db, migrations).map((m) => m.version)).toEqual(["20240201000000"]);
    expect(runPendingMigrations(db, migrations)).toEqual(["20240201000000"]);
  });

  test("still applies a migration older than the latest applied one", () => {
    runPendingMigrations(db, [tableMigration("20240201000000", "b")]);

    const applied = runPendingMigrations(db, [
      tableMigration("20240101000000", "a"),
      tableMigration("20240201000000", "b"),
    ]);

    expect(applied).toEqual(["20240101000000"]);
    expect(tableNames(db)).toContain("a");
  });

  test("stops at the first failure and keeps earlier migrations", () => {
    const failing: Migration = {
      version: "20240201000000",
      description: "broken",
      up: () => {
        throw new Error("syntax error");
      },
    };
    const migrations = [tableMigration("20240101000000", "a"), failing, tableMigration("20240301000000", "c")];

    expect(() => runPendingMigrations(db, migrations)).toThrow("Migration 20240201000000 failed: syntax error");
    expect(getAppliedMigrations(db).map((m) => m.version)).toEqual(["20240101000000"]);
    expect(tableNames(db)).toContain("a");
    expect(tableNames(db)).not.toContain("c");
  });

  test("failures carry the version of the failing migration", () => {
    const failing: Migration = {
      version: "20240201000000",
      description: "broken",
      up: (database) => database.exec("CREATE TABLE"),
    };

    let caught: unknown;
    try {
      runPendingMigrations(db, [failing]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MigrationError);
    expect(caught instanceof MigrationError && caught.version).toBe("20240201000000");
  });
});

describe("Migration Rollback", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  test("returns null when nothing is applied", () => {
    expect(rollbackLastMigration(db, [tableMigration("20240101000000", "a")])).toBeNull();
  });

  test("rolls back the most recent migration only", () => {
    const migrations = [tableMigration("20240101000000", "a"), tableMigration("20240201000000", "b")];
    runPendingMigrations(db, migrations);

    expect(rollbackLastMigration(db, migrations)).toBe("20240201000000");
    expect(tableNames(db)).toContain("a");
    expect(tableNames(db)).not.toContain("b");
    expect(getAppliedMigrations(db).map((m) => m.version)).toEqual(["20240101000000"]);
  });

  test("refuses to roll back a migration without a down step", () => {
    const migrations = [tableMigration("20240101000000", "a", false)];
    runPendingMigrations(db, migrations);

    expect(() => rollbackLastMigration(db, migrations)).toThrow(IrreversibleMigrationError);
    expect(isMigrationApplied(db, "20240101000000")).toBe(true);
  });

  test("a rolled back migration is pending again", () => {
    const migrations = [tableMigration("20240101000000", "a")];
    runPendingMigrations(db, migrations);
    rollbackLastMigration(db, migrations);

    expect(runPendingMigrations(db, migrations)).toEqual(["20240101000000"]);
  });

  test("every registered migration can be rolled back in turn", () => {
    runPendingMigrations(db);

    for (const migration of [...ALL_MIGRATIONS].reverse()) {
      expect(rollbackLastMigration(db)).toBe(migration.version);
    }
    expect(tableNames(db)).toEqual(["database_migrations"]);
  });
});

describe("Migration Status", () => {
  test("reports applied and pending migrations", () => {
    const db = new Database(":memory:");
    const migrations = [tableMigration("20240101000000", "a"), tableMigration("20240201000000", "b", false)];
    runPendingMigrations(db, migrations.slice(0, 1));

    const status = getMigrationStatus(db, migrations);

    expect(status).toHaveLength(2);
    expect(status[0]).toMatchObject({ version: "20240101000000", applied: true, reversible: true });
    expect(status[0].appliedAt).not.toBeNull();
    expect(status[1]).toEqual({
      version: "20240201000000",
      description: "create b",
      applied: false,
      appliedAt: null,
      reversible: false,
    });
    db.close();
  });
});

describe("Cache kind rename migration", () => {
  let db: Database.Database;
  const rename = ALL_MIGRATIONS[ALL_MIGRATIONS.length - 1];

  beforeEach(() => {
    db = new Database(":memory:");
    runPendingMigrations(db, ALL_MIGRATIONS.slice(0, -1));
  });

  afterEach(() => {
    db.close();
  });

  function insert(kind: string, split: string, content: string): void {
    db.prepare(
      "INSERT INTO cached_responses (kind, dataset, config, split, http_status, content) VALUES (?, 'd', 'c', ?, 200, ?)"
    ).run(kind, split, content);
  }

  function kinds(): { kind: string; split: string; content: string }[] {
    return db
      .prepare<[], { kind: string; split: string; content: string }>(
        "SELECT kind, split, content FROM cached_responses ORDER BY split"
      )
      .all();
  }

  test("renames legacy first-rows entries", () => {
    insert("split-first-rows-from-streaming", "train", "{}");

    runPendingMigrations(db);

    expect(kinds()).toEqual([{ kind: "split-first-rows", split: "train", content: "{}" }]);
  });

  test("keeps the existing entry when both kinds exist", () => {
    insert("split-first-rows-from-streaming", "train", '{"old":true}');
    insert("split-first-rows", "train", '{"new":true}');
    insert("split-first-rows-from-streaming", "test", "{}");

    runPendingMigrations(db);

    expect(kinds()).toEqual([
      { kind: "split-first-rows", split: "test", content: "{}" },
      { kind: "split-first-rows", split: "train", content: '{"new":true}' },
    ]);
  });

  test("down restores the legacy kind", () => {
    insert("split-first-rows", "train", "{}");
    runPendingMigrations(db);

    expect(rollbackLastMigration(db)).toBe(rename.version);
    expect(kinds()).toEqual([{ kind: "split-first-rows-from-streaming", split: "train", content: "{}" }]);
  });
});
