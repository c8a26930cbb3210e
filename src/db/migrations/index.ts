/**
 * Migration registry
 * Exports all migrations sorted by version
 */

import type { Migration } from "./types.ts";

import { migration as createCachedResponses } from "./20231101000000_create_cached_responses.ts";
import { migration as createSplitRows } from "./20231101000100_create_split_rows.ts";
import { migration as createCacheTotalMetric } from "./20231110000000_create_cache_total_metric.ts";
import { migration as addFailedRuns } from "./20231201000000_add_failed_runs.ts";
import { migration as renameFirstRowsKind } from "./20231215000000_rename_first_rows_kind.ts";

const VERSION_PATTERN = /^\d{14}$/;

/**
 * Orders versions by code unit, as SQLite compares them
 */
export function compareVersions(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Validates a registry and returns it sorted by version.
 * Throws on a malformed or duplicated version.
 */
export function collectMigrations(migrations: readonly Migration[]): Migration[] {
  const seen = new Set<string>();
  for (const migration of migrations) {
    if (!VERSION_PATTERN.test(migration.version)) {
      throw new Error(`Invalid migration version "${migration.version}": expected YYYYMMDDhhmmss`);
    }
    if (seen.has(migration.version)) {
      throw new Error(`Duplicate migration version ${migration.version}`);
    }
    seen.add(migration.version);
  }
  return [...migrations].sort((a, b) => compareVersions(a.version, b.version));
}

/**
 * All migrations sorted by version
 */
export const ALL_MIGRATIONS: Migration[] = collectMigrations([
  createCachedResponses,
  createSplitRows,
  createCacheTotalMetric,
  addFailedRuns,
  renameFirstRowsKind,
]);
