/**
 * Cache store and row store - the artifacts computed by the workers, and the rows they index
 */

import { getDatabase } from "./migrations.ts";
import type { CachedResponseRow, CacheTotalMetricRow, SplitRowRow } from "./schema.ts";
import { memoryCache } from "../cache/memory.ts";
import { isRecord } from "../utils/validation.ts";

export class CacheEntryDoesNotExistError extends Error {
  constructor(kind: string, dataset: string, config: string | null, split: string | null) {
    super(`Cache entry does not exist: kind=${kind} dataset=${dataset} config=${config} split=${split}`);
    this.name = "CacheEntryDoesNotExistError";
  }
}

export interface CachedResponse {
  kind: string;
  dataset: string;
  config: string | null;
  split: string | null;
  httpStatus: number;
  errorCode: string | null;
  content: unknown;
  datasetGitRevision: string | null;
  progress: number | null;
  jobRunnerVersion: number | null;
  failedRuns: number;
  updatedAt: string;
}

export interface UpsertResponseInput {
  kind: string;
  dataset: string;
  config?: string | null;
  split?: string | null;
  httpStatus: number;
  errorCode?: string | null;
  content: unknown;
  datasetGitRevision?: string | null;
  progress?: number | null;
  jobRunnerVersion?: number | null;
}

export interface SplitRow {
  rowIdx: number;
  row: Record<string, unknown>;
}

export interface ResponseCount {
  kind: string;
  http_status: number;
  error_code: string | null;
  total: number;
}

function toCachedResponse(row: CachedResponseRow): CachedResponse {
  return {
    kind: row.kind,
    dataset: row.dataset,
    config: row.config === "" ? null : row.config,
    split: row.split === "" ? null : row.split,
    httpStatus: row.http_status,
    errorCode: row.error_code,
    content: JSON.parse(row.content),
    datasetGitRevision: row.dataset_git_revision,
    progress: row.progress,
    jobRunnerVersion: row.job_runner_version,
    failedRuns: row.failed_runs,
    updatedAt: row.updated_at,
  };
}

function parseRow(row: SplitRowRow): SplitRow {
  const value: unknown = JSON.parse(row.row_json);
  if (!isRecord(value)) {
    throw new Error(`Row ${row.row_idx} of ${row.dataset}/${row.config}/${row.split} is not an object`);
  }
  return { rowIdx: row.row_idx, row: value };
}

// ============ Cache Store ============

/**
 * Inserts or replaces the entry for (kind, dataset, config, split).
 * failed_runs counts consecutive error responses and resets on success.
 */
export function upsertResponse(input: UpsertResponseInput): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO cached_responses
    (kind, dataset, config, split, http_status, error_code, content, dataset_git_revision, progress, job_runner_version, failed_runs)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0)
    ON CONFLICT (kind, dataset, config, split) DO UPDATE SET
      http_status = excluded.http_status,
      error_code = excluded.error_code,
      content = excluded.content,
      dataset_git_revision = excluded.dataset_git_revision,
      progress = excluded.progress,
      job_runner_version = excluded.job_runner_version,
      failed_runs = CASE WHEN excluded.http_status = 200 THEN 0 ELSE cached_responses.failed_runs + 1 END,
      updated_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
  `).run(
    input.kind,
    input.dataset,
    input.config ?? "",
    input.split ?? "",
    input.httpStatus,
    input.errorCode ?? null,
    JSON.stringify(input.content),
    input.datasetGitRevision ?? null,
    input.progress ?? null,
    input.jobRunnerVersion ?? null
  );

  // Aggregates built from the previous content are stale now
  memoryCache.invalidateDataset(input.dataset);
}

function findResponse(
  kind: string,
  dataset: string,
  config: string | null,
  split: string | null
): CachedResponse | undefined {
  const db = getDatabase();
  const row = db
    .prepare<[string, string, string, string], CachedResponseRow>(`
      SELECT * FROM cached_responses
      WHERE kind = ? AND dataset = ? AND config = ? AND split = ?
    `)
    .get(kind, dataset, config ?? "", split ?? "");
  return row ? toCachedResponse(row) : undefined;
}

export function getResponse(
  kind: string,
  dataset: string,
  config: string | null = null,
  split: string | null = null
): CachedResponse {
  const response = findResponse(kind, dataset, config, split);
  if (!response) {
    throw new CacheEntryDoesNotExistError(kind, dataset, config, split);
  }
  return response;
}

/**
 * Returns the first successful entry among `kinds` (in order), else the first
 * existing error entry, else null.
 */
export function getBestResponse(
  kinds: readonly string[],
  dataset: string,
  config: string | null = null,
  split: string | null = null
): CachedResponse | null {
  let firstError: CachedResponse | null = null;
  for (const kind of kinds) {
    const response = findResponse(kind, dataset, config, split);
    if (!response) continue;
    if (response.httpStatus === 200) {
      return response;
    }
    firstError ??= response;
  }
  return firstError;
}

export function hasAnyResponse(dataset: string): boolean {
  const db = getDatabase();
  const row = db.prepare<[string], { found: number }>(
    "SELECT 1 AS found FROM cached_responses WHERE dataset = ? LIMIT 1"
  ).get(dataset);
  return row !== undefined;
}

/**
 * Entries of one kind, optionally restricted to a dataset, ordered by (dataset, config, split)
 */
export function listResponsesByKind(kind: string, dataset?: string): CachedResponse[] {
  const db = getDatabase();
  const rows =
    dataset === undefined
      ? db
          .prepare<[string], CachedResponseRow>(
            "SELECT * FROM cached_responses WHERE kind = ? ORDER BY dataset, config, split"
          )
          .all(kind)
      : db
          .prepare<[string, string], CachedResponseRow>(
            "SELECT * FROM cached_responses WHERE kind = ? AND dataset = ? ORDER BY config, split"
          )
          .all(kind, dataset);
  return rows.map(toCachedResponse);
}

export function deleteResponse(
  kind: string,
  dataset: string,
  config: string | null = null,
  split: string | null = null
): boolean {
  const db = getDatabase();
  const result = db
    .prepare("DELETE FROM cached_responses WHERE kind = ? AND dataset = ? AND config = ? AND split = ?")
    .run(kind, dataset, config ?? "", split ?? "");
  memoryCache.invalidateDataset(dataset);
  return result.changes > 0;
}

export function deleteDatasetResponses(dataset: string): number {
  const db = getDatabase();
  const result = db.prepare("DELETE FROM cached_responses WHERE dataset = ?").run(dataset);
  memoryCache.invalidateDataset(dataset);
  return result.changes;
}

export function countResponsesByKindStatusAndErrorCode(): ResponseCount[] {
  const db = getDatabase();
  return db
    .prepare<[], ResponseCount>(`
      SELECT kind, http_status, error_code, COUNT(*) AS total
      FROM cached_responses
      GROUP BY kind, http_status, error_code
      ORDER BY kind, http_status, error_code
    `)
    .all();
}

// ============ Metrics Store ============

/**
 * Replaces the stored snapshot of cache entry counts
 */
export function replaceCacheTotalMetrics(counts: readonly ResponseCount[]): void {
  const db = getDatabase();
  const insert = db.prepare(
    "INSERT INTO cache_total_metric (kind, http_status, error_code, total) VALUES (?, ?, ?, ?)"
  );
  const replace = db.transaction((entries: readonly ResponseCount[]) => {
    db.prepare("DELETE FROM cache_total_metric").run();
    for (const entry of entries) {
      insert.run(entry.kind, entry.http_status, entry.error_code ?? "", entry.total);
    }
  });
  replace(counts);
}

export function getCacheTotalMetrics(): CacheTotalMetricRow[] {
  const db = getDatabase();
  return db
    .prepare<[], CacheTotalMetricRow>(
      "SELECT * FROM cache_total_metric ORDER BY kind, http_status, error_code"
    )
    .all();
}

// ============ Row Store ============

/**
 * Replaces all rows of a split. Rows are numbered from 0 in the given order.
 */
export function replaceSplitRows(
  dataset: string,
  config: string,
  split: string,
  rows: readonly Record<string, unknown>[]
): void {
  const db = getDatabase();
  const insert = db.prepare(
    "INSERT INTO split_rows (dataset, config, split, row_idx, row_json) VALUES (?, ?, ?, ?, ?)"
  );
  const replace = db.transaction((newRows: readonly Record<string, unknown>[]) => {
    db.prepare("DELETE FROM split_rows WHERE dataset = ? AND config = ? AND split = ?").run(dataset, config, split);
    newRows.forEach((row, rowIdx) => {
      insert.run(dataset, config, split, rowIdx, JSON.stringify(row));
    });
  });
  replace(rows);
  memoryCache.invalidateDataset(dataset);
}

export function getSplitRows(
  dataset: string,
  config: string,
  split: string,
  offset: number,
  length: number
): SplitRow[] {
  const db = getDatabase();
  return db
    .prepare<[string, string, string, number, number], SplitRowRow>(`
      SELECT * FROM split_rows
      WHERE dataset = ? AND config = ? AND split = ?
      ORDER BY row_idx
      LIMIT ? OFFSET ?
    `)
    .all(dataset, config, split, length, offset)
    .map(parseRow);
}

export function getAllSplitRows(dataset: string, config: string, split: string): SplitRow[] {
  const db = getDatabase();
  return db
    .prepare<[string, string, string], SplitRowRow>(`
      SELECT * FROM split_rows
      WHERE dataset = ? AND config = ? AND split = ?
      ORDER BY row_idx
    `)
    .all(dataset, config, split)
    .map(parseRow);
}

export function countSplitRows(dataset: string, config: string, split: string): number {
  const db = getDatabase();
  const row = db
    .prepare<[string, string, string], { total: number }>(
      "SELECT COUNT(*) AS total FROM split_rows WHERE dataset = ? AND config = ? AND split = ?"
    )
    .get(dataset, config, split);
  return row?.total ?? 0;
}

export function deleteDatasetRows(dataset: string): number {
  const db = getDatabase();
  const result = db.prepare("DELETE FROM split_rows WHERE dataset = ?").run(dataset);
  memoryCache.invalidateDataset(dataset);
  return result.changes;
}
