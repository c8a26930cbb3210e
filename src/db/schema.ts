/**
 * Row shapes of the tables created by the migrations
 */

export interface CachedResponseRow {
  id: number;
  kind: string;
  dataset: string;
  /** '' when the entry is dataset-level */
  config: string;
  /** '' when the entry is dataset- or config-level */
  split: string;
  http_status: number;
  error_code: string | null;
  content: string;
  dataset_git_revision: string | null;
  progress: number | null;
  job_runner_version: number | null;
  failed_runs: number;
  updated_at: string;
}

export interface SplitRowRow {
  dataset: string;
  config: string;
  split: string;
  row_idx: number;
  row_json: string;
}

export interface CacheTotalMetricRow {
  kind: string;
  http_status: number;
  /** '' for successful responses */
  error_code: string;
  total: number;
  created_at: string;
}
