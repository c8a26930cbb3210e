/**
 * Admin API: writes to the cache and row stores, and operational reports.
 * Mounted behind the X-API-Key middleware.
 */

import { Hono, type Context } from "hono";
import { z } from "zod";
import { getRecentLogs } from "../../core/logger.ts";
import { ingestSplit, ingestSplitSchema } from "../../datasets/ingest.ts";
import { InvalidParameterError } from "../../datasets/errors.ts";
import { requireDataset, requireParam } from "../../datasets/params.ts";
import { getDatabase, getMigrationStatus } from "../../db/migrations.ts";
import {
  deleteDatasetResponses,
  deleteDatasetRows,
  listResponsesByKind,
  upsertResponse,
} from "../../db/repository.ts";
import { clampInt } from "../../utils/validation.ts";
import { respondWithError } from "./responses.ts";

const admin = new Hono();

const upsertCacheSchema = z.object({
  kind: z.string().min(1),
  dataset: z.string().min(1),
  config: z.string().min(1).nullable().default(null),
  split: z.string().min(1).nullable().default(null),
  http_status: z.number().int().min(200).max(599),
  error_code: z.string().min(1).nullable().default(null),
  content: z.record(z.unknown()),
  dataset_git_revision: z.string().nullable().default(null),
  progress: z.number().min(0).max(1).nullable().default(null),
  job_runner_version: z.number().int().nullable().default(null),
});

async function parseBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new InvalidParameterError("Request body must be valid JSON");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
    throw new InvalidParameterError(`Invalid request body: ${issues.join("; ")}`);
  }
  return result.data;
}

// Store a response computed elsewhere
admin.post("/cache", async (c) => {
  try {
    const body = await parseBody(c, upsertCacheSchema);
    if (body.split !== null && body.config === null) {
      throw new InvalidParameterError("Invalid request body: split: a split entry needs a config");
    }
    upsertResponse({
      kind: body.kind,
      dataset: body.dataset,
      config: body.config,
      split: body.split,
      httpStatus: body.http_status,
      errorCode: body.error_code,
      content: body.content,
      datasetGitRevision: body.dataset_git_revision,
      progress: body.progress,
      jobRunnerVersion: body.job_runner_version,
    });
    return c.json({ kind: body.kind, dataset: body.dataset, config: body.config, split: body.split });
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Replace the rows of a split and index them
admin.post("/rows", async (c) => {
  try {
    const body = await parseBody(c, ingestSplitSchema);
    const index = ingestSplit(body);
    return c.json({
      dataset: body.dataset,
      config: body.config,
      split: body.split,
      num_rows: index.num_rows,
      has_fts: index.has_fts,
    });
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Forget everything about a dataset
admin.delete("/dataset", (c) => {
  try {
    const dataset = requireDataset((name) => c.req.query(name));
    const deletedResponses = deleteDatasetResponses(dataset);
    const deletedRows = deleteDatasetRows(dataset);
    return c.json({ dataset, deleted_responses: deletedResponses, deleted_rows: deletedRows });
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Applied and pending migrations
admin.get("/migrations", (c) => {
  try {
    return c.json(getMigrationStatus(getDatabase()));
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Cache entries of one kind, without their content
admin.get("/cache-reports", (c) => {
  try {
    const kind = requireParam((name) => c.req.query(name), "kind");
    const dataset = c.req.query("dataset") || undefined;
    const entries = listResponsesByKind(kind, dataset).map((entry) => ({
      kind: entry.kind,
      dataset: entry.dataset,
      config: entry.config,
      split: entry.split,
      http_status: entry.httpStatus,
      error_code: entry.errorCode,
      dataset_git_revision: entry.datasetGitRevision,
      progress: entry.progress,
      job_runner_version: entry.jobRunnerVersion,
      failed_runs: entry.failedRuns,
      updated_at: entry.updatedAt,
    }));
    return c.json({ cache_reports: entries });
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Recent log lines
admin.get("/logs", (c) => {
  try {
    const lines = clampInt(c.req.query("lines"), 100, 1, 1000);
    return c.json({ lines: getRecentLogs(lines) });
  } catch (error) {
    return respondWithError(c, error);
  }
});

export default admin;
