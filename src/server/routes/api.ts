/**
 * Public datasets API: validity, splits, rows, search, filter, parquet, size and statistics
 */

import { Hono, type Context } from "hono";
import { getCachedIsValid, getCachedParquet, getCachedSize, getCachedSplits } from "../../cache/repository.ts";
import { env } from "../../config/env.ts";
import { authCheck } from "../../datasets/auth.ts";
import { filterRows } from "../../datasets/filter.ts";
import { parsePageParams, requireDataset, requireParam, requireSplitParams } from "../../datasets/params.ts";
import { getFirstRows, getRowsPage } from "../../datasets/rows.ts";
import { searchRows } from "../../datasets/search.ts";
import { getStatistics } from "../../datasets/statistics.ts";
import { respondWithError, setCacheControl } from "./responses.ts";

const api = new Hono();

function query(c: Context): (name: string) => string | undefined {
  return (name) => c.req.query(name);
}

async function checkAccess(c: Context, dataset: string): Promise<void> {
  await authCheck(dataset, c.req.header("Authorization"));
}

// Which viewer features the dataset supports
api.get("/is-valid", async (c) => {
  try {
    const dataset = requireDataset(query(c));
    await checkAccess(c, dataset);
    const response = getCachedIsValid(dataset);
    setCacheControl(c, true);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Configs and splits of the dataset
api.get("/splits", async (c) => {
  try {
    const dataset = requireDataset(query(c));
    await checkAccess(c, dataset);
    const response = getCachedSplits(dataset);
    setCacheControl(c, response.pending.length === 0);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Preview: features and first rows of a split
api.get("/first-rows", async (c) => {
  try {
    const params = requireSplitParams(query(c));
    await checkAccess(c, params.dataset);
    const response = getFirstRows(params);
    setCacheControl(c, true);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// A page of rows
api.get("/rows", async (c) => {
  try {
    const params = requireSplitParams(query(c));
    const page = parsePageParams(query(c));
    await checkAccess(c, params.dataset);
    const response = getRowsPage(params, page);
    setCacheControl(c, true);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Rows containing every term of the query
api.get("/search", async (c) => {
  try {
    const params = requireSplitParams(query(c));
    const text = requireParam(query(c), "query");
    const page = parsePageParams(query(c));
    await checkAccess(c, params.dataset);
    const response = searchRows(params, text, page);
    setCacheControl(c, true);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Rows matching a where predicate
api.get("/filter", async (c) => {
  try {
    const params = requireSplitParams(query(c));
    const where = requireParam(query(c), "where");
    const page = parsePageParams(query(c));
    await checkAccess(c, params.dataset);
    const response = filterRows(params, where, page);
    setCacheControl(c, true);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Parquet files of every config
api.get("/parquet", async (c) => {
  try {
    const dataset = requireDataset(query(c));
    await checkAccess(c, dataset);
    const response = getCachedParquet(dataset);
    setCacheControl(c, response.pending.length === 0);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Size of the dataset, its configs and splits
api.get("/size", async (c) => {
  try {
    const dataset = requireDataset(query(c));
    await checkAccess(c, dataset);
    const response = getCachedSize(dataset);
    setCacheControl(c, response.pending.length === 0);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

// Descriptive statistics of every supported column
api.get("/statistics", async (c) => {
  try {
    const params = requireSplitParams(query(c));
    await checkAccess(c, params.dataset);
    const response = getStatistics(params, env.histogramNumBins);
    setCacheControl(c, true);
    return c.json(response);
  } catch (error) {
    return respondWithError(c, error);
  }
});

export default api;
