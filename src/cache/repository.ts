/**
 * Dataset-level aggregates served through the memory cache.
 * Writes to the cache store or the row store drop the dataset's entries (see db/repository.ts).
 */

import { datasetKey, memoryCache } from "./memory.ts";
import {
  computeIsValidResponse,
  computeParquetResponse,
  computeSizeResponse,
  computeSplitsResponse,
} from "../datasets/aggregate.ts";
import type { IsValidResponse, ParquetResponse, SizeResponse, SplitsResponse } from "../datasets/types.ts";

export function getCachedSplits(dataset: string): SplitsResponse {
  return memoryCache.getOrCompute(datasetKey(dataset, "splits"), () => computeSplitsResponse(dataset));
}

export function getCachedParquet(dataset: string): ParquetResponse {
  return memoryCache.getOrCompute(datasetKey(dataset, "parquet"), () => computeParquetResponse(dataset));
}

export function getCachedSize(dataset: string): SizeResponse {
  return memoryCache.getOrCompute(datasetKey(dataset, "size"), () => computeSizeResponse(dataset));
}

export function getCachedIsValid(dataset: string): IsValidResponse {
  return memoryCache.getOrCompute(datasetKey(dataset, "is-valid"), () => computeIsValidResponse(dataset));
}
