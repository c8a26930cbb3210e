/**
 * Dataset-level responses assembled from config-level cache entries
 */

import { CACHE_KINDS, CONFIG_SPLIT_NAMES_KINDS } from "../config/constants.ts";
import { getBestResponse, hasAnyResponse, listResponsesByKind } from "../db/repository.ts";
import { getSuccessfulContent, parseContent } from "./cached.ts";
import { ResponseNotFoundError } from "./errors.ts";
import {
  configNamesContentSchema,
  configParquetContentSchema,
  configSizeContentSchema,
  rowsIndexContentSchema,
  splitNamesContentSchema,
  type ConfigSize,
  type DatasetSize,
  type IsValidResponse,
  type ParquetFile,
  type ParquetResponse,
  type PreviousJob,
  type SizeResponse,
  type SplitSize,
  type SplitsResponse,
} from "./types.ts";

/**
 * Config names of the dataset. Throws when the dataset-config-names entry is
 * missing (404) or an error (served as cached).
 */
export function getConfigNames(dataset: string): string[] {
  const content = getSuccessfulContent(configNamesContentSchema, [CACHE_KINDS.DATASET_CONFIG_NAMES], dataset);
  return content.config_names.map((item) => item.config);
}

export function computeSplitsResponse(dataset: string): SplitsResponse {
  const response: SplitsResponse = { splits: [], pending: [], failed: [] };

  for (const config of getConfigNames(dataset)) {
    const best = getBestResponse(CONFIG_SPLIT_NAMES_KINDS, dataset, config);
    if (!best) {
      response.pending.push({ dataset, config });
    } else if (best.httpStatus !== 200) {
      response.failed.push({ dataset, config, error: best.content });
    } else {
      const content = parseContent(splitNamesContentSchema, best.content);
      response.splits.push(...content.splits.map((item) => ({ dataset, config, split: item.split })));
    }
  }

  return response;
}

export function computeParquetResponse(dataset: string): ParquetResponse {
  const parquetFiles: ParquetFile[] = [];
  const pending: PreviousJob[] = [];
  const failed: PreviousJob[] = [];
  let partial = false;

  for (const config of getConfigNames(dataset)) {
    const job: PreviousJob = { kind: CACHE_KINDS.CONFIG_PARQUET, dataset, config, split: null };
    const best = getBestResponse([CACHE_KINDS.CONFIG_PARQUET], dataset, config);
    if (!best) {
      pending.push(job);
    } else if (best.httpStatus !== 200) {
      failed.push(job);
    } else {
      const content = parseContent(configParquetContentSchema, best.content);
      parquetFiles.push(...content.parquet_files);
      partial = partial || content.partial;
    }
  }

  return { parquet_files: parquetFiles, pending, failed, partial };
}

export function computeSizeResponse(dataset: string): SizeResponse {
  const configs: ConfigSize[] = [];
  const splits: SplitSize[] = [];
  const pending: PreviousJob[] = [];
  const failed: PreviousJob[] = [];
  let partial = false;

  for (const config of getConfigNames(dataset)) {
    const job: PreviousJob = { kind: CACHE_KINDS.CONFIG_SIZE, dataset, config, split: null };
    const best = getBestResponse([CACHE_KINDS.CONFIG_SIZE], dataset, config);
    if (!best) {
      pending.push(job);
    } else if (best.httpStatus !== 200) {
      failed.push(job);
    } else {
      const content = parseContent(configSizeContentSchema, best.content);
      configs.push(content.size.config);
      splits.push(...content.size.splits);
      partial = partial || content.partial;
    }
  }

  const datasetSize: DatasetSize = {
    dataset,
    num_bytes_original_files: configs.every((c) => c.num_bytes_original_files !== null)
      ? configs.reduce((total, c) => total + (c.num_bytes_original_files ?? 0), 0)
      : null,
    num_bytes_parquet_files: configs.reduce((total, c) => total + c.num_bytes_parquet_files, 0),
    num_bytes_memory: configs.reduce((total, c) => total + c.num_bytes_memory, 0),
    num_rows: configs.reduce((total, c) => total + c.num_rows, 0),
  };

  return { size: { dataset: datasetSize, configs, splits }, pending, failed, partial };
}

/**
 * Which viewer capabilities the dataset supports, from its split-level entries.
 * Malformed split-rows-index entries count as not indexed.
 */
export function computeIsValidResponse(dataset: string): IsValidResponse {
  if (!hasAnyResponse(dataset)) {
    throw new ResponseNotFoundError();
  }

  const firstRows = listResponsesByKind(CACHE_KINDS.SPLIT_FIRST_ROWS, dataset).filter((r) => r.httpStatus === 200);
  const indexes = listResponsesByKind(CACHE_KINDS.SPLIT_ROWS_INDEX, dataset)
    .filter((r) => r.httpStatus === 200)
    .flatMap((r) => {
      const parsed = rowsIndexContentSchema.safeParse(r.content);
      return parsed.success ? [parsed.data] : [];
    });

  const viewer = indexes.length > 0;
  return {
    preview: firstRows.length > 0 || viewer,
    viewer,
    search: indexes.some((index) => index.has_fts),
    filter: viewer,
  };
}
