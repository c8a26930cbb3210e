/**
 * Paginated access to the rows of an indexed split
 */

import { API_CONSTANTS, CACHE_KINDS } from "../config/constants.ts";
import { getAllSplitRows, getBestResponse, getSplitRows, type SplitRow } from "../db/repository.ts";
import { getSuccessfulContent, parseContent } from "./cached.ts";
import { CachedResponseError } from "./errors.ts";
import type { PageParams, SplitParams } from "./params.ts";
import {
  firstRowsContentSchema,
  rowsIndexContentSchema,
  type FeatureItem,
  type FirstRowsResponse,
  type PaginatedRowsResponse,
  type RowItem,
  type RowsIndexContent,
} from "./types.ts";

export function getRowsIndex({ dataset, config, split }: SplitParams): RowsIndexContent {
  return getSuccessfulContent(rowsIndexContentSchema, [CACHE_KINDS.SPLIT_ROWS_INDEX], dataset, config, split);
}

/**
 * Projects stored rows onto the split's features, in feature order.
 * A column missing from a row is returned as null.
 */
export function toRowItems(rows: readonly SplitRow[], features: readonly FeatureItem[]): RowItem[] {
  return rows.map(({ rowIdx, row }) => ({
    row_idx: rowIdx,
    row: Object.fromEntries(features.map((feature) => [feature.name, row[feature.name] ?? null])),
    truncated_cells: [],
  }));
}

/**
 * Builds a page out of the rows matching a query; row_idx keeps the position in the split
 */
export function paginate(
  index: RowsIndexContent,
  matches: readonly SplitRow[],
  { offset, length }: PageParams
): PaginatedRowsResponse {
  return {
    features: index.features,
    rows: toRowItems(matches.slice(offset, offset + length), index.features),
    num_rows_total: matches.length,
    num_rows_per_page: API_CONSTANTS.MAX_NUM_ROWS_PER_PAGE,
    partial: index.partial,
  };
}

export function getRowsPage(params: SplitParams, { offset, length }: PageParams): PaginatedRowsResponse {
  const index = getRowsIndex(params);
  const rows = getSplitRows(params.dataset, params.config, params.split, offset, length);
  return {
    features: index.features,
    rows: toRowItems(rows, index.features),
    num_rows_total: index.num_rows,
    num_rows_per_page: API_CONSTANTS.MAX_NUM_ROWS_PER_PAGE,
    partial: index.partial,
  };
}

/**
 * All rows of the split, with the index that describes them
 */
export function getIndexedRows(params: SplitParams): { index: RowsIndexContent; rows: SplitRow[] } {
  const index = getRowsIndex(params);
  return { index, rows: getAllSplitRows(params.dataset, params.config, params.split) };
}

/**
 * The cached split-first-rows entry, or the first rows of the row store when
 * the split is indexed but has no such entry.
 */
export function getFirstRows(params: SplitParams): FirstRowsResponse {
  const { dataset, config, split } = params;
  const cached = getBestResponse([CACHE_KINDS.SPLIT_FIRST_ROWS], dataset, config, split);
  if (cached) {
    if (cached.httpStatus !== 200) {
      throw new CachedResponseError(cached.httpStatus, cached.errorCode, cached.content);
    }
    return parseContent(firstRowsContentSchema, cached.content);
  }

  const index = getRowsIndex(params);
  const rows = getSplitRows(dataset, config, split, 0, API_CONSTANTS.FIRST_ROWS_MAX_NUMBER);
  return {
    dataset,
    config,
    split,
    features: index.features,
    rows: toRowItems(rows, index.features),
    truncated: index.num_rows > API_CONSTANTS.FIRST_ROWS_MAX_NUMBER,
  };
}
