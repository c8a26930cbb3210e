/**
 * Full-text search over the string columns of a split
 */

import type { SplitRow } from "../db/repository.ts";
import { FeatureNotSupportedError } from "./errors.ts";
import type { PageParams, SplitParams } from "./params.ts";
import { getIndexedRows, paginate } from "./rows.ts";
import {
  isSequenceFeature,
  isValueFeature,
  type FeatureItem,
  type FeatureType,
  type PaginatedRowsResponse,
} from "./types.ts";

const STRING_DTYPES = new Set(["string", "large_string"]);

function containsString(type: FeatureType): boolean {
  if (isValueFeature(type)) return STRING_DTYPES.has(type.dtype);
  if (isSequenceFeature(type)) return containsString(type.feature);
  return false;
}

/**
 * Columns holding strings, directly or inside a Sequence
 */
export function getSearchableColumns(features: readonly FeatureItem[]): string[] {
  return features.filter((feature) => containsString(feature.type)).map((feature) => feature.name);
}

function collectStrings(value: unknown, into: string[]): void {
  if (typeof value === "string") {
    into.push(value.toLowerCase());
  } else if (Array.isArray(value)) {
    for (const item of value) collectStrings(item, into);
  } else if (typeof value === "object" && value !== null) {
    for (const item of Object.values(value)) collectStrings(item, into);
  }
}

export function parseSearchTerms(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length > 0);
}

/**
 * True when every term occurs in at least one of the row's searchable values
 */
export function rowMatches(row: Record<string, unknown>, columns: readonly string[], terms: readonly string[]): boolean {
  const texts: string[] = [];
  for (const column of columns) {
    collectStrings(row[column], texts);
  }
  return terms.every((term) => texts.some((text) => text.includes(term)));
}

export function searchRows(params: SplitParams, query: string, page: PageParams): PaginatedRowsResponse {
  const { index, rows } = getIndexedRows(params);
  const columns = getSearchableColumns(index.features);
  if (!index.has_fts || columns.length === 0) {
    throw new FeatureNotSupportedError("The split does not have any string column to search in.");
  }

  const terms = parseSearchTerms(query);
  const matches: SplitRow[] = rows.filter(({ row }) => rowMatches(row, columns, terms));
  return paginate(index, matches, page);
}
