/**
 * Row filtering with a where predicate
 */

import { InvalidParameterError } from "./errors.ts";
import type { PageParams, SplitParams } from "./params.ts";
import { getIndexedRows, paginate } from "./rows.ts";
import type { PaginatedRowsResponse } from "./types.ts";
import { evaluateWhere, parseWhere, referencedColumns, WhereSyntaxError, type WhereExpression } from "./where.ts";

const INVALID_WHERE_MESSAGE = "Parameter 'where' is invalid";

function parseOrReject(where: string): WhereExpression {
  try {
    return parseWhere(where);
  } catch (error) {
    if (error instanceof WhereSyntaxError) {
      throw new InvalidParameterError(INVALID_WHERE_MESSAGE);
    }
    throw error;
  }
}

export function filterRows(params: SplitParams, where: string, page: PageParams): PaginatedRowsResponse {
  const expression = parseOrReject(where);
  const { index, rows } = getIndexedRows(params);

  const columnNames = new Set(index.features.map((feature) => feature.name));
  if (referencedColumns(expression).some((column) => !columnNames.has(column))) {
    throw new InvalidParameterError(INVALID_WHERE_MESSAGE);
  }

  const matches = rows.filter(({ row }) => evaluateWhere(expression, row) === true);
  return paginate(index, matches, page);
}
