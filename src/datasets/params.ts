/**
 * Query parameter parsing shared by the dataset endpoints
 */

import { API_CONSTANTS } from "../config/constants.ts";
import { parseStrictInt } from "../utils/validation.ts";
import { InvalidParameterError, MissingRequiredParameterError } from "./errors.ts";

type QueryGetter = (name: string) => string | undefined;

export interface SplitParams {
  dataset: string;
  config: string;
  split: string;
}

export interface PageParams {
  offset: number;
  length: number;
}

function formatNames(names: readonly string[]): string {
  const quoted = names.map((name) => `'${name}'`);
  if (quoted.length === 1) return `Parameter ${quoted[0]} is`;
  return `Parameter ${quoted.slice(0, -1).join(", ")} and ${quoted[quoted.length - 1]} are`;
}

function readParam(query: QueryGetter, name: string): string | undefined {
  const value = query(name)?.trim();
  return value ? value : undefined;
}

/**
 * @example
 * requireParam(query, "where"); // throws "Parameter 'where' is required" when absent or blank
 */
export function requireParam(query: QueryGetter, name: string): string {
  const value = readParam(query, name);
  if (value === undefined) {
    throw new MissingRequiredParameterError(`${formatNames([name])} required`);
  }
  return value;
}

export function requireDataset(query: QueryGetter): string {
  return requireParam(query, "dataset");
}

/**
 * Throws "Parameter 'dataset', 'config' and 'split' are required" when any is missing
 */
export function requireSplitParams(query: QueryGetter): SplitParams {
  const dataset = readParam(query, "dataset");
  const config = readParam(query, "config");
  const split = readParam(query, "split");
  if (dataset === undefined || config === undefined || split === undefined) {
    throw new MissingRequiredParameterError(`${formatNames(["dataset", "config", "split"])} required`);
  }
  return { dataset, config, split };
}

function parseNonNegative(name: string, raw: string | undefined, defaultValue: number): number {
  if (raw === undefined || raw === "") return defaultValue;
  const value = parseStrictInt(raw.trim());
  if (value === null) {
    throw new InvalidParameterError(`Parameter '${name}' must be an integer`);
  }
  if (value < 0) {
    throw new InvalidParameterError(`Parameter '${name}' must be positive`);
  }
  return value;
}

/**
 * `offset` defaults to 0; `length` defaults to, and is capped at, the page size
 */
export function parsePageParams(query: QueryGetter): PageParams {
  const offset = parseNonNegative("offset", query("offset"), 0);
  const length = Math.min(
    parseNonNegative("length", query("length"), API_CONSTANTS.MAX_NUM_ROWS_PER_PAGE),
    API_CONSTANTS.MAX_NUM_ROWS_PER_PAGE
  );
  return { offset, length };
}
