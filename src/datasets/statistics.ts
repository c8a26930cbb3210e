/**
 * Descriptive statistics of a split, computed per column from its rows
 */

import type { z } from "zod";
import { CACHE_KINDS, STATISTICS_CONSTANTS } from "../config/constants.ts";
import { createLogger } from "../core/logger.ts";
import { getBestResponse, upsertResponse } from "../db/repository.ts";
import { parseContent } from "./cached.ts";
import { CachedResponseError, NoSupportedFeaturesError } from "./errors.ts";
import type { SplitParams } from "./params.ts";
import { getIndexedRows } from "./rows.ts";
import {
  isClassLabelFeature,
  isValueFeature,
  statisticsContentSchema,
  type ColumnType,
  type FeatureItem,
  type Row,
} from "./types.ts";

const log = createLogger("statistics");

const INT_DTYPES = new Set(["int8", "int16", "int32", "int64", "uint8", "uint16", "uint32", "uint64"]);
const FLOAT_DTYPES = new Set(["float16", "float32", "float64"]);
const STRING_DTYPES = new Set(["string", "large_string"]);

export type NumericalColumnType = "int" | "float";

export type Histogram = {
  hist: number[];
  bin_edges: number[];
};

export type NumericalStatisticsItem = {
  nan_count: number;
  nan_proportion: number;
  min: number | null;
  max: number | null;
  mean: number | null;
  median: number | null;
  std: number | null;
  histogram: Histogram | null;
};

export type CategoricalStatisticsItem = {
  nan_count: number;
  nan_proportion: number;
  no_label_count: number;
  no_label_proportion: number;
  n_unique: number;
  frequencies: Record<string, number>;
};

export type BoolStatisticsItem = {
  nan_count: number;
  nan_proportion: number;
  frequencies: Record<string, number>;
};

export type StatisticsPerColumnItem = {
  column_name: string;
  column_type: ColumnType;
  column_statistics: NumericalStatisticsItem | CategoricalStatisticsItem | BoolStatisticsItem;
};

export type SplitStatistics = {
  num_examples: number;
  statistics: StatisticsPerColumnItem[];
};

export function roundTo(value: number, decimals: number = STATISTICS_CONSTANTS.DECIMALS): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function proportion(count: number, total: number): number {
  return count === 0 || total === 0 ? 0 : roundTo(count / total);
}

/**
 * Bin edges for a histogram over [min, max].
 * int: integer-width bins starting at min, `max` appended as the last edge.
 * float: `numBins` equal-width bins, unrounded. A single value gives [min, max].
 *
 * @example
 * generateBins(0, 12, "int", 10);  // [0, 2, 4, 6, 8, 10, 12, 12]
 * generateBins(0, 10, "float", 5); // [0, 2, 4, 6, 8, 10]
 */
export function generateBins(min: number, max: number, columnType: NumericalColumnType, numBins: number): number[] {
  if (min === max) {
    return [min, max];
  }

  const edges: number[] = [];
  if (columnType === "int") {
    const binSize = Math.ceil((max - min + 1) / numBins);
    for (let edge = min; edge <= max; edge += binSize) {
      edges.push(edge);
    }
  } else {
    const binSize = (max - min) / numBins;
    for (let i = 0; i < numBins; i++) {
      edges.push(min + i * binSize);
    }
  }
  edges.push(max);
  return edges;
}

/**
 * Counts values per bin. Bins are half-open except the last, which includes its upper edge.
 * Counting uses the edges as given; only the returned bin_edges are rounded.
 */
export function computeHistogram(values: readonly number[], binEdges: readonly number[]): Histogram {
  const lastBin = binEdges.length - 2;
  const hist = new Array<number>(lastBin + 1).fill(0);
  for (const value of values) {
    let bin = lastBin;
    while (bin > 0 && binEdges[bin] > value) {
      bin--;
    }
    hist[bin]++;
  }
  return { hist, bin_edges: binEdges.map((edge) => roundTo(edge)) };
}

function median(sorted: readonly number[]): number {
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

function sampleStd(values: readonly number[], mean: number): number | null {
  if (values.length < 2) return null;
  const squares = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function computeNumericalStatistics(
  column: readonly unknown[],
  columnType: NumericalColumnType,
  numBins: number
): NumericalStatisticsItem {
  const values = column.filter((value): value is number => typeof value === "number" && Number.isFinite(value));
  const nanCount = column.length - values.length;
  const nanProportion = proportion(nanCount, column.length);

  if (values.length === 0) {
    return {
      nan_count: nanCount,
      nan_proportion: nanProportion,
      min: null,
      max: null,
      mean: null,
      median: null,
      std: null,
      histogram: null,
    };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
  const std = sampleStd(values, mean);
  const histogram = computeHistogram(values, generateBins(min, max, columnType, numBins));

  return {
    nan_count: nanCount,
    nan_proportion: nanProportion,
    min: columnType === "float" ? roundTo(min) : min,
    max: columnType === "float" ? roundTo(max) : max,
    mean: roundTo(mean),
    median: roundTo(median(sorted)),
    std: std === null ? null : roundTo(std),
    histogram,
  };
}

/** Counts in decreasing order; ties keep first-seen order */
function countValues(values: readonly string[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  const sorted = [...counts.entries()].sort((a, b) => b[1] - a[1]);
  return Object.fromEntries(sorted);
}

export function computeClassLabelStatistics(column: readonly unknown[], names: readonly string[]): CategoricalStatisticsItem {
  let nanCount = 0;
  let noLabelCount = 0;
  const counts = new Array<number>(names.length).fill(0);

  for (const value of column) {
    // labels may be stored as class names
    const classId = typeof value === "string" && names.includes(value) ? names.indexOf(value) : value;
    if (typeof classId !== "number") {
      nanCount++;
    } else if (classId === STATISTICS_CONSTANTS.NO_LABEL_VALUE) {
      noLabelCount++;
    } else if (classId >= 0 && classId < names.length) {
      counts[classId]++;
    } else {
      nanCount++;
    }
  }

  return {
    nan_count: nanCount,
    nan_proportion: proportion(nanCount, column.length),
    no_label_count: noLabelCount,
    no_label_proportion: proportion(noLabelCount, column.length),
    n_unique: names.length,
    frequencies: Object.fromEntries(names.map((name, classId) => [name, counts[classId]])),
  };
}

export function computeBoolStatistics(column: readonly unknown[]): BoolStatisticsItem {
  const values = column.filter((value): value is boolean => typeof value === "boolean");
  const nanCount = column.length - values.length;
  return {
    nan_count: nanCount,
    nan_proportion: proportion(nanCount, column.length),
    frequencies: countValues(values.map((value) => (value ? "True" : "False"))),
  };
}

/**
 * string_label when there are at most MAX_NUM_STRING_LABELS distinct values,
 * string_text (statistics of the string lengths) otherwise
 */
export function computeStringStatistics(
  column: readonly unknown[],
  numBins: number
): { columnType: "string_label"; statistics: CategoricalStatisticsItem } | { columnType: "string_text"; statistics: NumericalStatisticsItem } {
  const values = column.filter((value): value is string => typeof value === "string");
  const nanCount = column.length - values.length;
  const frequencies = countValues(values);
  const nUnique = Object.keys(frequencies).length;

  if (nUnique <= STATISTICS_CONSTANTS.MAX_NUM_STRING_LABELS) {
    return {
      columnType: "string_label",
      statistics: {
        nan_count: nanCount,
        nan_proportion: proportion(nanCount, column.length),
        no_label_count: 0,
        no_label_proportion: 0,
        n_unique: nUnique,
        frequencies,
      },
    };
  }

  const lengths = column.map((value) => (typeof value === "string" ? [...value].length : null));
  return { columnType: "string_text", statistics: computeNumericalStatistics(lengths, "int", numBins) };
}

function computeColumnStatistics(
  feature: FeatureItem,
  column: readonly unknown[],
  numBins: number
): StatisticsPerColumnItem | null {
  const type = feature.type;
  const base = { column_name: feature.name };

  if (isClassLabelFeature(type)) {
    return { ...base, column_type: "class_label", column_statistics: computeClassLabelStatistics(column, type.names) };
  }
  if (!isValueFeature(type)) {
    return null;
  }
  if (INT_DTYPES.has(type.dtype)) {
    return { ...base, column_type: "int", column_statistics: computeNumericalStatistics(column, "int", numBins) };
  }
  if (FLOAT_DTYPES.has(type.dtype)) {
    return { ...base, column_type: "float", column_statistics: computeNumericalStatistics(column, "float", numBins) };
  }
  if (type.dtype === "bool") {
    return { ...base, column_type: "bool", column_statistics: computeBoolStatistics(column) };
  }
  if (STRING_DTYPES.has(type.dtype)) {
    const { columnType, statistics } = computeStringStatistics(column, numBins);
    return { ...base, column_type: columnType, column_statistics: statistics };
  }
  return null;
}

/**
 * Statistics of every supported column, sorted by column name.
 * Throws NoSupportedFeaturesError when no column is supported.
 */
export function computeSplitStatistics(features: readonly FeatureItem[], rows: readonly Row[], numBins: number): SplitStatistics {
  const statistics: StatisticsPerColumnItem[] = [];
  for (const feature of features) {
    const column = rows.map((row) => row[feature.name] ?? null);
    const item = computeColumnStatistics(feature, column, numBins);
    if (item) {
      statistics.push(item);
    }
  }

  if (statistics.length === 0) {
    throw new NoSupportedFeaturesError();
  }

  return {
    num_examples: rows.length,
    statistics: statistics.sort((a, b) => (a.column_name < b.column_name ? -1 : a.column_name > b.column_name ? 1 : 0)),
  };
}

export type StatisticsResponse = z.output<typeof statisticsContentSchema>;

/**
 * The cached split-descriptive-statistics entry. When the split is indexed but
 * has no entry yet, statistics are computed from the row store and cached.
 */
export function getStatistics(params: SplitParams, numBins: number): StatisticsResponse {
  const { dataset, config, split } = params;
  const cached = getBestResponse([CACHE_KINDS.SPLIT_DESCRIPTIVE_STATISTICS], dataset, config, split);
  if (cached) {
    if (cached.httpStatus !== 200) {
      throw new CachedResponseError(cached.httpStatus, cached.errorCode, cached.content);
    }
    return parseContent(statisticsContentSchema, cached.content);
  }

  const { index, rows } = getIndexedRows(params);
  const started = performance.now();
  const computed = computeSplitStatistics(
    index.features,
    rows.map(({ row }) => row),
    numBins
  );
  const response: StatisticsResponse = { ...computed, partial: index.partial };

  upsertResponse({
    kind: CACHE_KINDS.SPLIT_DESCRIPTIVE_STATISTICS,
    dataset,
    config,
    split,
    httpStatus: 200,
    content: response,
  });
  log.debug(`Computed statistics of ${dataset}/${config}/${split}`, {
    columns: computed.statistics.length,
    durationMs: Math.round(performance.now() - started),
  });

  return response;
}
