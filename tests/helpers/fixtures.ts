/**
 * Test fixtures: a small dataset seeded into the cache and row stores
 */

import { CACHE_KINDS } from "../../src/config/constants.ts";
import { ingestSplit } from "../../src/datasets/ingest.ts";
import type { FeatureType, Row } from "../../src/datasets/types.ts";
import { upsertResponse } from "../../src/db/repository.ts";

export const DATASET = "user/movies";

export const MOVIE_FEATURES: { name: string; type: FeatureType }[] = [
  { name: "text", type: { _type: "Value", dtype: "string" } },
  { name: "label", type: { _type: "ClassLabel", names: ["neg", "pos"] } },
  { name: "score", type: { _type: "Value", dtype: "float64" } },
  { name: "year", type: { _type: "Value", dtype: "int32" } },
  { name: "liked", type: { _type: "Value", dtype: "bool" } },
];

export const MOVIE_ROWS: Row[] = [
  { text: "A quiet film about the sea", label: 1, score: 7.5, year: 1999, liked: true },
  { text: "Loud action movie", label: 0, score: 4.0, year: 2005, liked: false },
  { text: "The sea and the sky", label: 1, score: 8.25, year: 2010, liked: true },
  { text: "Documentary about whales", label: -1, score: null, year: 2010, liked: null },
  { text: null, label: 0, score: 5.0, year: 2021, liked: true },
];

export const PARQUET_FILE = {
  dataset: DATASET,
  config: "default",
  split: "train",
  url: "https://files.test/user/movies/default/train/0000.parquet",
  filename: "0000.parquet",
  size: 2048,
};

export const CONFIG_SIZE = {
  dataset: DATASET,
  config: "default",
  num_bytes_original_files: 4096,
  num_bytes_parquet_files: 2048,
  num_bytes_memory: 1000,
  num_rows: 5,
  num_columns: 5,
};

export const SPLIT_SIZE = {
  dataset: DATASET,
  config: "default",
  split: "train",
  num_bytes_parquet_files: 2048,
  num_bytes_memory: 1000,
  num_rows: 5,
  num_columns: 5,
};

export function seedConfigNames(dataset: string, configs: readonly string[]): void {
  upsertResponse({
    kind: CACHE_KINDS.DATASET_CONFIG_NAMES,
    dataset,
    httpStatus: 200,
    content: { config_names: configs.map((config) => ({ dataset, config })) },
  });
}

export function seedSplitNames(dataset: string, config: string, splits: readonly string[]): void {
  upsertResponse({
    kind: CACHE_KINDS.CONFIG_SPLIT_NAMES_FROM_INFO,
    dataset,
    config,
    httpStatus: 200,
    content: { splits: splits.map((split) => ({ dataset, config, split })) },
  });
}

/**
 * "user/movies": configs "default" (complete) and "extra" (nothing computed yet),
 * with the 5 rows of default/train ingested
 */
export function seedMovies(): void {
  seedConfigNames(DATASET, ["default", "extra"]);
  seedSplitNames(DATASET, "default", ["train", "test"]);
  upsertResponse({
    kind: CACHE_KINDS.CONFIG_PARQUET,
    dataset: DATASET,
    config: "default",
    httpStatus: 200,
    content: { parquet_files: [PARQUET_FILE], partial: false },
  });
  upsertResponse({
    kind: CACHE_KINDS.CONFIG_SIZE,
    dataset: DATASET,
    config: "default",
    httpStatus: 200,
    content: { size: { config: CONFIG_SIZE, splits: [SPLIT_SIZE] }, partial: false },
  });
  ingestSplit({
    dataset: DATASET,
    config: "default",
    split: "train",
    features: MOVIE_FEATURES,
    rows: MOVIE_ROWS,
    partial: false,
  });
}

/**
 * `count` rows with an integer id and a short text
 */
export function makeRows(count: number): Row[] {
  return Array.from({ length: count }, (_, i) => ({ id: i, text: `row ${i}` }));
}
