/**
 * Content shapes of cached artifacts and API responses, with their zod schemas.
 * Cached content is written by other processes, so it is validated on read.
 */

import { z } from "zod";

// ============ Features ============

export interface ValueFeature {
  _type: "Value";
  dtype: string;
}

export interface ClassLabelFeature {
  _type: "ClassLabel";
  names: string[];
}

export interface SequenceFeature {
  _type: "Sequence";
  feature: FeatureType;
}

/** Image, Audio, Translation... stored as-is, not interpreted */
export interface OtherFeature {
  _type: string;
  [key: string]: unknown;
}

export type FeatureType = ValueFeature | ClassLabelFeature | SequenceFeature | OtherFeature;

const INTERPRETED_TYPES: readonly string[] = ["Value", "ClassLabel", "Sequence"];

export const featureTypeSchema: z.ZodType<FeatureType> = z.lazy(() =>
  z.union([
    z.object({ _type: z.literal("Value"), dtype: z.string() }),
    z.object({ _type: z.literal("ClassLabel"), names: z.array(z.string()) }),
    z.object({ _type: z.literal("Sequence"), feature: featureTypeSchema }),
    z
      .object({
        _type: z.string().refine((type) => !INTERPRETED_TYPES.includes(type), {
          message: "Value, ClassLabel and Sequence features must carry their own fields",
        }),
      })
      .passthrough(),
  ])
);

export function isValueFeature(feature: FeatureType): feature is ValueFeature {
  return feature._type === "Value";
}

export function isClassLabelFeature(feature: FeatureType): feature is ClassLabelFeature {
  return feature._type === "ClassLabel";
}

export function isSequenceFeature(feature: FeatureType): feature is SequenceFeature {
  return feature._type === "Sequence";
}

export const featureItemSchema = z.object({
  feature_idx: z.number().int().nonnegative(),
  name: z.string(),
  type: featureTypeSchema,
});
export type FeatureItem = z.infer<typeof featureItemSchema>;

// ============ Rows ============

export type Row = Record<string, unknown>;

export const rowSchema: z.ZodType<Row> = z.record(z.unknown());

export const rowItemSchema = z.object({
  row_idx: z.number().int().nonnegative(),
  row: rowSchema,
  truncated_cells: z.array(z.string()),
});
export type RowItem = z.infer<typeof rowItemSchema>;

export interface PaginatedRowsResponse {
  features: FeatureItem[];
  rows: RowItem[];
  num_rows_total: number;
  num_rows_per_page: number;
  partial: boolean;
}

// ============ Cached contents ============

export const configNamesContentSchema = z.object({
  config_names: z.array(z.object({ dataset: z.string(), config: z.string() })),
});

export const splitNamesContentSchema = z.object({
  splits: z.array(z.object({ dataset: z.string(), config: z.string(), split: z.string() })),
});

export const parquetFileSchema = z.object({
  dataset: z.string(),
  config: z.string(),
  split: z.string(),
  url: z.string(),
  filename: z.string(),
  size: z.number().int().nonnegative(),
});
export type ParquetFile = z.infer<typeof parquetFileSchema>;

export const configParquetContentSchema = z.object({
  parquet_files: z.array(parquetFileSchema),
  partial: z.boolean().default(false),
});

export const configSizeSchema = z.object({
  dataset: z.string(),
  config: z.string(),
  num_bytes_original_files: z.number().int().nullable(),
  num_bytes_parquet_files: z.number().int(),
  num_bytes_memory: z.number().int(),
  num_rows: z.number().int(),
  num_columns: z.number().int(),
});
export type ConfigSize = z.infer<typeof configSizeSchema>;

export const splitSizeSchema = z.object({
  dataset: z.string(),
  config: z.string(),
  split: z.string(),
  num_bytes_parquet_files: z.number().int(),
  num_bytes_memory: z.number().int(),
  num_rows: z.number().int(),
  num_columns: z.number().int(),
});
export type SplitSize = z.infer<typeof splitSizeSchema>;

export const configSizeContentSchema = z.object({
  size: z.object({
    config: configSizeSchema,
    splits: z.array(splitSizeSchema),
  }),
  partial: z.boolean().default(false),
});

export const firstRowsContentSchema = z.object({
  dataset: z.string(),
  config: z.string(),
  split: z.string(),
  features: z.array(featureItemSchema),
  rows: z.array(rowItemSchema),
  truncated: z.boolean().default(false),
});
export type FirstRowsResponse = z.infer<typeof firstRowsContentSchema>;

export const rowsIndexContentSchema = z.object({
  features: z.array(featureItemSchema),
  num_rows: z.number().int().nonnegative(),
  has_fts: z.boolean(),
  partial: z.boolean(),
});
export type RowsIndexContent = z.infer<typeof rowsIndexContentSchema>;

export const COLUMN_TYPES = ["class_label", "float", "int", "bool", "string_label", "string_text"] as const;
export type ColumnType = (typeof COLUMN_TYPES)[number];

export const statisticsContentSchema = z.object({
  num_examples: z.number().int().nonnegative(),
  statistics: z.array(
    z.object({
      column_name: z.string(),
      column_type: z.enum(COLUMN_TYPES),
      column_statistics: z.record(z.unknown()),
    })
  ),
  partial: z.boolean().default(false),
});

// ============ Aggregated responses ============

export interface FullConfigItem {
  dataset: string;
  config: string;
}

export interface FullSplitItem {
  dataset: string;
  config: string;
  split: string;
}

export interface FailedConfigItem extends FullConfigItem {
  error: unknown;
}

export interface PreviousJob {
  kind: string;
  dataset: string;
  config: string | null;
  split: string | null;
}

export interface SplitsResponse {
  splits: FullSplitItem[];
  pending: FullConfigItem[];
  failed: FailedConfigItem[];
}

export interface ParquetResponse {
  parquet_files: ParquetFile[];
  pending: PreviousJob[];
  failed: PreviousJob[];
  partial: boolean;
}

export interface DatasetSize {
  dataset: string;
  num_bytes_original_files: number | null;
  num_bytes_parquet_files: number;
  num_bytes_memory: number;
  num_rows: number;
}

export interface SizeResponse {
  size: {
    dataset: DatasetSize;
    configs: ConfigSize[];
    splits: SplitSize[];
  };
  pending: PreviousJob[];
  failed: PreviousJob[];
  partial: boolean;
}

export interface IsValidResponse {
  preview: boolean;
  viewer: boolean;
  search: boolean;
  filter: boolean;
}
