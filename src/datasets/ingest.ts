/**
 * Loading a split's rows into the row store, as the indexing worker would
 */

import { z } from "zod";
import { CACHE_KINDS } from "../config/constants.ts";
import { createLogger } from "../core/logger.ts";
import { getDatabase } from "../db/migrations.ts";
import { deleteResponse, replaceSplitRows, upsertResponse } from "../db/repository.ts";
import { getSearchableColumns } from "./search.ts";
import { featureTypeSchema, rowSchema, type FeatureItem, type RowsIndexContent } from "./types.ts";

const log = createLogger("ingest");

export const ingestSplitSchema = z.object({
  dataset: z.string().min(1),
  config: z.string().min(1),
  split: z.string().min(1),
  features: z
    .array(z.object({ name: z.string().min(1), type: featureTypeSchema }))
    .min(1)
    .refine((features) => new Set(features.map((f) => f.name)).size === features.length, {
      message: "Feature names must be unique",
    }),
  rows: z.array(rowSchema),
  partial: z.boolean().default(false),
});

export type IngestSplitInput = z.infer<typeof ingestSplitSchema>;

/**
 * Replaces the split's rows and writes its split-rows-index entry in one transaction.
 * Statistics cached for the previous rows are dropped.
 */
export function ingestSplit(input: IngestSplitInput): RowsIndexContent {
  const { dataset, config, split } = input;
  const features: FeatureItem[] = input.features.map((feature, featureIdx) => ({
    feature_idx: featureIdx,
    name: feature.name,
    type: feature.type,
  }));

  const index = getDatabase().transaction((): RowsIndexContent => {
    replaceSplitRows(dataset, config, split, input.rows);

    const content: RowsIndexContent = {
      features,
      num_rows: input.rows.length,
      has_fts: getSearchableColumns(features).length > 0,
      partial: input.partial,
    };
    upsertResponse({
      kind: CACHE_KINDS.SPLIT_ROWS_INDEX,
      dataset,
      config,
      split,
      httpStatus: 200,
      content,
    });
    deleteResponse(CACHE_KINDS.SPLIT_DESCRIPTIVE_STATISTICS, dataset, config, split);
    return content;
  })();

  log.info(`Ingested ${input.rows.length} rows into ${dataset}/${config}/${split}`, {
    features: features.length,
    hasFts: index.has_fts,
  });
  return index;
}
