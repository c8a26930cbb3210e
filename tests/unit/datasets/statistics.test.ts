/**
 * Tests for descriptive statistics
 */

import { describe, test, expect } from "vitest";
import {
  computeBoolStatistics,
  computeClassLabelStatistics,
  computeHistogram,
  computeNumericalStatistics,
  computeSplitStatistics,
  computeStringStatistics,
  generateBins,
  getStatistics,
  roundTo,
} from "../../../src/datasets/statistics.ts";
import { NoSupportedFeaturesError } from "../../../src/datasets/errors.ts";
import { getResponse, upsertResponse } from "../../../src/db/repository.ts";
import { DATASET, MOVIE_ROWS, seedMovies } from "../../helpers/fixtures.ts";
import type { FeatureItem } from "../../../src/datasets/types.ts";

describe("roundTo", () => {
  test("should round to 5 decimals by default", () => {
    expect(roundTo(2.01427199421197)).toBe(2.01427);
    expect(roundTo(0.333333333)).toBe(0.33333);
    expect(roundTo(1.23456, 2)).toBe(1.23);
  });
});

describe("generateBins", () => {
  test("int bins have integer width and end with max", () => {
    expect(generateBins(0, 12, "int", 10)).toEqual([0, 2, 4, 6, 8, 10, 12, 12]);
    expect(generateBins(-10, 15, "int", 10)).toEqual([-10, -7, -4, -1, 2, 5, 8, 11, 14, 15]);
    expect(generateBins(0, 1, "int", 10)).toEqual([0, 1, 1]);
    expect(generateBins(0, 9, "int", 10)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 9]);
    expect(generateBins(0, 10, "int", 10)).toEqual([0, 2, 4, 6, 8, 10, 10]);
  });

  test("float bins split the range evenly", () => {
    expect(generateBins(0, 10, "float", 10)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(generateBins(-100, 100, "float", 10)).toEqual([-100, -80, -60, -40, -20, 0, 20, 40, 60, 80, 100]);
    expect(generateBins(4, 8.25, "float", 10).map((edge) => roundTo(edge))).toEqual([4, 4.425, 4.85, 5.275, 5.7, 6.125, 6.55, 6.975, 7.4, 7.825, 8.25]);
  });

  test("a single value gives one bin", () => {
    expect(generateBins(0, 0, "int", 10)).toEqual([0, 0]);
    expect(generateBins(2.5, 2.5, "float", 10)).toEqual([2.5, 2.5]);
  });
});

describe("computeHistogram", () => {
  test("should count values per half-open bin", () => {
    expect(computeHistogram([0, 1, 2, 3, 11], [0, 2, 4, 6, 8, 10, 12, 12])).toEqual({
      hist: [2, 2, 0, 0, 0, 1, 0],
      bin_edges: [0, 2, 4, 6, 8, 10, 12, 12],
    });
  });

  test("the last bin includes its upper edge", () => {
    expect(computeHistogram([0, 9, 10], [0, 5, 10]).hist).toEqual([1, 2]);
  });

  test("a single-value column fills one bin", () => {
    expect(computeHistogram([3, 3, 3], [3, 3])).toEqual({ hist: [3], bin_edges: [3, 3] });
  });

  test("values are counted against the unrounded edges", () => {
    // 0.333331 sits below 1/3 but above its rounded value 0.33333
    expect(computeHistogram([0, 0.333331, 1], generateBins(0, 1, "float", 3))).toEqual({
      hist: [2, 0, 1],
      bin_edges: [0, 0.33333, 0.66667, 1],
    });
  });
});

describe("computeNumericalStatistics", () => {
  test("int column", () => {
    expect(computeNumericalStatistics([1999, 2005, 2010, 2010, 2021], "int", 10)).toEqual({
      nan_count: 0,
      nan_proportion: 0,
      min: 1999,
      max: 2021,
      mean: 2009,
      median: 2010,
      std: 8.09321,
      histogram: {
        hist: [1, 0, 1, 2, 0, 0, 0, 1],
        bin_edges: [1999, 2002, 2005, 2008, 2011, 2014, 2017, 2020, 2021],
      },
    });
  });

  test("float column with missing values", () => {
    expect(computeNumericalStatistics([7.5, 4.0, 8.25, null, 5.0], "float", 10)).toEqual({
      nan_count: 1,
      nan_proportion: 0.2,
      min: 4,
      max: 8.25,
      mean: 6.1875,
      median: 6.25,
      std: 2.01427,
      histogram: {
        hist: [1, 0, 1, 0, 0, 0, 0, 0, 1, 1],
        bin_edges: [4, 4.425, 4.85, 5.275, 5.7, 6.125, 6.55, 6.975, 7.4, 7.825, 8.25],
      },
    });
  });

  test("a single value has no std", () => {
    const statistics = computeNumericalStatistics([42], "int", 10);

    expect(statistics.std).toBeNull();
    expect(statistics.histogram).toEqual({ hist: [1], bin_edges: [42, 42] });
  });

  test("only missing values", () => {
    expect(computeNumericalStatistics([null, null], "float", 10)).toEqual({
      nan_count: 2,
      nan_proportion: 1,
      min: null,
      max: null,
      mean: null,
      median: null,
      std: null,
      histogram: null,
    });
  });

  test("an empty column has a zero nan proportion", () => {
    expect(computeNumericalStatistics([], "int", 10).nan_proportion).toBe(0);
  });
});

describe("computeClassLabelStatistics", () => {
  test("counts labels, missing values and no-label values", () => {
    expect(computeClassLabelStatistics([1, 0, 1, -1, 0, null], ["neg", "pos"])).toEqual({
      nan_count: 1,
      nan_proportion: 0.16667,
      no_label_count: 1,
      no_label_proportion: 0.16667,
      n_unique: 2,
      frequencies: { neg: 2, pos: 2 },
    });
  });

  test("accepts labels stored as class names", () => {
    const statistics = computeClassLabelStatistics(["pos", "pos", "neutral", 0], ["neg", "pos"]);

    expect(statistics.frequencies).toEqual({ neg: 1, pos: 2 });
    expect(statistics.nan_count).toBe(1);
    expect(statistics.no_label_count).toBe(0);
  });

  test("out of range ids are counted as missing", () => {
    expect(computeClassLabelStatistics([5], ["neg", "pos"]).nan_count).toBe(1);
  });
});

describe("computeBoolStatistics", () => {
  test("counts True and False, most frequent first", () => {
    expect(computeBoolStatistics([false, true, true, null])).toEqual({
      nan_count: 1,
      nan_proportion: 0.25,
      frequencies: { True: 2, False: 1 },
    });
  });
});

describe("computeStringStatistics", () => {
  test("at most 30 distinct values is a label column", () => {
    const column = Array.from({ length: 30 }, (_, i) => `value-${i}`);
    const result = computeStringStatistics(column, 10);

    expect(result.columnType).toBe("string_label");
    expect(result.columnType === "string_label" && result.statistics.n_unique).toBe(30);
  });

  test("more than 30 distinct values is a text column over string lengths", () => {
    const column: (string | null)[] = Array.from({ length: 31 }, (_, i) => "x".repeat(i + 1));
    column.push(null);
    const result = computeStringStatistics(column, 10);

    expect(result.columnType).toBe("string_text");
    if (result.columnType !== "string_text") return;
    expect(result.statistics).toMatchObject({ nan_count: 1, min: 1, max: 31, mean: 16, median: 16 });
    expect(result.statistics.histogram?.bin_edges).toEqual([1, 5, 9, 13, 17, 21, 25, 29, 31]);
  });

  test("text lengths count code points", () => {
    const column = Array.from({ length: 31 }, (_, i) => "\u{1F600}".repeat(i + 1));
    const result = computeStringStatistics(column, 10);

    expect(result.columnType).toBe("string_text");
    if (result.columnType !== "string_text") return;
    expect(result.statistics).toMatchObject({ nan_count: 0, min: 1, max: 31, mean: 16, median: 16 });
    expect(result.statistics.histogram?.bin_edges).toEqual([1, 5, 9, 13, 17, 21, 25, 29, 31]);
  });

  test("label frequencies are sorted by count", () => {
    const result = computeStringStatistics(["b", "a", "b", "c", "a", "b"], 10);

    expect(result.statistics).toMatchObject({ n_unique: 3, frequencies: { b: 3, a: 2, c: 1 } });
    expect(Object.keys(result.columnType === "string_label" ? result.statistics.frequencies : {})).toEqual([
      "b",
      "a",
      "c",
    ]);
  });
});

describe("computeSplitStatistics", () => {
  const features: FeatureItem[] = [
    { feature_idx: 0, name: "text", type: { _type: "Value", dtype: "string" } },
    { feature_idx: 1, name: "label", type: { _type: "ClassLabel", names: ["neg", "pos"] } },
    { feature_idx: 2, name: "score", type: { _type: "Value", dtype: "float64" } },
    { feature_idx: 3, name: "year", type: { _type: "Value", dtype: "int32" } },
    { feature_idx: 4, name: "liked", type: { _type: "Value", dtype: "bool" } },
    { feature_idx: 5, name: "image", type: { _type: "Image" } },
  ];

  test("computes every supported column, sorted by name", () => {
    const result = computeSplitStatistics(features, MOVIE_ROWS, 10);

    expect(result.num_examples).toBe(5);
    expect(result.statistics.map((item) => [item.column_name, item.column_type])).toEqual([
      ["label", "class_label"],
      ["liked", "bool"],
      ["score", "float"],
      ["text", "string_label"],
      ["year", "int"],
    ]);
  });

  test("missing cells count as missing values", () => {
    const result = computeSplitStatistics(features, MOVIE_ROWS, 10);
    const text = result.statistics.find((item) => item.column_name === "text");

    expect(text?.column_statistics).toEqual({
      nan_count: 1,
      nan_proportion: 0.2,
      no_label_count: 0,
      no_label_proportion: 0,
      n_unique: 4,
      frequencies: {
        "A quiet film about the sea": 1,
        "Loud action movie": 1,
        "The sea and the sky": 1,
        "Documentary about whales": 1,
      },
    });
  });

  test("throws when no column is supported", () => {
    expect(() => computeSplitStatistics([features[5]], MOVIE_ROWS, 10)).toThrow(NoSupportedFeaturesError);
  });
});

describe("getStatistics", () => {
  const params = { dataset: DATASET, config: "default", split: "train" };

  test("computes from the row store and caches the result", () => {
    seedMovies();

    const response = getStatistics(params, 10);

    expect(response.num_examples).toBe(5);
    expect(response.partial).toBe(false);
    expect(response.statistics).toHaveLength(5);
    expect(getResponse("split-descriptive-statistics", DATASET, "default", "train").content).toEqual(response);
  });

  test("serves an existing cache entry as-is", () => {
    seedMovies();
    const cached = { num_examples: 2, statistics: [], partial: true };
    upsertResponse({
      kind: "split-descriptive-statistics",
      dataset: DATASET,
      config: "default",
      split: "train",
      httpStatus: 200,
      content: cached,
    });

    expect(getStatistics(params, 10)).toEqual(cached);
  });

  test("serves a cached error with its status", () => {
    upsertResponse({
      kind: "split-descriptive-statistics",
      dataset: DATASET,
      config: "default",
      split: "train",
      httpStatus: 501,
      errorCode: "NoSupportedFeaturesError",
      content: { error: "No columns for statistics computation found." },
    });

    expect(() => getStatistics(params, 10)).toThrow("No columns for statistics computation found.");
  });
});
