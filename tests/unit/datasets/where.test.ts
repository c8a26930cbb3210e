/**
 * Tests for the where predicate parser and evaluator
 */

import { describe, test, expect } from "vitest";
import { evaluateWhere, parseWhere, referencedColumns, tokenize, WhereSyntaxError } from "../../../src/datasets/where.ts";

const ROW = { name: "Ada", age: 36, height: null, active: true, "first name": "Ada" };

function matches(where: string, row: Record<string, unknown> = ROW): boolean | null {
  return evaluateWhere(parseWhere(where), row);
}

describe("tokenize", () => {
  test("should split operators, literals and identifiers", () => {
    const kinds = tokenize("age >= 18 AND name <> 'O''Brien'").map((token) => token.kind);

    expect(kinds).toEqual(["identifier", "operator", "number", "keyword", "identifier", "operator", "string", "end"]);
  });

  test("should unescape doubled quotes", () => {
    const [token] = tokenize("'O''Brien'");

    expect(token).toEqual({ kind: "string", value: "O'Brien", position: 0 });
  });

  test("should read negative and decimal numbers", () => {
    const values = tokenize("-1.5 .25 3e2").flatMap((token) => (token.kind === "number" ? [token.value] : []));

    expect(values).toEqual([-1.5, 0.25, 300]);
  });

  test("should reject unterminated strings", () => {
    expect(() => tokenize("name = 'Ada")).toThrow("Unterminated string at position 7");
  });
});

describe("parseWhere", () => {
  test("should give AND precedence over OR", () => {
    expect(parseWhere("a = 1 OR b = 2 AND c = 3")).toEqual({
      type: "or",
      left: { type: "comparison", column: "a", operator: "=", value: 1 },
      right: {
        type: "and",
        left: { type: "comparison", column: "b", operator: "=", value: 2 },
        right: { type: "comparison", column: "c", operator: "=", value: 3 },
      },
    });
  });

  test("should accept case-insensitive keywords and IS NOT NULL", () => {
    expect(parseWhere("not height is not null")).toEqual({
      type: "not",
      operand: { type: "isNull", column: "height", negated: true },
    });
  });

  test("should map <> to !=", () => {
    expect(parseWhere("age <> 3")).toEqual({ type: "comparison", column: "age", operator: "!=", value: 3 });
  });

  test("should accept quoted identifiers", () => {
    expect(parseWhere('"first name" = \'Ada\'')).toEqual({
      type: "comparison",
      column: "first name",
      operator: "=",
      value: "Ada",
    });
  });

  test.each([
    ["an empty predicate", ""],
    ["a missing literal", "age >"],
    ["a missing operator", "age 3"],
    ["an unbalanced parenthesis", "(age = 3"],
    ["a trailing token", "age = 3 4"],
    ["a column compared to a column", "age = height"],
    ["an unknown character", "age = 3 # comment"],
    ["an empty quoted identifier", '"" = 1'],
  ])("should reject %s", (_, where) => {
    expect(() => parseWhere(where)).toThrow(WhereSyntaxError);
  });

  test("should reject statement separators", () => {
    expect(() => parseWhere("age = 3; DROP TABLE split_rows")).toThrow(
      "Statement separators are not allowed at position 7"
    );
  });
});

describe("referencedColumns", () => {
  test("should list each column once", () => {
    expect(referencedColumns(parseWhere("(age > 1 AND name = 'a') OR NOT age IS NULL"))).toEqual(["age", "name"]);
  });
});

describe("evaluateWhere", () => {
  test("should compare numbers, strings and booleans", () => {
    expect(matches("age = 36")).toBe(true);
    expect(matches("age < 36")).toBe(false);
    expect(matches("age >= 36.0")).toBe(true);
    expect(matches("name > 'A'")).toBe(true);
    expect(matches("name != 'Ada'")).toBe(false);
    expect(matches("active = TRUE")).toBe(true);
  });

  test("should be unknown when comparing with null or another type", () => {
    expect(matches("height = 1")).toBeNull();
    expect(matches("age = NULL")).toBeNull();
    expect(matches("age = '36'")).toBeNull();
    expect(matches("missing = 1")).toBeNull();
  });

  test("should test for null", () => {
    expect(matches("height IS NULL")).toBe(true);
    expect(matches("height IS NOT NULL")).toBe(false);
    expect(matches("missing IS NULL")).toBe(true);
  });

  test("should follow three-valued logic", () => {
    expect(matches("height = 1 AND age = 0")).toBe(false);
    expect(matches("height = 1 AND age = 36")).toBeNull();
    expect(matches("height = 1 OR age = 36")).toBe(true);
    expect(matches("height = 1 OR age = 0")).toBeNull();
    expect(matches("NOT height = 1")).toBeNull();
    expect(matches("NOT age = 0")).toBe(true);
  });
});
