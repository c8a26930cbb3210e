/**
 * Parsing helpers for query parameters and untyped JSON
 */

/**
 * Strictly parses a base-10 integer: optional sign, digits only.
 * Returns null for anything else ("1.5", "10abc", "", " 3").
 *
 * @example
 * parseStrictInt("-4"); // -4
 * parseStrictInt("4e2"); // null
 */
export function parseStrictInt(value: string): number | null {
  if (!/^[+-]?\d+$/.test(value)) return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

/**
 * Integer query parameter kept within [min, max]; the default when absent or not an integer
 *
 * @example
 * clampInt("150", 10, 1, 100); // 100
 * clampInt("abc", 10, 1, 100); // 10
 */
export function clampInt(value: string | undefined, defaultValue: number, min: number, max: number): number {
  const parsed = value === undefined ? null : parseStrictInt(value.trim());
  return parsed === null ? defaultValue : Math.min(Math.max(parsed, min), max);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
