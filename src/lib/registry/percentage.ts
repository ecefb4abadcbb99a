// src/lib/registry/percentage.ts

/**
 * Normalize a registry share value to a number in [0, 100].
 *
 * Accepts numbers and text such as "57.66%", "57,66 %", " 12 ".
 * Returns undefined when the value is missing, unparseable or out of range,
 * so the edge is stored without a percentage.
 */
export function normalizePercentage(value: unknown): number | undefined {
  let n: number;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string") {
    const cleaned = value.trim().replace(/%$/, "").trim().replace(",", ".");
    if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return undefined;
    n = Number(cleaned);
  } else {
    return undefined;
  }
  if (!Number.isFinite(n) || n < 0 || n > 100) return undefined;
  return n;
}
