// src/lib/ownership/effectivePercentage.ts

import type { OwnershipPath } from "@/lib/graph/types";
import type { MissingPercentagePolicy } from "./types";

/**
 * Multiplier one edge contributes to a chain. No rounding anywhere: callers
 * round for display.
 */
export function shareMultiplier(
  percentage: number | undefined,
  policy: MissingPercentagePolicy = "pass_through",
): number {
  if (percentage === undefined) return policy === "pass_through" ? 1 : 0;
  return percentage / 100;
}

/** 100 × Π(eᵢ / 100), in order. */
export function effectivePercentageOf(
  percentages: ReadonlyArray<number | undefined>,
  policy: MissingPercentagePolicy = "pass_through",
): number {
  let product = 1;
  for (const pct of percentages) {
    product *= shareMultiplier(pct, policy);
  }
  return 100 * product;
}

export function effectivePercentage(
  path: OwnershipPath,
  policy: MissingPercentagePolicy = "pass_through",
): number {
  return effectivePercentageOf(
    path.steps.map((step) => step.edge.percentage),
    policy,
  );
}
