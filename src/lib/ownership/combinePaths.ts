/**
 * Folds effective percentages of paths that reach the same counterpart.
 *
 * One accumulator per discovery phase; each counterpart is written once with
 * the combined value, which keeps re-runs idempotent under every policy.
 */

import type { GraphNode } from "@/lib/graph/types";
import type { MergePolicy } from "./types";

export interface CombinedShare {
  counterpart: GraphNode;
  percentage: number;
  pathCount: number;
}

export function combineShares(current: number, next: number, policy: MergePolicy): number {
  switch (policy) {
    case "overwrite":
      return next;
    case "max":
      return Math.max(current, next);
    case "sum":
      return Math.min(100, current + next);
  }
}

export class PathShareAccumulator {
  private readonly entries = new Map<string, CombinedShare>();

  constructor(private readonly policy: MergePolicy) {}

  add(counterpart: GraphNode, percentage: number): void {
    const existing = this.entries.get(counterpart.id);
    if (!existing) {
      this.entries.set(counterpart.id, { counterpart, percentage, pathCount: 1 });
      return;
    }
    existing.percentage = combineShares(existing.percentage, percentage, this.policy);
    existing.pathCount += 1;
  }

  /** In order of first discovery. */
  results(): CombinedShare[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
