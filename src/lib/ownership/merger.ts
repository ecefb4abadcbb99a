/**
 * Derived Relationship Merger
 *
 * Writes INDIRECT_OWNER_OF (owner → seed) and CONTROLS_INDIRECTLY
 * (seed → target) edges through the store's native upsert.
 *
 * Invariants:
 * - One derived edge per ordered pair and type; repeats update in place.
 * - provenance / created_at are written only on creation; percentage /
 *   updated_at on every merge.
 * - A downstream pair already joined by a primary OWNS_SHARES_IN edge is never
 *   given a derived edge.
 */

import { EDGE_PROPS } from "@/lib/graph/schema";
import type { DerivedRelationshipType, GraphNode, GraphStore } from "@/lib/graph/types";
import type { MergeOutcome } from "./types";

function linkCounts(counterpart: GraphNode): { companiesLinked: number; shareholdersLinked: number } {
  return {
    companiesLinked: counterpart.labels.includes("Company") ? 1 : 0,
    shareholdersLinked: counterpart.labels.includes("Shareholder") ? 1 : 0,
  };
}

export class DerivedRelationshipMerger {
  private readonly now: () => Date;

  constructor(
    private readonly store: GraphStore,
    opts: { now?: () => Date } = {},
  ) {
    this.now = opts.now ?? (() => new Date());
  }

  async mergeUpstream(ownerId: string, seedId: string, percentage: number): Promise<MergeOutcome> {
    const outcome = await this.upsertDerived("INDIRECT_OWNER_OF", ownerId, seedId, percentage);
    if (!outcome) return { status: "missing_endpoint", companiesLinked: 0, shareholdersLinked: 0 };
    return { status: "merged", edge: outcome.edge, ...linkCounts(outcome.source) };
  }

  async mergeDownstream(seedId: string, targetId: string, percentage: number): Promise<MergeOutcome> {
    if (await this.store.existsEdge(seedId, targetId, "OWNS_SHARES_IN")) {
      return {
        status: "suppressed",
        reason: "direct_edge_exists",
        companiesLinked: 0,
        shareholdersLinked: 0,
      };
    }
    const outcome = await this.upsertDerived("CONTROLS_INDIRECTLY", seedId, targetId, percentage);
    if (!outcome) return { status: "missing_endpoint", companiesLinked: 0, shareholdersLinked: 0 };
    return { status: "merged", edge: outcome.edge, ...linkCounts(outcome.target) };
  }

  private upsertDerived(
    type: DerivedRelationshipType,
    sourceId: string,
    targetId: string,
    percentage: number,
  ) {
    const stamp = this.now().toISOString();
    return this.store.upsertEdge({
      sourceId,
      targetId,
      type,
      onCreate: {
        [EDGE_PROPS.provenance]: "derived",
        [EDGE_PROPS.createdAt]: stamp,
        [EDGE_PROPS.isIndirect]: true,
      },
      onMatch: {
        [EDGE_PROPS.percentage]: percentage,
        [EDGE_PROPS.updatedAt]: stamp,
      },
    });
  }
}
