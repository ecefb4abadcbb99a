/**
 * Indirect Ownership Discovery: Shared Types
 *
 * Upstream discovery finds who ultimately owns a seed entity
 * (INDIRECT_OWNER_OF owner → seed); downstream discovery finds what a seed
 * ultimately controls (CONTROLS_INDIRECTLY seed → target).
 */

import type { GraphEdge } from "@/lib/graph/types";

// ---------------------------------------------------------------------------
// Traversal
// ---------------------------------------------------------------------------

export type TraversalDirection = "upstream" | "downstream";

/** Shortest indirect chain; single hops are primary edges already. */
export const MIN_INDIRECT_PATH_LENGTH = 2;
export const DEFAULT_MAX_DEPTH = 3;

export interface FindPathsOpts {
  minLength?: number;
  maxDepth?: number;
}

// ---------------------------------------------------------------------------
// Policies (see DESIGN.md)
// ---------------------------------------------------------------------------

/**
 * How an OWNS_SHARES_IN edge without a percentage contributes to a chain.
 *   pass_through: multiplier 1.0 (default)
 *   break_chain:  multiplier 0
 */
export type MissingPercentagePolicy = "pass_through" | "break_chain";

/**
 * How several paths reaching the same ordered pair are combined.
 *   overwrite: last enumerated path wins (default)
 *   max:       largest effective percentage
 *   sum:       sum of effective percentages, capped at 100
 */
export type MergePolicy = "overwrite" | "max" | "sum";

export const MISSING_PERCENTAGE_POLICIES = [
  "pass_through",
  "break_chain",
] as const satisfies readonly MissingPercentagePolicy[];
export const MERGE_POLICIES = ["overwrite", "max", "sum"] as const satisfies readonly MergePolicy[];

// ---------------------------------------------------------------------------
// Merge outcomes
// ---------------------------------------------------------------------------

export type MergeOutcome =
  | {
      status: "merged";
      edge: GraphEdge;
      companiesLinked: number;
      shareholdersLinked: number;
    }
  | {
      status: "suppressed";
      reason: "direct_edge_exists";
      companiesLinked: 0;
      shareholdersLinked: 0;
    }
  | {
      status: "missing_endpoint";
      companiesLinked: 0;
      shareholdersLinked: 0;
    };

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

export interface PhaseStats {
  pathsEvaluated: number;
  relationshipsMerged: number;
  relationshipsSuppressed: number;
  companiesLinked: number;
  shareholdersLinked: number;
}

export type PhaseResult =
  | { ok: true; direction: TraversalDirection; stats: PhaseStats }
  | { ok: false; direction: TraversalDirection; stats: PhaseStats; error: string };

export interface DiscoveryStats {
  seedId: string;
  maxDepth: number;
  upstreamRelationships: number;
  downstreamRelationships: number;
  totalRelationships: number;
  companiesLinked: number;
  shareholdersLinked: number;
  phases: {
    upstream: PhaseResult;
    downstream: PhaseResult;
  };
}

export type SeedDiscoveryResult =
  | { ok: true; seedId: string; stats: DiscoveryStats }
  | { ok: false; seedId: string; error: string };

export interface SyntheticDataStats {
  companiesCreated: number;
  shareholdersCreated: number;
  relationshipsCreated: number;
  /** True when the optional external entity was found and linked. */
  externalLinked: boolean;
}

export function emptyPhaseStats(): PhaseStats {
  return {
    pathsEvaluated: 0,
    relationshipsMerged: 0,
    relationshipsSuppressed: 0,
    companiesLinked: 0,
    shareholdersLinked: 0,
  };
}

export type Logger = Pick<Console, "log" | "warn" | "error">;
