/**
 * Indirect Ownership Discovery: Orchestrator
 *
 * discoverIndirectRelationships(seedId, maxDepth):
 *   connectivity check → upstream phase → downstream phase → aggregate stats.
 *
 * Invariants:
 * - An unreachable store (GRAPH_STORE_UNAVAILABLE) aborts the run.
 * - Any other failure is contained to its phase: that phase reports
 *   { ok: false } with zero stats and the other phase still runs.
 * - Counts are "processed", not "newly created": re-running on an unchanged
 *   graph reports the same totals and leaves the same derived edges.
 * - The store is injected; opening and closing it is the caller's job.
 */

import pLimit from "p-limit";
import { describeError, isStoreUnavailable } from "@/lib/graph/errors";
import { pathStart, type GraphStore } from "@/lib/graph/types";
import { PathShareAccumulator } from "./combinePaths";
import { effectivePercentage } from "./effectivePercentage";
import { DerivedRelationshipMerger } from "./merger";
import { assertValidDepth, findPaths } from "./pathFinder";
import { createSyntheticTestData, type SyntheticDataOpts } from "./syntheticData";
import {
  DEFAULT_MAX_DEPTH,
  emptyPhaseStats,
  type DiscoveryStats,
  type Logger,
  type MergePolicy,
  type MissingPercentagePolicy,
  type PhaseResult,
  type PhaseStats,
  type SeedDiscoveryResult,
  type SyntheticDataStats,
  type TraversalDirection,
} from "./types";

export interface DiscoveryOptions {
  defaultMaxDepth?: number;
  mergePolicy?: MergePolicy;
  missingPercentage?: MissingPercentagePolicy;
  now?: () => Date;
  logger?: Logger;
}

export class IndirectOwnershipDiscovery {
  private readonly merger: DerivedRelationshipMerger;
  private readonly defaultMaxDepth: number;
  private readonly mergePolicy: MergePolicy;
  private readonly missingPercentage: MissingPercentagePolicy;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly store: GraphStore,
    opts: DiscoveryOptions = {},
  ) {
    this.defaultMaxDepth = opts.defaultMaxDepth ?? DEFAULT_MAX_DEPTH;
    this.mergePolicy = opts.mergePolicy ?? "overwrite";
    this.missingPercentage = opts.missingPercentage ?? "pass_through";
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? console;
    this.merger = new DerivedRelationshipMerger(store, { now: this.now });
    assertValidDepth(this.defaultMaxDepth);
  }

  async discoverIndirectRelationships(seedId: string, maxDepth = this.defaultMaxDepth): Promise<DiscoveryStats> {
    assertValidDepth(maxDepth);
    await this.store.verifyConnectivity();

    this.logger.log(`[ownership] discovering upstream ownership for ${seedId} (depth ${maxDepth})`);
    const upstream = await this.runPhase(seedId, "upstream", maxDepth);

    this.logger.log(`[ownership] discovering downstream ownership for ${seedId} (depth ${maxDepth})`);
    const downstream = await this.runPhase(seedId, "downstream", maxDepth);

    const upstreamRelationships = upstream.stats.relationshipsMerged;
    const downstreamRelationships = downstream.stats.relationshipsMerged;

    return {
      seedId,
      maxDepth,
      upstreamRelationships,
      downstreamRelationships,
      totalRelationships: upstreamRelationships + downstreamRelationships,
      companiesLinked: upstream.stats.companiesLinked + downstream.stats.companiesLinked,
      shareholdersLinked: upstream.stats.shareholdersLinked + downstream.stats.shareholdersLinked,
      phases: { upstream, downstream },
    };
  }

  /**
   * Several seeds with bounded concurrency. Each seed reports its own result;
   * one seed failing (even fatally) does not reject the batch.
   */
  async discoverMany(
    seedIds: string[],
    maxDepth = this.defaultMaxDepth,
    opts: { concurrency?: number } = {},
  ): Promise<SeedDiscoveryResult[]> {
    const limit = pLimit(Math.max(1, opts.concurrency ?? 2));
    return Promise.all(
      seedIds.map((seedId) =>
        limit(async (): Promise<SeedDiscoveryResult> => {
          try {
            const stats = await this.discoverIndirectRelationships(seedId, maxDepth);
            return { ok: true, seedId, stats };
          } catch (err) {
            this.logger.error(`[ownership] discovery for ${seedId} failed:`, describeError(err));
            return { ok: false, seedId, error: describeError(err) };
          }
        }),
      ),
    );
  }

  createSyntheticTestData(opts: Omit<SyntheticDataOpts, "logger" | "now"> = {}): Promise<SyntheticDataStats> {
    return createSyntheticTestData(this.store, { ...opts, logger: this.logger, now: this.now });
  }

  private async runPhase(
    seedId: string,
    direction: TraversalDirection,
    maxDepth: number,
  ): Promise<PhaseResult> {
    const stats: PhaseStats = emptyPhaseStats();
    try {
      const shares = new PathShareAccumulator(this.mergePolicy);
      for await (const path of findPaths(this.store, seedId, direction, { maxDepth }, this.logger)) {
        stats.pathsEvaluated += 1;
        const counterpart = direction === "upstream" ? pathStart(path) : path.end;
        shares.add(counterpart, effectivePercentage(path, this.missingPercentage));
      }

      for (const share of shares.results()) {
        const outcome =
          direction === "upstream"
            ? await this.merger.mergeUpstream(share.counterpart.id, seedId, share.percentage)
            : await this.merger.mergeDownstream(seedId, share.counterpart.id, share.percentage);

        switch (outcome.status) {
          case "merged":
            stats.relationshipsMerged += 1;
            stats.companiesLinked += outcome.companiesLinked;
            stats.shareholdersLinked += outcome.shareholdersLinked;
            break;
          case "suppressed":
            stats.relationshipsSuppressed += 1;
            break;
          case "missing_endpoint":
            this.logger.warn(
              `[ownership] ${direction} merge skipped: ${share.counterpart.id} or ${seedId} no longer exists`,
            );
            break;
        }
      }

      this.logger.log(
        `[ownership] ${direction} done for ${seedId}: ${stats.pathsEvaluated} paths, ` +
          `${stats.relationshipsMerged} merged, ${stats.relationshipsSuppressed} suppressed`,
      );
      return { ok: true, direction, stats };
    } catch (err) {
      if (isStoreUnavailable(err)) throw err;
      this.logger.error(`[ownership] ${direction} phase failed for ${seedId}:`, describeError(err));
      return { ok: false, direction, stats: emptyPhaseStats(), error: describeError(err) };
    }
  }
}
