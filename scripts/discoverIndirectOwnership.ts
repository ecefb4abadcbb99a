/**
 * Indirect Ownership Discovery
 *
 * Derives INDIRECT_OWNER_OF / CONTROLS_INDIRECTLY edges around one or more
 * seed companies and prints per-seed stats.
 *
 * Exit codes:
 *   0:  every seed completed (a failed phase is reported, not fatal)
 *   1:  setup error, or at least one seed failed
 *
 * Usage:
 *   npx tsx scripts/discoverIndirectOwnership.ts --krs 0000100001
 *   npx tsx scripts/discoverIndirectOwnership.ts --synthetic --memory
 *   npx tsx scripts/discoverIndirectOwnership.ts --krs A --krs B --depth 4 --policy max
 */

import * as dotenv from "dotenv";
import { parseDiscoverArgs } from "@/lib/cli/parseArgs";
import { serverEnv } from "@/lib/env/server";
import { openGraphStore } from "@/lib/graph/openGraphStore";
import { withGraphStore } from "@/lib/graph/withGraphStore";
import { IndirectOwnershipDiscovery } from "@/lib/ownership/discovery";
import { SYNTHETIC_IDS } from "@/lib/ownership/syntheticData";
import type { SeedDiscoveryResult } from "@/lib/ownership/types";

dotenv.config({ path: ".env.local" });
dotenv.config();

function printHelp(): void {
  console.log(`
Indirect Ownership Discovery
============================
Follows OWNS_SHARES_IN chains of length 2..depth around each seed and merges
derived edges with their effective percentage.

Usage:
  npx tsx scripts/discoverIndirectOwnership.ts [options]

Options:
  --krs ID             Seed company (repeatable)
  --depth N            Maximum path length, 1..10 (default: DISCOVERY_MAX_DEPTH or 3)
  --synthetic          Rebuild the synthetic fixture first; seeds default to its root company
  --policy P           overwrite | max | sum (default: DISCOVERY_MERGE_POLICY or overwrite)
  --missing P          pass_through | break_chain (default: DISCOVERY_MISSING_PERCENTAGE or pass_through)
  --concurrency N      Seeds processed in parallel (default: 2)
  --memory             Use an in-process store instead of Neo4j
  --help               Show this help text
`);
}

function printResult(result: SeedDiscoveryResult): void {
  if (!result.ok) {
    console.log(`  ✗ ${result.seedId}: ${result.error}`);
    return;
  }
  const { stats } = result;
  console.log(`  ✓ ${stats.seedId} (depth ${stats.maxDepth})`);
  console.log(`      upstream:   ${stats.upstreamRelationships}`);
  console.log(`      downstream: ${stats.downstreamRelationships}`);
  console.log(`      total:      ${stats.totalRelationships}`);
  console.log(`      companies linked:    ${stats.companiesLinked}`);
  console.log(`      shareholders linked: ${stats.shareholdersLinked}`);
  for (const phase of [stats.phases.upstream, stats.phases.downstream]) {
    if (!phase.ok) console.log(`      ⚠ ${phase.direction} phase failed: ${phase.error}`);
  }
}

async function main(): Promise<number> {
  const parsed = parseDiscoverArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`[discover] ${parsed.error}`);
    printHelp();
    return 1;
  }
  const args = parsed.args;
  if (args.help) {
    printHelp();
    return 0;
  }

  const env = serverEnv();
  const depth = args.depth ?? env.DISCOVERY_MAX_DEPTH;

  return withGraphStore(
    () => openGraphStore(env, { memory: args.memory }),
    async (store) => {
      const discovery = new IndirectOwnershipDiscovery(store, {
        defaultMaxDepth: env.DISCOVERY_MAX_DEPTH,
        mergePolicy: args.policy ?? env.DISCOVERY_MERGE_POLICY,
        missingPercentage: args.missing ?? env.DISCOVERY_MISSING_PERCENTAGE,
      });

      await store.verifyConnectivity();
      await store.ensureSchema();

      const seeds = [...args.seeds];
      if (args.synthetic) {
        await discovery.createSyntheticTestData({ externalLinkKrs: env.SYNTHETIC_LINK_KRS });
        if (seeds.length === 0) seeds.push(SYNTHETIC_IDS.C1);
      }

      const results = await discovery.discoverMany(seeds, depth, { concurrency: args.concurrency });
      console.log("\nDiscovery results:");
      results.forEach(printResult);
      return results.every((r) => r.ok) ? 0 : 1;
    },
  );
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("[discover] fatal:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
