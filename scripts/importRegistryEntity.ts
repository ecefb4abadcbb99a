/**
 * Registry Import
 *
 * Fetches a company, its representatives and its shareholders from the KRS
 * registry and writes them into the graph as primary edges.
 *
 * Usage:
 *   npx tsx scripts/importRegistryEntity.ts --krs 0000100001
 *   npx tsx scripts/importRegistryEntity.ts --krs 0000100001 --mock
 */

import * as dotenv from "dotenv";
import { parseImportArgs } from "@/lib/cli/parseArgs";
import { serverEnv } from "@/lib/env/server";
import { describeError } from "@/lib/graph/errors";
import { openGraphStore } from "@/lib/graph/openGraphStore";
import { withGraphStore } from "@/lib/graph/withGraphStore";
import { createKrsClient } from "@/lib/registry/krsClient";
import { createMockRegistrySource } from "@/lib/registry/mockSource";
import { ingestRegistryEntity } from "@/lib/registry/ingest";

dotenv.config({ path: ".env.local" });
dotenv.config();

function printHelp(): void {
  console.log(`
Registry Import
===============
Usage:
  npx tsx scripts/importRegistryEntity.ts --krs ID [--krs ID ...] [--mock]

Options:
  --krs ID   Company to import (repeatable)
  --mock     Serve bundled registry responses instead of calling the API
  --help     Show this help text
`);
}

async function main(): Promise<number> {
  const parsed = parseImportArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`[import] ${parsed.error}`);
    printHelp();
    return 1;
  }
  if (parsed.args.help) {
    printHelp();
    return 0;
  }
  const { krs, mock } = parsed.args;

  const env = serverEnv();
  const source = mock
    ? createMockRegistrySource()
    : createKrsClient({ baseUrl: env.KRS_API_BASE_URL, rateLimitPerSecond: env.KRS_RATE_LIMIT });

  return withGraphStore(
    () => openGraphStore(env),
    async (store) => {
      await store.verifyConnectivity();
      await store.ensureSchema();

      let failed = 0;
      for (const id of krs) {
        try {
          const stats = await ingestRegistryEntity(store, source, id);
          console.log(
            `  ✓ ${stats.companyId}: ${stats.managesEdges} MANAGES, ${stats.ownershipEdges} OWNS_SHARES_IN`,
          );
        } catch (err) {
          failed += 1;
          console.error(`  ✗ ${id}: ${describeError(err)}`);
        }
      }
      return failed === 0 ? 0 : 1;
    },
  );
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("[import] fatal:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
