/**
 * Derived Edge Export
 *
 * Dumps INDIRECT_OWNER_OF / CONTROLS_INDIRECTLY edges as JSON rows, CSV or a
 * nodes + links network. Without --out the export goes to stdout.
 *
 * Usage:
 *   npx tsx scripts/exportDerivedEdges.ts --format csv --out output/derived.csv
 *   npx tsx scripts/exportDerivedEdges.ts --krs 0000100001 --format network
 */

import * as dotenv from "dotenv";
import { parseExportArgs } from "@/lib/cli/parseArgs";
import { serverEnv } from "@/lib/env/server";
import { listDerivedOwnership, renderExport, writeExport } from "@/lib/export/derivedOwnership";
import { openGraphStore } from "@/lib/graph/openGraphStore";
import { withGraphStore } from "@/lib/graph/withGraphStore";

dotenv.config({ path: ".env.local" });
dotenv.config();

function printHelp(): void {
  console.log(`
Derived Edge Export
===================
Usage:
  npx tsx scripts/exportDerivedEdges.ts [--krs ID] [--format json|csv|network] [--out PATH]

Options:
  --krs ID       Only edges touching this node
  --format F     json (default), csv or network
  --out PATH     Write to a file instead of stdout
  --help         Show this help text
`);
}

async function main(): Promise<number> {
  const parsed = parseExportArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`[export] ${parsed.error}`);
    printHelp();
    return 1;
  }
  const args = parsed.args;
  if (args.help) {
    printHelp();
    return 0;
  }

  const env = serverEnv();
  return withGraphStore(
    () => openGraphStore(env),
    async (store) => {
      const rows = await listDerivedOwnership(store, { seedId: args.seedId });
      const content = renderExport(rows, args.format);
      if (args.out) {
        await writeExport(args.out, content);
        console.error(`[export] wrote ${rows.length} edges to ${args.out}`);
      } else {
        process.stdout.write(content);
      }
      return 0;
    },
  );
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("[export] fatal:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
