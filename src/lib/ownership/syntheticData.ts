/**
 * Synthetic ownership fixture.
 *
 *   S3 (individual) ─80%→ S2 ─60%→ S1 ─75%→ C1
 *   C1 ─51%→ C2 ─70%→ C3
 *   C1 ─30%→ C4 ─25%→ C5
 *
 * Re-runnable: nodes with reserved ids are removed (with their edges) first.
 * Optionally links C1 ─15%→ an existing entity given by registry id; that
 * step is best effort and never fails the run.
 */

import { describeError } from "@/lib/graph/errors";
import { EDGE_PROPS } from "@/lib/graph/schema";
import type { GraphStore, ShareholderType } from "@/lib/graph/types";
import type { Logger, SyntheticDataStats } from "./types";

export const SYNTHETIC_COMPANIES = [
  { key: "C1", id: "TEST001", name: "Test Holding C1" },
  { key: "C2", id: "TEST002", name: "Test Subsidiary C2" },
  { key: "C3", id: "TEST003", name: "Test Subsidiary C3" },
  { key: "C4", id: "TEST004", name: "Test Affiliate C4" },
  { key: "C5", id: "TEST005", name: "Test Affiliate C5" },
] as const;

export const SYNTHETIC_SHAREHOLDERS: ReadonlyArray<{
  key: string;
  id: string;
  name: string;
  type: ShareholderType;
}> = [
  { key: "S1", id: "TEST_S1", name: "Test Investor S1", type: "company" },
  { key: "S2", id: "TEST_S2", name: "Test Investor S2", type: "company" },
  { key: "S3", id: "TEST_S3", name: "Test Person S3", type: "individual" },
];

export const SYNTHETIC_IDS: Record<string, string> = Object.fromEntries(
  [...SYNTHETIC_COMPANIES, ...SYNTHETIC_SHAREHOLDERS].map((e) => [e.key, e.id]),
);

export const SYNTHETIC_TAG_FIELD = "id";
export const SYNTHETIC_TAG_VALUES: string[] = Object.values(SYNTHETIC_IDS);

/** [from, to, percentage] by fixture key. */
export const SYNTHETIC_OWNERSHIP: ReadonlyArray<readonly [string, string, number]> = [
  ["S3", "S2", 80],
  ["S2", "S1", 60],
  ["S1", "C1", 75],
  ["C1", "C2", 51],
  ["C2", "C3", 70],
  ["C1", "C4", 30],
  ["C4", "C5", 25],
];

export const EXTERNAL_LINK_PERCENTAGE = 15;

export interface SyntheticDataOpts {
  /** Registry id (krs) of an existing company to link C1 to, if present. */
  externalLinkKrs?: string;
  logger?: Logger;
  now?: () => Date;
}

function fixtureId(key: string): string {
  const id = SYNTHETIC_IDS[key];
  if (!id) throw new Error(`unknown synthetic fixture key ${key}`);
  return id;
}

export async function createSyntheticTestData(
  store: GraphStore,
  opts: SyntheticDataOpts = {},
): Promise<SyntheticDataStats> {
  const logger = opts.logger ?? console;
  const now = opts.now ?? (() => new Date());
  const stats: SyntheticDataStats = {
    companiesCreated: 0,
    shareholdersCreated: 0,
    relationshipsCreated: 0,
    externalLinked: false,
  };

  try {
    const removed = await store.deleteNodesByTag(SYNTHETIC_TAG_FIELD, SYNTHETIC_TAG_VALUES);
    if (removed > 0) logger.log(`[ownership] removed ${removed} previous synthetic nodes`);
  } catch (err) {
    logger.warn("[ownership] synthetic cleanup failed, continuing:", describeError(err));
  }

  for (const company of SYNTHETIC_COMPANIES) {
    await store.upsertNode({
      id: company.id,
      label: "Company",
      properties: { krs: company.id, name: company.name, status: "active", synthetic: true },
    });
    stats.companiesCreated += 1;
  }

  for (const holder of SYNTHETIC_SHAREHOLDERS) {
    await store.upsertNode({
      id: holder.id,
      label: "Shareholder",
      properties: { name: holder.name, shareholder_type: holder.type, synthetic: true },
    });
    stats.shareholdersCreated += 1;
  }

  for (const [from, to, percentage] of SYNTHETIC_OWNERSHIP) {
    const stamp = now().toISOString();
    const record = await store.upsertEdge({
      sourceId: fixtureId(from),
      targetId: fixtureId(to),
      type: "OWNS_SHARES_IN",
      onCreate: { [EDGE_PROPS.provenance]: "primary", [EDGE_PROPS.createdAt]: stamp },
      onMatch: { [EDGE_PROPS.percentage]: percentage, [EDGE_PROPS.updatedAt]: stamp },
    });
    if (record) stats.relationshipsCreated += 1;
  }

  if (opts.externalLinkKrs) {
    stats.externalLinked = await linkExternalEntity(store, opts.externalLinkKrs, now).catch(() => false);
    if (stats.externalLinked) stats.relationshipsCreated += 1;
  }

  logger.log(
    `[ownership] synthetic fixture ready: ${stats.companiesCreated} companies, ` +
      `${stats.shareholdersCreated} shareholders, ${stats.relationshipsCreated} relationships`,
  );
  return stats;
}

async function linkExternalEntity(store: GraphStore, krs: string, now: () => Date): Promise<boolean> {
  const target = await store.getNode(krs);
  if (!target || !target.labels.includes("Company")) return false;
  const stamp = now().toISOString();
  const record = await store.upsertEdge({
    sourceId: fixtureId("C1"),
    targetId: target.id,
    type: "OWNS_SHARES_IN",
    onCreate: { [EDGE_PROPS.provenance]: "primary", [EDGE_PROPS.createdAt]: stamp },
    onMatch: { [EDGE_PROPS.percentage]: EXTERNAL_LINK_PERCENTAGE, [EDGE_PROPS.updatedAt]: stamp },
  });
  return record !== null;
}
