/**
 * Registry → graph ingestion.
 *
 * Invariants:
 * - Company nodes are keyed by krs (`id === krs`).
 * - A shareholder that carries its own krs is written as a Company node, so
 *   ownership chains continue across ingested companies; every other
 *   shareholder becomes a Shareholder node keyed by its slugged name.
 * - OWNS_SHARES_IN edges are primary; percentage is already normalized by the
 *   registry schemas and omitted when absent.
 * - Re-ingesting an entity updates nodes and edges in place. An edge whose
 *   share or role is no longer known loses the stale value (null in onMatch).
 */

import { EDGE_PROPS } from "@/lib/graph/schema";
import type { GraphProperties, GraphStore } from "@/lib/graph/types";
import type { RegistryEntity, RegistryShareholder, RegistrySource } from "./types";

export interface IngestStats {
  companyId: string;
  personsUpserted: number;
  shareholdersUpserted: number;
  managesEdges: number;
  ownershipEdges: number;
  /** Ownership edges written without a percentage. */
  percentagesMissing: number;
}

export interface IngestOpts {
  now?: () => Date;
  logger?: Pick<Console, "log" | "warn">;
}

/** Lowercase ASCII slug: "Przykładowy Sp. z o.o." → "przykladowy_sp_z_o_o". */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/ł/g, "l")
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function personId(firstName: string, lastName: string): string {
  return `${slugify(firstName)}_${slugify(lastName)}`;
}

export function shareholderId(name: string): string {
  return `shareholder_${slugify(name)}`;
}

function compact(props: GraphProperties): GraphProperties {
  return Object.fromEntries(Object.entries(props).filter(([, v]) => v !== undefined));
}

function companyProperties(entity: RegistryEntity): GraphProperties {
  return compact({
    krs: entity.krs,
    name: entity.name,
    nip: entity.nip,
    regon: entity.regon,
    address: entity.address,
    status: entity.status,
    legal_form: entity.legalForm,
    registration_date: entity.registrationDate,
  });
}

async function upsertOwner(store: GraphStore, holder: RegistryShareholder): Promise<string> {
  if (holder.krs) {
    const node = await store.upsertNode({
      id: holder.krs,
      label: "Company",
      properties: { krs: holder.krs, name: holder.name },
    });
    return node.id;
  }
  const node = await store.upsertNode({
    id: shareholderId(holder.name),
    label: "Shareholder",
    properties: { name: holder.name, shareholder_type: holder.type },
  });
  return node.id;
}

export async function ingestRegistryEntity(
  store: GraphStore,
  source: RegistrySource,
  krs: string,
  opts: IngestOpts = {},
): Promise<IngestStats> {
  const now = opts.now ?? (() => new Date());
  const logger = opts.logger ?? console;

  const entity = await source.getEntityDetails(krs);
  const [representatives, shareholders] = await Promise.all([
    source.getEntityRepresentatives(krs),
    source.getEntityShareholders(krs),
  ]);

  const company = await store.upsertNode({
    id: entity.krs,
    label: "Company",
    properties: companyProperties(entity),
  });

  const stats: IngestStats = {
    companyId: company.id,
    personsUpserted: 0,
    shareholdersUpserted: 0,
    managesEdges: 0,
    ownershipEdges: 0,
    percentagesMissing: 0,
  };

  for (const rep of representatives) {
    const person = await store.upsertNode({
      id: personId(rep.firstName, rep.lastName),
      label: "Person",
      properties: {
        first_name: rep.firstName,
        last_name: rep.lastName,
        name: `${rep.firstName} ${rep.lastName}`,
      },
    });
    stats.personsUpserted += 1;

    const stamp = now().toISOString();
    const edge = await store.upsertEdge({
      sourceId: person.id,
      targetId: company.id,
      type: "MANAGES",
      onCreate: { [EDGE_PROPS.provenance]: "primary", [EDGE_PROPS.createdAt]: stamp },
      onMatch: { [EDGE_PROPS.role]: rep.role ?? null, [EDGE_PROPS.updatedAt]: stamp },
    });
    if (edge) stats.managesEdges += 1;
  }

  for (const holder of shareholders) {
    const ownerId = await upsertOwner(store, holder);
    stats.shareholdersUpserted += 1;

    const stamp = now().toISOString();
    const edge = await store.upsertEdge({
      sourceId: ownerId,
      targetId: company.id,
      type: "OWNS_SHARES_IN",
      onCreate: { [EDGE_PROPS.provenance]: "primary", [EDGE_PROPS.createdAt]: stamp },
      onMatch: { [EDGE_PROPS.percentage]: holder.percentage ?? null, [EDGE_PROPS.updatedAt]: stamp },
    });
    if (!edge) continue;
    stats.ownershipEdges += 1;
    if (holder.percentage === undefined) stats.percentagesMissing += 1;
  }

  logger.log(
    `[registry] ingested ${company.id}: ${stats.personsUpserted} representatives, ` +
      `${stats.shareholdersUpserted} shareholders`,
  );
  if (stats.percentagesMissing > 0) {
    logger.warn(`[registry] ${stats.percentagesMissing} ownership edges for ${company.id} have no percentage`);
  }
  return stats;
}
