/**
 * Derived ownership export.
 *
 * Reads INDIRECT_OWNER_OF / CONTROLS_INDIRECTLY edges and renders them as
 * JSON rows, CSV (RFC 4180) or a nodes + links network for graph viewers.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  DERIVED_RELATIONSHIP_TYPES,
  type DerivedRelationshipType,
  type GraphNode,
  type GraphStore,
  type Provenance,
} from "@/lib/graph/types";

export type ExportFormat = "json" | "csv" | "network";
export const EXPORT_FORMATS: readonly ExportFormat[] = ["json", "csv", "network"];

export interface DerivedOwnershipRow {
  source_id: string;
  source_name: string;
  target_id: string;
  target_name: string;
  type: DerivedRelationshipType;
  percentage: number | null;
  provenance: Provenance;
  updated_at: string | null;
}

export interface OwnershipNetwork {
  nodes: Array<{ id: string; name: string }>;
  links: Array<{
    source: string;
    target: string;
    type: DerivedRelationshipType;
    percentage: number | null;
    is_indirect: boolean;
  }>;
}

const CSV_COLUMNS = [
  "source_id",
  "source_name",
  "target_id",
  "target_name",
  "type",
  "percentage",
  "provenance",
  "updated_at",
] as const satisfies ReadonlyArray<keyof DerivedOwnershipRow>;

function displayName(node: GraphNode): string {
  const name = node.properties.name;
  return typeof name === "string" && name.length > 0 ? name : node.id;
}

function isDerivedType(type: string): type is DerivedRelationshipType {
  return (DERIVED_RELATIONSHIP_TYPES as readonly string[]).includes(type);
}

export async function listDerivedOwnership(
  store: GraphStore,
  opts: { seedId?: string } = {},
): Promise<DerivedOwnershipRow[]> {
  const records = await store.listEdges({ types: [...DERIVED_RELATIONSHIP_TYPES], nodeId: opts.seedId });
  const rows: DerivedOwnershipRow[] = [];
  for (const { edge, source, target } of records) {
    if (!isDerivedType(edge.type)) continue;
    rows.push({
      source_id: source.id,
      source_name: displayName(source),
      target_id: target.id,
      target_name: displayName(target),
      type: edge.type,
      percentage: edge.percentage ?? null,
      provenance: edge.provenance,
      updated_at: edge.updatedAt ?? null,
    });
  }
  return rows;
}

export function toJson(rows: DerivedOwnershipRow[]): string {
  return `${JSON.stringify(rows, null, 2)}\n`;
}

function csvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: DerivedOwnershipRow[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map((col) => csvField(row[col])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

export function toNetwork(rows: DerivedOwnershipRow[]): OwnershipNetwork {
  const nodes = new Map<string, { id: string; name: string }>();
  const addNode = (id: string, name: string) => {
    if (!nodes.has(id)) nodes.set(id, { id, name });
  };

  const links: OwnershipNetwork["links"] = rows.map((row) => {
    addNode(row.source_id, row.source_name);
    addNode(row.target_id, row.target_name);
    return {
      source: row.source_id,
      target: row.target_id,
      type: row.type,
      percentage: row.percentage,
      is_indirect: row.provenance === "derived",
    };
  });

  return { nodes: [...nodes.values()], links };
}

export function renderExport(rows: DerivedOwnershipRow[], format: ExportFormat): string {
  switch (format) {
    case "json":
      return toJson(rows);
    case "csv":
      return toCsv(rows);
    case "network":
      return `${JSON.stringify(toNetwork(rows), null, 2)}\n`;
  }
}

export async function writeExport(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf8");
}
