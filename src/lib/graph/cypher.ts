/**
 * Cypher builders for the Neo4j store.
 *
 * Variable-length bounds, labels and relationship types cannot be passed as
 * Cypher parameters, so they are validated here (zod) before being placed in
 * query text. Node ids and property maps always travel as parameters.
 */

import { z } from "zod";
import {
  NODE_LABELS,
  RELATIONSHIP_TYPES,
  type NodeLabel,
  type PathQuery,
  type RelationshipType,
} from "./types";

export const MAX_TRAVERSAL_DEPTH = 10;

const RelationshipTypeSchema = z.enum(RELATIONSHIP_TYPES);
const NodeLabelSchema = z.enum(NODE_LABELS);

const PathBoundsSchema = z
  .object({
    minLength: z.number().int().min(1).max(MAX_TRAVERSAL_DEPTH),
    maxLength: z.number().int().min(1).max(MAX_TRAVERSAL_DEPTH),
  })
  .refine((b) => b.minLength <= b.maxLength, {
    message: "minLength must not exceed maxLength",
  });

const PropertyKeySchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/);

export function relationshipTypeToken(type: RelationshipType): string {
  return RelationshipTypeSchema.parse(type);
}

export function labelToken(label: NodeLabel): string {
  return NodeLabelSchema.parse(label);
}

export function propertyKeyToken(key: string): string {
  return PropertyKeySchema.parse(key);
}

/** Matches a node of any model label by its `id`. */
export function anyNodeById(variable: string, param: string): string {
  const labels = NODE_LABELS.map((l) => `${variable}:${l}`).join(" OR ");
  return `(${variable}.id = $${param} AND (${labels}))`;
}

export interface CypherStatement {
  text: string;
  params: Record<string, unknown>;
}

/**
 * One traversal primitive for both directions. The anchor (fromId or toId)
 * decides which end of the pattern is bound.
 */
export function buildSimplePathQuery(query: PathQuery): CypherStatement {
  const bounds = PathBoundsSchema.parse({
    minLength: query.minLength,
    maxLength: query.maxLength,
  });
  const relType = relationshipTypeToken(query.edgeType);
  const pattern = `p = (head)-[:${relType}*${bounds.minLength}..${bounds.maxLength}]->(tail)`;

  const anchorClause =
    query.fromId !== undefined ? anyNodeById("head", "anchorId") : anyNodeById("tail", "anchorId");
  const anchorId = query.fromId !== undefined ? query.fromId : query.toId;

  const text = [
    `MATCH ${pattern}`,
    `WHERE ${anchorClause}`,
    // Relationship-unique matching still allows repeated nodes; keep simple paths only.
    "  AND ALL(i IN range(0, size(nodes(p)) - 2) WHERE NOT nodes(p)[i] IN nodes(p)[i + 1..])",
    "RETURN nodes(p) AS nodes, relationships(p) AS rels",
  ].join("\n");

  return { text, params: { anchorId } };
}

export function buildUpsertEdgeStatement(
  type: RelationshipType,
  params: {
    sourceId: string;
    targetId: string;
    onCreate: Record<string, unknown>;
    onMatch: Record<string, unknown>;
  },
): CypherStatement {
  const relType = relationshipTypeToken(type);
  const text = [
    `MATCH (a) WHERE ${anyNodeById("a", "sourceId")}`,
    `MATCH (b) WHERE ${anyNodeById("b", "targetId")}`,
    `MERGE (a)-[r:${relType}]->(b)`,
    "ON CREATE SET r += $onCreate, r += $onMatch",
    "ON MATCH SET r += $onMatch",
    "RETURN a, r, b",
  ].join("\n");
  return { text, params };
}

export function buildExistsEdgeStatement(
  type: RelationshipType,
  sourceId: string,
  targetId: string,
): CypherStatement {
  const relType = relationshipTypeToken(type);
  const text = [
    `MATCH (a)-[r:${relType}]->(b)`,
    `WHERE ${anyNodeById("a", "sourceId")} AND ${anyNodeById("b", "targetId")}`,
    "RETURN count(r) > 0 AS exists",
  ].join("\n");
  return { text, params: { sourceId, targetId } };
}

export function buildDeleteByTagStatement(tagField: string, tagValues: string[]): CypherStatement {
  const key = propertyKeyToken(tagField);
  const text = [
    `MATCH (n) WHERE n.${key} IN $tagValues`,
    "DETACH DELETE n",
    "RETURN count(*) AS deleted",
  ].join("\n");
  return { text, params: { tagValues } };
}

/**
 * Node ids are unique across model labels: an id that already exists under
 * another label gains this label instead of a second node being created.
 */
export function buildUpsertNodeStatement(
  label: NodeLabel,
  params: { id: string; properties: Record<string, unknown>; now: string },
): CypherStatement {
  const token = labelToken(label);
  const text = [
    `OPTIONAL MATCH (m) WHERE ${anyNodeById("m", "id")}`,
    "WITH m LIMIT 1",
    "CALL {",
    "  WITH m",
    "  WITH m WHERE m IS NULL",
    `  CREATE (n:${token} {id: $id})`,
    "  SET n += $properties, n.created_at = $now",
    "  RETURN n",
    "  UNION",
    "  WITH m",
    "  WITH m WHERE m IS NOT NULL",
    `  SET m:${token}, m += $properties, m.updated_at = $now`,
    "  RETURN m AS n",
    "}",
    "RETURN n",
  ].join("\n");
  return { text, params };
}

export function buildListEdgesStatement(filter: {
  types: RelationshipType[];
  nodeId?: string;
}): CypherStatement {
  const types = filter.types.map(relationshipTypeToken);
  const clauses = ["type(r) IN $types"];
  if (filter.nodeId !== undefined) clauses.push("(a.id = $nodeId OR b.id = $nodeId)");
  const text = [
    "MATCH (a)-[r]->(b)",
    `WHERE ${clauses.join(" AND ")}`,
    "RETURN a, r, b",
    "ORDER BY type(r), a.id, b.id",
  ].join("\n");
  return { text, params: { types, nodeId: filter.nodeId ?? null } };
}
