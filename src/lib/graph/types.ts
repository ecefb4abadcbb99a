/**
 * Ownership Graph: Shared Types
 *
 * Property-graph model for registry data: Company / Person / Shareholder nodes,
 * primary edges (OWNS_SHARES_IN, MANAGES) ingested from the registry and
 * derived edges (INDIRECT_OWNER_OF, CONTROLS_INDIRECTLY) written by discovery.
 *
 * Invariants:
 * - Every node has a string `id`; for Company nodes `id === krs`.
 * - Only OWNS_SHARES_IN carries traversal weight.
 * - At most one edge per (sourceId, targetId, type).
 */

// ---------------------------------------------------------------------------
// Labels & relationship types
// ---------------------------------------------------------------------------

export const NODE_LABELS = ["Company", "Person", "Shareholder"] as const;
export type NodeLabel = (typeof NODE_LABELS)[number];

export const RELATIONSHIP_TYPES = [
  "OWNS_SHARES_IN",
  "MANAGES",
  "INDIRECT_OWNER_OF",
  "CONTROLS_INDIRECTLY",
] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export const DERIVED_RELATIONSHIP_TYPES = [
  "INDIRECT_OWNER_OF",
  "CONTROLS_INDIRECTLY",
] as const satisfies readonly RelationshipType[];
export type DerivedRelationshipType = (typeof DERIVED_RELATIONSHIP_TYPES)[number];

export type Provenance = "primary" | "derived";

export type ShareholderType = "individual" | "company" | "organization";

export function isNodeLabel(value: unknown): value is NodeLabel {
  return typeof value === "string" && (NODE_LABELS as readonly string[]).includes(value);
}

export function isRelationshipType(value: unknown): value is RelationshipType {
  return (
    typeof value === "string" &&
    (RELATIONSHIP_TYPES as readonly string[]).includes(value)
  );
}

// ---------------------------------------------------------------------------
// Nodes & edges
// ---------------------------------------------------------------------------

export type GraphProperties = Record<string, unknown>;

export interface GraphNode {
  id: string;
  labels: NodeLabel[];
  properties: GraphProperties;
}

export interface GraphEdge {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  /** Already-normalized share in [0, 100]; absent when the registry gave none. */
  percentage?: number;
  provenance: Provenance;
  createdAt?: string;
  updatedAt?: string;
  properties: GraphProperties;
}

/** An edge together with both endpoints, as returned by upserts and listings. */
export interface EdgeRecord {
  edge: GraphEdge;
  source: GraphNode;
  target: GraphNode;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export interface PathStep {
  node: GraphNode;
  /** Outgoing edge from `node` to the next node on the path. */
  edge: GraphEdge;
}

/**
 * A simple path in natural edge direction: steps[0].node is the first node,
 * `end` is the last. Length (hop count) is steps.length.
 */
export interface OwnershipPath {
  steps: PathStep[];
  end: GraphNode;
}

export function pathStart(path: OwnershipPath): GraphNode {
  return path.steps.length > 0 ? path.steps[0].node : path.end;
}

export function pathNodes(path: OwnershipPath): GraphNode[] {
  return [...path.steps.map((s) => s.node), path.end];
}

/** Anchor is exactly one of fromId (downstream) or toId (upstream). */
export type PathAnchor =
  | { fromId: string; toId?: undefined }
  | { toId: string; fromId?: undefined };

export type PathQuery = PathAnchor & {
  edgeType: RelationshipType;
  minLength: number;
  maxLength: number;
};

// ---------------------------------------------------------------------------
// Store writes
// ---------------------------------------------------------------------------

export interface EdgeUpsert {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  /** Applied only when the edge is created. */
  onCreate: GraphProperties;
  /** Applied on every upsert, including the creating one. A null value removes the property. */
  onMatch: GraphProperties;
}

export interface NodeUpsert {
  id: string;
  label: NodeLabel;
  properties: GraphProperties;
}

export interface EdgeFilter {
  types?: RelationshipType[];
  /** Edges touching this node id on either end. */
  nodeId?: string;
}

// ---------------------------------------------------------------------------
// Store contract
// ---------------------------------------------------------------------------

export interface GraphStore {
  /** Throws GraphStoreUnavailableError when the store cannot be reached. */
  verifyConnectivity(): Promise<void>;

  findSimplePaths(query: PathQuery): AsyncIterable<OwnershipPath>;

  /** Returns null when either endpoint does not exist. */
  upsertEdge(input: EdgeUpsert): Promise<EdgeRecord | null>;

  existsEdge(sourceId: string, targetId: string, type: RelationshipType): Promise<boolean>;

  /** Deletes matching nodes and all their edges; resolves to the node count removed. */
  deleteNodesByTag(tagField: string, tagValues: string[]): Promise<number>;

  upsertNode(input: NodeUpsert): Promise<GraphNode>;

  getNode(id: string): Promise<GraphNode | null>;

  listEdges(filter?: EdgeFilter): Promise<EdgeRecord[]>;

  ensureSchema(): Promise<void>;

  close(): Promise<void>;
}
