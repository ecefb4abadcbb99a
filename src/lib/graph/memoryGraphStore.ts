/**
 * In-process GraphStore.
 *
 * Same upsert and traversal semantics as the Neo4j store, held in Maps.
 * Used by the test suite and by the CLI's --memory mode. Insertion order is
 * preserved, so path enumeration order is stable for a given write sequence.
 */

import { GraphStoreUnavailableError } from "./errors";
import { edgeFromProperties, edgeKey } from "./mapping";
import { EDGE_PROPS } from "./schema";
import { enumerateSimplePaths, type Hop } from "./simplePaths";
import {
  RELATIONSHIP_TYPES,
  type EdgeFilter,
  type EdgeRecord,
  type EdgeUpsert,
  type GraphEdge,
  type GraphNode,
  type GraphProperties,
  type GraphStore,
  type NodeUpsert,
  type OwnershipPath,
  type PathQuery,
  type RelationshipType,
} from "./types";

export interface MemoryGraphStoreOpts {
  now?: () => Date;
}

function cloneNode(node: GraphNode): GraphNode {
  return { id: node.id, labels: [...node.labels], properties: { ...node.properties } };
}

function cloneEdge(edge: GraphEdge): GraphEdge {
  return { ...edge, properties: { ...edge.properties } };
}

// Neo4j drops a property assigned null through `+=`.
function withoutNulls(props: GraphProperties): GraphProperties {
  return Object.fromEntries(Object.entries(props).filter(([, v]) => v !== null && v !== undefined));
}

export class MemoryGraphStore implements GraphStore {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();
  private readonly now: () => Date;
  private closed = false;
  private schemaApplied = false;

  constructor(opts: MemoryGraphStoreOpts = {}) {
    this.now = opts.now ?? (() => new Date());
  }

  async verifyConnectivity(): Promise<void> {
    this.assertOpen();
  }

  async *findSimplePaths(query: PathQuery): AsyncGenerator<OwnershipPath> {
    this.assertOpen();
    const upstream = query.toId !== undefined;
    const anchorId = query.toId !== undefined ? query.toId : query.fromId;
    if (!this.nodes.has(anchorId)) return;

    const neighbours = (nodeId: string): Hop<GraphEdge>[] => {
      const hops: Hop<GraphEdge>[] = [];
      for (const edge of this.edges.values()) {
        if (edge.type !== query.edgeType) continue;
        if (upstream && edge.targetId === nodeId) hops.push({ to: edge.sourceId, edge });
        if (!upstream && edge.sourceId === nodeId) hops.push({ to: edge.targetId, edge });
      }
      return hops;
    };

    for (const hops of enumerateSimplePaths({
      anchorId,
      minLength: query.minLength,
      maxLength: query.maxLength,
      neighbours,
    })) {
      yield upstream ? this.upstreamPath(anchorId, hops) : this.downstreamPath(anchorId, hops);
    }
  }

  async upsertEdge(input: EdgeUpsert): Promise<EdgeRecord | null> {
    this.assertOpen();
    const source = this.nodes.get(input.sourceId);
    const target = this.nodes.get(input.targetId);
    if (!source || !target) return null;

    const key = edgeKey(input.sourceId, input.targetId, input.type);
    const existing = this.edges.get(key);
    const properties = withoutNulls(
      existing ? { ...existing.properties, ...input.onMatch } : { ...input.onCreate, ...input.onMatch },
    );

    const edge = edgeFromProperties(input.sourceId, input.targetId, input.type, properties);
    this.edges.set(key, edge);
    return { edge: cloneEdge(edge), source: cloneNode(source), target: cloneNode(target) };
  }

  async existsEdge(sourceId: string, targetId: string, type: RelationshipType): Promise<boolean> {
    this.assertOpen();
    return this.edges.has(edgeKey(sourceId, targetId, type));
  }

  async deleteNodesByTag(tagField: string, tagValues: string[]): Promise<number> {
    this.assertOpen();
    const wanted = new Set(tagValues);
    let deleted = 0;
    for (const [id, node] of this.nodes) {
      const tag = node.properties[tagField];
      if (typeof tag !== "string" || !wanted.has(tag)) continue;
      this.nodes.delete(id);
      deleted += 1;
      for (const [key, edge] of this.edges) {
        if (edge.sourceId === id || edge.targetId === id) this.edges.delete(key);
      }
    }
    return deleted;
  }

  async upsertNode(input: NodeUpsert): Promise<GraphNode> {
    this.assertOpen();
    const stamp = this.now().toISOString();
    const existing = this.nodes.get(input.id);
    const node: GraphNode = existing
      ? {
          id: input.id,
          labels: existing.labels.includes(input.label)
            ? existing.labels
            : [...existing.labels, input.label],
          properties: withoutNulls({ ...existing.properties, ...input.properties, id: input.id, updated_at: stamp }),
        }
      : {
          id: input.id,
          labels: [input.label],
          properties: withoutNulls({ ...input.properties, id: input.id, created_at: stamp }),
        };
    this.nodes.set(input.id, node);
    return cloneNode(node);
  }

  async getNode(id: string): Promise<GraphNode | null> {
    this.assertOpen();
    const node = this.nodes.get(id);
    return node ? cloneNode(node) : null;
  }

  async listEdges(filter: EdgeFilter = {}): Promise<EdgeRecord[]> {
    this.assertOpen();
    const types = new Set<RelationshipType>(filter.types ?? RELATIONSHIP_TYPES);
    const out: EdgeRecord[] = [];
    for (const edge of this.edges.values()) {
      if (!types.has(edge.type)) continue;
      if (filter.nodeId !== undefined && edge.sourceId !== filter.nodeId && edge.targetId !== filter.nodeId) {
        continue;
      }
      const source = this.nodes.get(edge.sourceId);
      const target = this.nodes.get(edge.targetId);
      if (!source || !target) continue;
      out.push({ edge: cloneEdge(edge), source: cloneNode(source), target: cloneNode(target) });
    }
    return out;
  }

  async ensureSchema(): Promise<void> {
    this.assertOpen();
    this.schemaApplied = true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get schemaEnsured(): boolean {
    return this.schemaApplied;
  }

  /** Seed helper for tests and demos: primary OWNS_SHARES_IN edge. */
  async addOwnership(sourceId: string, targetId: string, percentage?: number): Promise<EdgeRecord | null> {
    const stamp = this.now().toISOString();
    return this.upsertEdge({
      sourceId,
      targetId,
      type: "OWNS_SHARES_IN",
      onCreate: { [EDGE_PROPS.provenance]: "primary", [EDGE_PROPS.createdAt]: stamp },
      onMatch: { [EDGE_PROPS.percentage]: percentage ?? null, [EDGE_PROPS.updatedAt]: stamp },
    });
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new GraphStoreUnavailableError("memory graph store is closed");
    }
  }

  private requireNode(id: string): GraphNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`memory graph store: dangling edge endpoint ${id}`);
    return cloneNode(node);
  }

  // Hops were collected walking incoming edges from the anchor: reverse them.
  private upstreamPath(anchorId: string, hops: Hop<GraphEdge>[]): OwnershipPath {
    const steps = [...hops].reverse().map((hop) => ({
      node: this.requireNode(hop.to),
      edge: cloneEdge(hop.edge),
    }));
    return { steps, end: this.requireNode(anchorId) };
  }

  private downstreamPath(anchorId: string, hops: Hop<GraphEdge>[]): OwnershipPath {
    const steps = hops.map((hop, i) => ({
      node: this.requireNode(i === 0 ? anchorId : hops[i - 1].to),
      edge: cloneEdge(hop.edge),
    }));
    return { steps, end: this.requireNode(hops[hops.length - 1].to) };
  }
}
