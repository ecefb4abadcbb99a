/**
 * Neo4j GraphStore over the Bolt protocol (neo4j-driver).
 *
 * - Every write is a single managed write transaction (executeWrite), so each
 *   upsert is atomic and concurrent writers on the same pair are serialized by
 *   the server.
 * - Path queries stream records; the caller can stop iterating early.
 * - Driver errors are classified into GRAPH_STORE_UNAVAILABLE vs
 *   GRAPH_QUERY_FAILED (see ./errors).
 */

import neo4j, {
  isNode,
  isRelationship,
  type Driver,
  type Node as Neo4jNode,
  type Relationship as Neo4jRelationship,
} from "neo4j-driver";
import {
  buildDeleteByTagStatement,
  buildExistsEdgeStatement,
  buildListEdgesStatement,
  buildSimplePathQuery,
  buildUpsertEdgeStatement,
  buildUpsertNodeStatement,
  anyNodeById,
  type CypherStatement,
} from "./cypher";
import { classifyStoreError, GraphQueryError } from "./errors";
import { edgeFromProperties } from "./mapping";
import { SCHEMA_STATEMENTS } from "./schema";
import {
  RELATIONSHIP_TYPES,
  isNodeLabel,
  isRelationshipType,
  type EdgeFilter,
  type EdgeRecord,
  type EdgeUpsert,
  type GraphNode,
  type GraphProperties,
  type GraphStore,
  type NodeLabel,
  type NodeUpsert,
  type OwnershipPath,
  type PathQuery,
  type PathStep,
  type RelationshipType,
} from "./types";

export interface Neo4jGraphStoreConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
  /** Seconds. */
  maxConnectionLifetime?: number;
  maxConnectionPoolSize?: number;
  /** Seconds. */
  connectionTimeout?: number;
  now?: () => Date;
}

type Logger = Pick<Console, "log" | "warn" | "error">;

// ─── Value conversion ────────────────────────────────────────────────────────

function toPlain(value: unknown): unknown {
  if (neo4j.isInt(value)) return value.toNumber();
  if (
    neo4j.isDateTime(value) ||
    neo4j.isDate(value) ||
    neo4j.isLocalDateTime(value) ||
    neo4j.isTime(value) ||
    neo4j.isLocalTime(value) ||
    neo4j.isDuration(value)
  ) {
    return value.toString();
  }
  if (Array.isArray(value)) return value.map(toPlain);
  return value;
}

function plainProperties(props: Record<string, unknown>): GraphProperties {
  const out: GraphProperties = {};
  for (const [k, v] of Object.entries(props)) out[k] = toPlain(v);
  return out;
}

function toGraphNode(node: Neo4jNode): GraphNode {
  const properties = plainProperties(node.properties);
  const id = properties.id;
  if (typeof id !== "string") {
    throw new GraphQueryError(`node ${node.elementId} has no string id property`);
  }
  return { id, labels: node.labels.filter((l): l is NodeLabel => isNodeLabel(l)), properties };
}

function toEdgeRecord(a: unknown, r: unknown, b: unknown): EdgeRecord {
  if (!isNode(a) || !isNode(b) || !isRelationship(r)) {
    throw new GraphQueryError("unexpected record shape: expected (node, relationship, node)");
  }
  const type = r.type;
  if (!isRelationshipType(type)) {
    throw new GraphQueryError(`unexpected relationship type ${type}`);
  }
  const source = toGraphNode(a);
  const target = toGraphNode(b);
  return {
    edge: edgeFromProperties(source.id, target.id, type, plainProperties(r.properties)),
    source,
    target,
  };
}

function toOwnershipPath(rawNodes: unknown, rawRels: unknown): OwnershipPath {
  if (!Array.isArray(rawNodes) || !Array.isArray(rawRels)) {
    throw new GraphQueryError("unexpected path record: nodes/rels must be lists");
  }
  const nodes = rawNodes.map((n: unknown) => {
    if (!isNode(n)) throw new GraphQueryError("unexpected path record: non-node in nodes(p)");
    return n;
  });
  const rels: Neo4jRelationship[] = rawRels.map((r: unknown) => {
    if (!isRelationship(r)) throw new GraphQueryError("unexpected path record: non-relationship in rels");
    return r;
  });
  if (nodes.length !== rels.length + 1) {
    throw new GraphQueryError("unexpected path record: node/relationship count mismatch");
  }

  const graphNodes = nodes.map(toGraphNode);
  const steps: PathStep[] = rels.map((rel, i) => {
    const type = rel.type;
    if (!isRelationshipType(type)) throw new GraphQueryError(`unexpected relationship type ${type}`);
    return {
      node: graphNodes[i],
      edge: edgeFromProperties(
        graphNodes[i].id,
        graphNodes[i + 1].id,
        type,
        plainProperties(rel.properties),
      ),
    };
  });
  return { steps, end: graphNodes[graphNodes.length - 1] };
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class Neo4jGraphStore implements GraphStore {
  private readonly driver: Driver;
  private readonly database: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(config: Neo4jGraphStoreConfig, logger: Logger = console) {
    this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
      maxConnectionLifetime: (config.maxConnectionLifetime ?? 3600) * 1000,
      maxConnectionPoolSize: config.maxConnectionPoolSize ?? 50,
      connectionTimeout: (config.connectionTimeout ?? 30) * 1000,
    });
    this.database = config.database;
    this.now = config.now ?? (() => new Date());
    this.logger = logger;
    this.logger.log(`[graph] Neo4j driver created for ${config.uri} (database: ${config.database})`);
  }

  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity({ database: this.database });
    } catch (err) {
      throw classifyStoreError(err, "Neo4j connectivity check failed");
    }
  }

  async *findSimplePaths(query: PathQuery): AsyncGenerator<OwnershipPath> {
    const stmt = buildSimplePathQuery(query);
    const session = this.driver.session({
      database: this.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      const result = session.run(stmt.text, stmt.params);
      for await (const record of result) {
        yield toOwnershipPath(record.get("nodes"), record.get("rels"));
      }
    } catch (err) {
      throw classifyStoreError(err, "simple path query failed");
    } finally {
      await session.close();
    }
  }

  async upsertEdge(input: EdgeUpsert): Promise<EdgeRecord | null> {
    const stmt = buildUpsertEdgeStatement(input.type, {
      sourceId: input.sourceId,
      targetId: input.targetId,
      onCreate: input.onCreate,
      onMatch: input.onMatch,
    });
    const records = await this.write(stmt, `upsert ${input.type}`);
    if (records.length === 0) return null;
    const [record] = records;
    return toEdgeRecord(record.get("a"), record.get("r"), record.get("b"));
  }

  async existsEdge(sourceId: string, targetId: string, type: RelationshipType): Promise<boolean> {
    const records = await this.read(buildExistsEdgeStatement(type, sourceId, targetId), `exists ${type}`);
    return records.length > 0 && records[0].get("exists") === true;
  }

  async deleteNodesByTag(tagField: string, tagValues: string[]): Promise<number> {
    if (tagValues.length === 0) return 0;
    const records = await this.write(buildDeleteByTagStatement(tagField, tagValues), "delete by tag");
    if (records.length === 0) return 0;
    const deleted = toPlain(records[0].get("deleted"));
    return typeof deleted === "number" ? deleted : 0;
  }

  async upsertNode(input: NodeUpsert): Promise<GraphNode> {
    const stmt = buildUpsertNodeStatement(input.label, {
      id: input.id,
      properties: input.properties,
      now: this.now().toISOString(),
    });
    const records = await this.write(stmt, `upsert ${input.label}`);
    const raw: unknown = records[0]?.get("n");
    if (!isNode(raw)) throw new GraphQueryError(`upsert ${input.label} returned no node`);
    return toGraphNode(raw);
  }

  async getNode(id: string): Promise<GraphNode | null> {
    const records = await this.read(
      { text: `MATCH (n) WHERE ${anyNodeById("n", "id")} RETURN n LIMIT 1`, params: { id } },
      "get node",
    );
    const raw: unknown = records[0]?.get("n");
    return isNode(raw) ? toGraphNode(raw) : null;
  }

  async listEdges(filter: EdgeFilter = {}): Promise<EdgeRecord[]> {
    const stmt = buildListEdgesStatement({
      types: filter.types ?? [...RELATIONSHIP_TYPES],
      nodeId: filter.nodeId,
    });
    const records = await this.read(stmt, "list edges");
    return records.map((rec) => toEdgeRecord(rec.get("a"), rec.get("r"), rec.get("b")));
  }

  async ensureSchema(): Promise<void> {
    const session = this.driver.session({ database: this.database });
    try {
      for (const statement of SCHEMA_STATEMENTS) {
        await session.run(statement);
      }
      this.logger.log(`[graph] schema ensured (${SCHEMA_STATEMENTS.length} statements)`);
    } catch (err) {
      throw classifyStoreError(err, "schema setup failed");
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
    this.logger.log("[graph] Neo4j driver closed");
  }

  private async write(stmt: CypherStatement, context: string) {
    const session = this.driver.session({ database: this.database });
    try {
      return await session.executeWrite(async (tx) => {
        const result = await tx.run(stmt.text, stmt.params);
        return result.records;
      });
    } catch (err) {
      throw classifyStoreError(err, context);
    } finally {
      await session.close();
    }
  }

  private async read(stmt: CypherStatement, context: string) {
    const session = this.driver.session({
      database: this.database,
      defaultAccessMode: neo4j.session.READ,
    });
    try {
      return await session.executeRead(async (tx) => {
        const result = await tx.run(stmt.text, stmt.params);
        return result.records;
      });
    } catch (err) {
      throw classifyStoreError(err, context);
    } finally {
      await session.close();
    }
  }
}
