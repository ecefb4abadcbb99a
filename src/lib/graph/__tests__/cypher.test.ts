import test from "node:test";
import assert from "node:assert/strict";

import {
  anyNodeById,
  buildDeleteByTagStatement,
  buildExistsEdgeStatement,
  buildListEdgesStatement,
  buildSimplePathQuery,
  buildUpsertEdgeStatement,
  buildUpsertNodeStatement,
} from "../cypher";

test("anyNodeById: matches any model label by id parameter", () => {
  assert.equal(anyNodeById("a", "sourceId"), "(a.id = $sourceId AND (a:Company OR a:Person OR a:Shareholder))");
});

// ─── Traversal ───────────────────────────────────────────────────────────────

test("buildSimplePathQuery: downstream binds the head of the pattern", () => {
  const stmt = buildSimplePathQuery({ fromId: "K1", edgeType: "OWNS_SHARES_IN", minLength: 2, maxLength: 3 });
  assert.deepEqual(stmt.text.split("\n"), [
    "MATCH p = (head)-[:OWNS_SHARES_IN*2..3]->(tail)",
    "WHERE (head.id = $anchorId AND (head:Company OR head:Person OR head:Shareholder))",
    "  AND ALL(i IN range(0, size(nodes(p)) - 2) WHERE NOT nodes(p)[i] IN nodes(p)[i + 1..])",
    "RETURN nodes(p) AS nodes, relationships(p) AS rels",
  ]);
  assert.deepEqual(stmt.params, { anchorId: "K1" });
});

test("buildSimplePathQuery: upstream binds the tail of the pattern", () => {
  const stmt = buildSimplePathQuery({ toId: "K1", edgeType: "OWNS_SHARES_IN", minLength: 2, maxLength: 5 });
  assert.equal(stmt.text.split("\n")[0], "MATCH p = (head)-[:OWNS_SHARES_IN*2..5]->(tail)");
  assert.equal(
    stmt.text.split("\n")[1],
    "WHERE (tail.id = $anchorId AND (tail:Company OR tail:Person OR tail:Shareholder))",
  );
  assert.deepEqual(stmt.params, { anchorId: "K1" });
});

test("buildSimplePathQuery: bounds are validated before reaching query text", () => {
  assert.throws(() => buildSimplePathQuery({ fromId: "K1", edgeType: "OWNS_SHARES_IN", minLength: 2, maxLength: 11 }));
  assert.throws(() => buildSimplePathQuery({ fromId: "K1", edgeType: "OWNS_SHARES_IN", minLength: 0, maxLength: 3 }));
  assert.throws(() => buildSimplePathQuery({ fromId: "K1", edgeType: "OWNS_SHARES_IN", minLength: 4, maxLength: 3 }));
  assert.throws(() => buildSimplePathQuery({ fromId: "K1", edgeType: "OWNS_SHARES_IN", minLength: 1.5, maxLength: 3 }));
});

test("buildSimplePathQuery: ids never reach query text", () => {
  const stmt = buildSimplePathQuery({ fromId: "x' OR 1=1 //", edgeType: "OWNS_SHARES_IN", minLength: 2, maxLength: 3 });
  assert.ok(!stmt.text.includes("1=1"));
  assert.equal(stmt.params.anchorId, "x' OR 1=1 //");
});

// ─── Writes ──────────────────────────────────────────────────────────────────

test("buildUpsertEdgeStatement: MERGE with create-only and every-time props", () => {
  const params = { sourceId: "A", targetId: "B", onCreate: { provenance: "derived" }, onMatch: { percentage: 10 } };
  const stmt = buildUpsertEdgeStatement("CONTROLS_INDIRECTLY", params);
  const lines = stmt.text.split("\n");
  assert.equal(lines[2], "MERGE (a)-[r:CONTROLS_INDIRECTLY]->(b)");
  assert.equal(lines[3], "ON CREATE SET r += $onCreate, r += $onMatch");
  assert.equal(lines[4], "ON MATCH SET r += $onMatch");
  assert.deepEqual(stmt.params, params);
});

test("buildExistsEdgeStatement: typed pattern, ids as params", () => {
  const stmt = buildExistsEdgeStatement("OWNS_SHARES_IN", "A", "B");
  assert.equal(stmt.text.split("\n")[0], "MATCH (a)-[r:OWNS_SHARES_IN]->(b)");
  assert.deepEqual(stmt.params, { sourceId: "A", targetId: "B" });
});

test("buildDeleteByTagStatement: validates the property key", () => {
  const stmt = buildDeleteByTagStatement("id", ["T1", "T2"]);
  assert.equal(stmt.text.split("\n")[0], "MATCH (n) WHERE n.id IN $tagValues");
  assert.deepEqual(stmt.params, { tagValues: ["T1", "T2"] });
  assert.throws(() => buildDeleteByTagStatement("id) DETACH DELETE (m", ["T1"]));
});

test("buildUpsertNodeStatement: matches the id under any label before creating", () => {
  const stmt = buildUpsertNodeStatement("Shareholder", { id: "S1", properties: { name: "S" }, now: "t" });
  const lines = stmt.text.split("\n");
  assert.equal(lines[0], "OPTIONAL MATCH (m) WHERE (m.id = $id AND (m:Company OR m:Person OR m:Shareholder))");
  assert.equal(lines[5], "  CREATE (n:Shareholder {id: $id})");
  assert.equal(lines[11], "  SET m:Shareholder, m += $properties, m.updated_at = $now");
  assert.equal(lines.some((l) => l.startsWith("MERGE")), false);
  assert.deepEqual(stmt.params, { id: "S1", properties: { name: "S" }, now: "t" });
});

test("buildListEdgesStatement: optional node filter", () => {
  const all = buildListEdgesStatement({ types: ["INDIRECT_OWNER_OF"] });
  assert.equal(all.text.split("\n")[1], "WHERE type(r) IN $types");
  assert.deepEqual(all.params, { types: ["INDIRECT_OWNER_OF"], nodeId: null });

  const one = buildListEdgesStatement({ types: ["INDIRECT_OWNER_OF"], nodeId: "K1" });
  assert.equal(one.text.split("\n")[1], "WHERE type(r) IN $types AND (a.id = $nodeId OR b.id = $nodeId)");
});
