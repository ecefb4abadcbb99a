import test from "node:test";
import assert from "node:assert/strict";

import { enumerateSimplePaths, type Hop } from "../simplePaths";

// a → b, a → c, b → c, c → a
const ADJACENCY: Record<string, string[]> = { a: ["b", "c"], b: ["c"], c: ["a"] };

function neighbours(nodeId: string): Hop<string>[] {
  return (ADJACENCY[nodeId] ?? []).map((to) => ({ to, edge: `${nodeId}->${to}` }));
}

function run(minLength: number, maxLength: number, anchorId = "a"): string[][] {
  return [...enumerateSimplePaths({ anchorId, minLength, maxLength, neighbours })].map((hops) =>
    hops.map((h) => h.to),
  );
}

test("enumerateSimplePaths: depth-first, every length in range", () => {
  assert.deepEqual(run(1, 3), [["b"], ["b", "c"], ["c"]]);
});

test("enumerateSimplePaths: minLength filters short paths", () => {
  assert.deepEqual(run(2, 3), [["b", "c"]]);
});

test("enumerateSimplePaths: never returns to the anchor", () => {
  for (const hops of run(1, 10)) assert.ok(!hops.includes("a"));
});

test("enumerateSimplePaths: empty range yields nothing", () => {
  assert.deepEqual(run(1, 0), []);
  assert.deepEqual(run(3, 2), []);
});

test("enumerateSimplePaths: isolated anchor yields nothing", () => {
  assert.deepEqual(run(1, 3, "z"), []);
});

test("enumerateSimplePaths: hops carry their edges", () => {
  const [first] = enumerateSimplePaths({ anchorId: "b", minLength: 2, maxLength: 2, neighbours });
  assert.deepEqual(first, [
    { to: "c", edge: "b->c" },
    { to: "a", edge: "c->a" },
  ]);
});

test("enumerateSimplePaths: yielded paths are snapshots", () => {
  const paths = [...enumerateSimplePaths({ anchorId: "a", minLength: 1, maxLength: 2, neighbours })];
  assert.deepEqual(
    paths.map((p) => p.length),
    [1, 2, 1],
  );
});
