import test from "node:test";
import assert from "node:assert/strict";

import { MemoryGraphStore } from "@/lib/graph/memoryGraphStore";
import { pathNodes, type OwnershipPath, type PathQuery } from "@/lib/graph/types";
import { assertValidDepth, buildPathQuery, findPaths } from "../pathFinder";
import type { Logger } from "../types";

// ─── Helpers ─────────────────────────────────────────────────────────────────

const silent: Logger = { log() {}, warn() {}, error() {} };

async function chainStore(): Promise<MemoryGraphStore> {
  // A ─50→ B ─40→ C ─30→ D
  const store = new MemoryGraphStore();
  for (const id of ["A", "B", "C", "D"]) {
    await store.upsertNode({ id, label: "Company", properties: { krs: id } });
  }
  await store.addOwnership("A", "B", 50);
  await store.addOwnership("B", "C", 40);
  await store.addOwnership("C", "D", 30);
  return store;
}

async function collect(iter: AsyncIterable<OwnershipPath>): Promise<string[][]> {
  const out: string[][] = [];
  for await (const path of iter) out.push(pathNodes(path).map((n) => n.id));
  return out;
}

class CountingStore extends MemoryGraphStore {
  queries: PathQuery[] = [];

  async *findSimplePaths(query: PathQuery): AsyncGenerator<OwnershipPath> {
    this.queries.push(query);
    yield* super.findSimplePaths(query);
  }
}

// ─── Depth validation ────────────────────────────────────────────────────────

test("assertValidDepth: accepts integers 1..10", () => {
  assert.doesNotThrow(() => assertValidDepth(1));
  assert.doesNotThrow(() => assertValidDepth(10));
});

test("assertValidDepth: rejects out-of-range and fractional depths", () => {
  assert.throws(() => assertValidDepth(0), RangeError);
  assert.throws(() => assertValidDepth(11), RangeError);
  assert.throws(() => assertValidDepth(2.5), RangeError);
});

// ─── Query shape ─────────────────────────────────────────────────────────────

test("buildPathQuery: upstream anchors on the path end", () => {
  assert.deepEqual(buildPathQuery("S", "upstream", 2, 3), {
    edgeType: "OWNS_SHARES_IN",
    minLength: 2,
    maxLength: 3,
    toId: "S",
  });
});

test("buildPathQuery: downstream anchors on the path start", () => {
  assert.deepEqual(buildPathQuery("S", "downstream", 2, 4), {
    edgeType: "OWNS_SHARES_IN",
    minLength: 2,
    maxLength: 4,
    fromId: "S",
  });
});

// ─── Enumeration ─────────────────────────────────────────────────────────────

test("findPaths: upstream paths end at the seed and skip direct owners", async () => {
  const store = await chainStore();
  const paths = await collect(findPaths(store, "C", "upstream", { maxDepth: 3 }, silent));
  assert.deepEqual(paths, [["A", "B", "C"]]);
});

test("findPaths: downstream paths start at the seed, length 2..maxDepth", async () => {
  const store = await chainStore();
  const paths = await collect(findPaths(store, "A", "downstream", { maxDepth: 3 }, silent));
  assert.deepEqual(paths, [
    ["A", "B", "C"],
    ["A", "B", "C", "D"],
  ]);
});

test("findPaths: maxDepth bounds path length", async () => {
  const store = await chainStore();
  const paths = await collect(findPaths(store, "A", "downstream", { maxDepth: 2 }, silent));
  assert.deepEqual(paths, [["A", "B", "C"]]);
});

test("findPaths: minLength below 2 is raised to 2", async () => {
  const store = await chainStore();
  const paths = await collect(findPaths(store, "A", "downstream", { minLength: 1, maxDepth: 2 }, silent));
  assert.deepEqual(paths, [["A", "B", "C"]]);
});

test("findPaths: maxDepth 1 yields nothing and never queries the store", async () => {
  const store = new CountingStore();
  await store.upsertNode({ id: "A", label: "Company", properties: {} });
  const paths = await collect(findPaths(store, "A", "downstream", { maxDepth: 1 }, silent));
  assert.deepEqual(paths, []);
  assert.equal(store.queries.length, 0);
});

test("findPaths: invalid depth throws before querying", async () => {
  const store = new CountingStore();
  await assert.rejects(() => collect(findPaths(store, "A", "upstream", { maxDepth: 0 }, silent)), RangeError);
  assert.equal(store.queries.length, 0);
});

test("findPaths: terminates on cycles and never revisits a node", async () => {
  const store = await chainStore();
  await store.addOwnership("D", "A", 10);
  const paths = await collect(findPaths(store, "A", "downstream", { maxDepth: 10 }, silent));
  assert.deepEqual(paths, [
    ["A", "B", "C"],
    ["A", "B", "C", "D"],
  ]);
});

test("findPaths: unknown seed yields nothing", async () => {
  const store = await chainStore();
  const paths = await collect(findPaths(store, "ZZZ", "upstream", { maxDepth: 3 }, silent));
  assert.deepEqual(paths, []);
});

test("findPaths: out-of-contract paths from the store are skipped with a warning", async () => {
  class LooseStore extends MemoryGraphStore {
    async *findSimplePaths(query: PathQuery): AsyncGenerator<OwnershipPath> {
      const a = await this.getNode("A");
      const b = await this.getNode("B");
      if (a && b) {
        yield {
          steps: [
            {
              node: a,
              edge: { sourceId: "A", targetId: "B", type: "OWNS_SHARES_IN", percentage: 50, provenance: "primary", properties: {} },
            },
          ],
          end: b,
        };
      }
      yield* super.findSimplePaths(query);
    }
  }

  const store = new LooseStore();
  for (const id of ["A", "B", "C"]) await store.upsertNode({ id, label: "Company", properties: {} });
  await store.addOwnership("A", "B", 50);
  await store.addOwnership("B", "C", 40);

  const warnings: string[] = [];
  const logger: Logger = { log() {}, error() {}, warn: (msg: string) => warnings.push(msg) };
  const paths = await collect(findPaths(store, "A", "downstream", { maxDepth: 3 }, logger));

  assert.deepEqual(paths, [["A", "B", "C"]]);
  assert.deepEqual(warnings, [
    "[ownership] store returned out-of-contract downstream path (length 1) for A; skipped",
  ]);
});
