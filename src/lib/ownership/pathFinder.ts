/**
 * Ownership Path Finder
 *
 * Lazily enumerates simple OWNS_SHARES_IN paths around a seed:
 *   upstream:   owner --...--> seed
 *   downstream: seed  --...--> target
 *
 * Invariants:
 * - Hop count in [minLength, maxDepth]; minLength is never below 2, so direct
 *   ownership (already a primary edge) is never re-derived.
 * - maxDepth < minLength yields nothing and never queries the store.
 * - Paths are simple; a node on the current path is never revisited, which
 *   keeps traversal finite on cyclic (cross-ownership) graphs.
 */

import { MAX_TRAVERSAL_DEPTH } from "@/lib/graph/cypher";
import type { GraphStore, OwnershipPath, PathQuery } from "@/lib/graph/types";
import { pathNodes } from "@/lib/graph/types";
import {
  DEFAULT_MAX_DEPTH,
  MIN_INDIRECT_PATH_LENGTH,
  type FindPathsOpts,
  type Logger,
  type TraversalDirection,
} from "./types";

export function assertValidDepth(maxDepth: number): void {
  if (!Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > MAX_TRAVERSAL_DEPTH) {
    throw new RangeError(
      `maxDepth must be an integer between 1 and ${MAX_TRAVERSAL_DEPTH}, got ${maxDepth}`,
    );
  }
}

export function isSimplePath(path: OwnershipPath): boolean {
  const ids = pathNodes(path).map((n) => n.id);
  return new Set(ids).size === ids.length;
}

export function buildPathQuery(
  seedId: string,
  direction: TraversalDirection,
  minLength: number,
  maxDepth: number,
): PathQuery {
  const bounds = { edgeType: "OWNS_SHARES_IN" as const, minLength, maxLength: maxDepth };
  return direction === "upstream" ? { ...bounds, toId: seedId } : { ...bounds, fromId: seedId };
}

function isAnchored(path: OwnershipPath, seedId: string, direction: TraversalDirection): boolean {
  if (path.steps.length === 0) return false;
  return direction === "upstream" ? path.end.id === seedId : path.steps[0].node.id === seedId;
}

export async function* findPaths(
  store: GraphStore,
  seedId: string,
  direction: TraversalDirection,
  opts: FindPathsOpts = {},
  logger: Logger = console,
): AsyncGenerator<OwnershipPath> {
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  const minLength = Math.max(opts.minLength ?? MIN_INDIRECT_PATH_LENGTH, MIN_INDIRECT_PATH_LENGTH);
  assertValidDepth(maxDepth);
  if (maxDepth < minLength) return;

  for await (const path of store.findSimplePaths(buildPathQuery(seedId, direction, minLength, maxDepth))) {
    const length = path.steps.length;
    if (length < minLength || length > maxDepth || !isAnchored(path, seedId, direction) || !isSimplePath(path)) {
      logger.warn(
        `[ownership] store returned out-of-contract ${direction} path (length ${length}) for ${seedId}; skipped`,
      );
      continue;
    }
    yield path;
  }
}
