/**
 * Bounded simple-path enumeration (depth-first, lazy).
 *
 * Walks from an anchor node along a neighbour function, never revisiting a
 * node already on the current path, and yields every path whose hop count is
 * within [minLength, maxLength]. Terminates on cyclic graphs because the
 * on-path set bounds each branch and maxLength bounds the depth.
 *
 * Direction-agnostic: callers walking "upstream" supply incoming edges as
 * neighbours and reverse the emitted hops themselves.
 */

export interface Hop<E> {
  /** Node reached by this hop. */
  to: string;
  edge: E;
}

export interface SimplePathOpts<E> {
  anchorId: string;
  minLength: number;
  maxLength: number;
  neighbours: (nodeId: string) => Iterable<Hop<E>>;
}

export function* enumerateSimplePaths<E>(opts: SimplePathOpts<E>): Generator<Hop<E>[]> {
  const { anchorId, minLength, maxLength, neighbours } = opts;
  if (maxLength < 1 || maxLength < minLength) return;

  const onPath = new Set<string>([anchorId]);
  const hops: Hop<E>[] = [];

  function* walk(current: string): Generator<Hop<E>[]> {
    if (hops.length >= Math.max(minLength, 1)) {
      yield [...hops];
    }
    if (hops.length === maxLength) return;

    for (const hop of neighbours(current)) {
      if (onPath.has(hop.to)) continue;
      onPath.add(hop.to);
      hops.push(hop);
      yield* walk(hop.to);
      hops.pop();
      onPath.delete(hop.to);
    }
  }

  yield* walk(anchorId);
}
