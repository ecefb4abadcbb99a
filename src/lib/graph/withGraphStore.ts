import type { GraphStore } from "./types";

/**
 * Scoped store acquisition: the store is always closed once `fn` settles,
 * whether it resolved or threw.
 */
export async function withGraphStore<T>(
  open: () => GraphStore | Promise<GraphStore>,
  fn: (store: GraphStore) => Promise<T>,
): Promise<T> {
  const store = await open();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
