import { neo4jConfigFromEnv, type ServerEnv } from "@/lib/env/server";
import { MemoryGraphStore } from "./memoryGraphStore";
import { Neo4jGraphStore } from "./neo4jGraphStore";
import type { GraphStore } from "./types";

/** Store for an entry point: Neo4j from env, or an empty in-process store. */
export function openGraphStore(env: ServerEnv, opts: { memory?: boolean } = {}): GraphStore {
  if (opts.memory) {
    console.log("[graph] using in-memory store (nothing is persisted)");
    return new MemoryGraphStore();
  }
  return new Neo4jGraphStore(neo4jConfigFromEnv(env));
}
