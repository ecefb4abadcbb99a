import { z } from "zod";
import type { Neo4jGraphStoreConfig } from "@/lib/graph/neo4jGraphStore";
import { MAX_TRAVERSAL_DEPTH } from "@/lib/graph/cypher";
import { DEFAULT_KRS_BASE_URL } from "@/lib/registry/krsClient";
import { MERGE_POLICIES, MISSING_PERCENTAGE_POLICIES } from "@/lib/ownership/types";

// Unset and blank values both fall back to the default.
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const ServerEnvSchema = z.object({
  // Neo4j
  NEO4J_URI: z.preprocess(blankToUndefined, z.string().url().default("bolt://localhost:7687")),
  NEO4J_USER: z.preprocess(blankToUndefined, z.string().min(1).default("neo4j")),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.preprocess(blankToUndefined, z.string().min(1).default("neo4j")),
  NEO4J_MAX_CONNECTION_LIFETIME: positiveInt(3600),
  NEO4J_MAX_CONNECTION_POOL_SIZE: positiveInt(50),
  NEO4J_CONNECTION_TIMEOUT: positiveInt(30),

  // Registry API
  KRS_API_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_KRS_BASE_URL)),
  KRS_RATE_LIMIT: positiveInt(5),

  // Discovery
  DISCOVERY_MAX_DEPTH: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(MAX_TRAVERSAL_DEPTH).default(3),
  ),
  DISCOVERY_MERGE_POLICY: z.preprocess(blankToUndefined, z.enum(MERGE_POLICIES).default("overwrite")),
  DISCOVERY_MISSING_PERCENTAGE: z.preprocess(
    blankToUndefined,
    z.enum(MISSING_PERCENTAGE_POLICIES).default("pass_through"),
  ),

  // Synthetic fixture (optional)
  SYNTHETIC_LINK_KRS: z.preprocess(blankToUndefined, z.string().min(1).optional()),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.output<typeof ServerEnvSchema>;

export function serverEnv(source: Record<string, string | undefined> = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    const keys = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid server environment variables: ${keys} (see logs).`);
  }
  return parsed.data;
}

export function neo4jConfigFromEnv(env: ServerEnv): Neo4jGraphStoreConfig {
  return {
    uri: env.NEO4J_URI,
    user: env.NEO4J_USER,
    password: env.NEO4J_PASSWORD,
    database: env.NEO4J_DATABASE,
    maxConnectionLifetime: env.NEO4J_MAX_CONNECTION_LIFETIME,
    maxConnectionPoolSize: env.NEO4J_MAX_CONNECTION_POOL_SIZE,
    connectionTimeout: env.NEO4J_CONNECTION_TIMEOUT,
  };
}
