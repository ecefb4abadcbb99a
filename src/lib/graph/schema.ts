// src/lib/graph/schema.ts

export const GRAPH_CONSTRAINTS = [
  "CREATE CONSTRAINT company_krs IF NOT EXISTS FOR (c:Company) REQUIRE c.krs IS UNIQUE",
  "CREATE CONSTRAINT company_id IF NOT EXISTS FOR (c:Company) REQUIRE c.id IS UNIQUE",
  "CREATE CONSTRAINT person_id IF NOT EXISTS FOR (p:Person) REQUIRE p.id IS UNIQUE",
  "CREATE CONSTRAINT shareholder_id IF NOT EXISTS FOR (s:Shareholder) REQUIRE s.id IS UNIQUE",
] as const;

export const GRAPH_INDEXES = [
  "CREATE INDEX company_nip IF NOT EXISTS FOR (c:Company) ON (c.nip)",
  "CREATE INDEX company_regon IF NOT EXISTS FOR (c:Company) ON (c.regon)",
  "CREATE INDEX company_name IF NOT EXISTS FOR (c:Company) ON (c.name)",
  "CREATE INDEX person_name IF NOT EXISTS FOR (p:Person) ON (p.last_name, p.first_name)",
  "CREATE INDEX shareholder_name IF NOT EXISTS FOR (s:Shareholder) ON (s.name)",
] as const;

export const SCHEMA_STATEMENTS: readonly string[] = [...GRAPH_CONSTRAINTS, ...GRAPH_INDEXES];

// Property keys shared by the stores and the ingestion layer.
export const EDGE_PROPS = {
  percentage: "percentage",
  provenance: "provenance",
  createdAt: "created_at",
  updatedAt: "updated_at",
  isIndirect: "is_indirect",
  role: "role",
} as const;
