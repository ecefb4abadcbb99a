import { EDGE_PROPS } from "./schema";
import type { GraphEdge, GraphProperties, Provenance, RelationshipType } from "./types";

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function asPercentage(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function provenanceOf(type: RelationshipType, value: unknown): Provenance {
  if (value === "primary" || value === "derived") return value;
  // Edges written before provenance was recorded: infer from type.
  return type === "INDIRECT_OWNER_OF" || type === "CONTROLS_INDIRECTLY" ? "derived" : "primary";
}

export function edgeFromProperties(
  sourceId: string,
  targetId: string,
  type: RelationshipType,
  properties: GraphProperties,
): GraphEdge {
  return {
    sourceId,
    targetId,
    type,
    percentage: asPercentage(properties[EDGE_PROPS.percentage]),
    provenance: provenanceOf(type, properties[EDGE_PROPS.provenance]),
    createdAt: asString(properties[EDGE_PROPS.createdAt]),
    updatedAt: asString(properties[EDGE_PROPS.updatedAt]),
    properties,
  };
}

export function edgeKey(sourceId: string, targetId: string, type: RelationshipType): string {
  return `${sourceId}\u0000${type}\u0000${targetId}`;
}
