export type NodeLabel = "Paper" | "Author" | "Institution" | "Venue" | "Topic";

export type RelationshipType =
  | "AUTHORED"
  | "AFFILIATED_WITH"
  | "PUBLISHED_IN"
  | "ABOUT"
  | "CITES"
  | "RELATED_TO";

export interface GraphCounts {
  nodes: number;
  relationships: number;
}

export type LabelCounts = Record<NodeLabel, number>;

export interface SchemaSummary {
  constraints: number;
  indexes: number;
}
