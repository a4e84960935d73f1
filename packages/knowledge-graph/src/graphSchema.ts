import type { LabelCounts, NodeLabel, RelationshipType } from "@graphrag-demo/shared";

export const NODE_LABELS: readonly NodeLabel[] = ["Paper", "Author", "Institution", "Venue", "Topic"];

export const RELATIONSHIP_TYPES: readonly RelationshipType[] = [
  "AUTHORED",
  "AFFILIATED_WITH",
  "PUBLISHED_IN",
  "ABOUT",
  "CITES",
  "RELATED_TO"
];

// Node counts loaded by 02_populate_data.cypher.
export const EXPECTED_LABEL_COUNTS: LabelCounts = {
  Paper: 6,
  Author: 6,
  Institution: 4,
  Venue: 4,
  Topic: 8
};

export function isNodeLabel(value: string): value is NodeLabel {
  return NODE_LABELS.some((label) => label === value);
}
