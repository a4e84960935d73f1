import { describe, expect, it } from "vitest";
import type { RelationshipType } from "@graphrag-demo/shared";
import { loadCypherScript, POPULATE_SCRIPT, SCHEMA_SCRIPT } from "../../../src/cypher/scriptFiles.js";
import { EXPECTED_LABEL_COUNTS, NODE_LABELS, RELATIONSHIP_TYPES } from "../../../src/graphSchema.js";

function rowCount(statement: string): number {
  return statement.split("\n").filter((line) => line.trim().startsWith("{")).length;
}

const EXPECTED_RELATIONSHIP_COUNTS: Record<RelationshipType, number> = {
  AUTHORED: 14,
  AFFILIATED_WITH: 6,
  PUBLISHED_IN: 6,
  ABOUT: 13,
  CITES: 7,
  RELATED_TO: 6
};

describe("schema script", () => {
  it("creates one id constraint per label and guards every statement", async () => {
    const statements = await loadCypherScript(SCHEMA_SCRIPT);

    expect(statements).toHaveLength(10);
    expect(statements.filter((statement) => statement.includes("CONSTRAINT"))).toHaveLength(5);
    for (const label of NODE_LABELS) {
      expect(
        statements.some(
          (statement) => statement.includes(`:${label})`) && statement.includes("IS UNIQUE")
        )
      ).toBe(true);
    }
    expect(statements.every((statement) => statement.includes("IF NOT EXISTS"))).toBe(true);
  });
});

describe("population script", () => {
  it("loads the expected number of nodes per label", async () => {
    const statements = await loadCypherScript(POPULATE_SCRIPT);

    expect(statements).toHaveLength(11);
    for (const label of NODE_LABELS) {
      const statement = statements.find((candidate) => candidate.includes(`CREATE (n:${label})`));
      expect(statement).toBeDefined();
      expect(rowCount(statement ?? "")).toBe(EXPECTED_LABEL_COUNTS[label]);
    }
  });

  it("loads 52 relationships across the six types", async () => {
    const statements = await loadCypherScript(POPULATE_SCRIPT);

    let total = 0;
    for (const type of RELATIONSHIP_TYPES) {
      const statement = statements.find((candidate) => candidate.includes(`[:${type} {`));
      expect(statement).toBeDefined();
      const rows = rowCount(statement ?? "");
      expect(rows).toBe(EXPECTED_RELATIONSHIP_COUNTS[type]);
      total += rows;
    }
    expect(total).toBe(52);
  });

  it("contains the entities the demonstration queries look for", async () => {
    const script = (await loadCypherScript(POPULATE_SCRIPT)).join("\n");

    expect(script).toContain("'Stanford University'");
    expect(script).toContain("'Massachusetts Institute of Technology'");
    expect(script).toContain("'Retrieval-Augmented Generation'");
    expect(script).toContain("'Knowledge Graphs'");
    expect(script).toContain("title: 'GraphRAG:");
  });
});
