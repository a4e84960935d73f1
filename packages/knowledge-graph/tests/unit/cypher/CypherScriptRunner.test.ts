import pino from "pino";
import { describe, expect, it } from "vitest";
import { CypherScriptRunner } from "../../../src/cypher/CypherScriptRunner.js";
import { POPULATE_SCRIPT, SCHEMA_SCRIPT } from "../../../src/cypher/scriptFiles.js";
import { FakeKnowledgeGraphStore } from "../../helpers/FakeKnowledgeGraphStore.js";

const silentLogger = pino({ level: "silent" });

describe("CypherScriptRunner", () => {
  it("runs every statement of a script in order", async () => {
    const store = new FakeKnowledgeGraphStore();
    const runner = new CypherScriptRunner(store, { logger: silentLogger });

    const result = await runner.runFile(SCHEMA_SCRIPT);

    expect(result).toEqual({
      file: SCHEMA_SCRIPT,
      statementCount: 10,
      executedCount: 10,
      failure: null
    });
    expect(store.executed[0]).toBe(
      "CREATE CONSTRAINT paper_id_unique IF NOT EXISTS FOR (p:Paper) REQUIRE p.id IS UNIQUE"
    );
  });

  it("stops at the first failing statement", async () => {
    const store = new FakeKnowledgeGraphStore();
    store.failOn = "CREATE (n:Author)";
    const runner = new CypherScriptRunner(store, { logger: silentLogger });

    const result = await runner.runFile(POPULATE_SCRIPT);

    expect(result.statementCount).toBe(11);
    expect(result.executedCount).toBe(1);
    expect(result.failure?.index).toBe(2);
    expect(result.failure?.message).toBe("Simulated failure");
    expect(store.executed).toHaveLength(1);
    expect(store.executed.some((statement) => statement.includes("AUTHORED"))).toBe(false);
  });
});
