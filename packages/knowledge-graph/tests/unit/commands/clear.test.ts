import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { runClear } from "../../../src/commands/clear.js";
import { EXPECTED_LABEL_COUNTS } from "../../../src/graphSchema.js";
import { FakeKnowledgeGraphStore } from "../../helpers/FakeKnowledgeGraphStore.js";

const silentLogger = pino({ level: "silent" });

function populatedStore(): FakeKnowledgeGraphStore {
  const store = new FakeKnowledgeGraphStore();
  store.labelCounts = { ...EXPECTED_LABEL_COUNTS };
  store.relationships = 52;
  return store;
}

describe("runClear", () => {
  it("stops without prompting when the graph is already empty", async () => {
    const store = new FakeKnowledgeGraphStore();
    const confirm = vi.fn(async () => true);

    const report = await runClear(store, { confirm, logger: silentLogger });

    expect(report).toEqual({ outcome: "already_empty", before: { nodes: 0, relationships: 0 } });
    expect(confirm).not.toHaveBeenCalled();
    expect(store.clearCalls).toBe(0);
  });

  it("keeps the data when the operator declines", async () => {
    const store = populatedStore();
    const confirm = vi.fn(async () => false);

    const report = await runClear(store, { confirm, logger: silentLogger });

    expect(report.outcome).toBe("cancelled");
    expect(confirm).toHaveBeenCalledWith(
      "This will delete 28 nodes and 52 relationships. Continue? [y/N] "
    );
    expect(store.clearCalls).toBe(0);
  });

  it("deletes everything and reports the preserved schema", async () => {
    const store = populatedStore();

    const report = await runClear(store, { confirm: async () => true, logger: silentLogger });

    expect(report).toEqual({
      outcome: "cleared",
      before: { nodes: 28, relationships: 52 },
      after: { nodes: 0, relationships: 0 },
      schema: { constraints: 5, indexes: 10 }
    });
  });

  it("skips the prompt when confirmation is waived", async () => {
    const store = populatedStore();
    const confirm = vi.fn(async () => false);

    const report = await runClear(store, { confirm, skipConfirmation: true, logger: silentLogger });

    expect(report.outcome).toBe("cleared");
    expect(confirm).not.toHaveBeenCalled();
    expect(store.clearCalls).toBe(1);
  });

  it("still reports the clear when the schema cannot be listed", async () => {
    const store = populatedStore();
    store.schemaError = new Error("SHOW not permitted");

    const report = await runClear(store, { confirm: async () => true, logger: silentLogger });

    expect(report.outcome).toBe("cleared");
    expect(report.outcome === "cleared" ? report.schema : undefined).toBeNull();
  });
});
