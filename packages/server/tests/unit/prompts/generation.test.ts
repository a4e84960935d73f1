import { describe, expect, it } from "vitest";
import { buildGenerationPrompt } from "../../../src/prompts/generation.js";

describe("buildGenerationPrompt", () => {
  it("returns the prompt unchanged without context", () => {
    expect(buildGenerationPrompt("Explain GraphRAG")).toBe("Explain GraphRAG");
    expect(buildGenerationPrompt("Explain GraphRAG", "")).toBe("Explain GraphRAG");
  });

  it("puts the context ahead of the question", () => {
    expect(buildGenerationPrompt("How are they related?", "Nodes are entities.")).toBe(
      "Context:\nNodes are entities.\n\nQuestion: How are they related?"
    );
  });
});
