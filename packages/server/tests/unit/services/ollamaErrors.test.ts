import { describe, expect, it } from "vitest";
import { describeOllamaFailure } from "../../../src/services/ollamaErrors.js";

class UpstreamError extends Error {
  constructor(
    message: string,
    readonly status_code: number
  ) {
    super(message);
  }
}

describe("describeOllamaFailure", () => {
  it("relays Ollama's status and message for HTTP errors", () => {
    const failure = describeOllamaFailure(
      "Generation",
      new UpstreamError('model "phantom:1b" not found, try pulling it first', 404)
    );

    expect(failure).toEqual({
      statusCode: 404,
      body: {
        error: "Generation failed",
        details: 'model "phantom:1b" not found, try pulling it first'
      }
    });
  });

  it("maps refused connections to 503", () => {
    const error = new TypeError("fetch failed", {
      cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:11434"), {
        code: "ECONNREFUSED"
      })
    });

    expect(describeOllamaFailure("Chat completion", error)).toEqual({
      statusCode: 503,
      body: { error: "Ollama unavailable", details: "fetch failed" }
    });
  });

  it("falls back to 500 for anything else", () => {
    expect(describeOllamaFailure("Listing models", "boom")).toEqual({
      statusCode: 500,
      body: { error: "Listing models failed", details: "boom" }
    });
  });

  it("ignores status codes outside the error range", () => {
    const failure = describeOllamaFailure("Generation", new UpstreamError("odd", 302));
    expect(failure.statusCode).toBe(500);
  });
});
