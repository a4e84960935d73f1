import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../../src/app.js";
import { SERVICE_NAME } from "../../src/routes/root.js";
import { FakeOllamaService } from "../helpers/FakeOllamaService.js";

describe("application", () => {
  const app = createApp({ ollamaService: new FakeOllamaService() });

  it("describes the service at the root", async () => {
    const response = await request(app).get("/");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      service: SERVICE_NAME,
      status: "running",
      ollama_url: "http://ollama.test:11434"
    });
  });

  it("mounts every endpoint", async () => {
    const health = await request(app).get("/health");
    expect(health.body.status).toBe("healthy");

    const models = await request(app).get("/models");
    expect(models.body.count).toBe(2);

    const generate = await request(app).post("/generate").send({ prompt: "ping" });
    expect(generate.status).toBe(200);
    expect(generate.body.text.length).toBeGreaterThan(0);

    const chat = await request(app)
      .post("/chat")
      .send({ messages: [{ role: "user", content: "ping" }] });
    expect(chat.status).toBe(200);
    expect(chat.body.message.role).toBe("assistant");
  });

  it("answers unknown routes with 404", async () => {
    const response = await request(app).get("/api/unknown");
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: "Route not found" });
  });

  it("rejects malformed JSON as a validation error", async () => {
    const response = await request(app)
      .post("/generate")
      .set("Content-Type", "application/json")
      .send('{"prompt": ');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Validation failed");
  });

  it("rejects bodies over the JSON limit with 413", async () => {
    const response = await request(app)
      .post("/generate")
      .send({ prompt: "x".repeat(3 * 1024 * 1024) });

    expect(response.status).toBe(413);
    expect(response.body).toEqual({
      error: "Invalid request body",
      details: "request entity too large"
    });
  });

  it("rejects unsupported body charsets with 415", async () => {
    const response = await request(app)
      .post("/generate")
      .set("Content-Type", "application/json; charset=latin1")
      .send('{"prompt":"ping"}');

    expect(response.status).toBe(415);
    expect(response.body).toEqual({
      error: "Invalid request body",
      details: 'unsupported charset "LATIN1"'
    });
  });

  it("allows cross-origin requests", async () => {
    const response = await request(app).get("/health").set("Origin", "http://localhost:5173");
    expect(response.headers["access-control-allow-origin"]).toBe("*");
  });
});
