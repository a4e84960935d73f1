import { Router } from "express";
import type { HealthResponse } from "@graphrag-demo/shared";
import { getOllamaServiceSingleton } from "../runtime/ollamaRuntime.js";
import type { OllamaServiceLike } from "../services/ollamaTypes.js";

interface CreateHealthRouterOptions {
  ollamaService?: OllamaServiceLike;
  checkOllama?: () => Promise<boolean>;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();
  const checkOllama = options.checkOllama ?? (() => ollamaService.checkHealth());

  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const ollamaConnected = await checkOllama();
    const response: HealthResponse = {
      status: ollamaConnected ? "healthy" : "unhealthy",
      ollama_connected: ollamaConnected
    };
    res.json(response);
  });

  return healthRouter;
}
