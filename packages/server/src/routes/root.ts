import { Router } from "express";
import type { ServiceInfoResponse } from "@graphrag-demo/shared";
import { getOllamaServiceSingleton } from "../runtime/ollamaRuntime.js";
import type { OllamaServiceLike } from "../services/ollamaTypes.js";

export const SERVICE_NAME = "GraphRAG Generation Server";

interface CreateRootRouterOptions {
  ollamaService?: OllamaServiceLike;
}

export function createRootRouter(options: CreateRootRouterOptions = {}): Router {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();

  const rootRouter = Router();

  rootRouter.get("/", (_req, res) => {
    const response: ServiceInfoResponse = {
      service: SERVICE_NAME,
      status: "running",
      ollama_url: ollamaService.host
    };
    res.json(response);
  });

  return rootRouter;
}
