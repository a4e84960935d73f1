import { Router } from "express";
import { getOllamaServiceSingleton } from "../runtime/ollamaRuntime.js";
import { describeOllamaFailure } from "../services/ollamaErrors.js";
import type { OllamaServiceLike } from "../services/ollamaTypes.js";
import { logger } from "../utils/logger.js";

interface CreateModelsRouterOptions {
  ollamaService?: OllamaServiceLike;
}

export function createModelsRouter(options: CreateModelsRouterOptions = {}): Router {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();

  const modelsRouter = Router();

  modelsRouter.get("/", async (_req, res) => {
    try {
      return res.json(await ollamaService.listModels());
    } catch (error) {
      const failure = describeOllamaFailure("Listing models", error);
      logger.error({ err: error }, "Failed to list models");
      return res.status(failure.statusCode).json(failure.body);
    }
  });

  return modelsRouter;
}
