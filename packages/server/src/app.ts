import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { ApiErrorResponse } from "@graphrag-demo/shared";
import { appConfig } from "./config.js";
import { requestLogger } from "./middleware/logger.js";
import { createChatRouter } from "./routes/chat.js";
import { createGenerateRouter } from "./routes/generate.js";
import { createHealthRouter } from "./routes/health.js";
import { createModelsRouter } from "./routes/models.js";
import { createRootRouter } from "./routes/root.js";
import { getOllamaServiceSingleton } from "./runtime/ollamaRuntime.js";
import type { OllamaServiceLike } from "./services/ollamaTypes.js";
import { logger } from "./utils/logger.js";

interface CreateAppOptions {
  ollamaService?: OllamaServiceLike;
}

export function createApp(options: CreateAppOptions = {}): Express {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();

  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: appConfig.CORS_ORIGIN }));
  app.use(express.json({ limit: "2mb" }));

  app.use("/generate", createGenerateRouter({ ollamaService }));
  app.use("/chat", createChatRouter({ ollamaService }));
  app.use("/models", createModelsRouter({ ollamaService }));
  app.use("/health", createHealthRouter({ ollamaService }));
  app.use("/", createRootRouter({ ollamaService }));

  app.use((_req, res) => {
    const response: ApiErrorResponse = { error: "Route not found" };
    res.status(404).json(response);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      const response: ApiErrorResponse = { error: "Validation failed", details: err.message };
      res.status(400).json(response);
      return;
    }

    if (isClientRequestError(err)) {
      const response: ApiErrorResponse = { error: "Invalid request body", details: err.message };
      res.status(err.status).json(response);
      return;
    }

    logger.error({ err }, "Unhandled error");
    const response: ApiErrorResponse = { error: "Internal server error" };
    res.status(500).json(response);
  });

  return app;
}

// express.json() reports malformed JSON as an error of type "entity.parse.failed".
function isBodyParseError(err: unknown): err is Error {
  return (
    err instanceof Error &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

// Body parser rejections (oversized payload, unsupported charset) carry a 4xx status.
function isClientRequestError(err: unknown): err is Error & { status: number } {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}
