import type { Logger } from "pino";
import type { OllamaServiceLike } from "../services/ollamaTypes.js";
import { logger as defaultLogger } from "../utils/logger.js";
import { getOllamaServiceSingleton } from "./ollamaRuntime.js";

export interface OllamaConnectionReport {
  connected: boolean;
  modelCount: number;
}

interface OllamaConnectionOptions {
  ollamaService?: OllamaServiceLike;
  logger?: Logger;
}

export async function reportOllamaConnection(
  options: OllamaConnectionOptions = {}
): Promise<OllamaConnectionReport> {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();
  const logger = options.logger ?? defaultLogger;

  const connected = await ollamaService.checkHealth();
  if (!connected) {
    logger.warn({ host: ollamaService.host }, "Ollama service not accessible at startup");
    return { connected: false, modelCount: 0 };
  }

  try {
    const { count } = await ollamaService.listModels();
    logger.info({ host: ollamaService.host }, `Connected to Ollama. Available models: ${count}`);
    return { connected: true, modelCount: count };
  } catch (error) {
    logger.warn({ err: error }, "Connected to Ollama but listing models failed");
    return { connected: true, modelCount: 0 };
  }
}
