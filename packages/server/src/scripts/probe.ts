import { OllamaService } from "../services/OllamaService.js";
import { logger } from "../utils/logger.js";
import { probeOllama } from "./probeOllama.js";

probeOllama(OllamaService.fromEnv())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, "Ollama probe failed");
    process.exitCode = 1;
  });
