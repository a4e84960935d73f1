import { appConfig } from "./config.js";
import { createApp } from "./app.js";
import { reportOllamaConnection } from "./runtime/connectivity.js";
import { logger } from "./utils/logger.js";

const app = createApp();

app.listen(appConfig.PORT, appConfig.HOST, () => {
  logger.info(`GraphRAG generation server is running on http://${appConfig.HOST}:${appConfig.PORT}`);
  reportOllamaConnection().catch((error: unknown) => {
    logger.error({ err: error }, "Ollama startup check failed");
  });
});
