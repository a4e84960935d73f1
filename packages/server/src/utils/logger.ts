import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: "graphrag-server",
  level: appConfig.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime
});
