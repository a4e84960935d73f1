import pino from "pino";
import { appConfig } from "../config.js";

export const logger = pino({
  name: "knowledge-graph",
  level: appConfig.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime
});
