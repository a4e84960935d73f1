import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

const httpLogger = logger.child({ component: "http" });

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();

  res.on("finish", () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    };

    if (res.statusCode >= 500) {
      httpLogger.warn(entry, "HTTP request failed");
      return;
    }
    httpLogger.info(entry, "HTTP request");
  });

  next();
};
