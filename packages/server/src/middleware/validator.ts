import type { RequestHandler } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import type { ApiErrorResponse } from "@graphrag-demo/shared";

interface ValidationSchemas {
  body: ZodTypeAny;
}

export const validate = (schemas: ValidationSchemas): RequestHandler => {
  return (req, res, next) => {
    try {
      req.body = schemas.body.parse(req.body ?? {});
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const response: ApiErrorResponse = {
          error: "Validation failed",
          details: error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message
          }))
        };
        res.status(400).json(response);
        return;
      }

      next(error);
    }
  };
};
