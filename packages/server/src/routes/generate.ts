import { Router } from "express";
import { z } from "zod";
import type { GenerateRequest, GenerateResponse } from "@graphrag-demo/shared";
import { validate } from "../middleware/validator.js";
import { getOllamaServiceSingleton } from "../runtime/ollamaRuntime.js";
import { describeOllamaFailure } from "../services/ollamaErrors.js";
import type { OllamaServiceLike } from "../services/ollamaTypes.js";
import { logger } from "../utils/logger.js";

const generateBodySchema = z.object({
  prompt: z.string().min(1),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).optional(),
  max_tokens: z.number().int().positive().optional(),
  context: z.string().optional(),
  system_prompt: z.string().optional()
}) satisfies z.ZodType<GenerateRequest>;

interface CreateGenerateRouterOptions {
  ollamaService?: OllamaServiceLike;
}

export function createGenerateRouter(options: CreateGenerateRouterOptions = {}): Router {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();

  const generateRouter = Router();

  generateRouter.post("/", validate({ body: generateBodySchema }), async (req, res) => {
    const body = req.body as GenerateRequest;

    try {
      const response: GenerateResponse = await ollamaService.generate({
        prompt: body.prompt,
        model: body.model,
        temperature: body.temperature,
        maxTokens: body.max_tokens,
        context: body.context,
        systemPrompt: body.system_prompt
      });
      return res.json(response);
    } catch (error) {
      const failure = describeOllamaFailure("Generation", error);
      logger.error({ err: error, model: body.model }, "Generation failed");
      return res.status(failure.statusCode).json(failure.body);
    }
  });

  return generateRouter;
}
