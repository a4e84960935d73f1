import { Router } from "express";
import { z } from "zod";
import type { ChatRequest, ChatResponse } from "@graphrag-demo/shared";
import { validate } from "../middleware/validator.js";
import { getOllamaServiceSingleton } from "../runtime/ollamaRuntime.js";
import { describeOllamaFailure } from "../services/ollamaErrors.js";
import type { OllamaServiceLike } from "../services/ollamaTypes.js";
import { logger } from "../utils/logger.js";

const chatMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string()
});

const chatBodySchema = z.object({
  messages: z.array(chatMessageSchema).min(1),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).optional(),
  max_tokens: z.number().int().positive().optional()
}) satisfies z.ZodType<ChatRequest>;

interface CreateChatRouterOptions {
  ollamaService?: OllamaServiceLike;
}

export function createChatRouter(options: CreateChatRouterOptions = {}): Router {
  const ollamaService = options.ollamaService ?? getOllamaServiceSingleton();

  const chatRouter = Router();

  chatRouter.post("/", validate({ body: chatBodySchema }), async (req, res) => {
    const body = req.body as ChatRequest;

    try {
      const response: ChatResponse = await ollamaService.chat({
        messages: body.messages,
        model: body.model,
        temperature: body.temperature,
        maxTokens: body.max_tokens
      });
      return res.json(response);
    } catch (error) {
      const failure = describeOllamaFailure("Chat completion", error);
      logger.error(
        { err: error, model: body.model, messageCount: body.messages.length },
        "Chat completion failed"
      );
      return res.status(failure.statusCode).json(failure.body);
    }
  });

  return chatRouter;
}
