import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { ChatResponse } from "@regintel/shared";
import type { AppConfig } from "../config.js";
import { validate } from "../middleware/validator.js";
import type { ChatService } from "../services/ChatService.js";
import type { ChatReplyResult } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";

const chatMessageSchema = z.object({
  role: z.enum(["user", "assistant", "system"]),
  content: z.string()
});

export const chatRequestSchema = z.object({
  message: z.string().trim().min(1),
  conversation_history: z.array(chatMessageSchema).default([]),
  top_k: z.coerce.number().int().min(1).max(20).optional()
});

type ChatRequestBody = z.infer<typeof chatRequestSchema>;

const collectionParamsSchema = z.object({
  collection: z.string().min(1)
});

export const NOT_CONFIGURED_REPLY =
  "OpenAI client not available. Please check your API key configuration.";
export const GENERIC_ERROR_REPLY =
  "I encountered an error while processing your request. Please try again later.";

interface CreateChatRouterOptions {
  chatService: ChatService;
  defaultCollection: string;
  errorDetail?: AppConfig["CHAT_ERROR_DETAIL"];
}

/** Turns a reply result into the text the caller sees. */
export function renderReply(
  reply: ChatReplyResult,
  errorDetail: AppConfig["CHAT_ERROR_DETAIL"] = "full"
): string {
  if (reply.ok) {
    return reply.text;
  }
  if (reply.kind === "not_configured") {
    return NOT_CONFIGURED_REPLY;
  }
  if (errorDetail === "generic") {
    return GENERIC_ERROR_REPLY;
  }
  return `I encountered an error while processing your request: ${reply.detail}`;
}

export function createChatRouter(options: CreateChatRouterOptions): Router {
  const { chatService, defaultCollection } = options;
  const errorDetail = options.errorDetail ?? "full";

  const chatRouter = Router();

  const handleChat = async (req: Request, res: Response, collection: string) => {
    const body: ChatRequestBody = req.body;

    try {
      const result = await chatService.answer({
        message: body.message,
        history: body.conversation_history,
        collection,
        topK: body.top_k
      });

      if (!result.reply.ok) {
        logger.warn(
          { collection, kind: result.reply.kind, detail: result.reply.detail },
          "Chat reply degraded"
        );
      }

      const response: ChatResponse = {
        response: renderReply(result.reply, errorDetail),
        sources: result.sources
      };
      return res.json(response);
    } catch (error) {
      logger.error({ err: error, collection }, "Internal error in chat endpoint");
      return res.status(500).json({ error: "Internal server error" });
    }
  };

  chatRouter.post("/", validate({ body: chatRequestSchema }), (req, res) =>
    handleChat(req, res, defaultCollection)
  );

  chatRouter.post(
    "/:collection",
    validate({ params: collectionParamsSchema, body: chatRequestSchema }),
    (req, res) => handleChat(req, res, req.params.collection ?? defaultCollection)
  );

  return chatRouter;
}
