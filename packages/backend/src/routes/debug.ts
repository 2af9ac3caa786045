import { Router } from "express";
import { z } from "zod";
import type { DebugContextResponse } from "@regintel/shared";
import { validate } from "../middleware/validator.js";
import type { ChatService } from "../services/ChatService.js";
import { DEBUG_CONTENT_PREVIEW_LENGTH } from "../services/contextAssembler.js";
import { logger } from "../utils/logger.js";

const debugParamsSchema = z.object({
  collection: z.string().min(1)
});

const debugBodySchema = z.object({
  message: z.string().trim().min(1)
});

type DebugBody = z.infer<typeof debugBodySchema>;

interface CreateDebugRouterOptions {
  chatService: ChatService;
}

/**
 * Shows the context a chat turn would send to the model, with the longer debug
 * excerpts, without calling the model.
 */
export function createDebugRouter(options: CreateDebugRouterOptions): Router {
  const debugRouter = Router();

  debugRouter.post(
    "/context/:collection",
    validate({ params: debugParamsSchema, body: debugBodySchema }),
    async (req, res) => {
      const collection = req.params.collection ?? "";
      const body: DebugBody = req.body;

      try {
        const preview = await options.chatService.previewContext(
          body.message,
          collection,
          DEBUG_CONTENT_PREVIEW_LENGTH
        );
        const response: DebugContextResponse = {
          collection,
          promptVariant: preview.context.promptVariant,
          sourceCount: preview.context.sourceCount,
          context: preview.context.text,
          sources: preview.sources
        };
        return res.json(response);
      } catch (error) {
        logger.error({ err: error, collection }, "Debug context build failed");
        return res.status(500).json({ error: "Internal server error" });
      }
    }
  );

  return debugRouter;
}
