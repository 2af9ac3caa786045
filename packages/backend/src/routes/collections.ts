import { Router } from "express";
import { z } from "zod";
import type {
  CollectionStatusResponse,
  ListCollectionsResponse,
  VectorStore
} from "@regintel/shared";
import type { CollectionRegistry } from "../collections/CollectionRegistry.js";
import { validate } from "../middleware/validator.js";
import { logger } from "../utils/logger.js";

const collectionParamsSchema = z.object({
  collection: z.string().min(1)
});

interface CreateCollectionsRouterOptions {
  registry: CollectionRegistry;
  vectorStore: VectorStore;
}

export function createCollectionsRouter(options: CreateCollectionsRouterOptions): Router {
  const { registry, vectorStore } = options;

  const collectionsRouter = Router();

  collectionsRouter.get("/", (_req, res) => {
    const response: ListCollectionsResponse = {
      collections: registry.summaries()
    };
    res.json(response);
  });

  collectionsRouter.get(
    "/:collection/status",
    validate({ params: collectionParamsSchema }),
    async (req, res) => {
      const collection = req.params.collection ?? "";
      try {
        const response: CollectionStatusResponse = {
          collection,
          loadState: await vectorStore.describeCollection(collection)
        };
        return res.json(response);
      } catch (error) {
        logger.error({ err: error, collection }, "Collection status lookup failed");
        return res.status(500).json({ error: "Internal server error" });
      }
    }
  );

  return collectionsRouter;
}
