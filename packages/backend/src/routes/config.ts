import { Router } from "express";
import type { GetConfigResponse } from "@regintel/shared";
import type { CollectionRegistry } from "../collections/CollectionRegistry.js";
import type { AppConfig } from "../config.js";
import type { DependencyChecks } from "../runtime/connectivity.js";

interface CreateConfigRouterOptions {
  config: AppConfig;
  registry: CollectionRegistry;
  checkDependencies: () => DependencyChecks;
}

/** Read-only snapshot of the non-secret settings. */
export function createConfigRouter(options: CreateConfigRouterOptions): Router {
  const { config, registry } = options;

  const configRouter = Router();

  configRouter.get("/", (_req, res) => {
    const response: GetConfigResponse = {
      config: {
        nodeEnv: config.NODE_ENV,
        chatModel: config.CHAT_MODEL,
        embeddingModel: config.EMBEDDING_MODEL,
        defaultCollection: config.DEFAULT_COLLECTION,
        collections: registry.list().map((entry) => entry.id),
        searchTopK: config.SEARCH_TOP_K,
        strictRagOnly: config.STRICT_RAG_ONLY,
        enableReranking: config.ENABLE_RERANKING,
        rerankingModel: config.RERANKING_MODEL,
        initialSearchMultiplier: config.INITIAL_SEARCH_MULTIPLIER,
        chatErrorDetail: config.CHAT_ERROR_DETAIL,
        checks: options.checkDependencies()
      }
    };
    res.json(response);
  });

  return configRouter;
}
