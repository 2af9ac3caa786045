import type { VectorStore } from "@regintel/shared";
import { CollectionRegistry } from "../collections/CollectionRegistry.js";
import type { AppConfig } from "../config.js";
import { ChatService } from "../services/ChatService.js";
import { LLMService } from "../services/LLMService.js";
import type { ChatClientLike, EmbeddingClientLike } from "../services/llmTypes.js";
import { MilvusVectorStore } from "../store/MilvusVectorStore.js";

/** Everything a request handler needs, built once at start-up and passed in. */
export interface RagRuntime {
  config: AppConfig;
  registry: CollectionRegistry;
  embeddingClient: EmbeddingClientLike;
  chatClient: ChatClientLike;
  vectorStore: VectorStore;
  chatService: ChatService;
  startTime: number;
}

export interface RagRuntimeOverrides {
  embeddingClient?: EmbeddingClientLike;
  chatClient?: ChatClientLike;
  vectorStore?: VectorStore;
  startTime?: number;
}

export function createRagRuntime(config: AppConfig, overrides: RagRuntimeOverrides = {}): RagRuntime {
  const registry = CollectionRegistry.fromConfig(config);

  let llmService: LLMService | null = null;
  const getLLMService = (): LLMService => {
    if (!llmService) {
      llmService = LLMService.fromConfig(config);
    }
    return llmService;
  };

  const embeddingClient = overrides.embeddingClient ?? getLLMService();
  const chatClient = overrides.chatClient ?? getLLMService();
  const vectorStore = overrides.vectorStore ?? MilvusVectorStore.fromConfig(config);

  return {
    config,
    registry,
    embeddingClient,
    chatClient,
    vectorStore,
    chatService: new ChatService(embeddingClient, vectorStore, chatClient, registry, {
      topK: config.SEARCH_TOP_K
    }),
    startTime: overrides.startTime ?? Date.now()
  };
}
