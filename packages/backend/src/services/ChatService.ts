import type { ChatMessage, SourceRecord, VectorStore } from "@regintel/shared";
import type { CollectionRegistry } from "../collections/CollectionRegistry.js";
import { normalizeHits } from "../collections/normalizer.js";
import { outputFieldsFor } from "../collections/schemas.js";
import {
  CONTENT_PREVIEW_LENGTH,
  MAX_CONTEXT_SOURCES,
  assembleContext,
  detectCollectionType,
  type AssembledContext
} from "./contextAssembler.js";
import type { ChatClientLike, ChatReplyResult, EmbeddingClientLike } from "./llmTypes.js";

interface ChatServiceOptions {
  historyLimit: number;
  maxContextSources: number;
  contentLimit: number;
  topK: number;
}

const defaultOptions: ChatServiceOptions = {
  historyLimit: 5,
  maxContextSources: MAX_CONTEXT_SOURCES,
  contentLimit: CONTENT_PREVIEW_LENGTH,
  topK: 5
};

export interface ChatTurnInput {
  message: string;
  history: ChatMessage[];
  collection: string;
  topK?: number;
}

export interface ChatTurnResult {
  reply: ChatReplyResult;
  sources: SourceRecord[];
  context: AssembledContext;
}

export interface ContextPreview {
  sources: SourceRecord[];
  context: AssembledContext;
}

/**
 * One retrieval-augmented chat turn: embed, search, normalize, assemble, generate.
 * Each stage runs after the previous one resolves.
 */
export class ChatService {
  private readonly options: ChatServiceOptions;

  constructor(
    private readonly embeddingClient: EmbeddingClientLike,
    private readonly vectorStore: VectorStore,
    private readonly chatClient: ChatClientLike,
    private readonly registry: CollectionRegistry,
    options: Partial<ChatServiceOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async retrieveSources(message: string, collection: string, topK?: number): Promise<SourceRecord[]> {
    const embedding = await this.embeddingClient.generateEmbedding(message);
    if (embedding.length === 0) {
      return [];
    }

    const schema = this.registry.resolve(collection);
    const hits = await this.vectorStore.search({
      vector: embedding,
      collection,
      limit: topK ?? this.options.topK,
      outputFields: outputFieldsFor(schema)
    });

    return normalizeHits(hits, collection, schema);
  }

  buildContext(sources: SourceRecord[], contentLimit = this.options.contentLimit): AssembledContext {
    return assembleContext(sources, detectCollectionType(sources), this.registry, {
      maxSources: this.options.maxContextSources,
      contentLimit
    });
  }

  async previewContext(
    message: string,
    collection: string,
    contentLimit: number
  ): Promise<ContextPreview> {
    const sources = await this.retrieveSources(message, collection);
    return {
      sources,
      context: this.buildContext(sources, contentLimit)
    };
  }

  async answer(input: ChatTurnInput): Promise<ChatTurnResult> {
    const sources = await this.retrieveSources(input.message, input.collection, input.topK);
    const context = this.buildContext(sources);

    const reply = await this.chatClient.generateReply({
      message: input.message,
      history: input.history.slice(-this.options.historyLimit),
      context: context.text,
      promptVariant: context.promptVariant
    });

    return { reply, sources, context };
  }
}
