import OpenAI from "openai";
import { z } from "zod";
import type { ChatMessage } from "@regintel/shared";
import type { AppConfig } from "../config.js";
import { buildChatSystemPrompt, buildUserPrompt } from "../prompts/chat.js";
import { logger } from "../utils/logger.js";
import type {
  ChatClientLike,
  ChatReplyInput,
  ChatReplyResult,
  EmbeddingClientLike,
  LLMConfig,
  OpenAICompatibleClient
} from "./llmTypes.js";

const embeddingSchema = z.array(z.number()).min(1);

type NormalizedLLMConfig = LLMConfig & {
  temperature: number;
  maxTokens: number;
};

export class LLMService implements EmbeddingClientLike, ChatClientLike {
  private readonly client: OpenAICompatibleClient | null;
  private readonly config: NormalizedLLMConfig;

  constructor(config: LLMConfig, deps?: { client?: OpenAICompatibleClient }) {
    this.config = {
      ...config,
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 1000
    };

    if (deps?.client) {
      this.client = deps.client;
    } else if (config.apiKey.trim().length > 0) {
      this.client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL
      });
    } else {
      this.client = null;
    }
  }

  static fromConfig(config: AppConfig): LLMService {
    return new LLMService({
      apiKey: config.OPENAI_API_KEY,
      baseURL: config.OPENAI_BASE_URL,
      chatModel: config.CHAT_MODEL,
      embeddingModel: config.EMBEDDING_MODEL
    });
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    if (!this.client || text.trim().length === 0) {
      return [];
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.config.embeddingModel,
        input: text
      });
      const parsed = embeddingSchema.safeParse(response?.data?.[0]?.embedding);
      if (!parsed.success) {
        logger.error({ model: this.config.embeddingModel }, "Embedding response was malformed");
        return [];
      }
      return parsed.data;
    } catch (error) {
      logger.error({ err: error, model: this.config.embeddingModel }, "Embedding request failed");
      return [];
    }
  }

  async generateReply(input: ChatReplyInput): Promise<ChatReplyResult> {
    if (!this.client) {
      return { ok: false, kind: "not_configured", detail: "OpenAI API key is not configured" };
    }

    const messages: OpenAI.ChatCompletionMessageParam[] = [
      { role: "system", content: buildChatSystemPrompt(input.promptVariant) },
      ...input.history.map(toMessageParam),
      { role: "user", content: buildUserPrompt(input.message, input.context) }
    ];

    try {
      const response = await this.client.chat.completions.create({
        model: this.config.chatModel,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        messages
      });

      const content = response?.choices?.[0]?.message?.content ?? "";
      if (content.trim().length === 0) {
        return { ok: false, kind: "empty_response", detail: "The model returned an empty response" };
      }
      return { ok: true, text: content };
    } catch (error) {
      logger.error({ err: error, model: this.config.chatModel }, "Chat completion failed");
      return {
        ok: false,
        kind: "provider_error",
        detail: error instanceof Error ? error.message : String(error)
      };
    }
  }
}

function toMessageParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
}
