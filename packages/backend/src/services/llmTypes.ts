import type OpenAI from "openai";
import type { ChatMessage, PromptVariant } from "@regintel/shared";

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatReplyInput {
  message: string;
  history: ChatMessage[];
  context: string;
  promptVariant: PromptVariant;
}

export type ChatFailureKind = "not_configured" | "provider_error" | "empty_response";

export type ChatReplyResult =
  | { ok: true; text: string }
  | { ok: false; kind: ChatFailureKind; detail: string };

/** The subset of the OpenAI SDK surface the service calls. */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
    };
  };
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

export interface EmbeddingClientLike {
  isConfigured(): boolean;
  /** Resolves to an empty vector on any failure; never rejects. */
  generateEmbedding(text: string): Promise<number[]>;
}

export interface ChatClientLike {
  isConfigured(): boolean;
  /** Resolves to a failure result instead of rejecting. */
  generateReply(input: ChatReplyInput): Promise<ChatReplyResult>;
}
