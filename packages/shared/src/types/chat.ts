export type ChatRole = "user" | "assistant" | "system";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatRequest {
  message: string;
  conversation_history: ChatMessage[];
  top_k?: number;
}

export type SourceMetadata = Record<string, string | string[]>;

export interface SourceRecord {
  title: string;
  content: string;
  metadata: SourceMetadata;
  collection: string;
}

export interface ChatResponse {
  response: string;
  sources: SourceRecord[];
}

export type PromptVariant = "news" | "compliance" | "general";
