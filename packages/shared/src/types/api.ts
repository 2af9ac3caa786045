import type { CollectionLoadState } from "../store.js";
import type { PromptVariant, SourceRecord } from "./chat.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export type DependencyStatus = "configured" | "not_configured";

export interface HealthResponse {
  status: "healthy";
  message: string;
  timestamp: string;
  uptimeSec: number;
  checks: {
    llm: DependencyStatus;
    vectorDb: DependencyStatus;
  };
}

export interface CollectionSummary {
  id: string;
  name: string;
  description: string;
}

export interface ListCollectionsResponse {
  collections: CollectionSummary[];
}

export interface CollectionStatusResponse {
  collection: string;
  loadState: CollectionLoadState;
}

export interface RssFeedItem {
  id: string;
  title: string;
  content: string;
  published_at: string;
  source: string;
}

export interface LatestRssFeedsResponse {
  feeds: RssFeedItem[];
}

export interface WarningLetterItem {
  id: string;
  title: string;
  content: string;
  issued_date: string;
  company: string;
  violations: string[];
}

export interface LatestWarningLettersResponse {
  warning_letters: WarningLetterItem[];
}

export interface AuthMeResponse {
  user: null;
  authenticated: false;
}

export interface AuthLoginResponse {
  message: string;
}

export interface GetConfigResponse {
  config: {
    nodeEnv: string;
    chatModel: string;
    embeddingModel: string;
    defaultCollection: string;
    collections: string[];
    searchTopK: number;
    strictRagOnly: boolean;
    enableReranking: boolean;
    rerankingModel: string;
    initialSearchMultiplier: number;
    chatErrorDetail: "full" | "generic";
    checks: HealthResponse["checks"];
  };
}

export interface DebugContextResponse {
  collection: string;
  promptVariant: PromptVariant;
  sourceCount: number;
  context: string;
  sources: SourceRecord[];
}
