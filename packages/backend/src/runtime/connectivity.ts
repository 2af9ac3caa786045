import type { DependencyStatus, HealthResponse } from "@regintel/shared";
import type { RagRuntime } from "./ragRuntime.js";

export type DependencyChecks = HealthResponse["checks"];

function toStatus(configured: boolean): DependencyStatus {
  return configured ? "configured" : "not_configured";
}

// Reports configuration only; nothing here calls out to the providers.
export function checkDependencies(
  runtime: Pick<RagRuntime, "chatClient" | "embeddingClient" | "vectorStore">
): DependencyChecks {
  return {
    llm: toStatus(runtime.chatClient.isConfigured() && runtime.embeddingClient.isConfigured()),
    vectorDb: toStatus(runtime.vectorStore.isConfigured())
  };
}
