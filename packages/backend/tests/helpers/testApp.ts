import type { VectorStore } from "@regintel/shared";
import { parseConfig } from "../../src/config.js";
import { createRagRuntime } from "../../src/runtime/ragRuntime.js";
import { createApp } from "../../src/server.js";
import { FakeLLMService } from "./FakeLLMService.js";
import { FakeVectorStore } from "./FakeVectorStore.js";
import { rssHits, warningLetterHits } from "./fixtures.js";

interface TestAppOptions<S extends VectorStore = VectorStore> {
  env?: Record<string, string>;
  llm?: FakeLLMService;
  store?: S;
  startTime?: number;
}

export function seededStore(): FakeVectorStore {
  return new FakeVectorStore({
    hitsByCollection: {
      rss_feeds: rssHits,
      fda_warning_letters: warningLetterHits
    }
  });
}

export function buildTestApp<S extends VectorStore = FakeVectorStore>(
  options: TestAppOptions<S> = {}
) {
  const llm = options.llm ?? new FakeLLMService();
  const store = options.store ?? seededStore();
  const config = parseConfig({ LOG_LEVEL: "silent", ...options.env });
  const runtime = createRagRuntime(config, {
    embeddingClient: llm,
    chatClient: llm,
    vectorStore: store,
    startTime: options.startTime
  });

  return { app: createApp(runtime), llm, store, runtime };
}
