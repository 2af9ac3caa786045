import { describe, expect, it } from "vitest";
import type { ChatMessage } from "@regintel/shared";
import { CollectionRegistry } from "../../../src/collections/CollectionRegistry.js";
import { ChatService } from "../../../src/services/ChatService.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";
import { FakeVectorStore } from "../../helpers/FakeVectorStore.js";
import { rssHits, warningLetterHits } from "../../helpers/fixtures.js";

const registry = CollectionRegistry.fromConfig({
  RSS_FEEDS_COLLECTION: "rss_feeds",
  FDA_WARNING_LETTERS_COLLECTION: "fda_warning_letters"
});

function setup(llm = new FakeLLMService()) {
  const store = new FakeVectorStore({
    hitsByCollection: {
      rss_feeds: rssHits,
      fda_warning_letters: warningLetterHits
    }
  });
  const service = new ChatService(llm, store, llm, registry);
  return { llm, store, service };
}

function history(length: number): ChatMessage[] {
  return Array.from({ length }, (_, index): ChatMessage => ({
    role: index % 2 === 0 ? "user" : "assistant",
    content: `turn ${index + 1}`
  }));
}

describe("ChatService", () => {
  it("skips the search when the embedding is empty", async () => {
    const { llm, store, service } = setup(new FakeLLMService({ embedding: [] }));

    const result = await service.answer({
      message: "Any news?",
      history: [],
      collection: "rss_feeds"
    });

    expect(store.searches).toHaveLength(0);
    expect(result.sources).toEqual([]);
    expect(llm.lastReplyInput?.context).toBe("");
    expect(llm.lastReplyInput?.promptVariant).toBe("general");
  });

  it("searches the collection with its output fields and the configured limit", async () => {
    const { store, service } = setup();

    await service.answer({ message: "Pump clearance", history: [], collection: "rss_feeds" });

    expect(store.searches).toEqual([
      {
        vector: [0.1, 0.2, 0.3, 0.4],
        collection: "rss_feeds",
        limit: 5,
        outputFields: [
          "text_content",
          "article_title",
          "published_date",
          "feed_name",
          "chunk_type",
          "companies",
          "products",
          "regulations",
          "regulatory_bodies"
        ]
      }
    ]);
  });

  it("returns every hit but puts only three into the prompt", async () => {
    const { llm, service } = setup();

    const result = await service.answer({
      message: "Pump clearance",
      history: [],
      collection: "rss_feeds"
    });

    expect(result.sources).toHaveLength(5);
    expect(result.context.sourceCount).toBe(3);
    const numbered = (llm.lastReplyInput?.context ?? "")
      .split("\n")
      .filter((line) => /^\d+\. /.test(line));
    expect(numbered).toHaveLength(3);
  });

  it("honours a per-request top-k", async () => {
    const { service } = setup();

    const result = await service.answer({
      message: "Pump clearance",
      history: [],
      collection: "rss_feeds",
      topK: 2
    });

    expect(result.sources.map((source) => source.title)).toEqual([
      "Acme infusion pump cleared",
      "Draft cybersecurity guidance"
    ]);
  });

  it("passes only the last five history entries to the chat client", async () => {
    const { llm, service } = setup();

    await service.answer({
      message: "And then?",
      history: history(8),
      collection: "rss_feeds"
    });

    expect(llm.lastReplyInput?.history.map((message) => message.content)).toEqual([
      "turn 4",
      "turn 5",
      "turn 6",
      "turn 7",
      "turn 8"
    ]);
  });

  it("selects the compliance prompt for warning letters", async () => {
    const { llm, service } = setup();

    const result = await service.answer({
      message: "Which violations were cited?",
      history: [],
      collection: "fda_warning_letters"
    });

    expect(result.sources).toHaveLength(1);
    expect(llm.lastReplyInput?.promptVariant).toBe("compliance");
    expect(llm.lastReplyInput?.message).toBe("Which violations were cited?");
  });

  it("returns no sources for an unknown collection", async () => {
    const { llm, store, service } = setup();

    const result = await service.answer({
      message: "Anything?",
      history: [],
      collection: "unknown_collection"
    });

    expect(store.searches).toHaveLength(1);
    expect(result.sources).toEqual([]);
    expect(llm.lastReplyInput?.promptVariant).toBe("general");
  });

  it("hands back a failed reply as a result", async () => {
    const { service } = setup(
      new FakeLLMService({ reply: { ok: false, kind: "provider_error", detail: "rate limited" } })
    );

    const result = await service.answer({ message: "Hi", history: [], collection: "rss_feeds" });

    expect(result.reply).toEqual({ ok: false, kind: "provider_error", detail: "rate limited" });
    expect(result.sources).toHaveLength(5);
  });

  it("previews the context with a custom excerpt length without calling the model", async () => {
    const { llm, service } = setup();

    const preview = await service.previewContext("Violations", "fda_warning_letters", 10);

    expect(llm.replyInputs).toHaveLength(0);
    expect(preview.context.text).toBe(
      [
        "Relevant sources from FDA Warning Letters:",
        "1. Sample Vapor Co - Company: Sample Vapor Co, Date: 2025-05-12",
        "   The firm f..."
      ].join("\n")
    );
  });
});
