import type { CollectionSummary } from "@regintel/shared";
import type { AppConfig } from "../config.js";
import { collectionSchemas, type CollectionSchema } from "./schemas.js";

export interface CollectionEntry {
  id: string;
  schema: CollectionSchema;
}

/**
 * Maps collection identifiers to their schema descriptors. Identifiers the registry
 * does not know resolve to the fallback schema (the news feed layout).
 */
export class CollectionRegistry {
  private readonly entries = new Map<string, CollectionEntry>();

  constructor(
    entries: CollectionEntry[],
    private readonly fallback: CollectionSchema = collectionSchemas.rss_feeds
  ) {
    for (const entry of entries) {
      this.entries.set(entry.id, entry);
    }
  }

  static fromConfig(
    config: Pick<AppConfig, "RSS_FEEDS_COLLECTION" | "FDA_WARNING_LETTERS_COLLECTION">
  ): CollectionRegistry {
    return new CollectionRegistry([
      { id: config.RSS_FEEDS_COLLECTION, schema: collectionSchemas.rss_feeds },
      { id: config.FDA_WARNING_LETTERS_COLLECTION, schema: collectionSchemas.fda_warning_letters }
    ]);
  }

  list(): CollectionEntry[] {
    return [...this.entries.values()];
  }

  summaries(): CollectionSummary[] {
    return this.list().map(({ id, schema }) => ({
      id,
      name: schema.displayName,
      description: schema.description
    }));
  }

  find(collection: string): CollectionSchema | undefined {
    return this.entries.get(collection)?.schema;
  }

  resolve(collection: string): CollectionSchema {
    return this.find(collection) ?? this.fallback;
  }
}
