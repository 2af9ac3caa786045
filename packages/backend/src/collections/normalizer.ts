import type { RawHit, SourceMetadata, SourceRecord } from "@regintel/shared";
import type { CollectionSchema } from "./schemas.js";

export function normalizeHit(
  hit: RawHit,
  collection: string,
  schema: CollectionSchema
): SourceRecord {
  const metadata: SourceMetadata = {};
  for (const field of schema.metadataFields) {
    metadata[field.name] =
      field.type === "list"
        ? readList(hit[field.name])
        : readText(hit[field.name]) ?? field.fallback ?? "";
  }

  return {
    title: firstText(hit, schema.titleFields) ?? schema.titleFallback,
    content: firstText(hit, schema.contentFields) ?? "",
    metadata,
    collection
  };
}

export function normalizeHits(
  hits: RawHit[],
  collection: string,
  schema: CollectionSchema
): SourceRecord[] {
  return hits.map((hit) => normalizeHit(hit, collection, schema));
}

function firstText(hit: RawHit, fields: string[]): string | undefined {
  for (const field of fields) {
    const value = readText(hit[field]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function readText(value: unknown): string | undefined {
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value !== "string" || value.trim().length === 0) {
    return undefined;
  }
  return value;
}

// List fields arrive as arrays or as JSON-encoded VARCHAR columns.
function readList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => {
      const text = readText(item);
      return text === undefined ? [] : [text];
    });
  }

  const text = readText(value)?.trim();
  if (text === undefined) {
    return [];
  }
  if (text.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (Array.isArray(parsed)) {
        return readList(parsed);
      }
    } catch {
      return [text];
    }
  }
  return [text];
}
