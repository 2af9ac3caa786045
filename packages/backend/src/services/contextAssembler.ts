import type { PromptVariant, SourceRecord } from "@regintel/shared";
import type { CollectionRegistry } from "../collections/CollectionRegistry.js";

export const MAX_CONTEXT_SOURCES = 3;
export const CONTENT_PREVIEW_LENGTH = 200;
export const DEBUG_CONTENT_PREVIEW_LENGTH = 1200;

export interface AssembleContextOptions {
  maxSources?: number;
  contentLimit?: number;
}

export interface AssembledContext {
  text: string;
  promptVariant: PromptVariant;
  sourceCount: number;
}

/**
 * Collection type of a result set, read from its first record. A mixed result set
 * is labelled after whichever collection happens to come first.
 */
export function detectCollectionType(sources: SourceRecord[]): string | null {
  return sources[0]?.collection ?? null;
}

export function assembleContext(
  sources: SourceRecord[],
  collectionType: string | null,
  registry: CollectionRegistry,
  options: AssembleContextOptions = {}
): AssembledContext {
  const maxSources = options.maxSources ?? MAX_CONTEXT_SOURCES;
  const contentLimit = options.contentLimit ?? CONTENT_PREVIEW_LENGTH;
  const schema = collectionType === null ? undefined : registry.find(collectionType);
  const promptVariant: PromptVariant = schema?.promptVariant ?? "general";
  // Unknown collections were normalized with the fallback layout, so attribute them by it.
  const layout = collectionType === null ? undefined : registry.resolve(collectionType);

  const selected = sources.slice(0, Math.min(maxSources, MAX_CONTEXT_SOURCES));
  if (selected.length === 0) {
    return { text: "", promptVariant, sourceCount: 0 };
  }

  const heading = schema ? `Relevant sources from ${schema.displayName}:` : "Relevant sources:";
  const blocks = selected.map((source, index) => {
    const attribution = (layout?.attribution ?? [])
      .map(({ label, field }) => `${label}: ${formatValue(source.metadata[field])}`)
      .join(", ");
    const header = attribution
      ? `${index + 1}. ${source.title} - ${attribution}`
      : `${index + 1}. ${source.title}`;
    return `${header}\n   ${excerpt(source.content, contentLimit)}...`;
  });

  return {
    text: [heading, ...blocks].join("\n"),
    promptVariant,
    sourceCount: selected.length
  };
}

// Counts code points so a surrogate pair is never split.
function excerpt(content: string, limit: number): string {
  return Array.from(content).slice(0, limit).join("");
}

function formatValue(value: string | string[] | undefined): string {
  if (value === undefined) {
    return "Unknown";
  }
  return Array.isArray(value) ? value.join(", ") : value;
}
