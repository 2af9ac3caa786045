import type { PromptVariant } from "@regintel/shared";

export type CollectionKind = "rss_feeds" | "fda_warning_letters";

export interface MetadataFieldSpec {
  name: string;
  type: "text" | "list";
  /** Placeholder used when a text field is missing or blank. */
  fallback?: string;
}

export interface AttributionFieldSpec {
  label: string;
  field: string;
}

export interface CollectionSchema {
  kind: CollectionKind;
  displayName: string;
  description: string;
  /** Hit fields tried in order for the record body; the first one is requested from the store. */
  contentFields: string[];
  titleFields: string[];
  titleFallback: string;
  metadataFields: MetadataFieldSpec[];
  attribution: AttributionFieldSpec[];
  promptVariant: PromptVariant;
}

const TITLE_FIELDS = ["article_title", "company_name"];
const UNKNOWN_TITLE = "Unknown Title";

export const collectionSchemas = {
  rss_feeds: {
    kind: "rss_feeds",
    displayName: "Regulatory News",
    description: "RSS feeds from regulatory sources",
    contentFields: ["text_content", "content"],
    titleFields: TITLE_FIELDS,
    titleFallback: UNKNOWN_TITLE,
    metadataFields: [
      { name: "article_title", type: "text", fallback: UNKNOWN_TITLE },
      { name: "published_date", type: "text", fallback: "Unknown Date" },
      { name: "feed_name", type: "text", fallback: "Unknown Feed" },
      { name: "chunk_type", type: "text", fallback: "unknown" },
      { name: "companies", type: "list" },
      { name: "products", type: "list" },
      { name: "regulations", type: "list" },
      { name: "regulatory_bodies", type: "list" }
    ],
    attribution: [
      { label: "Feed", field: "feed_name" },
      { label: "Date", field: "published_date" }
    ],
    promptVariant: "news"
  },
  fda_warning_letters: {
    kind: "fda_warning_letters",
    displayName: "FDA Warning Letters",
    description: "FDA compliance documents",
    contentFields: ["text_content", "content"],
    titleFields: TITLE_FIELDS,
    titleFallback: UNKNOWN_TITLE,
    metadataFields: [
      { name: "company_name", type: "text", fallback: "Unknown Company" },
      { name: "letter_date", type: "text", fallback: "Unknown Date" },
      { name: "chunk_type", type: "text", fallback: "unknown" },
      { name: "chunk_id", type: "text", fallback: "unknown" },
      { name: "violations", type: "list" },
      { name: "required_actions", type: "list" },
      { name: "systemic_issues", type: "list" },
      { name: "regulatory_consequences", type: "list" },
      { name: "product_types", type: "list" },
      { name: "product_categories", type: "list" }
    ],
    attribution: [
      { label: "Company", field: "company_name" },
      { label: "Date", field: "letter_date" }
    ],
    promptVariant: "compliance"
  }
} satisfies Record<CollectionKind, CollectionSchema>;

export function outputFieldsFor(schema: CollectionSchema): string[] {
  const fields = [schema.contentFields[0], ...schema.metadataFields.map((field) => field.name)];
  return [...new Set(fields.filter((field): field is string => field !== undefined))];
}
