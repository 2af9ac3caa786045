import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const envFlag = (defaultValue: boolean) =>
  z
    .string()
    .default(String(defaultValue))
    .transform((value) => value.trim().toLowerCase() === "true");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().default("*"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  CHAT_MODEL: z.string().min(1).default("gpt-4"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-large"),
  MILVUS_URI: z.string().default(""),
  MILVUS_TOKEN: z.string().default(""),
  MILVUS_VECTOR_FIELD: z.string().min(1).default("text_vector"),
  RSS_FEEDS_COLLECTION: z.string().min(1).default("rss_feeds"),
  FDA_WARNING_LETTERS_COLLECTION: z.string().min(1).default("fda_warning_letters"),
  DEFAULT_COLLECTION: z.string().default(""),
  SEARCH_TOP_K: z.coerce.number().int().min(1).max(20).default(5),
  // Parsed and reported, never consulted by retrieval.
  STRICT_RAG_ONLY: envFlag(true),
  ENABLE_RERANKING: envFlag(false),
  RERANKING_MODEL: z.string().default("o3"),
  INITIAL_SEARCH_MULTIPLIER: z.coerce.number().int().positive().default(3),
  CHAT_ERROR_DETAIL: z.enum(["full", "generic"]).default("full"),
  ENABLE_DEBUG_ROUTES: envFlag(false)
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    ...parsed,
    DEFAULT_COLLECTION: parsed.DEFAULT_COLLECTION.trim() || parsed.RSS_FEEDS_COLLECTION
  };
}

export const appConfig: AppConfig = parseConfig(process.env);
