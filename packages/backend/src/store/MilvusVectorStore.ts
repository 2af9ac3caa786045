import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type {
  CollectionLoadState,
  RawHit,
  VectorSearchQuery,
  VectorStore
} from "@regintel/shared";
import type { AppConfig } from "../config.js";
import { logger } from "../utils/logger.js";

export interface MilvusVectorStoreConfig {
  uri: string;
  token: string;
  vectorField: string;
}

export type MilvusHttpClient = Pick<AxiosInstance, "post">;

const envelopeSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
  data: z.unknown().optional()
});

const describeDataSchema = z.object({
  load: z
    .enum(["LoadStateNotExist", "LoadStateNotLoad", "LoadStateLoading", "LoadStateLoaded"])
    .optional()
});

const searchDataSchema = z.array(z.record(z.unknown()));

type MilvusEnvelope = z.infer<typeof envelopeSchema>;

const SEARCH_PARAMS = {
  metricType: "COSINE",
  params: { nprobe: 10 }
} as const;

/**
 * Client for the Milvus / Zilliz Cloud REST v2 API. Every failure degrades to an
 * empty or "unknown" result so retrieval never breaks a chat turn.
 */
export class MilvusVectorStore implements VectorStore {
  private readonly http: MilvusHttpClient | null;

  constructor(
    private readonly config: MilvusVectorStoreConfig,
    deps?: { http?: MilvusHttpClient }
  ) {
    if (deps?.http) {
      this.http = deps.http;
    } else if (config.uri.trim().length > 0 && config.token.trim().length > 0) {
      this.http = axios.create({
        baseURL: config.uri.replace(/\/+$/, ""),
        headers: {
          Authorization: `Bearer ${config.token}`,
          "Content-Type": "application/json"
        },
        validateStatus: () => true
      });
    } else {
      this.http = null;
    }
  }

  static fromConfig(config: AppConfig): MilvusVectorStore {
    return new MilvusVectorStore({
      uri: config.MILVUS_URI,
      token: config.MILVUS_TOKEN,
      vectorField: config.MILVUS_VECTOR_FIELD
    });
  }

  isConfigured(): boolean {
    return this.http !== null;
  }

  async describeCollection(collection: string): Promise<CollectionLoadState> {
    const envelope = await this.call("/v2/vectordb/collections/describe", {
      collectionName: collection
    });
    if (!envelope) {
      return "unknown";
    }

    const parsed = describeDataSchema.safeParse(envelope.data);
    return parsed.success ? parsed.data.load ?? "unknown" : "unknown";
  }

  async loadCollection(collection: string): Promise<boolean> {
    const envelope = await this.call("/v2/vectordb/collections/load", {
      collectionName: collection
    });
    return envelope !== null;
  }

  async search(query: VectorSearchQuery): Promise<RawHit[]> {
    if (query.vector.length === 0) {
      return [];
    }
    if (!this.http) {
      logger.warn({ collection: query.collection }, "Vector database is not configured, skipping search");
      return [];
    }

    await this.ensureLoaded(query.collection);

    const envelope = await this.call("/v2/vectordb/entities/search", {
      collectionName: query.collection,
      data: [query.vector],
      annsField: this.config.vectorField,
      limit: query.limit,
      outputFields: query.outputFields,
      searchParams: SEARCH_PARAMS
    });
    if (!envelope) {
      return [];
    }

    const hits = searchDataSchema.safeParse(envelope.data);
    if (!hits.success) {
      logger.warn({ collection: query.collection }, "Vector search returned no hit list");
      return [];
    }

    return hits.data;
  }

  // Loading is a warm-up: the search runs whether or not it succeeds.
  private async ensureLoaded(collection: string): Promise<void> {
    const state = await this.describeCollection(collection);
    if (state !== "LoadStateNotLoad") {
      return;
    }

    const loaded = await this.loadCollection(collection);
    logger.info({ collection, loaded }, "Requested collection load");
  }

  private async call(path: string, body: Record<string, unknown>): Promise<MilvusEnvelope | null> {
    if (!this.http) {
      return null;
    }

    const collection = body.collectionName;
    try {
      const response = await this.http.post(path, body);
      if (response.status !== 200) {
        logger.warn({ path, collection, statusCode: response.status }, "Vector database request failed");
        return null;
      }

      const envelope = envelopeSchema.safeParse(response.data);
      if (!envelope.success) {
        logger.warn({ path, collection }, "Vector database returned an unexpected body");
        return null;
      }
      if (envelope.data.code !== undefined && envelope.data.code !== 0) {
        logger.warn(
          { path, collection, code: envelope.data.code, message: envelope.data.message },
          "Vector database returned an error code"
        );
        return null;
      }

      return envelope.data;
    } catch (error) {
      logger.error({ err: error, path, collection }, "Vector database request errored");
      return null;
    }
  }
}
