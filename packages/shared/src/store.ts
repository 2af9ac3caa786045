export type CollectionLoadState =
  | "LoadStateNotExist"
  | "LoadStateNotLoad"
  | "LoadStateLoading"
  | "LoadStateLoaded"
  | "unknown";

/** One raw search hit as returned by the vector database, output fields inlined. */
export type RawHit = Record<string, unknown>;

export interface VectorSearchQuery {
  vector: number[];
  collection: string;
  limit: number;
  outputFields: string[];
}

export interface VectorStore {
  isConfigured(): boolean;
  describeCollection(collection: string): Promise<CollectionLoadState>;
  loadCollection(collection: string): Promise<boolean>;
  search(query: VectorSearchQuery): Promise<RawHit[]>;
}
