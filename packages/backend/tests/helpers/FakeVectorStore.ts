import type {
  CollectionLoadState,
  RawHit,
  VectorSearchQuery,
  VectorStore
} from "@regintel/shared";

interface FakeVectorStoreOptions {
  hitsByCollection?: Record<string, RawHit[]>;
  loadState?: CollectionLoadState;
  configured?: boolean;
}

/** In-memory stand-in: returns seeded hits for known collections, nothing otherwise. */
export class FakeVectorStore implements VectorStore {
  readonly searches: VectorSearchQuery[] = [];

  private readonly hitsByCollection: Record<string, RawHit[]>;
  private readonly loadState: CollectionLoadState;
  private readonly configured: boolean;

  constructor(options: FakeVectorStoreOptions = {}) {
    this.hitsByCollection = options.hitsByCollection ?? {};
    this.loadState = options.loadState ?? "LoadStateLoaded";
    this.configured = options.configured ?? true;
  }

  isConfigured(): boolean {
    return this.configured;
  }

  async describeCollection(collection: string): Promise<CollectionLoadState> {
    return collection in this.hitsByCollection ? this.loadState : "LoadStateNotExist";
  }

  async loadCollection(collection: string): Promise<boolean> {
    return collection in this.hitsByCollection;
  }

  async search(query: VectorSearchQuery): Promise<RawHit[]> {
    this.searches.push(query);
    return (this.hitsByCollection[query.collection] ?? []).slice(0, query.limit);
  }
}
