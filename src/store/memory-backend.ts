import { EmbeddingService } from "../embeddings";
import { InvalidArgumentError } from "../errors";
import type { CollectionName, Metadata, MetadataFilter, StoredVector } from "../types";
import type { ScoredVector, VectorBackend } from "./backend";

function matchesFilter(metadata: Metadata, filter: MetadataFilter | undefined): boolean {
  if (!filter) return true;
  for (const [key, expected] of Object.entries(filter)) {
    if (metadata[key] !== expected) return false;
  }
  return true;
}

/**
 * In-process vector backend: every collection is a Map scanned linearly on
 * query. Read-after-write consistent for the lifetime of the process and NOT
 * durable. Used directly (VECTOR_STORE=memory), in tests, and as the degraded
 * backend when the persistent one cannot be opened.
 */
export class MemoryVectorBackend implements VectorBackend {
  public readonly kind: string = "memory";

  protected readonly collections: Record<CollectionName, Map<string, StoredVector>> = {
    materials: new Map(),
    questions: new Map(),
  };

  public async upsert(collection: CollectionName, record: StoredVector): Promise<void> {
    this.put(collection, record);
  }

  public async query(
    collection: CollectionName,
    vector: Float32Array,
    topK: number,
    filter?: MetadataFilter,
  ): Promise<ScoredVector[]> {
    const scored: ScoredVector[] = [];
    for (const record of this.collections[collection].values()) {
      if (!matchesFilter(record.metadata, filter)) continue;
      scored.push({ record, distance: 1 - EmbeddingService.cosine(record.embedding, vector) });
    }
    // Array#sort is stable, so equal distances keep insertion order.
    scored.sort((a, b) => a.distance - b.distance);
    return scored.slice(0, topK);
  }

  public async delete(collection: CollectionName, id: string): Promise<void> {
    this.collections[collection].delete(id);
  }

  public async clear(collection: CollectionName): Promise<void> {
    this.collections[collection].clear();
  }

  public async count(collection: CollectionName): Promise<number> {
    return this.collections[collection].size;
  }

  /**
   * Insert or replace a record synchronously.
   * @returns The record previously stored under the id, if any.
   * @throws {InvalidArgumentError} On an embedding dimension that differs from the collection's.
   */
  protected put(collection: CollectionName, record: StoredVector): StoredVector | undefined {
    const map = this.collections[collection];
    const expected = this.dimensionOf(collection);
    if (expected !== undefined && expected !== record.embedding.length) {
      throw new InvalidArgumentError(
        `Embedding dimension ${record.embedding.length} does not match collection '${collection}' (${expected})`,
      );
    }
    const previous = map.get(record.id);
    map.set(record.id, record);
    return previous;
  }

  private dimensionOf(collection: CollectionName): number | undefined {
    for (const record of this.collections[collection].values()) {
      return record.embedding.length;
    }
    return undefined;
  }
}
