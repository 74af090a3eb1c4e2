import type { CollectionName, MetadataFilter, StoredVector } from "../types";

/** A stored vector paired with its cosine distance to the query vector. */
export interface ScoredVector {
  readonly record: StoredVector;
  readonly distance: number;
}

/**
 * Engine contract behind the document store: upsert-by-id, filtered
 * nearest-neighbour query (cosine distance, ascending), delete-by-id and
 * clear-collection. Must be idempotent on upsert and tolerate concurrent
 * callers.
 */
export interface VectorBackend {
  /** Short label reported in status output, e.g. "file" or "memory". */
  readonly kind: string;

  upsert(collection: CollectionName, record: StoredVector): Promise<void>;

  /**
   * @param vector Query embedding.
   * @param topK   Maximum number of hits (> 0).
   * @param filter Optional exact-equality metadata filter.
   */
  query(
    collection: CollectionName,
    vector: Float32Array,
    topK: number,
    filter?: MetadataFilter,
  ): Promise<ScoredVector[]>;

  /** Remove a record if present; absence is not an error. */
  delete(collection: CollectionName, id: string): Promise<void>;

  clear(collection: CollectionName): Promise<void>;

  count(collection: CollectionName): Promise<number>;
}
