import type { EmbeddingService } from "../../src/embeddings";
import { HashingEmbeddings } from "../../src/hashing-embeddings";
import type { VectorBackend } from "../../src/store/backend";
import { createCollections, type DocumentStore, type StoreTimeouts } from "../../src/store/document-store";
import { MemoryVectorBackend } from "../../src/store/memory-backend";

export interface TestStoreOptions {
  embeddings?: EmbeddingService;
  backend?: VectorBackend;
  timeouts?: StoreTimeouts;
}

/** In-process store over the hashing embedder unless told otherwise. */
export function createTestStore(opts: TestStoreOptions = {}): DocumentStore {
  return createCollections(
    opts.backend ?? new MemoryVectorBackend(),
    opts.embeddings ?? new HashingEmbeddings(128),
    opts.timeouts,
  );
}
