import type { EmbeddingService } from "../embeddings";
import { describeError } from "../errors";
import type { VectorBackend } from "./backend";
import { createCollections, type DocumentStore, type StoreTimeouts } from "./document-store";
import { FileVectorBackend } from "./file-backend";
import { MemoryVectorBackend } from "./memory-backend";

export type VectorStoreKind = "file" | "memory";

export interface CreateStoreOptions {
  kind: VectorStoreKind;
  embeddings: EmbeddingService;
  /** Snapshot path, required for the file backend. */
  storePath?: string;
  timeouts?: StoreTimeouts;
  verbose?: boolean;
}

export interface CreatedStore {
  store: DocumentStore;
  /** True when the configured backend could not be opened and memory took over. */
  degraded: boolean;
}

/**
 * Build the document store for the configured backend. A persistent backend
 * that cannot be opened never takes the process down: the store falls back to
 * a transient {@link MemoryVectorBackend} and reports itself as degraded.
 */
export async function createDocumentStore(opts: CreateStoreOptions): Promise<CreatedStore> {
  let backend: VectorBackend;
  let degraded = false;
  if (opts.kind === "file" && opts.storePath) {
    try {
      backend = await FileVectorBackend.open({
        storePath: opts.storePath,
        modelName: opts.embeddings.getModelName(),
        verbose: opts.verbose,
      });
      console.error(`[RAG] Vector store: file (${opts.storePath})`);
    } catch (e) {
      console.error(
        `[RAG] Could not open vector store at ${opts.storePath} (${describeError(e)}). ` +
          `Falling back to an in-memory store; documents will NOT survive a restart.`,
      );
      backend = new MemoryVectorBackend();
      degraded = true;
    }
  } else {
    if (opts.kind === "file") {
      console.error(`[RAG] No INDEX_STORE_PATH configured; using in-memory vector store.`);
      degraded = true;
    }
    backend = new MemoryVectorBackend();
  }
  return { store: createCollections(backend, opts.embeddings, opts.timeouts), degraded };
}
