import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StoreUnavailableError, describeError } from "../errors";
import { COLLECTION_NAMES } from "../types";
import type { CollectionName, StoredVector } from "../types";
import { MemoryVectorBackend } from "./memory-backend";

/**
 * On-disk layout. Embeddings are serialized as base64-encoded little-endian
 * 32-bit floats under `emb`; `meta` is used for compatibility checks on load.
 */
const snapshotSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    modelName: z.string(),
    dimension: z.number().nullable().optional(),
    savedAt: z.string().optional(),
    embEncoding: z.literal("f32-base64"),
  }),
  collections: z.object({
    materials: z.array(z.unknown()).default([]),
    questions: z.array(z.unknown()).default([]),
  }),
});

const storedRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
  emb: z.string(),
});

export interface FileBackendOptions {
  /** JSON snapshot path; parent directories are created on demand. */
  storePath: string;
  /** Embedding model the vectors were produced with. */
  modelName: string;
  verbose?: boolean;
}

function encodeEmbedding(emb: Float32Array): string {
  return Buffer.from(emb.buffer, emb.byteOffset, emb.byteLength).toString("base64");
}

function decodeEmbedding(encoded: string): Float32Array | null {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy: pooled Buffers are not guaranteed to be 4-byte aligned
  return new Float32Array(buf.buffer.slice(buf.byteOffset, buf.byteOffset + buf.byteLength));
}

/**
 * Durable vector backend: the in-memory index of {@link MemoryVectorBackend}
 * plus a JSON snapshot rewritten after mutations. Snapshot writes are
 * serialized and atomic (temp file + rename); mutations that arrive while a
 * write is queued share that write. When a write fails the in-memory change is
 * rolled back and the mutation fails with StoreUnavailableError, so memory and
 * disk never disagree about an acknowledged write.
 */
export class FileVectorBackend extends MemoryVectorBackend {
  public readonly kind: string = "file";
  private readonly storePath: string;
  private readonly modelName: string;
  private readonly verbose: boolean;
  private writeChain: Promise<void> = Promise.resolve();
  /** Queued write that has not started reading the collections yet. */
  private queuedWrite: Promise<void> | null = null;

  private constructor(opts: FileBackendOptions) {
    super();
    this.storePath = opts.storePath;
    this.modelName = opts.modelName;
    this.verbose = !!opts.verbose;
  }

  /**
   * Load (or create) the snapshot and verify it can be written.
   * @throws {StoreUnavailableError} If the snapshot is unreadable, corrupt,
   *   unwritable, or was built with another embedding model. The file is left
   *   untouched in every one of those cases.
   */
  public static async open(opts: FileBackendOptions): Promise<FileVectorBackend> {
    const backend = new FileVectorBackend(opts);
    await backend.load();
    await backend.persist();
    return backend;
  }

  public async upsert(collection: CollectionName, record: StoredVector): Promise<void> {
    const map = this.collections[collection];
    const previous = this.put(collection, record);
    try {
      await this.persist();
    } catch (e) {
      // Only undo our own write; a newer concurrent upsert wins.
      if (map.get(record.id) === record) {
        if (previous) map.set(record.id, previous);
        else map.delete(record.id);
      }
      throw new StoreUnavailableError(`Failed to persist '${record.id}' to ${collection}`, {
        cause: e,
      });
    }
  }

  public async delete(collection: CollectionName, id: string): Promise<void> {
    const map = this.collections[collection];
    const previous = map.get(id);
    if (!previous) return;
    map.delete(id);
    try {
      await this.persist();
    } catch (e) {
      if (!map.has(id)) map.set(id, previous);
      throw new StoreUnavailableError(`Failed to persist deletion of '${id}' from ${collection}`, {
        cause: e,
      });
    }
  }

  public async clear(collection: CollectionName): Promise<void> {
    const map = this.collections[collection];
    const removed = Array.from(map.entries());
    map.clear();
    try {
      await this.persist();
    } catch (e) {
      for (const [id, record] of removed) if (!map.has(id)) map.set(id, record);
      throw new StoreUnavailableError(`Failed to persist clearing of ${collection}`, { cause: e });
    }
  }

  /**
   * Queue a snapshot write behind any in-flight one. Callers arriving before
   * the queued write starts join it, since it will include their changes.
   */
  private persist(): Promise<void> {
    if (this.queuedWrite) return this.queuedWrite;
    const run = this.writeChain.then(() => {
      this.queuedWrite = null;
      return this.writeSnapshot();
    });
    this.queuedWrite = run;
    // Keep the chain usable after a failure; the error still reaches the caller through `run`.
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async writeSnapshot(): Promise<void> {
    let dimension: number | null = null;
    const collections: Record<CollectionName, unknown[]> = { materials: [], questions: [] };
    for (const name of COLLECTION_NAMES) {
      for (const r of this.collections[name].values()) {
        dimension ??= r.embedding.length;
        collections[name].push({
          id: r.id,
          text: r.text,
          metadata: r.metadata,
          emb: encodeEmbedding(r.embedding),
        });
      }
    }
    const out = {
      version: 1,
      meta: {
        modelName: this.modelName,
        dimension,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      collections,
    };
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    const tmp = `${this.storePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, this.storePath);
    if (this.verbose) console.error(`[RAG][verbose] Persisted vector store to ${this.storePath}`);
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return; // fresh store
      throw new StoreUnavailableError(`Cannot read vector store at ${this.storePath}`, { cause: e });
    }

    let parsed: z.infer<typeof snapshotSchema>;
    try {
      parsed = snapshotSchema.parse(JSON.parse(raw));
    } catch (e) {
      throw new StoreUnavailableError(
        `Vector store at ${this.storePath} is corrupt: ${describeError(e)}`,
        { cause: e },
      );
    }

    if (parsed.meta.modelName !== this.modelName) {
      throw new StoreUnavailableError(
        `Vector store at ${this.storePath} was built with '${parsed.meta.modelName}', not '${this.modelName}'. ` +
          `Restore the previous embedding model or move the file aside to start a new store.`,
      );
    }

    let loaded = 0;
    let skipped = 0;
    for (const name of COLLECTION_NAMES) {
      for (const entry of parsed.collections[name]) {
        const rec = storedRecordSchema.safeParse(entry);
        const embedding = rec.success ? decodeEmbedding(rec.data.emb) : null;
        if (!rec.success || !embedding) {
          skipped++;
          continue;
        }
        this.collections[name].set(rec.data.id, {
          id: rec.data.id,
          text: rec.data.text,
          metadata: rec.data.metadata,
          embedding,
        });
        loaded++;
      }
    }
    console.error(`[RAG] Loaded persisted vector store: ${loaded} records.`);
    if (skipped) console.error(`[RAG] Skipped ${skipped} malformed records in ${this.storePath}`);
  }
}
