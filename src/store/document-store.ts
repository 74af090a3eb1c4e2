import type { z } from "zod";
import type { EmbeddingService } from "../embeddings";
import { InvalidArgumentError, RagError, StoreUnavailableError, describeError } from "../errors";
import { withTimeout } from "../timeout";
import {
  materialMetadataSchema,
  questionMetadataSchema,
  type CollectionName,
  type MaterialMetadata,
  type Metadata,
  type MetadataFilter,
  type QuestionMetadata,
  type RetrievalResult,
} from "../types";
import type { VectorBackend } from "./backend";

/** Per-call time bounds; a non-positive value disables the bound. */
export interface StoreTimeouts {
  embedMs?: number;
  queryMs?: number;
}

/**
 * One collection of the document store: validates input, embeds text, and
 * talks to the backend. Every failure that is not the caller's fault comes out
 * as StoreUnavailableError so upstream stages can degrade on a single type.
 */
export class DocumentCollection<M extends Metadata> {
  public constructor(
    public readonly name: CollectionName,
    private readonly backend: VectorBackend,
    private readonly embeddings: EmbeddingService,
    private readonly schema: z.ZodType<M, z.ZodTypeDef, unknown>,
    private readonly timeouts: StoreTimeouts = {},
  ) {}

  /**
   * Insert or replace the record under `id`. The text is embedded before the
   * backend is touched, so a failed or timed-out embedding changes nothing.
   *
   * @throws {InvalidArgumentError} On an empty id or text.
   * @throws {StoreUnavailableError} If embedding or the backend write fails.
   */
  public async upsert(id: string, text: string, metadata: M): Promise<void> {
    if (!id.trim()) throw new InvalidArgumentError(`${this.name}: id must not be empty`);
    if (!text.trim()) throw new InvalidArgumentError(`${this.name}: text for '${id}' must not be empty`);
    const embedding = await this.guard("embed", () => this.embeddings.embed(text), this.timeouts.embedMs);
    await this.guard("upsert", () => this.backend.upsert(this.name, { id, text, metadata, embedding }));
  }

  /**
   * Nearest neighbours of `text`, closest first, at most `topK` of them. An
   * empty collection or a filter nothing satisfies yields `[]`.
   *
   * @throws {InvalidArgumentError} On empty text or a non-positive / fractional `topK`.
   * @throws {StoreUnavailableError} If embedding or the backend query fails.
   */
  public async query(
    text: string,
    topK: number,
    filter?: MetadataFilter,
  ): Promise<RetrievalResult<M>[]> {
    if (!text.trim()) throw new InvalidArgumentError(`${this.name}: query text must not be empty`);
    assertTopK(topK);
    const vector = await this.guard("embed", () => this.embeddings.embed(text), this.timeouts.embedMs);
    const hits = await this.guard(
      "query",
      () => this.backend.query(this.name, vector, topK, filter),
      this.timeouts.queryMs,
    );
    return hits.map(({ record, distance }) => ({
      id: record.id,
      text: record.text,
      metadata: this.schema.parse(record.metadata),
      distance,
    }));
  }

  /** Remove `id` if present (idempotent). */
  public async delete(id: string): Promise<void> {
    if (!id.trim()) throw new InvalidArgumentError(`${this.name}: id must not be empty`);
    await this.guard("delete", () => this.backend.delete(this.name, id));
  }

  public async clear(): Promise<void> {
    await this.guard("clear", () => this.backend.clear(this.name));
  }

  public async count(): Promise<number> {
    return this.guard("count", () => this.backend.count(this.name));
  }

  private async guard<T>(op: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    try {
      return await withTimeout(fn(), timeoutMs, `${this.name} ${op} timed out after ${timeoutMs}ms`);
    } catch (e) {
      if (e instanceof RagError) throw e;
      throw new StoreUnavailableError(`${this.name} ${op} failed: ${describeError(e)}`, { cause: e });
    }
  }
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidArgumentError(`top_k must be a positive integer (got ${topK})`);
  }
}

/** The materials and reference-question collections over one backend. */
export interface DocumentStore {
  readonly backend: VectorBackend;
  readonly materials: DocumentCollection<MaterialMetadata>;
  readonly questions: DocumentCollection<QuestionMetadata>;
}

export function createCollections(
  backend: VectorBackend,
  embeddings: EmbeddingService,
  timeouts: StoreTimeouts = {},
): DocumentStore {
  return {
    backend,
    materials: new DocumentCollection("materials", backend, embeddings, materialMetadataSchema, timeouts),
    questions: new DocumentCollection("questions", backend, embeddings, questionMetadataSchema, timeouts),
  };
}
