import { StoreUnavailableError, err, ok, type Result } from "../errors";
import { assertTopK, type DocumentStore } from "../store/document-store";
import { emptyContext, type MetadataFilter, type RetrievedContext } from "../types";

/** Reference questions are supplementary; never fetch more than this many. */
export const MAX_REFERENCE_QUESTIONS = 3;
export const DEFAULT_TOP_K = 5;

/**
 * Fetches the materials and reference questions relevant to a query. Store
 * failures never escape {@link retrieve}: they degrade to an empty context so
 * generation can still answer.
 */
export class RetrievalStage {
  public constructor(
    private readonly store: DocumentStore,
    private readonly verbose = false,
  ) {}

  /**
   * Same lookup as {@link retrieve}, with store unavailability returned as a
   * value instead of swallowed.
   *
   * @throws {InvalidArgumentError} On empty query text or invalid `topK`.
   */
  public async tryRetrieve(
    query: string,
    subject?: string,
    topK = DEFAULT_TOP_K,
  ): Promise<Result<RetrievedContext, StoreUnavailableError>> {
    assertTopK(topK);
    const filter: MetadataFilter | undefined = subject ? { subject } : undefined;
    try {
      const [materials, referenceQuestions] = await Promise.all([
        this.store.materials.query(query, topK, filter),
        this.store.questions.query(query, Math.min(MAX_REFERENCE_QUESTIONS, topK), filter),
      ]);
      if (this.verbose) {
        console.error(
          `[RAG][verbose] Retrieved ${materials.length} materials, ${referenceQuestions.length} questions (subject=${subject ?? "*"})`,
        );
      }
      return ok({ materials, referenceQuestions });
    } catch (e) {
      if (e instanceof StoreUnavailableError) return err(e);
      throw e;
    }
  }

  public async retrieve(query: string, subject?: string, topK = DEFAULT_TOP_K): Promise<RetrievedContext> {
    const result = await this.tryRetrieve(query, subject, topK);
    if (!result.ok) {
      console.error(`[RAG] Retrieval unavailable, continuing without context: ${result.error.message}`);
      return emptyContext();
    }
    return result.value;
  }
}
