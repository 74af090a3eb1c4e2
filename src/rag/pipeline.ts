import { RagError, describeError, err, ok, type Result } from "../errors";
import type { GenerativeModel } from "../llm/types";
import type { DocumentStore } from "../store/document-store";
import type { AnswerResult, CollectionName, GradeResult, RetrievedContext, SourceRef } from "../types";
import { GenerationStage } from "./generation";
import { GradingStage, gradeChoice, type GradeRequest } from "./grading";
import { DEFAULT_TOP_K, RetrievalStage } from "./retrieval";

export interface NewStudyMaterial {
  id: string;
  title: string;
  content: string;
  topic: string;
  subject: string;
  difficulty?: string;
}

export interface NewQuestion {
  id: string;
  questionText: string;
  answerText: string;
  topic: string;
  subject: string;
  difficulty?: string;
}

export interface PipelineOptions {
  store: DocumentStore;
  /** `null` answers from retrieved materials only. */
  model: GenerativeModel | null;
  /** Retrieval depth for answers and grading (default 5). */
  topK?: number;
  /** Retrieve context before grading (default true). */
  gradingRetrieval?: boolean;
  generationTimeoutMs?: number;
  systemPrompt?: string;
  verbose?: boolean;
}

export const DEFAULT_DIFFICULTY = "intermediate";

/** Materials cited by an answer: retrieval order, one entry per id. */
export function collectSources(context: RetrievedContext): SourceRef[] {
  const seen = new Set<string>();
  const sources: SourceRef[] = [];
  for (const m of context.materials) {
    if (seen.has(m.id)) continue;
    seen.add(m.id);
    sources.push({ type: "study_material", id: m.id, title: m.metadata.title });
  }
  return sources;
}

/**
 * Entry point of the RAG core. Holds only references to its collaborators, so
 * one instance built at startup can serve any number of concurrent requests.
 */
export class RagPipeline {
  public readonly retrieval: RetrievalStage;
  public readonly generation: GenerationStage;
  public readonly grading: GradingStage;
  private readonly store: DocumentStore;
  private readonly topK: number;

  public constructor(opts: PipelineOptions) {
    this.store = opts.store;
    this.topK = opts.topK ?? DEFAULT_TOP_K;
    this.retrieval = new RetrievalStage(opts.store, opts.verbose);
    this.generation = new GenerationStage({
      model: opts.model,
      timeoutMs: opts.generationTimeoutMs,
      systemPrompt: opts.systemPrompt,
      verbose: opts.verbose,
    });
    this.grading = new GradingStage({
      retrieval: this.retrieval,
      generation: this.generation,
      retrievalEnabled: opts.gradingRetrieval ?? true,
      topK: this.topK,
    });
  }

  /** Retrieve → augment → generate. Degrades, never fails, on store or model trouble. */
  public async answerQuestion(query: string, subject?: string): Promise<AnswerResult> {
    const retrievedContext = await this.retrieval.retrieve(query, subject, this.topK);
    const answer = await this.generation.generate(query, retrievedContext);
    return { query, answer, sources: collectSources(retrievedContext), retrievedContext };
  }

  public gradeAnswer(req: GradeRequest): Promise<GradeResult> {
    return this.grading.grade(req);
  }

  public gradeMultipleChoice(studentAnswer: string, correctOption: string, maxScore = 1): GradeResult {
    return gradeChoice(studentAnswer, correctOption, maxScore);
  }

  /** @returns The stored id, or the reason the store rejected the material. */
  public async addStudyMaterial(input: NewStudyMaterial): Promise<Result<string>> {
    return this.attempt("study material", input.id, () =>
      this.store.materials.upsert(input.id, input.content, {
        title: input.title,
        topic: input.topic,
        subject: input.subject,
        difficulty: input.difficulty || DEFAULT_DIFFICULTY,
      }),
    );
  }

  /** Stores question and answer together so either side matches a query. */
  public async addQuestion(input: NewQuestion): Promise<Result<string>> {
    return this.attempt("question", input.id, () =>
      this.store.questions.upsert(input.id, `${input.questionText}\n\nAnswer: ${input.answerText}`, {
        question: input.questionText,
        answer: input.answerText,
        topic: input.topic,
        subject: input.subject,
        difficulty: input.difficulty || DEFAULT_DIFFICULTY,
      }),
    );
  }

  public deleteStudyMaterial(id: string): Promise<void> {
    return this.store.materials.delete(id);
  }

  public deleteQuestion(id: string): Promise<void> {
    return this.store.questions.delete(id);
  }

  public clearCollection(name: CollectionName): Promise<void> {
    return name === "materials" ? this.store.materials.clear() : this.store.questions.clear();
  }

  public async countDocuments(): Promise<Record<CollectionName, number>> {
    const [materials, questions] = await Promise.all([
      this.store.materials.count(),
      this.store.questions.count(),
    ]);
    return { materials, questions };
  }

  private async attempt(label: string, id: string, write: () => Promise<void>): Promise<Result<string>> {
    try {
      await write();
      return ok(id);
    } catch (e) {
      if (e instanceof RagError) {
        console.error(`[RAG] Error adding ${label} '${id}': ${e.message}`);
        return err(e);
      }
      console.error(`[RAG] Unexpected error adding ${label} '${id}': ${describeError(e)}`);
      throw e;
    }
  }
}
