import { z } from "zod";

/** Scalar value allowed in document metadata. */
export type MetadataValue = string | number | boolean;

/** Flat key → scalar mapping stored alongside every vector. */
export type Metadata = Record<string, MetadataValue>;

/** Exact-equality filter applied to metadata keys during a query. */
export type MetadataFilter = Record<string, MetadataValue>;

/** The two independently keyed collections of the document store. */
export const COLLECTION_NAMES = ["materials", "questions"] as const;
export type CollectionName = (typeof COLLECTION_NAMES)[number];

/**
 * Study material metadata. Unknown keys are dropped on read; missing keys
 * fall back to neutral defaults so older records never fail to load.
 */
export const materialMetadataSchema = z.object({
  title: z.string().catch("Unknown"),
  topic: z.string().catch(""),
  subject: z.string().catch(""),
  difficulty: z.string().catch("intermediate"),
});
export type MaterialMetadata = z.infer<typeof materialMetadataSchema>;

/** Reference question metadata (question + answer kept verbatim). */
export const questionMetadataSchema = z.object({
  question: z.string().catch(""),
  answer: z.string().catch(""),
  topic: z.string().catch(""),
  subject: z.string().catch(""),
  difficulty: z.string().catch("intermediate"),
});
export type QuestionMetadata = z.infer<typeof questionMetadataSchema>;

/**
 * A document as held by a vector backend: caller-assigned id, source text,
 * metadata and the embedding of the text.
 */
export interface StoredVector {
  readonly id: string;
  readonly text: string;
  readonly metadata: Metadata;
  readonly embedding: Float32Array;
}

/** One nearest-neighbour hit. Lower distance means closer (cosine distance). */
export interface RetrievalResult<M extends Metadata = Metadata> {
  readonly id: string;
  readonly text: string;
  readonly metadata: M;
  readonly distance: number;
}

/** Per-request retrieval output; never persisted. */
export interface RetrievedContext {
  readonly materials: RetrievalResult<MaterialMetadata>[];
  readonly referenceQuestions: RetrievalResult<QuestionMetadata>[];
}

export function emptyContext(): RetrievedContext {
  return { materials: [], referenceQuestions: [] };
}

/** Structured grade returned by the grading stage. */
export interface GradeResult {
  /** In [0, maxScore]. */
  readonly score: number;
  readonly feedback: string;
  /** In [0, 1]. */
  readonly confidence: number;
  /** Verbatim model output, kept for audit. */
  readonly raw: string;
}

/** A material cited in an answer. */
export interface SourceRef {
  readonly type: "study_material";
  readonly id: string;
  readonly title: string;
}

export interface AnswerResult {
  readonly query: string;
  readonly answer: string;
  readonly sources: SourceRef[];
  readonly retrievedContext: RetrievedContext;
}
