import {
  AutoModel,
  AutoTokenizer,
  FeatureExtractionPipeline,
} from "@huggingface/transformers";
import { EmbeddingService } from "./embeddings";
import { EmbedderNotInitializedError } from "./errors";

export const DEFAULT_EMBEDDING_MODEL = "Xenova/paraphrase-multilingual-MiniLM-L12-v2";

/**
 * Local sentence-embedding model run through @huggingface/transformers, using
 * mean pooling and L2 normalisation. The model is downloaded into the
 * model cache (see `configureModelCache`) on first {@link init}.
 */
export class TransformersEmbeddings extends EmbeddingService {
  private readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private dimension: number | undefined;

  public constructor(modelName?: string) {
    super();
    // Resolution precedence: explicit ctor arg > MODEL_NAME env var > default model
    this.modelName = modelName?.trim() || process.env.MODEL_NAME?.trim() || DEFAULT_EMBEDDING_MODEL;
  }

  public getModelName(): string {
    return this.modelName;
  }

  public getDimension(): number | undefined {
    return this.dimension;
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.embedder) return; // already initialized
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    const tokenizer = await AutoTokenizer.from_pretrained(this.modelName);
    const model = await AutoModel.from_pretrained(this.modelName);
    this.embedder = new FeatureExtractionPipeline({ task: "feature-extraction", model, tokenizer });
    console.error(`[RAG] Model ready: ${this.modelName}`);
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    if (texts.length === 0) return [];
    const output = await this.embedder([...texts], { pooling: "mean", normalize: true });
    const data = output.data;
    if (!(data instanceof Float32Array)) {
      throw new Error(`Unexpected embedding tensor type from ${this.modelName}`);
    }
    const dim = output.dims[output.dims.length - 1] ?? data.length / texts.length;
    this.dimension = dim;
    const vectors: Float32Array[] = [];
    for (let i = 0; i < texts.length; i++) {
      vectors.push(data.slice(i * dim, (i + 1) * dim));
    }
    return vectors;
  }
}
