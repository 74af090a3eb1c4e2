import { EmbeddingService } from "./embeddings";
import { InvalidArgumentError } from "./errors";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(value: string): number {
  let h = FNV_OFFSET;
  for (let i = 0; i < value.length; i++) {
    h ^= value.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

/** Lower-cased word tokens (letters and digits in any script). */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/**
 * Network-free embedder based on signed feature hashing of word unigrams and
 * character trigrams. Far weaker than a sentence model, but deterministic,
 * instant and dependency-free, which makes it the embedder of choice for tests
 * and for deployments without a model cache.
 */
export class HashingEmbeddings extends EmbeddingService {
  private readonly dimension: number;

  public constructor(dimension = 384) {
    super();
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new InvalidArgumentError(`dimension must be a positive integer (got ${dimension})`);
    }
    this.dimension = dimension;
  }

  public getModelName(): string {
    return `hashing-${this.dimension}`;
  }

  public getDimension(): number {
    return this.dimension;
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    return texts.map((t) => this.vectorize(t));
  }

  private vectorize(text: string): Float32Array {
    const vec = new Float32Array(this.dimension);
    for (const word of tokenize(text)) {
      this.add(vec, `w:${word}`, 1);
      const padded = `#${word}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.add(vec, `c:${padded.slice(i, i + 3)}`, 0.5);
      }
    }
    let norm = 0;
    for (let i = 0; i < vec.length; i++) norm += vec[i] * vec[i];
    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (let i = 0; i < vec.length; i++) vec[i] /= norm;
    }
    return vec;
  }

  private add(vec: Float32Array, feature: string, weight: number): void {
    const h = fnv1a(feature);
    const sign = (h & 0x80000000) === 0 ? 1 : -1;
    vec[h % this.dimension] += sign * weight;
  }
}
