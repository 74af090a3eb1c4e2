import { InvalidArgumentError } from "./errors";

/**
 * Split text into fixed-size overlapping windows. Each window holds at most
 * `chunkSize` characters and starts `chunkSize - overlap` characters after the
 * previous one; the last window is the first that reaches the end of the text.
 *
 * @throws {InvalidArgumentError} If `chunkSize` is not a positive integer, or
 *   `overlap` is negative, fractional or not smaller than `chunkSize`.
 */
export function chunkText(text: string, chunkSize: number, overlap: number): string[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidArgumentError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidArgumentError(`overlap must be a non-negative integer (got ${overlap})`);
  }
  if (overlap >= chunkSize) {
    throw new InvalidArgumentError(
      `overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`,
    );
  }
  const out: string[] = [];
  const step = chunkSize - overlap;
  for (let start = 0; start < text.length; start += step) {
    out.push(text.slice(start, start + chunkSize));
    if (start + chunkSize >= text.length) break;
  }
  return out;
}

/**
 * Common contract of every embedder: deterministic text → vector mapping plus
 * the chunking and similarity helpers the ingestion and grading code rely on.
 * A single instance can be shared by any number of concurrent callers.
 */
export abstract class EmbeddingService {
  /** Resolved model identifier (stored with persisted vectors). */
  public abstract getModelName(): string;

  /** Vector length, or `undefined` until the model has produced one. */
  public abstract getDimension(): number | undefined;

  /** Embed several texts, preserving input order. */
  public abstract embedBatch(texts: readonly string[]): Promise<Float32Array[]>;

  public async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    if (!vector) throw new Error(`${this.getModelName()} returned no embedding`);
    return vector;
  }

  public chunk(text: string, chunkSize: number, overlap: number): string[] {
    return chunkText(text, chunkSize, overlap);
  }

  /** Cosine similarity of two texts under this model. */
  public async similarity(a: string, b: string): Promise<number> {
    const [va, vb] = await this.embedBatch([a, b]);
    if (!va || !vb) throw new Error(`${this.getModelName()} returned no embedding`);
    return EmbeddingService.cosine(va, vb);
  }

  /**
   * Compute cosine similarity between two Float32 vectors. Length mismatch is
   * handled by comparing up to the shortest length.
   *
   * @returns Cosine similarity in range [-1, 1]
   */
  public static cosine(a: Float32Array, b: Float32Array): number {
    let dot = 0,
      na = 0,
      nb = 0;
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const x = a[i],
        y = b[i];
      dot += x * y;
      na += x * x;
      nb += y * y;
    }
    return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
  }
}
