/**
 * Error taxonomy shared by the retrieval / generation / grading stages.
 *
 * Each stage decides explicitly whether a failure degrades (empty context,
 * fallback text, zero grade) or surfaces to the caller. Stages that degrade
 * return a {@link Result} instead of throwing so the branch is visible at the
 * call site.
 */

export type RagErrorKind =
  | "InvalidArgument"
  | "StoreUnavailable"
  | "GenerationUnavailable"
  | "MalformedModelOutput";

/** Base class for every error the pipeline raises on purpose. */
export class RagError extends Error {
  public readonly kind: RagErrorKind;

  public constructor(kind: RagErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "RagError";
  }
}

/** Malformed caller input (empty id/text, bad top_k, bad chunk parameters). */
export class InvalidArgumentError extends RagError {
  public constructor(message: string) {
    super("InvalidArgument", message);
    this.name = "InvalidArgumentError";
  }
}

/** Document store (or the embedder feeding it) unreachable, failing or timed out. */
export class StoreUnavailableError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("StoreUnavailable", message, options);
    this.name = "StoreUnavailableError";
  }
}

/** Generative model missing, failing, timed out or returning nothing. */
export class GenerationUnavailableError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("GenerationUnavailable", message, options);
    this.name = "GenerationUnavailableError";
  }
}

/** Model output that could not be parsed into the expected JSON object. */
export class MalformedModelOutputError extends RagError {
  public constructor(message: string) {
    super("MalformedModelOutput", message);
    this.name = "MalformedModelOutputError";
  }
}

/** Error thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends Error {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/** Raised by {@link withTimeout} when the wrapped promise does not settle in time. */
export class OperationTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "OperationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export type Result<T, E = RagError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** Human-readable message for any thrown value. */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
