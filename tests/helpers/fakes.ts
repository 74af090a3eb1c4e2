import { EmbeddingService } from "../../src/embeddings";
import type { GenerativeModel } from "../../src/llm/types";
import { MemoryVectorBackend } from "../../src/store/memory-backend";
import type { ScoredVector } from "../../src/store/backend";

type Reply = string | ((prompt: string) => string | Promise<string>);

/** Generative model that answers from a script and records every prompt. */
export class ScriptedModel implements GenerativeModel {
  public readonly name = "scripted-model";
  public readonly prompts: string[] = [];

  public constructor(private readonly reply: Reply) {}

  public async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return typeof this.reply === "string" ? this.reply : this.reply(prompt);
  }
}

/** Generative model whose endpoint is unreachable. */
export class FailingModel implements GenerativeModel {
  public readonly name = "failing-model";
  public calls = 0;

  public async generate(): Promise<string> {
    this.calls++;
    throw new Error("connect ECONNREFUSED 127.0.0.1:443");
  }
}

/** Generative model that never answers. */
export class StalledModel implements GenerativeModel {
  public readonly name = "stalled-model";

  public generate(): Promise<string> {
    return new Promise<string>(() => undefined);
  }
}

/**
 * Embedder with hand-picked vectors so distances in tests are exact. Texts
 * missing from the table are an error.
 */
export class VectorTableEmbeddings extends EmbeddingService {
  public constructor(private readonly table: Record<string, number[]>) {
    super();
  }

  public getModelName(): string {
    return "vector-table";
  }

  public getDimension(): number | undefined {
    return Object.values(this.table)[0]?.length;
  }

  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    return texts.map((t) => {
      const vector = this.table[t];
      if (!vector) throw new Error(`no vector for '${t}'`);
      return Float32Array.from(vector);
    });
  }
}

/** Embedder that never answers. */
export class StalledEmbeddings extends EmbeddingService {
  public getModelName(): string {
    return "stalled";
  }

  public getDimension(): number | undefined {
    return undefined;
  }

  public embedBatch(): Promise<Float32Array[]> {
    return new Promise<Float32Array[]>(() => undefined);
  }
}

/** Backend whose engine is down: writes land in memory, queries fail. */
export class UnavailableBackend extends MemoryVectorBackend {
  public readonly kind: string = "unavailable";

  public async query(): Promise<ScoredVector[]> {
    throw new Error("vector engine unreachable");
  }
}
