import { GenerationUnavailableError, describeError, err, ok, type Result } from "../errors";
import type { GenerativeModel } from "../llm/types";
import { withTimeout } from "../timeout";
import type { RetrievedContext } from "../types";
import { DEFAULT_CONTEXT_LIMITS, formatContext, truncate, type ContextLimits } from "./context-formatter";

export const DEFAULT_SYSTEM_PROMPT = `You are an expert educational tutor.
Provide clear, helpful and educational responses in the language the student uses.
Focus on explaining concepts thoroughly and building understanding.
Use the provided study materials and reference questions to inform your response.
Be encouraging and supportive.`;

export const NO_MATERIALS_MESSAGE =
  "Sorry, I couldn't find relevant study materials to answer your question. " +
  "Please try rephrasing it or check that the topic is covered.";

/** Materials used by the fallback answer, and characters kept from each. */
export const FALLBACK_MATERIALS = 2;
export const FALLBACK_CHARS = 300;

export interface GenerateOptions {
  systemPrompt?: string;
  /** Heading placed above the query in the prompt (default "STUDENT QUESTION:"). */
  queryHeading?: string;
}

export interface GenerationOutcome {
  text: string;
  origin: "model" | "fallback";
}

export interface GenerationStageOptions {
  /** `null` runs in fallback-only mode. */
  model: GenerativeModel | null;
  timeoutMs?: number;
  systemPrompt?: string;
  contextLimits?: ContextLimits;
  verbose?: boolean;
}

/**
 * Network-free answer assembled from the top retrieved materials. Used when
 * no model is configured or the model call fails.
 */
export function fallbackResponse(context: RetrievedContext): string {
  if (!context.materials.length) return NO_MATERIALS_MESSAGE;
  return context.materials
    .slice(0, FALLBACK_MATERIALS)
    .map((m) => truncate(m.text, FALLBACK_CHARS))
    .join("\n\n");
}

/**
 * Combines a system instruction, the formatted context and the query into one
 * prompt and calls the model once. There is no internal retry.
 */
export class GenerationStage {
  private readonly model: GenerativeModel | null;
  private readonly timeoutMs: number | undefined;
  private readonly systemPrompt: string;
  private readonly contextLimits: ContextLimits;
  private readonly verbose: boolean;

  public constructor(opts: GenerationStageOptions) {
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs;
    this.systemPrompt = opts.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.contextLimits = opts.contextLimits ?? DEFAULT_CONTEXT_LIMITS;
    this.verbose = !!opts.verbose;
  }

  public isAvailable(): boolean {
    return this.model !== null;
  }

  public buildPrompt(query: string, context: RetrievedContext, options: GenerateOptions = {}): string {
    const sections = [options.systemPrompt ?? this.systemPrompt];
    const contextText = formatContext(context, this.contextLimits);
    if (contextText) sections.push(`CONTEXT FROM STUDY MATERIALS:\n${contextText}`);
    sections.push(`${options.queryHeading ?? "STUDENT QUESTION:"}\n${query}`);
    sections.push("RESPONSE:");
    return sections.join("\n\n");
  }

  /** Single bounded model call, with every failure returned as a value. */
  public async invoke(prompt: string): Promise<Result<string, GenerationUnavailableError>> {
    if (!this.model) return err(new GenerationUnavailableError("No generative model configured"));
    try {
      const text = await withTimeout(
        this.model.generate(prompt),
        this.timeoutMs,
        `${this.model.name} timed out after ${this.timeoutMs}ms`,
      );
      if (!text.trim()) return err(new GenerationUnavailableError(`${this.model.name} returned an empty response`));
      return ok(text);
    } catch (e) {
      if (e instanceof GenerationUnavailableError) return err(e);
      return err(
        new GenerationUnavailableError(`${this.model.name} failed: ${describeError(e)}`, { cause: e }),
      );
    }
  }

  public async generateDetailed(
    query: string,
    context: RetrievedContext,
    options: GenerateOptions = {},
  ): Promise<GenerationOutcome> {
    if (!this.model) {
      if (this.verbose) console.error(`[RAG][verbose] No generative model; answering from materials.`);
      return { text: fallbackResponse(context), origin: "fallback" };
    }
    const result = await this.invoke(this.buildPrompt(query, context, options));
    if (!result.ok) {
      console.error(`[RAG] Generation unavailable, using fallback answer: ${result.error.message}`);
      return { text: fallbackResponse(context), origin: "fallback" };
    }
    return { text: result.value, origin: "model" };
  }

  public async generate(query: string, context: RetrievedContext, options: GenerateOptions = {}): Promise<string> {
    return (await this.generateDetailed(query, context, options)).text;
  }
}
