import { GoogleGenAI } from "@google/genai";
import { GenerationUnavailableError, describeError } from "../errors";
import type { GenerativeModel } from "./types";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export interface GeminiOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
}

/** Google Gemini client behind the {@link GenerativeModel} contract. */
export class GeminiModel implements GenerativeModel {
  public readonly name: string;
  private readonly client: GoogleGenAI;
  private readonly temperature: number | undefined;

  public constructor(opts: GeminiOptions) {
    if (!opts.apiKey.trim()) {
      throw new GenerationUnavailableError("Missing GEMINI_API_KEY");
    }
    this.client = new GoogleGenAI({ apiKey: opts.apiKey });
    this.name = opts.model?.trim() || DEFAULT_GEMINI_MODEL;
    this.temperature = opts.temperature;
  }

  public async generate(prompt: string): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.name,
        contents: prompt,
        config: {
          ...(this.temperature !== undefined && { temperature: this.temperature }),
        },
      });
      text = response.text;
    } catch (e) {
      throw new GenerationUnavailableError(`Gemini request failed: ${describeError(e)}`, { cause: e });
    }
    if (!text?.trim()) {
      throw new GenerationUnavailableError("Gemini returned an empty response");
    }
    return text;
  }
}
