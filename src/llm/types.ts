/**
 * Prompt-in, text-out model client. Implementations hold no conversation
 * state between calls and may throw on any failure; the generation stage
 * turns those failures into its fallback.
 */
export interface GenerativeModel {
  /** Identifier reported in status output. */
  readonly name: string;
  generate(prompt: string): Promise<string>;
}
