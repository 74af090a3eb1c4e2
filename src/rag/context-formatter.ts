import type { RetrievedContext } from "../types";

export const MATERIALS_HEADER = "=== STUDY MATERIALS ===";
export const QUESTIONS_HEADER = "=== REFERENCE QUESTIONS & ANSWERS ===";

export interface ContextLimits {
  /** Characters kept per material (default 500). */
  materialChars: number;
  /** Characters kept per reference question (default 200). */
  questionChars: number;
}

export const DEFAULT_CONTEXT_LIMITS: ContextLimits = { materialChars: 500, questionChars: 200 };

/** Hard character cut; `...` marks text that was actually shortened. */
export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

/**
 * Render retrieved items as a prompt block: materials first, then reference
 * questions, each section only when non-empty. Returns "" for an empty context.
 */
export function formatContext(
  context: RetrievedContext,
  limits: ContextLimits = DEFAULT_CONTEXT_LIMITS,
): string {
  const parts: string[] = [];

  if (context.materials.length) {
    parts.push(MATERIALS_HEADER);
    for (const material of context.materials) {
      parts.push(`\nTopic: ${material.metadata.topic || "N/A"}`);
      parts.push(`Content: ${truncate(material.text, limits.materialChars)}`);
    }
  }

  if (context.referenceQuestions.length) {
    if (parts.length) parts.push("");
    parts.push(QUESTIONS_HEADER);
    for (const question of context.referenceQuestions) {
      parts.push(`Q: ${truncate(question.text, limits.questionChars)}`);
    }
  }

  return parts.join("\n");
}
