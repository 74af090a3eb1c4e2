import { InvalidArgumentError } from "../errors";
import { emptyContext, type GradeResult, type RetrievedContext } from "../types";
import type { GenerationStage } from "./generation";
import { assertMaxScore, toGradeResult } from "./grade-parser";
import type { RetrievalStage } from "./retrieval";

export const GRADING_SYSTEM_PROMPT = `You are a fair and consistent exam grader.
Compare the student's answer with the model answer, judging meaning rather than wording.
Award partial credit for partially correct answers.
You must reply with a single JSON object and nothing else.`;

export interface GradeRequest {
  questionText: string;
  modelAnswer: string;
  studentAnswer: string;
  subject?: string;
  rubric?: string;
  /** Upper bound of the returned score (default 1). */
  maxScore?: number;
}

export interface GradingStageOptions {
  retrieval: RetrievalStage;
  generation: GenerationStage;
  /** Look up context for the question before grading. */
  retrievalEnabled: boolean;
  topK?: number;
}

/** Builds the user-side grading instruction sent under the "GRADING TASK:" heading. */
export function buildGradingPrompt(req: GradeRequest): string {
  const lines = [
    "QUESTION:",
    req.questionText,
    "",
    "MODEL ANSWER:",
    req.modelAnswer,
    "",
    "STUDENT ANSWER:",
    req.studentAnswer,
  ];
  if (req.rubric?.trim()) lines.push("", "RUBRIC:", req.rubric);
  lines.push(
    "",
    'Return ONLY a JSON object of the form {"score": <number from 0 to 1>, "feedback": "<short feedback for the student>", "confidence": <number from 0 to 1>}.',
    "Do not add any text before or after the JSON object.",
  );
  return lines.join("\n");
}

/** Deterministic multiple-choice check; no model involved. */
export function gradeChoice(studentAnswer: string, correctOption: string, maxScore = 1): GradeResult {
  assertMaxScore(maxScore);
  const correct =
    correctOption.trim() !== "" && studentAnswer.trim().toUpperCase() === correctOption.trim().toUpperCase();
  return { score: correct ? maxScore : 0, feedback: "", confidence: 1, raw: "" };
}

/**
 * Grades free-text answers with the generative model. Never throws for
 * retrieval or generation trouble: those end in an empty context or in the
 * conservative zero grade.
 */
export class GradingStage {
  public constructor(private readonly opts: GradingStageOptions) {}

  /**
   * @throws {InvalidArgumentError} On an empty question or an invalid `maxScore`.
   */
  public async grade(req: GradeRequest): Promise<GradeResult> {
    const maxScore = req.maxScore ?? 1;
    if (!req.questionText.trim()) throw new InvalidArgumentError("question_text must not be empty");
    assertMaxScore(maxScore);

    let context: RetrievedContext = emptyContext();
    if (this.opts.retrievalEnabled) {
      context = await this.opts.retrieval.retrieve(req.questionText, req.subject, this.opts.topK);
    }

    const outcome = await this.opts.generation.generateDetailed(buildGradingPrompt(req), context, {
      systemPrompt: GRADING_SYSTEM_PROMPT,
      queryHeading: "GRADING TASK:",
    });
    if (outcome.origin === "fallback") {
      console.error(`[RAG] Grading model unavailable; returning zero score for manual review.`);
      return { score: 0, feedback: "", confidence: 0, raw: outcome.text };
    }

    return toGradeResult(outcome.text, maxScore);
  }
}
