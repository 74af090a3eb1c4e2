import { InvalidArgumentError, MalformedModelOutputError, err, ok, type Result } from "../errors";
import type { GradeResult } from "../types";

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(src: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(src);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Pull the JSON object out of a model reply. Tries the whole text first, then
 * the span from the first `{` to the last `}` (models like to wrap JSON in
 * prose or code fences). Anything else is malformed.
 */
export function parseGradePayload(raw: string): Result<JsonObject, MalformedModelOutputError> {
  const src = raw.trim();
  const direct = tryParseObject(src);
  if (direct) return ok(direct);

  const braced = /\{[\s\S]*\}/.exec(src);
  if (braced) {
    const embedded = tryParseObject(braced[0]);
    if (embedded) return ok(embedded);
  }
  return err(new MalformedModelOutputError("Model output contains no parseable JSON object"));
}

/**
 * Number from a number or numeric string; anything else, and NaN, is
 * `undefined`. Infinities pass through and are left to {@link clamp01}.
 */
export function toNumber(value: unknown): number | undefined {
  let n: number | undefined;
  if (typeof value === "number") n = value;
  else if (typeof value === "string" && value.trim()) n = Number(value.trim());
  return n === undefined || Number.isNaN(n) ? undefined : n;
}

export function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

export function assertMaxScore(maxScore: number): void {
  if (!Number.isFinite(maxScore) || maxScore < 0) {
    throw new InvalidArgumentError(`max_score must be a finite, non-negative number (got ${maxScore})`);
  }
}

/**
 * Turn raw model output into a grade. Every field is coerced on its own:
 * score and confidence default to 0 and are clamped to [0, 1] (score is then
 * scaled by `maxScore`); feedback must be a string. `raw` is kept verbatim.
 *
 * @throws {InvalidArgumentError} On an invalid `maxScore`.
 */
export function toGradeResult(raw: string, maxScore = 1): GradeResult {
  assertMaxScore(maxScore);
  const parsed = parseGradePayload(raw);
  if (!parsed.ok) {
    console.error(`[RAG] ${parsed.error.message}; scoring 0 and keeping raw output for audit.`);
  }
  const payload: JsonObject = parsed.ok ? parsed.value : {};
  const score = clamp01(toNumber(payload.score) ?? 0) * maxScore;
  const confidence = clamp01(toNumber(payload.confidence) ?? 0);
  const feedback = typeof payload.feedback === "string" ? payload.feedback : "";
  return { score, feedback, confidence, raw };
}
