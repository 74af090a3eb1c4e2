import { beforeEach, describe, expect, it } from "vitest";
import { InvalidArgumentError, MalformedModelOutputError } from "../../../src/errors";
import { parseGradePayload, toGradeResult, toNumber } from "../../../src/rag/grade-parser";
import { silenceLogs } from "../../helpers/mock-logger";

describe("parseGradePayload", () => {
  it("parses a bare JSON object", () => {
    expect(parseGradePayload('{"score": 1, "feedback": "Correct"}')).toEqual({
      ok: true,
      value: { score: 1, feedback: "Correct" },
    });
  });

  it("finds the object inside a code fence or prose", () => {
    const fenced = parseGradePayload('```json\n{"score": 0.5}\n```');
    expect(fenced).toEqual({ ok: true, value: { score: 0.5 } });

    const prose = parseGradePayload('Here is my grade: {"score": 0.25, "confidence": 0.5} Hope it helps!');
    expect(prose).toEqual({ ok: true, value: { score: 0.25, confidence: 0.5 } });
  });

  it.each([
    ["plain text", "I think this is correct"],
    ["a JSON array", "[1, 2, 3]"],
    ["a JSON string", '"score: 1"'],
    ["two separate objects", '{"score": 1} and {"score": 0}'],
    ["a truncated object", '{"score": 1, "feedback": "Cor'],
    ["an empty reply", ""],
  ])("rejects %s", (_label, raw) => {
    const result = parseGradePayload(raw);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(MalformedModelOutputError);
  });
});

describe("toNumber", () => {
  it("accepts numbers and numeric strings only", () => {
    expect(toNumber(0.5)).toBe(0.5);
    expect(toNumber(Number.POSITIVE_INFINITY)).toBe(Number.POSITIVE_INFINITY);
    expect(toNumber("-Infinity")).toBe(Number.NEGATIVE_INFINITY);
    expect(toNumber(" 0.75 ")).toBe(0.75);
    expect(toNumber("high")).toBeUndefined();
    expect(toNumber("")).toBeUndefined();
    expect(toNumber(Number.NaN)).toBeUndefined();
    expect(toNumber(null)).toBeUndefined();
    expect(toNumber(true)).toBeUndefined();
  });
});

describe("toGradeResult", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("scales the score by maxScore", () => {
    expect(toGradeResult('{"score": 0.5, "feedback": "Half right", "confidence": 0.8}', 10)).toEqual({
      score: 5,
      feedback: "Half right",
      confidence: 0.8,
      raw: '{"score": 0.5, "feedback": "Half right", "confidence": 0.8}',
    });
  });

  it("clamps out-of-range values", () => {
    const result = toGradeResult('{"score": 7, "confidence": -2}', 2);
    expect(result.score).toBe(2);
    expect(result.confidence).toBe(0);
  });

  it("coerces each field on its own", () => {
    const result = toGradeResult('{"score": "0.5", "feedback": 42, "confidence": "unsure"}');
    expect(result).toMatchObject({ score: 0.5, feedback: "", confidence: 0 });
  });

  it("grades unparseable output as zero and keeps it verbatim", () => {
    expect(toGradeResult("I think this is correct")).toEqual({
      score: 0,
      feedback: "",
      confidence: 0,
      raw: "I think this is correct",
    });
  });

  it("clamps overflowing numbers instead of zeroing them", () => {
    expect(toGradeResult('{"score": 1e999, "confidence": 1e999}', 10)).toMatchObject({ score: 10, confidence: 1 });
    expect(toGradeResult('{"score": -1e999, "confidence": -1e999}', 10)).toMatchObject({ score: 0, confidence: 0 });
  });

  it("scores zero but keeps feedback when the score key is missing", () => {
    expect(toGradeResult('{"feedback":"ok"}', 5)).toEqual({
      score: 0,
      feedback: "ok",
      confidence: 0,
      raw: '{"feedback":"ok"}',
    });
  });

  it.each([
    ["a non-numeric score", '{"score": "abc", "feedback": "?"}', 0],
    ["a negative score", '{"score": -5}', 0],
    ["an oversized score", '{"score": 99}', 4],
    ["a missing score", '{"feedback": "ok"}', 0],
    ["plain text", "Looks right to me.", 0],
    ["JSON inside prose", 'Sure! {"score": 0.25, "feedback": "Partial"} Thanks.', 1],
  ])("keeps %s within [0, maxScore]", (_label, raw, expected) => {
    const { score } = toGradeResult(raw, 4);
    expect(score).toBeGreaterThanOrEqual(0);
    expect(score).toBeLessThanOrEqual(4);
    expect(score).toBe(expected);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY])("rejects maxScore %s", (maxScore) => {
    expect(() => toGradeResult('{"score": 1}', maxScore)).toThrow(InvalidArgumentError);
  });
});
