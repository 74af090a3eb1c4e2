import { beforeEach, describe, expect, it } from "vitest";
import { InvalidArgumentError, StoreUnavailableError } from "../../../src/errors";
import { MAX_REFERENCE_QUESTIONS, RetrievalStage } from "../../../src/rag/retrieval";
import { emptyContext } from "../../../src/types";
import { UnavailableBackend } from "../../helpers/fakes";
import { loggedLines, silenceLogs } from "../../helpers/mock-logger";
import { createTestStore } from "../../helpers/store";

const meta = (subject: string) => ({ title: "Photosynthesis", topic: "plants", subject, difficulty: "easy" });

describe("RetrievalStage", () => {
  let logs: ReturnType<typeof silenceLogs>;

  beforeEach(() => {
    logs = silenceLogs();
  });

  it("finds a stored material for a related question", async () => {
    const store = createTestStore();
    await store.materials.upsert("m1", "Photosynthesis converts light to energy", meta("Biology"));
    const retrieval = new RetrievalStage(store);

    const context = await retrieval.retrieve("How do plants make energy?", "Biology", 5);

    expect(context.materials.map((m) => m.id)).toContain("m1");
  });

  it("restricts both collections to the subject", async () => {
    const store = createTestStore();
    await store.materials.upsert("bio", "energy in cells", meta("Biology"));
    await store.materials.upsert("phys", "energy in circuits", meta("Physics"));
    await store.questions.upsert("q-phys", "What is kinetic energy?\n\nAnswer: energy of motion", {
      question: "What is kinetic energy?",
      answer: "energy of motion",
      topic: "mechanics",
      subject: "Physics",
      difficulty: "easy",
    });
    const retrieval = new RetrievalStage(store);

    const context = await retrieval.retrieve("energy", "Biology");

    expect(context.materials.map((m) => m.id)).toEqual(["bio"]);
    expect(context.referenceQuestions).toEqual([]);
  });

  it("caps reference questions", async () => {
    const store = createTestStore();
    for (let i = 0; i < 5; i++) {
      await store.questions.upsert(`q${i}`, `question ${i} about energy`, {
        question: `question ${i}`,
        answer: "a",
        topic: "t",
        subject: "Physics",
        difficulty: "easy",
      });
    }
    const context = await new RetrievalStage(store).retrieve("energy", undefined, 10);
    expect(context.referenceQuestions).toHaveLength(MAX_REFERENCE_QUESTIONS);
  });

  it("degrades to an empty context when the store is unavailable", async () => {
    const retrieval = new RetrievalStage(createTestStore({ backend: new UnavailableBackend() }));

    const result = await retrieval.tryRetrieve("energy");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(StoreUnavailableError);

    expect(await retrieval.retrieve("energy")).toEqual(emptyContext());
    expect(loggedLines(logs).some((l) => l.startsWith("[RAG] Retrieval unavailable"))).toBe(true);
  });

  it("still rejects invalid arguments", async () => {
    const retrieval = new RetrievalStage(createTestStore());
    await expect(retrieval.retrieve("   ")).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(retrieval.retrieve("energy", undefined, 0)).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});
