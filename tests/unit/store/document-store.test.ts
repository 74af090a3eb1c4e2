import { beforeEach, describe, expect, it } from "vitest";
import { InvalidArgumentError, StoreUnavailableError } from "../../../src/errors";
import { MemoryVectorBackend } from "../../../src/store/memory-backend";
import { StalledEmbeddings, UnavailableBackend, VectorTableEmbeddings } from "../../helpers/fakes";
import { silenceLogs } from "../../helpers/mock-logger";
import { createTestStore } from "../../helpers/store";

const material = (subject: string, title = "T") => ({ title, topic: "topic", subject, difficulty: "easy" });

describe("DocumentCollection", () => {
  beforeEach(() => {
    silenceLogs();
  });

  const embeddings = new VectorTableEmbeddings({
    query: [1, 0, 0],
    "math near": [0.9, 0.1, 0],
    "math far": [0, 1, 0],
    "english a": [1, 0, 0],
    "english b": [0.8, 0.2, 0],
    "english c": [0, 0, 1],
    "flat 2d": [1, 0],
  });

  it("filters by metadata and orders by ascending distance", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("m-far", "math far", material("Math"));
    await store.materials.upsert("e1", "english a", material("English"));
    await store.materials.upsert("m-near", "math near", material("Math"));
    await store.materials.upsert("e2", "english b", material("English"));
    await store.materials.upsert("e3", "english c", material("English"));

    const hits = await store.materials.query("query", 3, { subject: "Math" });

    expect(hits.map((h) => h.id)).toEqual(["m-near", "m-far"]);
    expect(hits[0].distance).toBeLessThan(hits[1].distance);
    expect(hits[1].distance).toBeCloseTo(1, 6);
  });

  it("returns at most topK results", async () => {
    const store = createTestStore({ embeddings });
    for (const [id, text] of [
      ["a", "english a"],
      ["b", "english b"],
      ["c", "english c"],
    ]) {
      await store.materials.upsert(id, text, material("English"));
    }
    expect(await store.materials.query("query", 2)).toHaveLength(2);
    expect((await store.materials.query("query", 2)).map((h) => h.id)).toEqual(["a", "b"]);
  });

  it("keeps insertion order for equal distances", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("second", "english a", material("English"));
    await store.materials.upsert("first", "english a", material("English"));
    const hits = await store.materials.query("query", 5);
    expect(hits.map((h) => h.id)).toEqual(["second", "first"]);
  });

  it("returns an empty list for an empty collection or an unmatched filter", async () => {
    const store = createTestStore({ embeddings });
    expect(await store.materials.query("query", 5)).toEqual([]);
    await store.materials.upsert("e1", "english a", material("English"));
    expect(await store.materials.query("query", 5, { subject: "Chemistry" })).toEqual([]);
  });

  it("replaces a record upserted twice under the same id", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("doc", "english a", material("English", "first"));
    await store.materials.upsert("doc", "math far", material("Math", "second"));

    expect(await store.materials.count()).toBe(1);
    const [hit] = await store.materials.query("query", 5);
    expect(hit.text).toBe("math far");
    expect(hit.metadata.title).toBe("second");
  });

  it("is idempotent for an identical upsert", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("doc", "english a", material("English", "same"));
    const once = await store.materials.query("query", 5);

    await store.materials.upsert("doc", "english a", material("English", "same"));
    expect(await store.materials.count()).toBe(1);
    expect(await store.materials.query("query", 5)).toEqual(once);
  });

  it("keeps the collections independent", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("same-id", "english a", material("English"));
    expect(await store.questions.count()).toBe(0);
    expect(await store.questions.query("query", 5)).toEqual([]);
  });

  it("deletes idempotently and clears a collection", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("a", "english a", material("English"));
    await store.materials.upsert("b", "english b", material("English"));

    await store.materials.delete("a");
    await store.materials.delete("a");
    expect(await store.materials.count()).toBe(1);

    await store.materials.clear();
    expect(await store.materials.count()).toBe(0);
  });

  it("rejects empty ids, empty text and invalid topK", async () => {
    const store = createTestStore({ embeddings });
    await expect(store.materials.upsert(" ", "english a", material("English"))).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    await expect(store.materials.upsert("x", "", material("English"))).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.materials.query("   ", 5)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.materials.query("query", 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(store.materials.query("query", 1.5)).rejects.toBeInstanceOf(InvalidArgumentError);
  });

  it("rejects an embedding whose dimension differs from the collection's", async () => {
    const store = createTestStore({ embeddings });
    await store.materials.upsert("a", "english a", material("English"));
    await expect(store.materials.upsert("b", "flat 2d", material("English"))).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    expect(await store.materials.count()).toBe(1);
  });

  it("fills missing metadata with defaults and drops unknown keys on read", async () => {
    const backend = new MemoryVectorBackend();
    const store = createTestStore({ embeddings, backend });
    await backend.upsert("materials", {
      id: "legacy",
      text: "english a",
      metadata: { topic: "Grammar", source: "import" },
      embedding: Float32Array.from([1, 0, 0]),
    });

    const [hit] = await store.materials.query("query", 1);
    expect(hit.metadata).toEqual({ title: "Unknown", topic: "Grammar", subject: "", difficulty: "intermediate" });
  });

  it("reports an unreachable backend as StoreUnavailableError", async () => {
    const store = createTestStore({ embeddings, backend: new UnavailableBackend() });
    await expect(store.materials.query("query", 5)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it("reports an embedding that fails or times out as StoreUnavailableError", async () => {
    const store = createTestStore({ embeddings });
    await expect(store.materials.query("not in the table", 5)).rejects.toBeInstanceOf(StoreUnavailableError);

    const stalled = createTestStore({ embeddings: new StalledEmbeddings(), timeouts: { embedMs: 20 } });
    await expect(stalled.materials.upsert("a", "text", material("English"))).rejects.toThrow(/timed out after 20ms/);
    expect(await stalled.materials.count()).toBe(0);
  });
});
