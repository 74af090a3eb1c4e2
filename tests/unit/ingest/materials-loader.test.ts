import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { HashingEmbeddings } from "../../../src/hashing-embeddings";
import { MaterialsLoader, materialId } from "../../../src/ingest/materials-loader";
import { RagPipeline } from "../../../src/rag/pipeline";
import { StatusManager } from "../../../src/status";
import type { DocumentStore } from "../../../src/store/document-store";
import { silenceLogs } from "../../helpers/mock-logger";
import { createTestStore } from "../../helpers/store";

async function write(root: string, rel: string, content: string) {
  const abs = path.join(root, rel);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, content);
}

describe("materialId", () => {
  it("uses the bare path for single-chunk files", () => {
    expect(materialId("biology/cells.md", 0, 1)).toBe("biology/cells.md");
    expect(materialId("biology/cells.md", 2, 3)).toBe("biology/cells.md#2");
  });
});

describe("MaterialsLoader", () => {
  let root: string;
  let store: DocumentStore;
  let pipeline: RagPipeline;
  const embeddings = new HashingEmbeddings(64);

  beforeEach(async () => {
    silenceLogs();
    root = await fs.mkdtemp(path.join(os.tmpdir(), "study-materials-"));
    store = createTestStore({ embeddings });
    pipeline = new RagPipeline({ store, model: null });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const loader = (extra: Partial<ConstructorParameters<typeof MaterialsLoader>[0]> = {}) =>
    new MaterialsLoader({
      root,
      allowedExt: ["md", "txt"],
      excludedFolders: ["node_modules"],
      pipeline,
      embeddings,
      ...extra,
    });

  it("stores each allowed file with subject and topic from its path", async () => {
    await write(root, "biology/cells.md", "# Cells\n\nCells are the unit of life.");
    await write(root, "notes.txt", "Short note about atoms");
    await write(root, "node_modules/pkg/readme.md", "ignored");
    await write(root, "diagram.png", "not text");

    const status = new StatusManager();
    const summary = await loader({ status }).load();

    expect(summary).toEqual({ filesDiscovered: 2, chunksTotal: 2, chunksStored: 2 });
    expect(status.getStatus().ingest).toEqual({ filesDiscovered: 2, chunksTotal: 2, chunksStored: 2 });

    const [cells] = await store.materials.query("cells life", 5, { subject: "biology" });
    expect(cells.id).toBe("biology/cells.md");
    expect(cells.text).toBe("Cells\n\nCells are the unit of life.");
    expect(cells.metadata).toEqual({ title: "cells", topic: "cells", subject: "biology", difficulty: "intermediate" });

    const [note] = await store.materials.query("atoms", 5, { subject: "general" });
    expect(note.id).toBe("notes.txt");
    expect(note.text).toBe("Short note about atoms");
  });

  it("splits long files into numbered parts", async () => {
    await write(root, "long.txt", "0123456789abcdefghijklmno");

    const summary = await loader({ chunkSize: 10, chunkOverlap: 2, defaultDifficulty: "advanced" }).load();

    expect(summary.chunksStored).toBe(3);
    const hits = await store.materials.query("anything", 10);
    expect(hits.map((h) => h.id).sort()).toEqual(["long.txt#0", "long.txt#1", "long.txt#2"]);
    const first = hits.find((h) => h.id === "long.txt#0");
    expect(first?.text).toBe("0123456789");
    expect(first?.metadata).toEqual({
      title: "long (part 1)",
      topic: "long",
      subject: "general",
      difficulty: "advanced",
    });
  });

  it("skips empty files", async () => {
    await write(root, "empty.md", "   \n");
    await write(root, "real.md", "Mitochondria make ATP");

    const summary = await loader().load();

    expect(summary).toEqual({ filesDiscovered: 2, chunksTotal: 1, chunksStored: 1 });
    expect(await store.materials.count()).toBe(1);
  });

  it("rewrites the same ids when run twice", async () => {
    await write(root, "a.txt", "Osmosis moves water");
    await loader().load();
    await loader().load();
    expect(await store.materials.count()).toBe(1);
  });
});
