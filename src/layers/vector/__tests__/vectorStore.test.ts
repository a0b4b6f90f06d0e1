import { readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { makeTempDir } from "../../../__tests__/fixtures.js";
import { PassageMetadata, VectorIndexHandle } from "../../../domain/models.js";
import { HashingEmbedder } from "../embedder.js";
import { VectorIndex } from "../vectorIndex.js";
import { FileVectorStore, namespaceFilePath, VectorRecord } from "../vectorStore.js";

function metadata(moduleSlug: string): PassageMetadata {
  return {
    courseSlug: "course",
    moduleSlug,
    lessonName: "Week 1",
    lessonSlug: "week-1",
    itemName: "Item",
    itemSlug: "item",
    sourceFile: `${moduleSlug}.txt`,
    contentType: "transcript"
  };
}

function record(id: string, moduleSlug: string, vector: number[], text = id): VectorRecord {
  return { id, documentId: `${moduleSlug}:doc`, text, vector, metadata: metadata(moduleSlug) };
}

describe("FileVectorStore", () => {
  let root: string;
  let handle: VectorIndexHandle;
  const store = new FileVectorStore();

  beforeEach(async () => {
    root = await makeTempDir();
    handle = { tableName: "lecture_transcripts", directory: path.join(root, "index") };
    await store.upsert(handle, [
      record("a1", "alpha", [1, 0]),
      record("a2", "alpha", [0, 1]),
      record("b1", "beta", [1, 0])
    ]);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("ranks passages of one module by cosine similarity", async () => {
    const ranked = await store.query(handle, [1, 0], 5, { moduleSlug: "alpha" });

    expect(ranked.map((passage) => [passage.id, passage.score])).toEqual([
      ["a1", 1],
      ["a2", 0]
    ]);
    expect(await store.query(handle, [1, 0], 1, { moduleSlug: "alpha" })).toHaveLength(1);
  });

  it("replaces one module's entries in a single write", async () => {
    await store.upsert(handle, [record("a3", "alpha", [1, 1])], { moduleSlug: "alpha" });

    expect(await store.count(handle, { moduleSlug: "alpha" })).toBe(1);
    expect(await store.count(handle, { moduleSlug: "beta" })).toBe(1);
    const file = JSON.parse(await readFile(namespaceFilePath(handle), "utf8"));
    expect(file.records.map((entry: { id: string }) => entry.id)).toEqual(["b1", "a3"]);
  });

  it("replaces records that share an id", async () => {
    await store.upsert(handle, [record("a1", "alpha", [0, 1], "updated")]);

    const ranked = await store.query(handle, [0, 1], 5, { moduleSlug: "alpha" });
    expect(ranked.map((passage) => [passage.id, passage.text, passage.score])).toEqual([
      ["a1", "updated", 1],
      ["a2", "a2", 1]
    ]);

    const file = JSON.parse(await readFile(namespaceFilePath(handle), "utf8"));
    expect(file.records.map((entry: { id: string }) => entry.id)).toEqual(["a1", "a2", "b1"]);
  });

  it("treats a missing namespace as empty", async () => {
    const empty = { tableName: "other_table", directory: handle.directory };

    expect(await store.count(empty, { moduleSlug: "alpha" })).toBe(0);
    expect(await store.query(empty, [1, 0], 3, { moduleSlug: "alpha" })).toEqual([]);
  });

  it("rejects queries of a different dimension", async () => {
    await expect(store.query(handle, [1, 0, 0], 3, { moduleSlug: "alpha" })).rejects.toThrow(
      "Vector dimension mismatch in lecture_transcripts: stored 2, query 3. Re-run with --overwrite."
    );
  });

  it("rejects a corrupt namespace file", async () => {
    await writeFile(namespaceFilePath(handle), JSON.stringify({ tableName: "lecture_transcripts" }), "utf8");

    await expect(store.count(handle, { moduleSlug: "alpha" })).rejects.toThrow(
      `Vector namespace ${namespaceFilePath(handle)} is corrupt`
    );
  });
});

describe("VectorIndex", () => {
  it("embeds passages in batches and retrieves the closest one", async () => {
    const root = await makeTempDir();
    try {
      const handle = { tableName: "lecture_transcripts", directory: root };
      const index = new VectorIndex(new HashingEmbedder(64), new FileVectorStore(), 2);
      const documents = ["momentum smooths gradients", "learning rate scales steps", "convergence tolerance"].map(
        (text, position) => ({
          id: `doc#${position}`,
          documentId: "doc",
          text,
          metadata: metadata("alpha")
        })
      );

      expect(index.embeddingModel).toBe("hashing-64");
      expect(await index.upsert(handle, documents)).toBe(3);
      expect(await index.hasEntries(handle, { moduleSlug: "alpha" })).toBe(true);

      const [best] = await index.query(handle, "learning rate scales steps", 1, { moduleSlug: "alpha" });
      expect(best?.id).toBe("doc#1");

      expect(await index.hasEntries(handle, { moduleSlug: "beta" })).toBe(false);
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });
});
