import { PassageDocument, RankedPassage, VectorIndexHandle } from "../../domain/models.js";
import { chunkArray } from "../../utils/text.js";
import { Embedder } from "./embedder.js";
import { VectorFilter, VectorRecord, VectorStore } from "./vectorStore.js";

export class VectorIndex {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    private readonly batchSize: number
  ) {}

  get embeddingModel(): string {
    return this.embedder.modelId;
  }

  /**
   * Embeds every passage before touching the namespace, so a failed batch
   * leaves the stored records as they were. With `replace`, the matching
   * records are swapped out in the same write.
   */
  async upsert(handle: VectorIndexHandle, documents: PassageDocument[], replace?: VectorFilter): Promise<number> {
    const records: VectorRecord[] = [];

    for (const batch of chunkArray(documents, this.batchSize)) {
      const vectors = await this.embedder.embed(batch.map((document) => document.text));
      if (vectors.length !== batch.length) {
        throw new Error(`Embedder returned ${vectors.length} vector(s) for ${batch.length} passage(s).`);
      }

      batch.forEach((document, index) => {
        records.push({
          id: document.id,
          documentId: document.documentId,
          text: document.text,
          vector: vectors[index],
          metadata: document.metadata
        });
      });
    }

    await this.store.upsert(handle, records, replace);
    return records.length;
  }

  async query(handle: VectorIndexHandle, text: string, topK: number, filter: VectorFilter): Promise<RankedPassage[]> {
    const [vector] = await this.embedder.embed([text]);
    if (!vector) {
      throw new Error("Embedder returned no vector for the query.");
    }
    return this.store.query(handle, vector, topK, filter);
  }

  count(handle: VectorIndexHandle, filter: VectorFilter): Promise<number> {
    return this.store.count(handle, filter);
  }

  async hasEntries(handle: VectorIndexHandle, filter: VectorFilter): Promise<boolean> {
    return (await this.store.count(handle, filter)) > 0;
  }
}
