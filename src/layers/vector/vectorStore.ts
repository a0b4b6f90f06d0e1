import { cosineSimilarity } from "ai";
import path from "node:path";
import { z } from "zod/v4";

import { PassageMetadata, RankedPassage, VectorIndexHandle } from "../../domain/models.js";
import { isNotFound, readJsonFile, writeJsonAtomic } from "../../utils/files.js";

export interface VectorRecord {
  id: string;
  documentId: string;
  text: string;
  vector: number[];
  metadata: PassageMetadata;
}

export interface VectorFilter {
  moduleSlug: string;
}

export interface VectorStore {
  /** Writes `records` in one step, first dropping every record that matches `replace`. */
  upsert(handle: VectorIndexHandle, records: VectorRecord[], replace?: VectorFilter): Promise<void>;
  query(handle: VectorIndexHandle, vector: number[], topK: number, filter: VectorFilter): Promise<RankedPassage[]>;
  count(handle: VectorIndexHandle, filter: VectorFilter): Promise<number>;
}

const passageMetadataSchema = z.object({
  courseSlug: z.string(),
  moduleSlug: z.string(),
  lessonName: z.string(),
  lessonSlug: z.string(),
  itemName: z.string(),
  itemSlug: z.string(),
  sourceFile: z.string(),
  contentType: z.enum(["transcript", "extra-notes"])
});

const namespaceSchema = z.object({
  tableName: z.string(),
  records: z.array(
    z.object({
      id: z.string(),
      documentId: z.string(),
      text: z.string(),
      vector: z.array(z.number()),
      metadata: passageMetadataSchema
    })
  )
});

type NamespaceFile = z.infer<typeof namespaceSchema>;

export function namespaceFilePath(handle: VectorIndexHandle): string {
  return path.join(handle.directory, `${handle.tableName}.json`);
}

/**
 * Vector namespace persisted as one JSON file per table name, ranked by
 * cosine similarity in process.
 */
export class FileVectorStore implements VectorStore {
  async upsert(handle: VectorIndexHandle, records: VectorRecord[], replace?: VectorFilter): Promise<void> {
    const namespace = await this.load(handle);
    const kept = replace ? namespace.records.filter((record) => !matches(record, replace)) : namespace.records;
    const byId = new Map(kept.map((record) => [record.id, record]));
    for (const record of records) {
      byId.set(record.id, record);
    }

    await this.save(handle, { tableName: handle.tableName, records: [...byId.values()] });
  }

  async query(
    handle: VectorIndexHandle,
    vector: number[],
    topK: number,
    filter: VectorFilter
  ): Promise<RankedPassage[]> {
    const namespace = await this.load(handle);

    return namespace.records
      .filter((record) => matches(record, filter))
      .map((record) => {
        if (record.vector.length !== vector.length) {
          throw new Error(
            `Vector dimension mismatch in ${handle.tableName}: stored ${record.vector.length}, query ${vector.length}. Re-run with --overwrite.`
          );
        }
        return {
          id: record.id,
          text: record.text,
          metadata: record.metadata,
          score: cosineSimilarity(vector, record.vector)
        };
      })
      .sort((left, right) => right.score - left.score || left.id.localeCompare(right.id))
      .slice(0, topK);
  }

  async count(handle: VectorIndexHandle, filter: VectorFilter): Promise<number> {
    const namespace = await this.load(handle);
    return namespace.records.filter((record) => matches(record, filter)).length;
  }

  private async load(handle: VectorIndexHandle): Promise<NamespaceFile> {
    const filePath = namespaceFilePath(handle);
    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        return { tableName: handle.tableName, records: [] };
      }
      throw error;
    }

    const parsed = namespaceSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Vector namespace ${filePath} is corrupt: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  private async save(handle: VectorIndexHandle, namespace: NamespaceFile): Promise<void> {
    await writeJsonAtomic(namespaceFilePath(handle), namespace);
  }
}

function matches(record: VectorRecord, filter: VectorFilter): boolean {
  return record.metadata.moduleSlug === filter.moduleSlug;
}
