import { IngestionConfig } from "../../config/runtimeConfig.js";
import { describeError, IngestError } from "../../domain/errors.js";
import { IngestResult, ModuleRef, PassageDocument, TranscriptDocument, VectorIndexHandle } from "../../domain/models.js";
import { chunkText } from "../../utils/text.js";
import { VectorIndex } from "../vector/vectorIndex.js";
import { TranscriptLoader } from "./transcriptLoader.js";

export class EmbeddingIngestionStage {
  constructor(
    private readonly index: VectorIndex,
    private readonly loader: TranscriptLoader,
    private readonly config: IngestionConfig
  ) {}

  async ingest(
    transcriptPath: string,
    moduleRef: ModuleRef,
    handle: VectorIndexHandle,
    overwrite = false
  ): Promise<IngestResult> {
    const filter = { moduleSlug: moduleRef.moduleSlug };
    const existing = await this.index.count(handle, filter);

    if (existing > 0 && !overwrite) {
      this.log(`${handle.tableName} already holds ${existing} passage(s) for ${moduleRef.moduleSlug}; skipping.`);
      return { documentsIndexed: 0, chunksIndexed: 0, skipped: true };
    }

    const documents = await this.loader.load(transcriptPath, moduleRef);
    if (documents.length === 0) {
      throw new IngestError(`No transcript documents found for "${moduleRef.moduleName}" under ${transcriptPath}.`);
    }

    const passages = documents.flatMap((document) => this.toPassages(document));
    this.log(
      `Embedding ${passages.length} passage(s) from ${documents.length} document(s) with ${this.index.embeddingModel}.`
    );

    let chunksIndexed: number;
    try {
      chunksIndexed = await this.index.upsert(handle, passages, filter);
    } catch (error) {
      throw new IngestError(`Embedding failed for "${moduleRef.moduleName}": ${describeError(error)}`, {
        cause: error
      });
    }

    this.log(
      existing > 0
        ? `Replaced ${existing} stale passage(s) with ${chunksIndexed} in ${handle.tableName}.`
        : `Indexed ${chunksIndexed} passage(s) into ${handle.tableName}.`
    );
    return { documentsIndexed: documents.length, chunksIndexed, skipped: false };
  }

  private toPassages(document: TranscriptDocument): PassageDocument[] {
    return chunkText(document.text, this.config.chunkSize).map((text, index) => ({
      id: `${document.id}#${index}`,
      documentId: document.id,
      text,
      metadata: document.metadata
    }));
  }

  private log(message: string): void {
    console.log(`[ingest] ${message}`);
  }
}
