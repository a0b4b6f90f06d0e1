import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import { IngestError } from "../../domain/errors.js";
import { ModuleRef, ModuleSource, TranscriptDocument } from "../../domain/models.js";
import { isNotFound } from "../../utils/files.js";
import { normalizeWhitespace, slugify, titleFromSlug } from "../../utils/text.js";

export class TranscriptLoader {
  /**
   * Sources listed in the metadata win; without them every `.txt` file
   * under `transcriptPath` is a transcript, visited in sorted path order.
   */
  async load(transcriptPath: string, moduleRef: ModuleRef): Promise<TranscriptDocument[]> {
    const sources =
      moduleRef.sources.length > 0 ? moduleRef.sources : await this.discoverSources(transcriptPath);

    const documents: TranscriptDocument[] = [];
    for (const source of sources) {
      const text = await this.readSource(source);
      if (!text) {
        console.warn(`[ingest] Skipping empty or missing source ${source.filePath}`);
        continue;
      }

      documents.push({
        id: `${moduleRef.moduleSlug}:${path.relative(transcriptPath, source.filePath) || path.basename(source.filePath)}`,
        text,
        metadata: {
          courseSlug: moduleRef.courseSlug,
          moduleSlug: moduleRef.moduleSlug,
          lessonName: source.lessonName,
          lessonSlug: source.lessonSlug,
          itemName: source.itemName,
          itemSlug: source.itemSlug,
          sourceFile: source.filePath,
          contentType: source.contentType
        }
      });
    }

    return documents;
  }

  private async discoverSources(transcriptPath: string): Promise<ModuleSource[]> {
    const files = await this.walk(transcriptPath);

    return files
      .filter((filePath) => filePath.toLowerCase().endsWith(".txt"))
      .sort((left, right) => left.localeCompare(right))
      .map((filePath): ModuleSource => {
        const stem = path.basename(filePath, path.extname(filePath));
        const lessonDirectory = path.relative(transcriptPath, path.dirname(filePath));
        const lessonName = lessonDirectory ? lessonDirectory.split(path.sep).join(" / ") : "Transcripts";
        return {
          filePath,
          contentType: "transcript",
          lessonName,
          lessonSlug: slugify(lessonName) || "transcripts",
          itemName: titleFromSlug(stem),
          itemSlug: slugify(stem) || "item"
        };
      });
  }

  private async walk(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        throw new IngestError(`Transcript directory ${directory} does not exist.`, { cause: error });
      }
      throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
      const entryPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(entryPath)));
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }
    return files;
  }

  private async readSource(source: ModuleSource): Promise<string> {
    try {
      return normalizeWhitespace(await readFile(source.filePath, "utf8"));
    } catch (error) {
      if (isNotFound(error)) {
        return "";
      }
      throw new IngestError(`Could not read ${source.filePath}.`, { cause: error });
    }
  }
}
