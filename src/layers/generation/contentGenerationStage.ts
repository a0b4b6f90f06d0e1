import { readdir, readFile, rm } from "node:fs/promises";
import path from "node:path";

import { GenerationConfig } from "../../config/runtimeConfig.js";
import { describeError, GenerationError } from "../../domain/errors.js";
import {
  GenerationResult,
  ModuleRef,
  OutlineEntry,
  SectionFailure,
  SectionFragment,
  VectorIndexHandle
} from "../../domain/models.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { isNotFound, pathExists, writeFileAtomic } from "../../utils/files.js";
import { ensureHeading, inspectFragment, sanitizeLatex } from "../../utils/latex.js";
import { fragmentFileName, parseFragmentOrder, sectionIdFor } from "../paths/artifactPathBuilder.js";
import { VectorIndex } from "../vector/vectorIndex.js";
import { ContentWriter } from "./contentWriter.js";
import { PromptLibrary } from "./promptLibrary.js";

type SectionOutcome =
  | { status: "generated"; fragment: SectionFragment }
  | { status: "reused"; fragment: SectionFragment }
  | { status: "failed"; failure: SectionFailure };

export class ContentGenerationStage {
  constructor(
    private readonly index: VectorIndex,
    private readonly prompts: PromptLibrary,
    private readonly writer: ContentWriter,
    private readonly config: GenerationConfig
  ) {}

  /**
   * Writes one fragment per outline entry. A failing entry is recorded and
   * the rest continue; existing fragments are kept unless `overwrite`.
   */
  async generate(
    moduleRef: ModuleRef,
    handle: VectorIndexHandle,
    outline: OutlineEntry[],
    sectionsDir: string,
    overwrite = false
  ): Promise<GenerationResult> {
    if (overwrite) {
      const removed = await this.clearFragments(sectionsDir);
      if (removed > 0) {
        this.log(`Removed ${removed} existing fragment(s) from ${sectionsDir}`);
      }
    }

    const entries = [...outline].sort((left, right) => left.order - right.order);
    const outcomes = await mapWithConcurrency(entries, this.config.sectionConcurrency, (entry) =>
      this.generateSection(moduleRef, handle, entry, sectionsDir, overwrite)
    );

    const result: GenerationResult = {
      fragments: [],
      generatedIds: [],
      reusedIds: [],
      failures: [],
      failedSectionIds: []
    };

    for (const outcome of outcomes) {
      if (outcome.status === "failed") {
        result.failures.push(outcome.failure);
        result.failedSectionIds.push(outcome.failure.sectionId);
        continue;
      }

      result.fragments.push(outcome.fragment);
      if (outcome.status === "generated") {
        result.generatedIds.push(outcome.fragment.sectionId);
      } else {
        result.reusedIds.push(outcome.fragment.sectionId);
      }
    }

    this.log(
      `${result.generatedIds.length} generated, ${result.reusedIds.length} reused, ${result.failures.length} failed of ${entries.length} section(s)`
    );
    return result;
  }

  private async generateSection(
    moduleRef: ModuleRef,
    handle: VectorIndexHandle,
    entry: OutlineEntry,
    sectionsDir: string,
    overwrite: boolean
  ): Promise<SectionOutcome> {
    const sectionId = sectionIdFor(entry);
    const filePath = path.join(sectionsDir, fragmentFileName(entry));
    const base = {
      sectionId,
      order: entry.order,
      kind: entry.kind,
      title: entry.title,
      sourceQuery: entry.query,
      filePath
    };

    if (!overwrite && (await pathExists(filePath))) {
      return { status: "reused", fragment: { ...base, content: await readFile(filePath, "utf8") } };
    }

    try {
      const passages = await this.index.query(handle, entry.query, this.config.topK, {
        moduleSlug: moduleRef.moduleSlug
      });
      const prompt = await this.prompts.renderSection(moduleRef, entry);
      const raw = await this.writer.complete({ ...prompt, sectionId, kind: entry.kind, title: entry.title }, passages);

      const content = ensureHeading(sanitizeLatex(raw), entry.kind, entry.title);
      for (const issue of inspectFragment(content)) {
        console.warn(`[generate] ${sectionId}: ${issue}`);
      }

      await writeFileAtomic(filePath, `${content}\n`);
      this.log(`Wrote ${sectionId} (${passages.length} passage(s))`);
      return { status: "generated", fragment: { ...base, content: `${content}\n` } };
    } catch (error) {
      const failure = new GenerationError(`Section "${entry.title}" failed: ${describeError(error)}`, sectionId, {
        cause: error
      });
      console.warn(`[generate] ${failure.message}`);
      return { status: "failed", failure: { sectionId, title: entry.title, message: failure.message } };
    }
  }

  private async clearFragments(sectionsDir: string): Promise<number> {
    let names: string[];
    try {
      names = await readdir(sectionsDir);
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw error;
    }

    const fragments = names.filter((name) => parseFragmentOrder(name) !== null);
    await Promise.all(fragments.map((name) => rm(path.join(sectionsDir, name), { force: true })));
    return fragments.length;
  }

  private log(message: string): void {
    console.log(`[generate] ${message}`);
  }
}
