import { readdir } from "node:fs/promises";

import { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import { PipelineConfig } from "../../config/runtimeConfig.js";
import {
  AssemblyError,
  describeError,
  GenerationError,
  IngestError,
  MissingPrerequisiteError,
  PartialGenerationFailure,
  PipelineError,
  PipelineStage,
  ResolutionError
} from "../../domain/errors.js";
import {
  ArtifactPaths,
  AssembledResult,
  GenerationResult,
  IngestResult,
  ModuleOutline,
  ModuleRef,
  VectorIndexHandle
} from "../../domain/models.js";
import { isNotFound, pathExists } from "../../utils/files.js";
import { createId } from "../../utils/text.js";
import { DocumentAssemblyStage, loadDocumentTemplates } from "../assembly/documentAssemblyStage.js";
import { ContentGenerationStage } from "../generation/contentGenerationStage.js";
import { OutlinePlanner } from "../generation/outlinePlanner.js";
import { EmbeddingIngestionStage } from "../ingestion/embeddingIngestionStage.js";
import { MetadataResolver } from "../metadata/metadataResolver.js";
import { ArtifactPathBuilder, parseFragmentOrder } from "../paths/artifactPathBuilder.js";
import { namespaceFilePath } from "../vector/vectorStore.js";
import { VectorIndex } from "../vector/vectorIndex.js";
import { PipelineArtifactStore } from "./pipelineArtifactStore.js";
import { PipelineState, PipelineStateMachine, StateTransition } from "./pipelineStateMachine.js";

export interface TraceSource {
  drainTraces(): AgentRunTrace[];
}

export interface PipelineOrchestratorDependencies {
  resolver: MetadataResolver;
  paths: ArtifactPathBuilder;
  index: VectorIndex;
  ingestion: EmbeddingIngestionStage;
  outlinePlanner: OutlinePlanner;
  generation: ContentGenerationStage;
  assembly: DocumentAssemblyStage;
  traceSource?: TraceSource;
}

export interface PipelineRunReport {
  runId: string;
  moduleRef: ModuleRef | null;
  paths: ArtifactPaths | null;
  ingest: IngestResult | null;
  outline: ModuleOutline | null;
  generation: GenerationResult | null;
  assembly: AssembledResult | null;
  warnings: PartialGenerationFailure[];
  history: StateTransition[];
  runDirectory: string | null;
}

export type PipelineRunResult =
  | (PipelineRunReport & { state: "MERGED" })
  | (PipelineRunReport & { state: "FAILED"; stage: PipelineStage; error: PipelineError });

export class PipelineOrchestrator {
  constructor(
    private readonly config: PipelineConfig,
    private readonly dependencies: PipelineOrchestratorDependencies
  ) {}

  /**
   * Runs resolve, load, call and generate in order. Stage failures end in a
   * FAILED result instead of a rejection; per-section failures only add a
   * warning. A ledger that cannot be written leaves `runDirectory` null.
   */
  async run(): Promise<PipelineRunResult> {
    const startedAt = new Date().toISOString();
    const machine = new PipelineStateMachine();
    const report: PipelineRunReport = {
      runId: createId("run", startedAt),
      moduleRef: null,
      paths: null,
      ingest: null,
      outline: null,
      generation: null,
      assembly: null,
      warnings: [],
      history: [],
      runDirectory: null
    };

    let stage: PipelineStage = "resolve";
    let result: PipelineRunResult;

    try {
      const moduleRef = await this.dependencies.resolver.resolve(this.config.metadataFile, this.config.topicNumber);
      const paths = this.dependencies.paths.forModule(moduleRef);
      const handle = this.dependencies.paths.indexHandle(moduleRef, this.config.vectorTableName);
      report.moduleRef = moduleRef;
      report.paths = paths;
      this.log(`[${report.runId}] ${moduleRef.course} / Topic ${moduleRef.topicNumber}: ${moduleRef.moduleName}`);

      stage = "load";
      report.ingest = await this.load(moduleRef, handle);
      this.advance(machine, report.runId, "LOADED");

      stage = "call";
      await this.call(moduleRef, handle, paths, report);
      this.advance(machine, report.runId, "GENERATED");

      stage = "generate";
      report.assembly = await this.merge(moduleRef, paths, report.outline);
      this.advance(machine, report.runId, "MERGED");

      result = { ...report, history: machine.history, state: "MERGED" };
    } catch (error) {
      const failure = toPipelineError(stage, error);
      this.advance(machine, report.runId, "FAILED");
      console.error(`[orchestrator] [${report.runId}] ${stage} failed: ${failure.message}`);
      result = { ...report, history: machine.history, state: "FAILED", stage, error: failure };
    }

    if (result.paths) {
      try {
        result.runDirectory = await this.persistLedger(result, result.paths, startedAt);
      } catch (error) {
        console.warn(`[orchestrator] [${result.runId}] run ledger not written: ${describeError(error)}`);
      }
    }
    return result;
  }

  private async load(moduleRef: ModuleRef, handle: VectorIndexHandle): Promise<IngestResult> {
    if (!this.config.runLoad) {
      const present = await this.dependencies.index.hasEntries(handle, { moduleSlug: moduleRef.moduleSlug });
      if (!present) {
        throw new MissingPrerequisiteError("load", namespaceFilePath(handle));
      }
      this.log("load skipped; index entries present");
      return { documentsIndexed: 0, chunksIndexed: 0, skipped: true };
    }

    return this.dependencies.ingestion.ingest(moduleRef.transcriptPath, moduleRef, handle, this.config.overwrite);
  }

  private async call(
    moduleRef: ModuleRef,
    handle: VectorIndexHandle,
    paths: ArtifactPaths,
    report: PipelineRunReport
  ): Promise<void> {
    if (!this.config.runCall) {
      if ((await countFragments(paths.sectionsDir)) === 0) {
        throw new MissingPrerequisiteError("call", paths.sectionsDir);
      }
      this.log("call skipped; fragments present");
      return;
    }

    const outline = await this.dependencies.outlinePlanner.plan(
      moduleRef,
      handle,
      paths.outlinePath,
      this.config.overwrite
    );
    const generation = await this.dependencies.generation.generate(
      moduleRef,
      handle,
      outline.entries,
      paths.sectionsDir,
      this.config.overwrite
    );
    report.outline = outline;
    report.generation = generation;

    if (generation.failedSectionIds.length > 0) {
      const warning = new PartialGenerationFailure(generation.failedSectionIds, outline.entries.length);
      report.warnings.push(warning);
      console.warn(`[orchestrator] ${warning.message}`);
    }
  }

  private async merge(
    moduleRef: ModuleRef,
    paths: ArtifactPaths,
    outline: ModuleOutline | null
  ): Promise<AssembledResult | null> {
    if (!this.config.runGenerate) {
      if (!(await pathExists(paths.mergedDocPath))) {
        throw new MissingPrerequisiteError("generate", paths.mergedDocPath);
      }
      this.log("generate skipped; merged document present");
      return null;
    }

    const templates = await loadDocumentTemplates(this.config.templatesDirectory);
    return this.dependencies.assembly.assemble(
      paths.sectionsDir,
      templates.header,
      templates.footer,
      paths.mergedDocPath,
      {
        course: moduleRef.course,
        moduleName: moduleRef.moduleName,
        topicNumber: moduleRef.topicNumber,
        expectedSections: outline?.entries.length
      }
    );
  }

  private async persistLedger(result: PipelineRunResult, paths: ArtifactPaths, startedAt: string): Promise<string> {
    const store = new PipelineArtifactStore(paths.runsDir, result.runId);
    const traces = this.dependencies.traceSource?.drainTraces() ?? [];

    if (result.generation) {
      await store.persistStageArtifact("generation", {
        outlineSource: result.outline?.source ?? null,
        fragments: result.generation.fragments.map((fragment) => ({
          sectionId: fragment.sectionId,
          order: fragment.order,
          kind: fragment.kind,
          title: fragment.title,
          sourceQuery: fragment.sourceQuery,
          filePath: fragment.filePath
        })),
        generatedIds: result.generation.generatedIds,
        reusedIds: result.generation.reusedIds,
        failures: result.generation.failures
      });
    }
    await store.persistTraces(traces);
    await store.persistRunSummary({
      runId: result.runId,
      state: result.state,
      failedStage: result.state === "FAILED" ? result.stage : null,
      error: result.state === "FAILED" ? { name: result.error.name, message: result.error.message } : null,
      course: result.moduleRef?.course ?? null,
      moduleName: result.moduleRef?.moduleName ?? null,
      topicNumber: this.config.topicNumber,
      flags: {
        runLoad: this.config.runLoad,
        runCall: this.config.runCall,
        runGenerate: this.config.runGenerate,
        overwrite: this.config.overwrite
      },
      ingest: result.ingest,
      assembly: result.assembly,
      mergedDocPath: paths.mergedDocPath,
      warnings: result.warnings.map((warning) => warning.message),
      history: result.history,
      traceCount: traces.length,
      startedAt,
      completedAt: new Date().toISOString()
    });

    return store.directoryPath;
  }

  private advance(machine: PipelineStateMachine, runId: string, next: PipelineState): void {
    const previous = machine.state;
    machine.transition(next);
    this.log(`[${runId}] ${previous} -> ${next}`);
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}

async function countFragments(sectionsDir: string): Promise<number> {
  try {
    const names = await readdir(sectionsDir);
    return names.filter((name) => parseFragmentOrder(name) !== null).length;
  } catch (error) {
    if (isNotFound(error)) {
      return 0;
    }
    throw error;
  }
}

function toPipelineError(stage: PipelineStage, error: unknown): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = `${stage} stage failed: ${describeError(error)}`;
  switch (stage) {
    case "resolve":
      return new ResolutionError(message, { cause: error });
    case "load":
      return new IngestError(message, { cause: error });
    case "call":
      return new GenerationError(message, undefined, { cause: error });
    case "generate":
      return new AssemblyError(message, { cause: error });
  }
}
