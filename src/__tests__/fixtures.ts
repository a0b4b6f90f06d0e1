import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { AgentRuntime } from "../agents/runtime/agentRuntime.js";
import { DEFAULT_PROMPTS_DIRECTORY, PipelineConfig, RuntimeConfig } from "../config/runtimeConfig.js";
import { ModuleRef, OutlineEntry, RankedPassage } from "../domain/models.js";
import { DocumentAssemblyStage } from "../layers/assembly/documentAssemblyStage.js";
import { ContentGenerationStage } from "../layers/generation/contentGenerationStage.js";
import { ContentPrompt, ContentWriter } from "../layers/generation/contentWriter.js";
import { OutlinePlanner } from "../layers/generation/outlinePlanner.js";
import { PromptLibrary } from "../layers/generation/promptLibrary.js";
import { EmbeddingIngestionStage } from "../layers/ingestion/embeddingIngestionStage.js";
import { TranscriptLoader } from "../layers/ingestion/transcriptLoader.js";
import { MetadataResolver } from "../layers/metadata/metadataResolver.js";
import { PipelineOrchestrator } from "../layers/orchestration/pipelineOrchestrator.js";
import { ArtifactPathBuilder } from "../layers/paths/artifactPathBuilder.js";
import { Embedder, HashingEmbedder } from "../layers/vector/embedder.js";
import { VectorIndex } from "../layers/vector/vectorIndex.js";
import { FileVectorStore } from "../layers/vector/vectorStore.js";

export const COURSE_NAME = "Machine Learning Foundations";
export const MODULE_NAME = "Optimization Methods";
export const MODULE_SLUG = "optimization-methods";

export const SCENARIO_TRANSCRIPTS: Record<string, string> = {
  "convergence.txt": "Convergence means the loss stops improving. We check the gradient norm against a tolerance.",
  "gradient-descent.txt": "Gradient descent steps against the gradient. Each step uses the full training set.",
  "learning-rate.txt": "The learning rate scales every step. Too large a rate makes the loss diverge.",
  "momentum.txt": "Momentum keeps a running average of past gradients. It smooths noisy directions.",
  "stochastic-updates.txt": "Stochastic updates use one example at a time. They are cheap but noisy."
};

export const SCENARIO_OUTLINE: OutlineEntry[] = [
  { order: 0, kind: "section", title: "Introduction", query: "What does this module cover?" },
  { order: 1, kind: "subsection", title: "Gradient Descent", query: "How does gradient descent work?" },
  { order: 2, kind: "subsection", title: "Learning Rate", query: "How is the learning rate chosen?" },
  { order: 3, kind: "subsection", title: "Convergence", query: "When has training converged?" }
];

export const TEST_HEADER = "HEADER TEMPLATE_COURSE_NAME | TEMPLATE_MODULE_NAME | TEMPLATE_LESSON_CODE\n";
export const TEST_FOOTER = "\\end{document}\n";

export function makeTempDir(prefix = "lecture-notes-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeTextFiles(directory: string, files: Record<string, string>): Promise<void> {
  await mkdir(directory, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await writeFile(path.join(directory, name), content, "utf8");
  }
}

/**
 * Three-module course whose second module has five transcripts, a
 * four-entry outline file and plain header/footer templates.
 */
export async function writeScenario(root: string): Promise<void> {
  await writeFile(
    path.join(root, "metadata.json"),
    JSON.stringify({
      course_name: COURSE_NAME,
      modules: [
        { module_name: "Linear Models", transcript_path: "transcripts/module-1" },
        { module_name: MODULE_NAME, transcript_path: "transcripts/module-2" },
        { module_name: "Neural Networks", transcript_path: "transcripts/module-3" }
      ]
    }),
    "utf8"
  );
  await writeTextFiles(path.join(root, "transcripts", "module-2"), SCENARIO_TRANSCRIPTS);
  await writeFile(path.join(root, "outline.json"), JSON.stringify(SCENARIO_OUTLINE), "utf8");
  await writeTextFiles(path.join(root, "templates"), { "header.tex": TEST_HEADER, "footer.tex": TEST_FOOTER });
}

export function testRuntimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return {
    mode: "mock",
    writerModel: "test/writer",
    embeddingModel: "test/embedding",
    maxOutputTokens: 1024,
    temperature: 0,
    retryCount: 0,
    retryBaseDelayMs: 0,
    requestTimeoutMs: 1000,
    verboseAgentLogs: false,
    ...overrides
  };
}

export function testPipelineConfig(root: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    metadataFile: path.join(root, "metadata.json"),
    topicNumber: 2,
    outputBase: path.join(root, "outputs"),
    overwrite: false,
    runLoad: true,
    runCall: true,
    runGenerate: true,
    vectorTableName: "lecture_transcripts",
    runtime: testRuntimeConfig(),
    ingestion: { chunkSize: 400, embeddingBatchSize: 64 },
    generation: {
      sectionConcurrency: 2,
      topK: 3,
      outlineTopK: 50,
      outlineFile: path.join(root, "outline.json")
    },
    promptsDirectory: DEFAULT_PROMPTS_DIRECTORY,
    templatesDirectory: path.join(root, "templates"),
    ...overrides
  };
}

export function testModuleRef(transcriptPath: string, overrides: Partial<ModuleRef> = {}): ModuleRef {
  return {
    course: COURSE_NAME,
    courseSlug: "machine-learning-foundations",
    topicNumber: 2,
    moduleName: MODULE_NAME,
    moduleSlug: MODULE_SLUG,
    transcriptPath,
    sources: [],
    ...overrides
  };
}

export class CountingEmbedder implements Embedder {
  readonly modelId = "counting-hashing";
  calls = 0;
  private readonly inner = new HashingEmbedder(64);

  async embed(values: string[]): Promise<number[][]> {
    this.calls += 1;
    return this.inner.embed(values);
  }
}

export class FailingEmbedder implements Embedder {
  readonly modelId = "failing";

  async embed(): Promise<number[][]> {
    throw new Error("embedding provider unavailable");
  }
}

export class FakeContentWriter implements ContentWriter {
  readonly calls: string[] = [];
  readonly passageCounts: number[] = [];
  readonly failOn = new Set<string>();

  async complete(prompt: ContentPrompt, passages: RankedPassage[]): Promise<string> {
    this.calls.push(prompt.sectionId);
    this.passageCounts.push(passages.length);
    if (this.failOn.has(prompt.sectionId)) {
      throw new Error("writer unavailable");
    }
    return `Notes for ${prompt.title}.`;
  }
}

export interface TestHarness {
  config: PipelineConfig;
  orchestrator: PipelineOrchestrator;
  embedder: CountingEmbedder;
  writer: FakeContentWriter;
}

export function createHarness(config: PipelineConfig): TestHarness {
  const embedder = new CountingEmbedder();
  const writer = new FakeContentWriter();
  const runtime = new AgentRuntime(config.runtime);
  const index = new VectorIndex(embedder, new FileVectorStore(), config.ingestion.embeddingBatchSize);
  const prompts = new PromptLibrary(config.promptsDirectory);

  const orchestrator = new PipelineOrchestrator(config, {
    resolver: new MetadataResolver(),
    paths: new ArtifactPathBuilder(config.outputBase),
    index,
    ingestion: new EmbeddingIngestionStage(index, new TranscriptLoader(), config.ingestion),
    outlinePlanner: new OutlinePlanner(runtime, prompts, index, config.generation),
    generation: new ContentGenerationStage(index, prompts, writer, config.generation),
    assembly: new DocumentAssemblyStage(),
    traceSource: runtime
  });

  return { config, orchestrator, embedder, writer };
}
