import { AgentRuntime } from "./agents/runtime/agentRuntime.js";
import { PipelineConfig } from "./config/runtimeConfig.js";
import { DocumentAssemblyStage } from "./layers/assembly/documentAssemblyStage.js";
import { ContentGenerationStage } from "./layers/generation/contentGenerationStage.js";
import { RuntimeContentWriter } from "./layers/generation/contentWriter.js";
import { OutlinePlanner } from "./layers/generation/outlinePlanner.js";
import { PromptLibrary } from "./layers/generation/promptLibrary.js";
import { EmbeddingIngestionStage } from "./layers/ingestion/embeddingIngestionStage.js";
import { TranscriptLoader } from "./layers/ingestion/transcriptLoader.js";
import { MetadataResolver } from "./layers/metadata/metadataResolver.js";
import { PipelineOrchestrator } from "./layers/orchestration/pipelineOrchestrator.js";
import { ArtifactPathBuilder } from "./layers/paths/artifactPathBuilder.js";
import { createEmbedder } from "./layers/vector/embedder.js";
import { VectorIndex } from "./layers/vector/vectorIndex.js";
import { FileVectorStore } from "./layers/vector/vectorStore.js";

/** Wires the live or mock collaborators for one pipeline run. */
export function createOrchestrator(config: PipelineConfig): PipelineOrchestrator {
  const runtime = new AgentRuntime(config.runtime);
  const index = new VectorIndex(
    createEmbedder(config.runtime),
    new FileVectorStore(),
    config.ingestion.embeddingBatchSize
  );
  const prompts = new PromptLibrary(config.promptsDirectory);

  return new PipelineOrchestrator(config, {
    resolver: new MetadataResolver(),
    paths: new ArtifactPathBuilder(config.outputBase),
    index,
    ingestion: new EmbeddingIngestionStage(index, new TranscriptLoader(), config.ingestion),
    outlinePlanner: new OutlinePlanner(runtime, prompts, index, config.generation),
    generation: new ContentGenerationStage(index, prompts, new RuntimeContentWriter(runtime), config.generation),
    assembly: new DocumentAssemblyStage(),
    traceSource: runtime
  });
}
