#!/usr/bin/env node
import "dotenv/config";

import { parseCliFlags, USAGE } from "./config/cliFlags.js";
import { loadPipelineConfig } from "./config/runtimeConfig.js";
import { describeError } from "./domain/errors.js";
import { createOrchestrator } from "./pipeline.js";

async function main(): Promise<void> {
  const cli = parseCliFlags(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return;
  }

  const config = loadPipelineConfig(process.env, cli.flags);
  console.log(
    `[bootstrap] Lecture notes for topic ${config.topicNumber} in ${config.runtime.mode} mode (${config.runtime.writerModel}, ${config.runtime.embeddingModel}) -> ${config.outputBase}`
  );

  const result = await createOrchestrator(config).run();

  if (result.state === "FAILED") {
    console.error(`Pipeline FAILED at stage "${result.stage}": ${result.error.message}`);
    if (result.runDirectory) {
      console.error(`  Run artifacts: ${result.runDirectory}`);
    }
    process.exitCode = 1;
    return;
  }

  console.log(`Pipeline MERGED: ${result.moduleRef?.moduleName ?? "module"}`);
  if (result.ingest) {
    const ingest = result.ingest;
    console.log(
      ingest.skipped
        ? "  Index: reused"
        : `  Index: ${ingest.documentsIndexed} document(s), ${ingest.chunksIndexed} passage(s)`
    );
  }
  if (result.generation) {
    console.log(
      `  Sections: ${result.generation.generatedIds.length} generated, ${result.generation.reusedIds.length} reused, ${result.generation.failures.length} failed`
    );
  }
  if (result.assembly) {
    const expected = result.assembly.sectionsExpected ?? result.assembly.sectionsIncluded;
    console.log(`  Document: ${result.assembly.mergedDocPath} (${result.assembly.sectionsIncluded}/${expected} sections)`);
  } else if (result.paths) {
    console.log(`  Document: ${result.paths.mergedDocPath} (unchanged)`);
  }
  for (const warning of result.warnings) {
    console.warn(`  Warning: ${warning.message}`);
  }
  if (result.runDirectory) {
    console.log(`  Run artifacts: ${result.runDirectory}`);
  }
}

main().catch((error: unknown) => {
  console.error(`Pipeline failed: ${describeError(error)}`);
  process.exitCode = 1;
});
