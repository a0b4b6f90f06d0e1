import path from "node:path";

import { AgentRunTrace } from "../../agents/runtime/agentRuntime.js";
import { writeJsonAtomic } from "../../utils/files.js";

/** Per-run ledger under `<runsDir>/<runId>`. */
export class PipelineArtifactStore {
  private readonly runDirectory: string;

  constructor(runsDirectory: string, readonly runId: string) {
    this.runDirectory = path.join(runsDirectory, runId);
  }

  get directoryPath(): string {
    return this.runDirectory;
  }

  async persistStageArtifact(stage: string, artifact: unknown): Promise<string> {
    const filePath = path.join(this.runDirectory, `${stage}.artifact.json`);
    await writeJsonAtomic(filePath, artifact);
    return filePath;
  }

  async persistTraces(traces: AgentRunTrace[]): Promise<string> {
    const filePath = path.join(this.runDirectory, "agent-traces.json");
    await writeJsonAtomic(filePath, traces);
    return filePath;
  }

  async persistRunSummary(summary: unknown): Promise<string> {
    const filePath = path.join(this.runDirectory, "run-summary.json");
    await writeJsonAtomic(filePath, summary);
    return filePath;
  }
}
