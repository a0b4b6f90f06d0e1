export type PipelineStage = "resolve" | "load" | "call" | "generate";

export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {}

export class ResolutionError extends PipelineError {}

export class IngestError extends PipelineError {}

export class GenerationError extends PipelineError {
  constructor(
    message: string,
    public readonly sectionId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PartialGenerationFailure extends PipelineError {
  constructor(
    public readonly failedSectionIds: string[],
    public readonly attemptedCount: number
  ) {
    super(
      `${failedSectionIds.length} of ${attemptedCount} section(s) failed to generate: ${failedSectionIds.join(", ")}`
    );
  }
}

export class AssemblyError extends PipelineError {}

export class MissingPrerequisiteError extends PipelineError {
  constructor(
    public readonly stage: PipelineStage,
    public readonly artifact: string
  ) {
    super(`Stage "${stage}" was skipped but its artifact is missing: ${artifact}`);
  }
}

export function describeError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return "Unknown error.";
}
