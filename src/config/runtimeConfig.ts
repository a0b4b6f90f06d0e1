import path from "node:path";
import { fileURLToPath } from "node:url";

import { ConfigurationError } from "../domain/errors.js";

export type AgentMode = "live" | "mock";

export interface RuntimeConfig {
  mode: AgentMode;
  gatewayApiKey?: string;
  writerModel: string;
  embeddingModel: string;
  maxOutputTokens: number;
  temperature: number;
  retryCount: number;
  retryBaseDelayMs: number;
  requestTimeoutMs: number;
  verboseAgentLogs: boolean;
}

export interface IngestionConfig {
  chunkSize: number;
  embeddingBatchSize: number;
}

export interface GenerationConfig {
  sectionConcurrency: number;
  topK: number;
  outlineTopK: number;
  outlineFile?: string;
}

export interface PipelineConfig {
  metadataFile: string;
  topicNumber: number;
  outputBase: string;
  overwrite: boolean;
  runLoad: boolean;
  runCall: boolean;
  runGenerate: boolean;
  vectorTableName: string;
  runtime: RuntimeConfig;
  ingestion: IngestionConfig;
  generation: GenerationConfig;
  promptsDirectory: string;
  templatesDirectory: string;
}

export interface CliFlags {
  overwrite?: boolean;
  skipLoad?: boolean;
  skipCall?: boolean;
  skipGenerate?: boolean;
  metadataFile?: string;
  topicNumber?: string;
}

type Environment = Record<string, string | undefined>;

const DEFAULT_WRITER_MODEL = "openai/gpt-4o";
const DEFAULT_EMBEDDING_MODEL = "openai/text-embedding-3-small";
const DEFAULT_TABLE_NAME = "lecture_transcripts";
const PROJECT_ROOT = fileURLToPath(new URL("../../", import.meta.url));

export const DEFAULT_PROMPTS_DIRECTORY = path.join(PROJECT_ROOT, "prompts");
export const DEFAULT_TEMPLATES_DIRECTORY = path.join(PROJECT_ROOT, "templates");

export function loadPipelineConfig(env: Environment = process.env, flags: CliFlags = {}): PipelineConfig {
  const metadataFile = flags.metadataFile?.trim() || readOptionalString(env, "METADATA_FILE");
  if (!metadataFile) {
    throw new ConfigurationError("METADATA_FILE is required (or pass --metadata <file>).");
  }

  const topicRaw = flags.topicNumber?.trim() || readOptionalString(env, "TOPIC_NUMBER");
  if (!topicRaw) {
    throw new ConfigurationError("TOPIC_NUMBER is required (or pass --topic <n>).");
  }

  const outlineFile = readOptionalString(env, "D2R_OUTLINE_FILE");

  return {
    metadataFile: path.resolve(metadataFile),
    topicNumber: parseTopicNumber(topicRaw),
    outputBase: path.resolve(
      readOptionalString(env, "D2R_OUTPUT_BASE") ?? readString(env, "INPUT_BASE_DIR", "./outputs")
    ),
    overwrite: flags.overwrite ?? readBoolean(env, "D2R_OVERWRITE", false),
    runLoad: !(flags.skipLoad ?? readBoolean(env, "D2R_SKIP_LOAD", false)),
    runCall: !(flags.skipCall ?? false),
    runGenerate: !(flags.skipGenerate ?? false),
    vectorTableName: parseTableName(readString(env, "VECTOR_TABLE_NAME", DEFAULT_TABLE_NAME)),
    runtime: loadRuntimeConfig(env),
    ingestion: {
      chunkSize: readInteger(env, "D2R_CHUNK_SIZE", 1200, 200),
      embeddingBatchSize: readInteger(env, "D2R_EMBEDDING_BATCH_SIZE", 64, 1)
    },
    generation: {
      sectionConcurrency: readInteger(env, "D2R_SECTION_CONCURRENCY", 4, 1),
      topK: readInteger(env, "D2R_TOP_K", 20, 1),
      outlineTopK: readInteger(env, "D2R_OUTLINE_TOP_K", 500, 1),
      outlineFile: outlineFile ? path.resolve(outlineFile) : undefined
    },
    promptsDirectory: path.resolve(readString(env, "D2R_PROMPTS_DIR", DEFAULT_PROMPTS_DIRECTORY)),
    templatesDirectory: path.resolve(readString(env, "D2R_TEMPLATES_DIR", DEFAULT_TEMPLATES_DIRECTORY))
  };
}

export function loadRuntimeConfig(env: Environment = process.env): RuntimeConfig {
  const gatewayApiKey = readOptionalString(env, "AI_GATEWAY_API_KEY");
  const mode = resolveMode(env, gatewayApiKey);

  if (mode === "live" && !gatewayApiKey) {
    throw new ConfigurationError(
      "AI_GATEWAY_API_KEY is required for live agent mode. Set D2R_AGENT_MODE=mock to run without API calls."
    );
  }

  return {
    mode,
    gatewayApiKey,
    writerModel: readString(env, "AI_WRITER_MODEL", DEFAULT_WRITER_MODEL),
    embeddingModel: readString(env, "EMBEDDING_MODEL", DEFAULT_EMBEDDING_MODEL),
    maxOutputTokens: readInteger(env, "D2R_MAX_OUTPUT_TOKENS", 4096, 256),
    temperature: readNumber(env, "D2R_TEMPERATURE", 0.2, 0),
    retryCount: readInteger(env, "D2R_RETRY_COUNT", 2, 0),
    retryBaseDelayMs: readInteger(env, "D2R_RETRY_BASE_DELAY_MS", 500, 0),
    requestTimeoutMs: readInteger(env, "D2R_REQUEST_TIMEOUT_MS", 90000, 1000),
    verboseAgentLogs: readBoolean(env, "D2R_VERBOSE_AGENT_LOGS", true)
  };
}

function resolveMode(env: Environment, apiKey: string | undefined): AgentMode {
  const raw = readString(env, "D2R_AGENT_MODE", "auto").toLowerCase();

  if (raw === "live") {
    return "live";
  }
  if (raw === "mock") {
    return "mock";
  }
  if (raw !== "auto") {
    throw new ConfigurationError(`D2R_AGENT_MODE must be auto, live or mock. Received: ${raw}`);
  }

  return apiKey ? "live" : "mock";
}

function parseTopicNumber(raw: string): number {
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new ConfigurationError(`TOPIC_NUMBER must be a positive integer. Received: ${raw}`);
  }
  return Number(raw);
}

function parseTableName(raw: string): string {
  if (!/^[A-Za-z0-9_]+$/.test(raw)) {
    throw new ConfigurationError(`VECTOR_TABLE_NAME may only contain letters, digits and underscores. Received: ${raw}`);
  }
  return raw;
}

function readOptionalString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : undefined;
}

function readString(env: Environment, name: string, fallback: string): string {
  return readOptionalString(env, name) ?? fallback;
}

function readNumber(env: Environment, name: string, fallback: number, min: number): number {
  const raw = readOptionalString(env, name);
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new ConfigurationError(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
  }

  return parsed;
}

function readInteger(env: Environment, name: string, fallback: number, min: number): number {
  const value = readNumber(env, name, fallback, min);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer. Received: ${value}`);
  }
  return value;
}

function readBoolean(env: Environment, name: string, fallback: boolean): boolean {
  const raw = readOptionalString(env, name)?.toLowerCase();
  if (!raw) {
    return fallback;
  }

  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }

  throw new ConfigurationError(`${name} must be a boolean (true/false). Received: ${raw}`);
}
