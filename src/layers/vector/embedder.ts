import { createGateway, embedMany, type EmbeddingModel } from "ai";

import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { logRetry, withRetry } from "../../utils/retry.js";

export interface Embedder {
  readonly modelId: string;
  embed(values: string[]): Promise<number[][]>;
}

export class GatewayEmbedder implements Embedder {
  private readonly model: EmbeddingModel<string>;

  constructor(private readonly config: RuntimeConfig) {
    const gateway = createGateway({
      apiKey: config.gatewayApiKey
    });
    this.model = gateway.textEmbeddingModel(config.embeddingModel);
  }

  get modelId(): string {
    return this.config.embeddingModel;
  }

  async embed(values: string[]): Promise<number[][]> {
    if (values.length === 0) {
      return [];
    }

    return withRetry(
      async () => {
        const { embeddings } = await embedMany({
          model: this.model,
          values,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(this.config.requestTimeoutMs)
        });
        return embeddings;
      },
      {
        label: `embed ${values.length} value(s)`,
        retries: this.config.retryCount,
        baseDelayMs: this.config.retryBaseDelayMs,
        onRetry: logRetry("embed")
      }
    );
  }
}

/**
 * Offline embedder for mock runs: hashes lowercase word tokens into a fixed
 * number of buckets and L2-normalizes the counts.
 */
export class HashingEmbedder implements Embedder {
  readonly modelId: string;

  constructor(private readonly dimension = 256) {
    this.modelId = `hashing-${dimension}`;
  }

  async embed(values: string[]): Promise<number[][]> {
    return values.map((value) => this.embedOne(value));
  }

  private embedOne(value: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = value.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    for (const token of tokens) {
      vector[fnv1a(token) % this.dimension] += 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, component) => sum + component * component, 0));
    return norm === 0 ? vector : vector.map((component) => component / norm);
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function createEmbedder(config: RuntimeConfig): Embedder {
  return config.mode === "live" ? new GatewayEmbedder(config) : new HashingEmbedder();
}
