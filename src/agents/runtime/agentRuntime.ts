import { createGateway, generateText, type LanguageModel } from "ai";

import { AgentMode, RuntimeConfig } from "../../config/runtimeConfig.js";
import { describeError } from "../../domain/errors.js";
import { parseJsonFromModelText } from "../../utils/json.js";
import { logRetry, RetryPolicy, withRetry } from "../../utils/retry.js";
import { createId } from "../../utils/text.js";

export interface AgentRequest {
  stage: string;
  agentName: string;
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  retryCount?: number;
}

export interface TextAgentRequest extends AgentRequest {
  mockResponse: () => string;
}

export interface JsonAgentRequest<T> extends AgentRequest {
  parse: (value: unknown) => T;
  fallback: () => T;
}

export interface AgentRunTrace {
  traceId: string;
  stage: string;
  agentName: string;
  mode: AgentMode;
  model: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  attemptCount: number;
  inputTokens: number;
  outputTokens: number;
  fallbackUsed: boolean;
  errorMessage?: string;
}

export interface AgentRunResult<T> {
  data: T;
  trace: AgentRunTrace;
  rawText: string;
}

interface Generation {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

interface TraceInput {
  request: AgentRequest;
  mode: AgentMode;
  startedAt: string;
  startedAtMs: number;
  attemptCount: number;
  generation?: Generation;
  fallbackUsed: boolean;
  errorMessage?: string;
}

export class AgentRuntime {
  private readonly model?: LanguageModel;
  private readonly traces: AgentRunTrace[] = [];

  constructor(private readonly config: RuntimeConfig) {
    if (config.mode === "live") {
      const gateway = createGateway({
        apiKey: config.gatewayApiKey
      });
      this.model = gateway(config.writerModel);
    }
  }

  get mode(): AgentMode {
    return this.config.mode;
  }

  /**
   * Free-form completion. Live failures are retried with backoff and then
   * rethrown; there is no fallback text outside mock mode.
   */
  async runText(request: TextAgentRequest): Promise<AgentRunResult<string>> {
    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();

    if (this.config.mode === "mock") {
      const text = request.mockResponse();
      const trace = this.record({ request, mode: "mock", startedAt, startedAtMs, attemptCount: 1, fallbackUsed: true });
      return { data: text, trace, rawText: "" };
    }

    let attemptCount = 0;
    try {
      const generation = await withRetry(
        (attempt) => {
          attemptCount = attempt;
          return this.generate(request);
        },
        this.retryPolicy(request)
      );
      const trace = this.record({
        request,
        mode: "live",
        startedAt,
        startedAtMs,
        attemptCount,
        generation,
        fallbackUsed: false
      });
      return { data: generation.text, trace, rawText: generation.text };
    } catch (error) {
      this.record({
        request,
        mode: "live",
        startedAt,
        startedAtMs,
        attemptCount,
        fallbackUsed: false,
        errorMessage: describeError(error)
      });
      throw error;
    }
  }

  /**
   * Structured completion. A response that never parses falls back to
   * `request.fallback()` after the last attempt.
   */
  async runJson<T>(request: JsonAgentRequest<T>): Promise<AgentRunResult<T>> {
    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();

    if (this.config.mode === "mock") {
      const data = request.fallback();
      const trace = this.record({ request, mode: "mock", startedAt, startedAtMs, attemptCount: 1, fallbackUsed: true });
      return { data, trace, rawText: "" };
    }

    let attemptCount = 0;
    try {
      const { generation, data } = await withRetry(async (attempt) => {
        attemptCount = attempt;
        const generation = await this.generate(request);
        return { generation, data: request.parse(parseJsonFromModelText(generation.text)) };
      }, this.retryPolicy(request));

      const trace = this.record({
        request,
        mode: "live",
        startedAt,
        startedAtMs,
        attemptCount,
        generation,
        fallbackUsed: false
      });
      return { data, trace, rawText: generation.text };
    } catch (error) {
      const trace = this.record({
        request,
        mode: "live",
        startedAt,
        startedAtMs,
        attemptCount,
        fallbackUsed: true,
        errorMessage: describeError(error)
      });
      return { data: request.fallback(), trace, rawText: "" };
    }
  }

  drainTraces(): AgentRunTrace[] {
    return this.traces.splice(0, this.traces.length);
  }

  private async generate(request: AgentRequest): Promise<Generation> {
    if (!this.model) {
      throw new Error("Language model is not configured in mock mode.");
    }

    const result = await generateText({
      model: this.model,
      maxOutputTokens: request.maxOutputTokens ?? this.config.maxOutputTokens,
      temperature: request.temperature ?? this.config.temperature,
      system: request.systemPrompt,
      prompt: request.userPrompt,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(this.config.requestTimeoutMs)
    });

    return {
      text: result.text.trim(),
      inputTokens: result.usage?.inputTokens ?? 0,
      outputTokens: result.usage?.outputTokens ?? 0
    };
  }

  private retryPolicy(request: AgentRequest): RetryPolicy {
    return {
      label: `${request.stage}/${request.agentName}`,
      retries: request.retryCount ?? this.config.retryCount,
      baseDelayMs: this.config.retryBaseDelayMs,
      onRetry: logRetry(`agent:${request.stage}`)
    };
  }

  private record(input: TraceInput): AgentRunTrace {
    const trace: AgentRunTrace = {
      traceId: createId("trace", `${input.request.stage}-${input.request.agentName}-${input.startedAtMs}`),
      stage: input.request.stage,
      agentName: input.request.agentName,
      mode: input.mode,
      model: input.mode === "live" ? this.config.writerModel : "mock-runtime",
      startedAt: input.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - input.startedAtMs,
      attemptCount: input.attemptCount,
      inputTokens: input.generation?.inputTokens ?? 0,
      outputTokens: input.generation?.outputTokens ?? 0,
      fallbackUsed: input.fallbackUsed,
      errorMessage: input.errorMessage
    };

    this.traces.push(trace);
    if (this.config.verboseAgentLogs) {
      this.logTrace(trace);
    }
    return trace;
  }

  private logTrace(trace: AgentRunTrace): void {
    const fallbackMarker = trace.fallbackUsed ? "fallback" : "primary";
    const outcome = trace.errorMessage ? ` failed: ${trace.errorMessage}` : "";
    console.log(
      `[agent:${trace.stage}] ${trace.agentName} ${trace.mode}/${fallbackMarker} in ${trace.durationMs}ms (${trace.inputTokens}/${trace.outputTokens} tokens)${outcome}`
    );
  }
}
