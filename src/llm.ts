import { generateText, APICallError, LoadAPIKeyError, RetryError } from "ai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { ModelCallError } from "./errors.js";
import { createLogger, logMetric } from "./logger.js";

const log = createLogger("llm");

export interface ModelRequest {
  prompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelResult {
  text: string;
  durationMs: number;
  usage?: TokenUsage;
}

/** Anything that can turn a prompt into text: Gemini in production, fakes in tests. */
export interface ModelClient {
  generate(request: ModelRequest): Promise<ModelResult>;
}

export interface GeminiClientOptions {
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

// Sampling settings the generator has always used alongside temperature.
export const SAMPLING = { topP: 0.8, topK: 40 } as const;

export function toModelCallError(error: unknown): ModelCallError {
  if (error instanceof ModelCallError) return error;
  if (RetryError.isInstance(error)) return toModelCallError(error.lastError);

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 429) {
      return new ModelCallError("rate_limit", "Model API rate limit reached", { status, cause: error });
    }
    if (status === 401 || status === 403) {
      return new ModelCallError("auth", "Model API rejected the credentials", { status, cause: error });
    }
    return new ModelCallError("upstream", `Model API error${status ? ` ${status}` : ""}: ${error.message}`, { status, cause: error });
  }

  if (LoadAPIKeyError.isInstance(error)) {
    return new ModelCallError("auth", "No API key found. Set GEMINI_API_KEY.", { cause: error });
  }

  if (error instanceof Error && error.name === "TimeoutError") {
    return new ModelCallError("timeout", "Model request timed out", { cause: error });
  }
  if (error instanceof Error && error.name === "AbortError") {
    return new ModelCallError("aborted", "Model request was cancelled", { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ModelCallError("network", `Model request failed: ${message}`, { cause: error });
}

function withTimeout(timeoutMs: number, outer?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new ModelCallError("timeout", `Model request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const forward = () => controller.abort(outer?.reason);
  if (outer?.aborted) {
    forward();
  } else {
    outer?.addEventListener("abort", forward, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", forward);
    },
  };
}

export class GeminiClient implements ModelClient {
  private provider: ReturnType<typeof createGoogleGenerativeAI>;
  private timeoutMs: number;
  private maxRetries: number;

  constructor(options: GeminiClientOptions = {}) {
    this.provider = createGoogleGenerativeAI({ apiKey: options.apiKey });
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.maxRetries = options.maxRetries ?? 2;
  }

  async generate(request: ModelRequest): Promise<ModelResult> {
    const { signal, dispose } = withTimeout(this.timeoutMs, request.signal);
    const start = Date.now();

    try {
      log.debug(`Calling ${request.model} (temperature ${request.temperature}, max ${request.maxTokens} tokens)`);
      const { text, usage } = await generateText({
        model: this.provider(request.model),
        prompt: request.prompt,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        topP: SAMPLING.topP,
        topK: SAMPLING.topK,
        maxRetries: this.maxRetries,
        abortSignal: signal,
      });
      const durationMs = Date.now() - start;

      await logMetric("llm", "llm_latency", durationMs, { model: request.model });
      await logMetric("llm", "llm_tokens_total", usage.totalTokens, { model: request.model });

      return {
        text,
        durationMs,
        usage: {
          promptTokens: usage.promptTokens,
          completionTokens: usage.completionTokens,
          totalTokens: usage.totalTokens,
        },
      };
    } catch (e) {
      const reason: unknown = signal.aborted ? signal.reason : undefined;
      const failure = toModelCallError(reason instanceof ModelCallError ? reason : e);
      await logMetric("llm", "llm_error", 1, { model: request.model, kind: failure.kind });
      log.error(`${request.model} failed: ${failure.message}`);
      throw failure;
    } finally {
      dispose();
    }
  }
}
