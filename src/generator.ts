import { compile } from "./generation/compiler.js";
import type { GenerationConfig } from "./generation/schema.js";
import { ModelCallError } from "./errors.js";
import type { ModelClient, TokenUsage } from "./llm.js";
import { createLogger, logMetric, type Logger } from "./logger.js";
import { buildScriptArtifact, type ScriptArtifact } from "./script.js";

export interface GenerationResult {
  prompt: string;
  response: string;
  script: ScriptArtifact;
  usage?: TokenUsage;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  now?: Date;
}

export interface ScriptGeneratorOptions {
  author?: string;
  logger?: Logger;
}

export class ScriptGenerator {
  private client: ModelClient;
  private author?: string;
  private log: Logger;

  constructor(client: ModelClient, options: ScriptGeneratorOptions = {}) {
    this.client = client;
    this.author = options.author;
    this.log = options.logger ?? createLogger("generator");
  }

  preview(config: GenerationConfig): string {
    return compile(config);
  }

  async generate(config: GenerationConfig, options: GenerateOptions = {}): Promise<GenerationResult> {
    const prompt = compile(config);
    this.log.debug(`Compiled prompt (${prompt.length} chars)`);

    this.log.info(`Requesting script from ${config.model_name}`);
    const result = await this.client.generate({
      prompt,
      model: config.model_name,
      temperature: config.temperature,
      maxTokens: config.max_tokens,
      signal: options.signal,
    });

    if (!result.text.trim()) {
      throw new ModelCallError("empty_response", "The model returned an empty response");
    }

    const script = buildScriptArtifact(result.text, {
      taskDescription: config.task_description,
      includeHeader: config.include_header,
      encoding: config.file_encoding,
      author: this.author,
      now: options.now,
    });

    await logMetric("generator", "generation_latency", result.durationMs, { model: config.model_name });
    this.log.info(`Generated ${script.fileName} in ${result.durationMs}ms`);

    return { prompt, response: result.text, script, usage: result.usage };
  }
}
