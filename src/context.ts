/**
 * Application context - config, model client and generator wired together
 * once per process for the CLI and the web form.
 */

import { loadConfig, type Config } from './config.js';
import { ScriptGenerator } from './generator.js';
import { GeminiClient, type ModelClient } from './llm.js';
import { setLogLevel, setMetricsEnabled } from './logger.js';

export interface AppContext {
  config: Config;
  generator: ScriptGenerator;
}

export async function createContext(
  cwd: string = process.cwd(),
  client?: ModelClient
): Promise<AppContext> {
  const config = await loadConfig(cwd);
  setLogLevel(config.logLevel);
  setMetricsEnabled(config.metrics);

  const modelClient = client ?? new GeminiClient({
    apiKey: config.apiKey,
    timeoutMs: config.model.timeoutMs,
    maxRetries: config.model.maxRetries,
  });

  return {
    config,
    generator: new ScriptGenerator(modelClient, { author: config.author }),
  };
}
