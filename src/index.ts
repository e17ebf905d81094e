/**
 * pwsh-forge library entry: the instruction compiler plus the pieces the CLI
 * and the web form are built from.
 */
export { compile, constraintClauses } from './generation/compiler.js';
export {
  GenerationConfigSchema,
  GENERATION_DEFAULTS,
  MAX_OUTPUT_TOKENS,
  MODEL_NAMES,
  PROMPT_PRESETS,
  TARGET_OS_OPTIONS,
  parseGenerationConfig,
  type GenerationConfig,
  type GenerationInput,
} from './generation/schema.js';
export { PRESETS, applyPreset } from './generation/presets.js';
export { InvalidConfigError, ModelCallError, type ConfigIssue, type ModelErrorKind } from './errors.js';
export { GeminiClient, toModelCallError, type ModelClient, type ModelRequest, type ModelResult } from './llm.js';
export { ScriptGenerator, type GenerationResult } from './generator.js';
export {
  buildScriptArtifact,
  encodeScript,
  extractScript,
  scriptFileName,
  writeScript,
  type ScriptArtifact,
} from './script.js';
export { loadConfig, type Config } from './config.js';
export { createApp } from './server.js';
