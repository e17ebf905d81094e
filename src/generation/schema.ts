import { z } from "zod";
import { InvalidConfigError } from "../errors.js";
import { presetTemplate } from "./presets.js";

export const MODEL_NAMES = ["gemini-2.0-flash-exp", "gemini-1.5-flash", "gemini-1.5-pro"] as const;
export const PROMPT_PRESETS = ["none", "list_files", "manage_processes", "manage_services"] as const;
export const DETAIL_LEVELS = ["low", "medium", "high"] as const;
export const POWERSHELL_VERSIONS = ["7", "5.1"] as const;
export const TARGET_OS_OPTIONS = [
  "Windows Server 2022",
  "Windows Server 2019",
  "Windows Server 2016",
  "Windows Server 2012 R2",
  "Windows Server 2012",
  "Windows Server 2008 R2",
  "Windows Server 2008",
  "Windows 11",
  "Windows 10",
  "Windows 8.1",
  "Windows 8",
  "Windows 7",
  "Windows",
] as const;
export const FILE_ENCODINGS = ["utf-8", "ascii", "ansi"] as const;
export const VERBOSITY_LEVELS = ["terse", "normal", "verbose"] as const;
export const SCRIPT_TYPES = ["interactive", "unattended"] as const;
export const SECURITY_LEVELS = ["standard", "hardened"] as const;
export const LOGGING_LEVELS = ["none", "basic", "detailed"] as const;

// Gemini's output ceiling for the supported models.
export const MAX_OUTPUT_TOKENS = 8192;

export const ModelNameSchema = z.enum(MODEL_NAMES);
export const PromptPresetSchema = z.enum(PROMPT_PRESETS);
export const FileEncodingSchema = z.enum(FILE_ENCODINGS);

export const GenerationConfigSchema = z.object({
  task_description: z.string().refine((s) => s.trim().length > 0, "task description must not be empty"),
  model_name: ModelNameSchema.default("gemini-2.0-flash-exp"),
  temperature: z.number().min(0).max(1).default(0.7),
  max_tokens: z.number().int().min(1).max(MAX_OUTPUT_TOKENS).default(MAX_OUTPUT_TOKENS),
  prompt_preset: PromptPresetSchema.default("none"),
  prompt_detail_level: z.enum(DETAIL_LEVELS).default("medium"),
  powershell_version: z.enum(POWERSHELL_VERSIONS).default("7"),
  target_os: z.enum(TARGET_OS_OPTIONS).default("Windows Server 2016"),
  file_encoding: FileEncodingSchema.default("utf-8"),
  include_header: z.boolean().default(false),
  include_error_handling: z.boolean().default(false),
  verbosity: z.enum(VERBOSITY_LEVELS).default("normal"),
  script_type: z.enum(SCRIPT_TYPES).default("unattended"),
  security_level: z.enum(SECURITY_LEVELS).default("standard"),
  logging_level: z.enum(LOGGING_LEVELS).default("none"),
}).strict();

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type GenerationInput = z.input<typeof GenerationConfigSchema>;

export type ModelName = GenerationConfig["model_name"];
export type PromptPreset = GenerationConfig["prompt_preset"];
export type FileEncoding = GenerationConfig["file_encoding"];

export const GENERATION_DEFAULTS: Omit<GenerationConfig, "task_description"> = {
  model_name: "gemini-2.0-flash-exp",
  temperature: 0.7,
  max_tokens: MAX_OUTPUT_TOKENS,
  prompt_preset: "none",
  prompt_detail_level: "medium",
  powershell_version: "7",
  target_os: "Windows Server 2016",
  file_encoding: "utf-8",
  include_header: false,
  include_error_handling: false,
  verbosity: "normal",
  script_type: "unattended",
  security_level: "standard",
  logging_level: "none",
};

const PresetFallbackSchema = z.object({
  task_description: z.string().optional(),
  prompt_preset: PromptPresetSchema.optional(),
}).passthrough();

/**
 * Validate raw form or flag input. A blank description with a preset picks
 * up the preset's template and consumes the preset.
 */
export function parseGenerationConfig(input: unknown): GenerationConfig {
  let candidate = input;

  const fallback = PresetFallbackSchema.safeParse(input);
  if (fallback.success) {
    const { task_description, prompt_preset } = fallback.data;
    const template = prompt_preset ? presetTemplate(prompt_preset) : null;
    if (template !== null && !task_description?.trim()) {
      candidate = { ...fallback.data, task_description: template, prompt_preset: "none" };
    }
  }

  const result = GenerationConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw InvalidConfigError.fromZod(result.error);
  }
  return result.data;
}
